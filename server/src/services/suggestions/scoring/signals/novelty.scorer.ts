/**
 * Novelty signal: how unfamiliar a place is relative to the user's history,
 * scaled by their novelty tolerance.
 */

import { scoreNormalizer } from '../score-normalizer.js';
import { normalizeCategory } from '../category-mapper.js';
import { NEUTRAL_WEIGHT, type TasteProfile } from '../../profile/taste-profile.js';
import type { ImplicitProfile, Place } from '../../types.js';

const NO_HISTORY_SCORE = 0.5;
const VISITED_PENALTY = 0.8;
const PER_CATEGORY_FAMILIARITY_CAP = 0.3;
const TOTAL_FAMILIARITY_CAP = 0.4;
const VISITS_FOR_FULL_FAMILIARITY = 10;

function hasHistory(profile: ImplicitProfile | undefined): profile is ImplicitProfile {
  if (!profile) return false;
  return profile.visitedPlaceIds.length > 0 || Object.keys(profile.categoryVisitCounts).length > 0;
}

export function familiarityPenalty(place: Place, categoryVisitCounts: Record<string, number>): number {
  const counts = new Map<string, number>();
  for (const [category, visits] of Object.entries(categoryVisitCounts)) {
    counts.set(normalizeCategory(category), visits);
  }

  let penalty = 0;
  for (const category of new Set(place.categories.map(normalizeCategory))) {
    const visits = counts.get(category) ?? 0;
    if (visits > 0) {
      penalty += Math.min(visits / VISITS_FOR_FULL_FAMILIARITY, PER_CATEGORY_FAMILIARITY_CAP);
    }
  }
  return Math.min(penalty, TOTAL_FAMILIARITY_CAP);
}

export function scoreNovelty(
  place: Place,
  implicitProfile: ImplicitProfile | undefined,
  tasteProfile: TasteProfile | undefined
): number {
  if (!hasHistory(implicitProfile)) {
    return NO_HISTORY_SCORE;
  }

  const tolerance = tasteProfile?.noveltyTolerance ?? NEUTRAL_WEIGHT;
  const scale = 0.5 + tolerance / 2;

  let raw = 1;
  if (implicitProfile.visitedPlaceIds.includes(place.id)) {
    raw -= VISITED_PENALTY;
  }
  raw -= familiarityPenalty(place, implicitProfile.categoryVisitCounts);

  return scoreNormalizer.clamp(scoreNormalizer.clamp(raw) * scale);
}
