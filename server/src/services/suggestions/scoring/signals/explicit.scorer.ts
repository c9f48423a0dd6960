/**
 * Explicit signal: the user's stated taste profile against what the place offers.
 */

import { scoreNormalizer } from '../score-normalizer.js';
import type { CategoryMapper } from '../category-mapper.js';
import { TASTE_INTERESTS, type TasteInterest, type TasteProfile } from '../../profile/taste-profile.js';
import type { Place } from '../../types.js';

export interface ExplicitSignal {
  score: number;
  /** Interests the place maps to that the user weights above neutral, strongest first */
  matchedInterests: TasteInterest[];
}

const INTEREST_SHARE = 0.8;
const MATCH_THRESHOLD = 0.6;

export function scoreExplicit(place: Place, profile: TasteProfile | undefined, mapper: CategoryMapper): ExplicitSignal {
  if (!profile) {
    return { score: 0, matchedInterests: [] };
  }

  const placeInterests = mapper.placeInterests(place);
  let weightedSum = 0;
  let totalWeight = 0;
  const matched: Array<{ interest: TasteInterest; strength: number }> = [];

  for (const interest of TASTE_INTERESTS) {
    const placeWeight = placeInterests[interest];
    if (placeWeight === undefined || placeWeight <= 0) continue;

    const userWeight = profile.interests[interest];
    weightedSum += placeWeight * userWeight;
    totalWeight += placeWeight;

    if (userWeight >= MATCH_THRESHOLD) {
      matched.push({ interest, strength: placeWeight * userWeight });
    }
  }

  if (totalWeight === 0) {
    return { score: 0.5, matchedInterests: [] };
  }

  let score = weightedSum / totalWeight;

  const preferences = mapper.placePreferences(place);
  if (preferences.length > 0) {
    const preferenceMean =
      preferences.reduce((sum, preference) => sum + profile.preferences[preference], 0) / preferences.length;
    score = INTEREST_SHARE * score + (1 - INTEREST_SHARE) * preferenceMean;
  }

  matched.sort((a, b) => b.strength - a.strength || a.interest.localeCompare(b.interest));
  return {
    score: scoreNormalizer.clamp(score),
    matchedInterests: matched.map(m => m.interest)
  };
}
