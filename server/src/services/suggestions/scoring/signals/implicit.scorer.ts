/**
 * Implicit signal: learned behavioral affinity (cuisines, categories).
 * 0 without an implicit profile.
 */

import { scoreNormalizer } from '../score-normalizer.js';
import { normalizeCategory } from '../category-mapper.js';
import type { ImplicitProfile, Place } from '../../types.js';

export interface ImplicitSignal {
  score: number;
  favoriteCuisines: string[];
  favoriteCategories: string[];
}

const BASE = 0.5;
const CUISINE_MATCH_BOOST = 0.3;
const CATEGORY_MATCH_BOOST = 0.2;
const AVOIDED_PENALTY = 0.4;

function intersect(values: readonly string[], wanted: readonly string[]): string[] {
  const wantedSet = new Set(wanted.map(normalizeCategory));
  return values.filter(value => wantedSet.has(normalizeCategory(value)));
}

export function scoreImplicit(place: Place, profile: ImplicitProfile | undefined): ImplicitSignal {
  if (!profile) {
    return { score: 0, favoriteCuisines: [], favoriteCategories: [] };
  }

  const cuisines = place.cuisines ?? [];
  const favoriteCuisines = intersect(cuisines, profile.favoriteCuisines);
  const favoriteCategories = intersect(place.categories, profile.favoriteCategories);
  const avoided =
    intersect(cuisines, profile.avoidedCuisines).length > 0 ||
    intersect(place.categories, profile.avoidedCategories).length > 0;

  let score = BASE;
  if (favoriteCuisines.length > 0) score += CUISINE_MATCH_BOOST;
  if (favoriteCategories.length > 0) score += CATEGORY_MATCH_BOOST;
  if (avoided) score -= AVOIDED_PENALTY;

  return { score: scoreNormalizer.clamp(score), favoriteCuisines, favoriteCategories };
}
