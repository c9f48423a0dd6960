/**
 * Category Mapper
 * Maps provider place types to taste-profile interest dimensions
 * and descriptive features to preference dimensions.
 */

import categoryInterests from './data/category-interests.json' with { type: 'json' };
import contextFit from './data/context-fit.json' with { type: 'json' };
import {
  TASTE_INTERESTS,
  TASTE_PREFERENCES,
  type TasteInterest,
  type TastePreference
} from '../profile/taste-profile.js';
import type { Place } from '../types.js';

export type InterestWeights = Partial<Record<TasteInterest, number>>;

function toInterest(key: string): TasteInterest | undefined {
  return TASTE_INTERESTS.find(interest => interest === key);
}

function toPreference(key: string): TastePreference | undefined {
  return TASTE_PREFERENCES.find(preference => preference === key);
}

function parseInterestTable(raw: Record<string, Record<string, number>>): Map<string, InterestWeights> {
  const table = new Map<string, InterestWeights>();
  for (const [category, weights] of Object.entries(raw)) {
    const parsed: InterestWeights = {};
    for (const [key, weight] of Object.entries(weights)) {
      const interest = toInterest(key);
      if (interest) parsed[interest] = weight;
    }
    table.set(category, parsed);
  }
  return table;
}

function parseFeatureTable(raw: Record<string, string>): Map<string, TastePreference> {
  const table = new Map<string, TastePreference>();
  for (const [feature, key] of Object.entries(raw)) {
    const preference = toPreference(key);
    if (preference) table.set(feature, preference);
  }
  return table;
}

export function normalizeCategory(category: string): string {
  return category.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export class CategoryMapper {
  private readonly interests: Map<string, InterestWeights>;
  /** Longest keys first so partial matches pick the most specific entry */
  private readonly keysBySpecificity: string[];
  private readonly features: Map<string, TastePreference>;

  constructor(
    interestTable: Record<string, Record<string, number>> = categoryInterests,
    featureTable: Record<string, string> = contextFit.features
  ) {
    this.interests = parseInterestTable(interestTable);
    this.keysBySpecificity = [...this.interests.keys()].sort((a, b) => b.length - a.length || a.localeCompare(b));
    this.features = parseFeatureTable(featureTable);
  }

  /**
   * Interest weights for one category. Exact match first, then the
   * most specific known key contained in the category ("italian_restaurant" -> "restaurant").
   */
  mapToInterests(category: string): InterestWeights {
    const normalized = normalizeCategory(category);
    if (!normalized) return {};

    const exact = this.interests.get(normalized);
    if (exact) return { ...exact };

    const partial = this.keysBySpecificity.find(key => normalized.includes(key));
    return partial ? { ...(this.interests.get(partial) ?? {}) } : {};
  }

  /**
   * Combined interest profile of a place: per interest, the strongest weight across its categories
   */
  placeInterests(place: Place): InterestWeights {
    const combined: InterestWeights = {};
    for (const category of place.categories) {
      const mapped = this.mapToInterests(category);
      for (const interest of TASTE_INTERESTS) {
        const weight = mapped[interest];
        if (weight !== undefined && weight > (combined[interest] ?? 0)) {
          combined[interest] = weight;
        }
      }
    }
    return combined;
  }

  dominantInterest(category: string): TasteInterest | null {
    let best: TasteInterest | null = null;
    let bestWeight = 0;
    const mapped = this.mapToInterests(category);
    for (const interest of TASTE_INTERESTS) {
      const weight = mapped[interest] ?? 0;
      if (weight > bestWeight) {
        best = interest;
        bestWeight = weight;
      }
    }
    return best;
  }

  /**
   * Preference dimensions a place exhibits through its features
   */
  placePreferences(place: Place): TastePreference[] {
    const found = new Set<TastePreference>();
    for (const feature of place.features ?? []) {
      const preference = this.features.get(normalizeCategory(feature));
      if (preference) found.add(preference);
    }
    return TASTE_PREFERENCES.filter(preference => found.has(preference));
  }

  isRecognized(category: string): boolean {
    return Object.keys(this.mapToInterests(category)).length > 0;
  }
}

export const categoryMapper = new CategoryMapper();
