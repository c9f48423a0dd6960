/**
 * Suggestion Policy
 * Pure decisions per intent: validation, category filtering, route gating,
 * diversity, walking distance and human-readable reasons.
 */

import { distanceCalculator } from '../scoring/distance-calculator.js';
import { normalizeCategory } from '../scoring/category-mapper.js';
import type { BudgetLevel, GeoPoint, Place, SuggestionIntent, SuggestionRequest } from '../types.js';

export interface SuggestionPolicyConfig {
  minRadiusMeters: number;
  maxRadiusMeters: number;
  minWalkingMeters: number;
  maxWalkingMeters: number;
  veryCloseMeters: number;
  closeMeters: number;
  maxReasons: number;
  maxPreferenceReasons: number;
  maxContextualReasons: number;
  noveltyReasonThreshold: number;
  diversityFactors: Record<SuggestionIntent, number>;
  defaultWalkingMeters: Record<SuggestionIntent, number>;
  maxIncludeCategories: number;
  maxExcludeCategories: number;
  maxDietaryRestrictions: number;
}

export const DEFAULT_POLICY_CONFIG: SuggestionPolicyConfig = {
  minRadiusMeters: 100,
  maxRadiusMeters: 50_000,
  minWalkingMeters: 500,
  maxWalkingMeters: 10_000,
  veryCloseMeters: 500,
  closeMeters: 2000,
  maxReasons: 5,
  maxPreferenceReasons: 2,
  maxContextualReasons: 2,
  noveltyReasonThreshold: 0.7,
  diversityFactors: {
    QUICK: 0.3,
    FOOD_ONLY: 0.5,
    ACTIVITY_ONLY: 0.6,
    ROUTE_PLANNING: 0.8,
    TRY_SOMETHING_NEW: 1.0
  },
  defaultWalkingMeters: {
    QUICK: 1000,
    FOOD_ONLY: 2000,
    ACTIVITY_ONLY: 3000,
    ROUTE_PLANNING: 5000,
    TRY_SOMETHING_NEW: 4000
  },
  maxIncludeCategories: 10,
  maxExcludeCategories: 10,
  maxDietaryRestrictions: 5
};

export const FOOD_CATEGORIES: ReadonlySet<string> = new Set([
  'restaurant', 'cafe', 'bar', 'bakery', 'meal_takeaway', 'meal_delivery', 'food',
  'dessert', 'coffee', 'breakfast', 'lunch', 'dinner', 'brunch'
]);

/** Provider types that are food but carry no food token */
export const FOOD_PLACE_TYPES: ReadonlySet<string> = new Set([
  'ice_cream_shop', 'sandwich_shop', 'juice_shop', 'bagel_shop', 'donut_shop', 'chocolate_shop',
  'acai_shop', 'candy_store', 'confectionery', 'deli', 'diner', 'food_court', 'steak_house',
  'tea_house', 'pub', 'winery', 'brewery'
]);

export const ACTIVITY_CATEGORIES: ReadonlySet<string> = new Set([
  'amusement_park', 'aquarium', 'art_gallery', 'bowling_alley', 'casino', 'movie_theater', 'museum',
  'night_club', 'park', 'spa', 'stadium', 'tourist_attraction', 'zoo', 'gym', 'shopping_mall',
  'library', 'theater', 'concert_hall'
]);

export interface RequestBounds {
  intent?: SuggestionIntent;
  latitude?: number;
  longitude?: number;
  radiusMeters?: number;
  walkingDistanceMeters?: number;
}

export const BUDGET_PRICE_LEVEL: Record<BudgetLevel, number> = {
  FREE: 0,
  INEXPENSIVE: 1,
  MODERATE: 2,
  EXPENSIVE: 3,
  VERY_EXPENSIVE: 4
};

/**
 * Food when a category is a known food type, or any "_"-separated token of one
 * is a food category ("italian_restaurant" is food, "coffee_shop" is food)
 */
export function isFoodCategory(category: string): boolean {
  const normalized = normalizeCategory(category);
  return FOOD_CATEGORIES.has(normalized)
    || FOOD_PLACE_TYPES.has(normalized)
    || normalized.split('_').some(token => FOOD_CATEGORIES.has(token));
}

function inRange(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value <= max;
}

export function isFoodPlace(place: Place): boolean {
  return place.categories.some(isFoodCategory);
}

export function isActivityPlace(place: Place): boolean {
  return place.categories.some(category => ACTIVITY_CATEGORIES.has(normalizeCategory(category)));
}

export class SuggestionPolicy {
  constructor(private readonly config: SuggestionPolicyConfig = DEFAULT_POLICY_CONFIG) {}

  /**
   * Every violation found, in a stable order
   */
  validateRequest(
    intent: SuggestionIntent,
    location: GeoPoint,
    radiusMeters: number,
    walkingDistanceMeters: number | undefined
  ): string[] {
    return this.validateBounds({
      intent,
      latitude: location.latitude,
      longitude: location.longitude,
      radiusMeters,
      walkingDistanceMeters
    });
  }

  /**
   * Range rules for whichever fields are present. Used on bodies that failed
   * shape validation, so range violations are reported alongside shape ones.
   */
  validateBounds(fields: RequestBounds): string[] {
    const errors: string[] = [];
    const { config } = this;
    const { intent, latitude, longitude, radiusMeters, walkingDistanceMeters } = fields;

    if (latitude !== undefined && !inRange(latitude, -90, 90)) {
      errors.push('Latitude must be between -90 and 90');
    }
    if (longitude !== undefined && !inRange(longitude, -180, 180)) {
      errors.push('Longitude must be between -180 and 180');
    }
    if (radiusMeters !== undefined && !inRange(radiusMeters, config.minRadiusMeters, config.maxRadiusMeters)) {
      errors.push(
        `Radius must be between ${config.minRadiusMeters} and ${config.maxRadiusMeters.toLocaleString('en-US')} meters`
      );
    }

    const shortWalk = walkingDistanceMeters !== undefined && walkingDistanceMeters < config.minWalkingMeters;
    if (intent === 'ROUTE_PLANNING') {
      if (walkingDistanceMeters === undefined || shortWalk) {
        errors.push(`Route planning requires a walking distance of at least ${config.minWalkingMeters} meters`);
      }
    } else if (shortWalk) {
      errors.push(`Walking distance must be at least ${config.minWalkingMeters} meters`);
    }
    if (walkingDistanceMeters !== undefined && walkingDistanceMeters > config.maxWalkingMeters) {
      errors.push(`Walking distance cannot exceed ${config.maxWalkingMeters.toLocaleString('en-US')} meters (${config.maxWalkingMeters / 1000} km)`);
    }

    return errors;
  }

  /**
   * Limits on the optional request filters
   */
  validateFilters(request: Pick<SuggestionRequest, 'includeCategories' | 'excludeCategories' | 'dietaryRestrictions'>): string[] {
    const errors: string[] = [];
    if ((request.includeCategories?.length ?? 0) > this.config.maxIncludeCategories) {
      errors.push(`At most ${this.config.maxIncludeCategories} included categories are allowed`);
    }
    if ((request.excludeCategories?.length ?? 0) > this.config.maxExcludeCategories) {
      errors.push(`At most ${this.config.maxExcludeCategories} excluded categories are allowed`);
    }
    if ((request.dietaryRestrictions?.length ?? 0) > this.config.maxDietaryRestrictions) {
      errors.push(`At most ${this.config.maxDietaryRestrictions} dietary restrictions are allowed`);
    }
    return errors;
  }

  applyIntentFilter(intent: SuggestionIntent, places: readonly Place[], userExclusions: ReadonlySet<string>): Place[] {
    const allowed = places.filter(place => !userExclusions.has(place.id));

    switch (intent) {
      case 'FOOD_ONLY':
        return allowed.filter(isFoodPlace);
      case 'ACTIVITY_ONLY':
        return allowed.filter(place => !isFoodPlace(place));
      case 'QUICK':
      case 'ROUTE_PLANNING':
      case 'TRY_SOMETHING_NEW':
        return allowed;
    }
  }

  /**
   * Caller-supplied category and budget filters, applied after the intent filter
   */
  applyRequestFilters(
    places: readonly Place[],
    filters: Pick<SuggestionRequest, 'includeCategories' | 'excludeCategories' | 'budgetLevel'>
  ): Place[] {
    const include = new Set((filters.includeCategories ?? []).map(normalizeCategory));
    const exclude = new Set((filters.excludeCategories ?? []).map(normalizeCategory));
    const maxPrice = filters.budgetLevel ? BUDGET_PRICE_LEVEL[filters.budgetLevel] : undefined;

    return places.filter(place => {
      const categories = place.categories.map(normalizeCategory);
      if (include.size > 0 && !categories.some(category => include.has(category))) return false;
      if (categories.some(category => exclude.has(category))) return false;
      if (maxPrice !== undefined && place.priceLevel !== undefined && place.priceLevel > maxPrice) return false;
      return true;
    });
  }

  shouldBuildRoute(intent: SuggestionIntent): boolean {
    return intent === 'ROUTE_PLANNING';
  }

  getDiversityFactor(intent: SuggestionIntent): number {
    return this.config.diversityFactors[intent];
  }

  getMaxWalkingDistance(intent: SuggestionIntent, userPreference: number | undefined): number {
    if (userPreference !== undefined && userPreference > 0 && userPreference <= this.config.maxWalkingMeters) {
      return userPreference;
    }
    return this.config.defaultWalkingMeters[intent];
  }

  /**
   * Priority order: distance, rating, preference matches, novelty, context.
   * Truncated to maxReasons.
   */
  generateReasons(
    intent: SuggestionIntent,
    place: Place,
    userLocation: GeoPoint,
    matchedPreferences: readonly string[],
    noveltyScore: number,
    contextualReasons: readonly string[]
  ): string[] {
    const reasons: string[] = [];
    const distance = distanceCalculator.haversineMeters(userLocation, place.location);

    if (distance < this.config.veryCloseMeters) {
      reasons.push('Very close to you (walking distance)');
    } else if (distance < this.config.closeMeters) {
      reasons.push('Close to your location');
    }

    const rating = place.rating ?? 0;
    if (rating >= 4.5) {
      reasons.push('Highly rated (4.5+ stars)');
    } else if (rating >= 4.0) {
      reasons.push('Well-rated');
    }

    for (const preference of matchedPreferences.slice(0, this.config.maxPreferenceReasons)) {
      reasons.push(`Matches your interest in ${preference}`);
    }

    if (intent === 'TRY_SOMETHING_NEW' && noveltyScore > this.config.noveltyReasonThreshold) {
      reasons.push('A new experience for you');
    }

    reasons.push(...contextualReasons.slice(0, this.config.maxContextualReasons));

    return reasons.slice(0, this.config.maxReasons);
  }
}
