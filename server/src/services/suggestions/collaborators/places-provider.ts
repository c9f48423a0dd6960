/**
 * Places provider contract
 * Empty or partial results are valid; only a thrown error means failure.
 */

import type { BudgetLevel, GeoPoint, Place } from '../types.js';

export interface PlaceSearchFilters {
  includeCategories?: string[];
  excludeCategories?: string[];
  budgetLevel?: BudgetLevel;
  maxResults?: number;
}

export interface PlacesProvider {
  readonly name: string;
  search(location: GeoPoint, radiusMeters: number, filters: PlaceSearchFilters, signal?: AbortSignal): Promise<Place[]>;
}
