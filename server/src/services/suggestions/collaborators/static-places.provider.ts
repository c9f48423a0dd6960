/**
 * Fixed catalogue of places, filtered by radius.
 * Used for local development without a Google key, and in tests.
 */

import { distanceCalculator } from '../scoring/distance-calculator.js';
import type { GeoPoint, Place } from '../types.js';
import type { PlaceSearchFilters, PlacesProvider } from './places-provider.js';

export class StaticPlacesProvider implements PlacesProvider {
  readonly name = 'static';
  public calls = 0;

  constructor(private readonly places: readonly Place[]) {}

  async search(location: GeoPoint, radiusMeters: number, filters: PlaceSearchFilters, signal?: AbortSignal): Promise<Place[]> {
    this.calls++;
    signal?.throwIfAborted();

    const inRange = this.places.filter(
      place => distanceCalculator.haversineMeters(location, place.location) <= radiusMeters
    );
    return filters.maxResults !== undefined ? inRange.slice(0, filters.maxResults) : inRange;
  }
}
