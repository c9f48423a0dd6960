/**
 * Google Places (New) nearby search adapter
 * One page, field-masked. Retries and pagination belong to the provider, not the pipeline.
 */

import { z } from 'zod';
import { logger } from '../../../lib/logger/structured-logger.js';
import { ensureOk, fetchWithTimeout } from '../../../utils/fetch-with-timeout.js';
import type { GeoPoint, Place } from '../types.js';
import type { PlaceSearchFilters, PlacesProvider } from './places-provider.js';

const SEARCH_NEARBY_URL = 'https://places.googleapis.com/v1/places:searchNearby';
const PLACES_FIELD_MASK = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.location',
  'places.rating',
  'places.userRatingCount',
  'places.priceLevel',
  'places.types',
  'places.primaryType',
  'places.currentOpeningHours.openNow',
  'places.businessStatus'
].join(',');

const MAX_PAGE_SIZE = 20;

const PRICE_LEVELS: Record<string, number> = {
  PRICE_LEVEL_FREE: 0,
  PRICE_LEVEL_INEXPENSIVE: 1,
  PRICE_LEVEL_MODERATE: 2,
  PRICE_LEVEL_EXPENSIVE: 3,
  PRICE_LEVEL_VERY_EXPENSIVE: 4
};

const GooglePlaceSchema = z.object({
  id: z.string(),
  displayName: z.object({ text: z.string() }).optional(),
  formattedAddress: z.string().optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }),
  rating: z.number().optional(),
  userRatingCount: z.number().optional(),
  priceLevel: z.string().optional(),
  types: z.array(z.string()).default([]),
  primaryType: z.string().optional(),
  currentOpeningHours: z.object({ openNow: z.boolean().optional() }).optional(),
  businessStatus: z.string().optional()
});

const SearchNearbyResponseSchema = z.object({
  places: z.array(z.unknown()).default([])
});

export type GooglePlace = z.infer<typeof GooglePlaceSchema>;

export function mapGooglePlace(raw: GooglePlace): Place {
  return {
    id: raw.id,
    name: raw.displayName?.text ?? raw.id,
    location: { latitude: raw.location.latitude, longitude: raw.location.longitude },
    categories: raw.types,
    ...(raw.primaryType && { primaryCategory: raw.primaryType }),
    ...(raw.rating !== undefined && { rating: raw.rating }),
    ...(raw.userRatingCount !== undefined && { reviewCount: raw.userRatingCount }),
    ...(raw.priceLevel && PRICE_LEVELS[raw.priceLevel] !== undefined && { priceLevel: PRICE_LEVELS[raw.priceLevel] }),
    ...(raw.formattedAddress && { address: raw.formattedAddress }),
    ...(raw.currentOpeningHours?.openNow !== undefined && { isOpenNow: raw.currentOpeningHours.openNow })
  };
}

export interface GooglePlacesProviderOptions {
  apiKey: string;
  timeoutMs: number;
  language?: string;
}

export class GooglePlacesProvider implements PlacesProvider {
  readonly name = 'google_places';

  constructor(private readonly options: GooglePlacesProviderOptions) {}

  async search(location: GeoPoint, radiusMeters: number, filters: PlaceSearchFilters, signal?: AbortSignal): Promise<Place[]> {
    const body = {
      maxResultCount: Math.min(filters.maxResults ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE),
      locationRestriction: {
        circle: {
          center: { latitude: location.latitude, longitude: location.longitude },
          radius: Math.min(radiusMeters, 50_000)
        }
      },
      ...(filters.includeCategories?.length && { includedTypes: filters.includeCategories }),
      ...(filters.excludeCategories?.length && { excludedTypes: filters.excludeCategories }),
      languageCode: this.options.language ?? 'en'
    };

    const response = await fetchWithTimeout(SEARCH_NEARBY_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-Goog-Api-Key': this.options.apiKey,
        'X-Goog-FieldMask': PLACES_FIELD_MASK
      },
      body: JSON.stringify(body)
    }, { timeoutMs: this.options.timeoutMs, provider: this.name, signal });

    await ensureOk(response, this.name);
    const parsed = SearchNearbyResponseSchema.parse(await response.json());

    const places: Place[] = [];
    let dropped = 0;
    for (const raw of parsed.places) {
      const place = GooglePlaceSchema.safeParse(raw);
      if (!place.success || place.data.businessStatus === 'CLOSED_PERMANENTLY') {
        dropped++;
        continue;
      }
      places.push(mapGooglePlace(place.data));
    }

    logger.info({
      event: 'places_search_completed',
      provider: this.name,
      count: places.length,
      dropped,
      radiusMeters
    }, '[Places] Nearby search completed');

    return places;
  }
}
