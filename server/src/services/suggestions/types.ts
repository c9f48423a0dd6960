/**
 * Suggestion domain types
 */

import type { EntitlementClaims } from '../quota/entitlement.service.js';
import type { TasteProfile } from './profile/taste-profile.js';

export const SUGGESTION_INTENTS = [
  'QUICK',
  'FOOD_ONLY',
  'ACTIVITY_ONLY',
  'ROUTE_PLANNING',
  'TRY_SOMETHING_NEW'
] as const;

export type SuggestionIntent = typeof SUGGESTION_INTENTS[number];

export function isSuggestionIntent(value: unknown): value is SuggestionIntent {
  return SUGGESTION_INTENTS.some(intent => intent === value);
}

export const BUDGET_LEVELS = ['FREE', 'INEXPENSIVE', 'MODERATE', 'EXPENSIVE', 'VERY_EXPENSIVE'] as const;
export type BudgetLevel = typeof BUDGET_LEVELS[number];

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/**
 * Candidate place as returned by a places provider
 */
export interface Place {
  id: string;
  name: string;
  location: GeoPoint;
  /** Provider types, e.g. "restaurant", "italian_restaurant", "museum" */
  categories: string[];
  primaryCategory?: string;
  rating?: number;
  reviewCount?: number;
  /** 0 (free) .. 4 (very expensive) */
  priceLevel?: number;
  cuisines?: string[];
  /** Descriptive tags, e.g. "quiet", "live_music" */
  features?: string[];
  address?: string;
  isOpenNow?: boolean;
}

export type TimeOfDay = 'early_morning' | 'morning' | 'lunch' | 'afternoon' | 'evening' | 'night' | 'late_night';
export type Season = 'spring' | 'summer' | 'autumn' | 'winter';
export type WeatherCondition = 'clear' | 'clouds' | 'rain' | 'drizzle' | 'thunderstorm' | 'snow' | 'mist' | 'unknown';

export interface WeatherSnapshot {
  condition: WeatherCondition;
  temperatureC?: number;
  description?: string;
}

export interface ContextualInsights {
  weather?: WeatherSnapshot;
  timeOfDay?: TimeOfDay;
  season?: Season;
}

/**
 * Behavioral preferences learned from past activity
 */
export interface ImplicitProfile {
  favoriteCuisines: string[];
  favoriteCategories: string[];
  avoidedCuisines: string[];
  avoidedCategories: string[];
  visitedPlaceIds: string[];
  categoryVisitCounts: Record<string, number>;
}

/**
 * Per-request, read-only input to the scoring engine
 */
export interface ScoringContext {
  readonly userId?: string;
  readonly implicitProfile?: ImplicitProfile;
  readonly tasteProfile?: TasteProfile;
  readonly origin: GeoPoint;
  readonly requestTime: Date;
  readonly insights?: ContextualInsights;
  readonly intentText?: string;
  readonly sessionId?: string;
  readonly includeDebugInfo: boolean;
}

export type SignalName = 'implicit' | 'explicit' | 'novelty' | 'context' | 'quality';

export interface SignalContribution {
  score: number;
  weight: number;
  contribution: number;
}

export type ScoreBreakdown = Record<SignalName, SignalContribution> & { finalScore: number };

export interface ScoreReason {
  code: string;
  message: string;
  weight?: number;
}

export interface ScoredPlace {
  readonly place: Place;
  readonly distanceMeters: number;
  readonly score: number;
  readonly reasons: readonly ScoreReason[];
  /** Profile entries this place matched (interest names, cuisines) */
  readonly matchedPreferences: readonly string[];
  readonly noveltyScore: number;
  readonly contextualReasons: readonly string[];
  readonly debugBreakdown?: ScoreBreakdown;
}

export interface SuggestionRequest {
  intent: SuggestionIntent;
  latitude: number;
  longitude: number;
  radiusMeters: number;
  walkingDistanceMeters?: number;
  budgetLevel?: BudgetLevel;
  includeCategories?: string[];
  excludeCategories?: string[];
  dietaryRestrictions?: string[];
  areaName?: string;
  debug?: boolean;
}

/**
 * Caller identity from the verified auth context. Anonymous when userId is absent.
 */
export interface Principal {
  userId?: string;
  claims?: EntitlementClaims;
  sessionId?: string;
}

export interface FilterInfo {
  radiusMeters: number;
  walkingDistanceMeters?: number;
  budgetLevel?: BudgetLevel;
  includedCategories: string[];
  excludedCategories: string[];
  dietaryRestrictions: string[];
  appliedVariety: boolean;
  appliedContextual: boolean;
}

export interface SuggestionMeta {
  generatedAt: string;
  requestId: string;
  intent: SuggestionIntent;
  source: string;
  diversityFactor: number;
  usedAI: boolean;
  usedPersonalization: boolean;
  usedContextEngine: boolean;
  usedVariabilityEngine: boolean;
  timeOfDay?: TimeOfDay;
  weatherCondition?: WeatherCondition;
  season?: Season;
  candidateCount: number;
  timings: Record<string, number>;
}

export interface SuggestionView {
  id: string;
  name: string;
  latitude: number;
  longitude: number;
  categories: string[];
  address?: string;
  rating?: number;
  reviewCount?: number;
  priceLevel?: number;
  distanceMeters: number;
  score: number;
  reasons: string[];
  reasonCodes: string[];
  debug?: ScoreBreakdown;
}

export type TravelMode = 'walking' | 'driving';

export interface OrderedRoute {
  stops: Place[];
  totalDistanceMeters: number;
  estimatedDurationSeconds: number;
  mode: TravelMode;
}

export interface RouteStopView extends SuggestionView {
  order: number;
}

export interface RouteView {
  stops: RouteStopView[];
  totalDistanceMeters: number;
  estimatedDurationSeconds: number;
  maxWalkingDistanceMeters: number;
  mode: TravelMode;
}

export interface SuggestionListResult {
  kind: 'suggestions';
  suggestions: SuggestionView[];
  totalCount: number;
  filters: FilterInfo;
  metadata: SuggestionMeta;
  isPersonalized: boolean;
}

export interface RouteResult {
  kind: 'route';
  route: RouteView;
  metadata: SuggestionMeta;
  isPersonalized: boolean;
}

export type SuggestionResult = SuggestionListResult | RouteResult;

export interface QuotaInfo {
  remaining: number | null;
  limit: number;
  premium: boolean;
}
