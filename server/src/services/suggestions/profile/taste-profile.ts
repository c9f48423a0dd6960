/**
 * Taste profile model
 *
 * Closed set of dimensions. Updates are typed partial records keyed by
 * dimension; the quiz boundary is the only place that accepts free-form keys.
 */

export const TASTE_INTERESTS = [
  'culture',
  'food',
  'nature',
  'nightlife',
  'shopping',
  'art',
  'wellness',
  'sports'
] as const;

export const TASTE_PREFERENCES = [
  'tasteQuality',
  'atmosphere',
  'design',
  'calmness',
  'spaciousness'
] as const;

export type TasteInterest = typeof TASTE_INTERESTS[number];
export type TastePreference = typeof TASTE_PREFERENCES[number];
export type TasteDimension = TasteInterest | TastePreference | 'noveltyTolerance';

export interface TasteProfile {
  interests: Record<TasteInterest, number>;
  preferences: Record<TastePreference, number>;
  noveltyTolerance: number;
}

export type TasteWeights = Partial<Record<TasteDimension, number>>;

export const NEUTRAL_WEIGHT = 0.5;
export const MAX_DELTA_PER_UPDATE = 0.05;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

function isInterest(key: string): key is TasteInterest {
  return TASTE_INTERESTS.some(interest => interest === key);
}

function isPreference(key: string): key is TastePreference {
  return TASTE_PREFERENCES.some(preference => preference === key);
}

export function isTasteDimension(key: string): key is TasteDimension {
  return key === 'noveltyTolerance' || isInterest(key) || isPreference(key);
}

export function createDefaultTasteProfile(): TasteProfile {
  return {
    interests: {
      culture: NEUTRAL_WEIGHT,
      food: NEUTRAL_WEIGHT,
      nature: NEUTRAL_WEIGHT,
      nightlife: NEUTRAL_WEIGHT,
      shopping: NEUTRAL_WEIGHT,
      art: NEUTRAL_WEIGHT,
      wellness: NEUTRAL_WEIGHT,
      sports: NEUTRAL_WEIGHT
    },
    preferences: {
      tasteQuality: NEUTRAL_WEIGHT,
      atmosphere: NEUTRAL_WEIGHT,
      design: NEUTRAL_WEIGHT,
      calmness: NEUTRAL_WEIGHT,
      spaciousness: NEUTRAL_WEIGHT
    },
    noveltyTolerance: NEUTRAL_WEIGHT
  };
}

function readDimension(profile: TasteProfile, dimension: TasteDimension): number {
  if (dimension === 'noveltyTolerance') return profile.noveltyTolerance;
  if (isInterest(dimension)) return profile.interests[dimension];
  return profile.preferences[dimension];
}

function writeDimension(profile: TasteProfile, dimension: TasteDimension, value: number): void {
  if (dimension === 'noveltyTolerance') {
    profile.noveltyTolerance = value;
  } else if (isInterest(dimension)) {
    profile.interests[dimension] = value;
  } else {
    profile.preferences[dimension] = value;
  }
}

function cloneProfile(profile: TasteProfile): TasteProfile {
  return {
    interests: { ...profile.interests },
    preferences: { ...profile.preferences },
    noveltyTolerance: profile.noveltyTolerance
  };
}

function entriesOf(weights: TasteWeights): Array<[TasteDimension, number]> {
  const entries: Array<[TasteDimension, number]> = [];
  for (const [key, value] of Object.entries(weights)) {
    if (value !== undefined && isTasteDimension(key) && Number.isFinite(value)) {
      entries.push([key, value]);
    }
  }
  return entries;
}

/**
 * Overwrite dimensions with absolute weights, clamped to [0,1]
 */
export function applyTasteWeights(profile: TasteProfile, weights: TasteWeights): TasteProfile {
  const next = cloneProfile(profile);
  for (const [dimension, value] of entriesOf(weights)) {
    writeDimension(next, dimension, clamp01(value));
  }
  return next;
}

/**
 * Nudge dimensions by feedback deltas. Each delta is limited to
 * ±MAX_DELTA_PER_UPDATE so one interaction cannot swing the profile.
 */
export function applyTasteDelta(profile: TasteProfile, deltas: TasteWeights): TasteProfile {
  const next = cloneProfile(profile);
  for (const [dimension, delta] of entriesOf(deltas)) {
    const bounded = Math.max(-MAX_DELTA_PER_UPDATE, Math.min(MAX_DELTA_PER_UPDATE, delta));
    writeDimension(next, dimension, clamp01(readDimension(next, dimension) + bounded));
  }
  return next;
}

/**
 * Quiz answers arrive as string-keyed maps ("Culture", "taste_quality", ...).
 * Normalizes keys and drops anything that is not a known dimension.
 */
export function tasteWeightsFromQuizKeys(raw: Record<string, number>): TasteWeights {
  const weights: TasteWeights = {};
  for (const [rawKey, value] of Object.entries(raw)) {
    const key = rawKey
      .trim()
      .replace(/[_\s-]+(\w)/g, (_, c: string) => c.toUpperCase())
      .replace(/^\w/, c => c.toLowerCase());
    if (isTasteDimension(key) && typeof value === 'number') {
      weights[key] = value;
    }
  }
  return weights;
}
