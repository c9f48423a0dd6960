/**
 * Quality signal: smoothed rating blended with distance decay
 */

import type { RecommendationScoringOptions } from '../../../../config/scoring.config.js';
import { scoreNormalizer } from '../score-normalizer.js';
import type { Place } from '../../types.js';

export const RATING_SHARE = 0.4;
export const DISTANCE_SHARE = 0.6;

export type QualityOptions = Pick<
  RecommendationScoringOptions,
  'reviewCountSmoothingFactor' | 'distancePenaltyStartMeters' | 'distancePenaltyMaxMeters'
>;

export function scoreQuality(place: Place, distanceMeters: number, options: QualityOptions): number {
  const rating = scoreNormalizer.smoothedRating(place.rating, place.reviewCount, options.reviewCountSmoothingFactor);
  const decay = scoreNormalizer.distanceDecay(
    distanceMeters,
    options.distancePenaltyStartMeters,
    options.distancePenaltyMaxMeters
  );
  return scoreNormalizer.clamp(RATING_SHARE * rating + DISTANCE_SHARE * decay);
}
