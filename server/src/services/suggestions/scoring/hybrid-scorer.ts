/**
 * Hybrid Scoring Engine
 *
 * Weighted sum of five independent signals, each in [0,1]:
 * implicit, explicit, novelty, context, quality.
 * Pure over (context, candidates, options): no state, no randomness, inputs never mutated.
 */

import type { RecommendationScoringOptions } from '../../../config/scoring.config.js';
import { categoryMapper as defaultMapper, type CategoryMapper } from './category-mapper.js';
import { distanceCalculator } from './distance-calculator.js';
import { explainScore } from './explainability.js';
import { scoreNormalizer } from './score-normalizer.js';
import { scoreContext } from './signals/context.scorer.js';
import { scoreExplicit } from './signals/explicit.scorer.js';
import { scoreImplicit } from './signals/implicit.scorer.js';
import { scoreNovelty } from './signals/novelty.scorer.js';
import { scoreQuality } from './signals/quality.scorer.js';
import type { Place, ScoreBreakdown, ScoredPlace, ScoringContext, SignalContribution } from '../types.js';

function contribution(score: number, weight: number): SignalContribution {
  return { score, weight, contribution: score * weight };
}

/**
 * Score descending, then distance ascending, then place id ascending
 */
export function compareScoredPlaces(a: ScoredPlace, b: ScoredPlace): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.distanceMeters !== b.distanceMeters) return a.distanceMeters - b.distanceMeters;
  return a.place.id < b.place.id ? -1 : a.place.id > b.place.id ? 1 : 0;
}

export class HybridScoringEngine {
  constructor(
    private readonly options: RecommendationScoringOptions,
    private readonly mapper: CategoryMapper = defaultMapper
  ) {}

  get maxResults(): number {
    return this.options.maxResults;
  }

  passesRatingFloor(place: Place): boolean {
    if (this.options.minimumRating <= 0) return true;
    return (place.rating ?? 0) >= this.options.minimumRating;
  }

  score(context: ScoringContext, place: Place): ScoredPlace {
    const { weights } = this.options;
    const distanceMeters = distanceCalculator.haversineMeters(context.origin, place.location);

    const implicit = scoreImplicit(place, context.implicitProfile);
    const explicit = scoreExplicit(place, context.tasteProfile, this.mapper);
    const novelty = scoreNovelty(place, context.implicitProfile, context.tasteProfile);
    const contextSignal = scoreContext(place, context.insights);
    const quality = scoreQuality(place, distanceMeters, this.options);

    const parts = {
      implicit: contribution(implicit.score, weights.implicit),
      explicit: contribution(explicit.score, weights.explicit),
      novelty: contribution(novelty, weights.novelty),
      context: contribution(contextSignal.score, weights.context),
      quality: contribution(quality, weights.quality)
    };
    const finalScore = scoreNormalizer.clamp(
      parts.implicit.contribution +
      parts.explicit.contribution +
      parts.novelty.contribution +
      parts.context.contribution +
      parts.quality.contribution
    );
    const breakdown: ScoreBreakdown = { ...parts, finalScore };

    const debug = context.includeDebugInfo && this.options.enableDebugFields;
    const reasons = explainScore({
      breakdown,
      matchedInterests: explicit.matchedInterests,
      favoriteCuisines: implicit.favoriteCuisines,
      favoriteCategories: implicit.favoriteCategories,
      contextualReasons: contextSignal.reasons,
      rating: place.rating,
      distanceMeters,
      closeThresholdMeters: this.options.distancePenaltyStartMeters
    }, debug);

    return {
      place,
      distanceMeters,
      score: finalScore,
      reasons,
      matchedPreferences: [...explicit.matchedInterests, ...implicit.favoriteCuisines],
      noveltyScore: novelty,
      contextualReasons: contextSignal.reasons,
      ...(debug && { debugBreakdown: breakdown })
    };
  }

  /**
   * Score the first maxCandidates places that pass the rating floor, sorted, untruncated
   */
  rankAll(context: ScoringContext, candidates: readonly Place[]): ScoredPlace[] {
    return candidates
      .filter(place => this.passesRatingFloor(place))
      .slice(0, this.options.maxCandidates)
      .map(place => this.score(context, place))
      .sort(compareScoredPlaces);
  }

  /**
   * Sorted and truncated to maxResults
   */
  scoreAll(context: ScoringContext, candidates: readonly Place[]): ScoredPlace[] {
    return this.rankAll(context, candidates).slice(0, this.options.maxResults);
  }
}
