/**
 * Explainability
 * Turns the strongest contributing signals into reason codes with English messages.
 */

import type { TasteInterest } from '../profile/taste-profile.js';
import type { ScoreBreakdown, ScoreReason, SignalName } from '../types.js';

export const MAX_ENGINE_REASONS = 4;
const NOVELTY_REASON_THRESHOLD = 0.7;
const HIGH_RATING = 4.5;

export const REASON_MESSAGES = {
  FAVORITE_CUISINE: (cuisine: string) => `You often enjoy ${cuisine} food`,
  MATCHES_YOUR_HISTORY: () => 'Similar to places you like',
  TRY_SOMETHING_NEW: () => 'Something different from your usual',
  GOOD_FOR_NOW: () => 'Good fit for the current time and conditions',
  HIGHLY_RATED: () => 'Highly rated by visitors',
  CLOSE_TO_YOU: () => 'Close to you',
  GENERAL_RECOMMENDATION: () => 'Recommended near you'
} as const;

export function interestReasonCode(interest: TasteInterest): string {
  return `MATCHES_INTEREST_${interest.toUpperCase()}`;
}

export interface ExplanationInput {
  breakdown: ScoreBreakdown;
  matchedInterests: readonly TasteInterest[];
  favoriteCuisines: readonly string[];
  favoriteCategories: readonly string[];
  contextualReasons: readonly string[];
  rating: number | undefined;
  distanceMeters: number;
  closeThresholdMeters: number;
}

interface Candidate {
  code: string;
  message: string;
  signal: SignalName;
}

function candidateReasons(input: ExplanationInput): Candidate[] {
  const candidates: Candidate[] = [];

  for (const interest of input.matchedInterests) {
    candidates.push({
      code: interestReasonCode(interest),
      message: `Matches your interest in ${interest}`,
      signal: 'explicit'
    });
  }

  const cuisine = input.favoriteCuisines[0];
  if (cuisine) {
    candidates.push({ code: 'FAVORITE_CUISINE', message: REASON_MESSAGES.FAVORITE_CUISINE(cuisine), signal: 'implicit' });
  }
  if (input.favoriteCategories.length > 0) {
    candidates.push({ code: 'MATCHES_YOUR_HISTORY', message: REASON_MESSAGES.MATCHES_YOUR_HISTORY(), signal: 'implicit' });
  }
  if (input.breakdown.novelty.score > NOVELTY_REASON_THRESHOLD) {
    candidates.push({ code: 'TRY_SOMETHING_NEW', message: REASON_MESSAGES.TRY_SOMETHING_NEW(), signal: 'novelty' });
  }
  if (input.contextualReasons.length > 0) {
    candidates.push({ code: 'GOOD_FOR_NOW', message: REASON_MESSAGES.GOOD_FOR_NOW(), signal: 'context' });
  }
  if ((input.rating ?? 0) >= HIGH_RATING) {
    candidates.push({ code: 'HIGHLY_RATED', message: REASON_MESSAGES.HIGHLY_RATED(), signal: 'quality' });
  }
  if (input.distanceMeters <= input.closeThresholdMeters) {
    candidates.push({ code: 'CLOSE_TO_YOU', message: REASON_MESSAGES.CLOSE_TO_YOU(), signal: 'quality' });
  }

  return candidates;
}

/**
 * Reasons ordered by the contribution of the signal behind them.
 * Stable: equal contributions keep insertion order.
 */
export function explainScore(input: ExplanationInput, includeWeights: boolean): ScoreReason[] {
  const ranked = candidateReasons(input)
    .map((candidate, index) => ({ candidate, index, weight: input.breakdown[candidate.signal].contribution }))
    .sort((a, b) => b.weight - a.weight || a.index - b.index)
    .slice(0, MAX_ENGINE_REASONS);

  if (ranked.length === 0) {
    return [{ code: 'GENERAL_RECOMMENDATION', message: REASON_MESSAGES.GENERAL_RECOMMENDATION() }];
  }

  return ranked.map(({ candidate, weight }) => ({
    code: candidate.code,
    message: candidate.message,
    ...(includeWeights && { weight: Math.round(weight * 1000) / 1000 })
  }));
}
