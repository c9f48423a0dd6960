/**
 * Recommendation scoring options
 *
 * Validated once at startup. A weight set that does not sum to 1.0
 * (within WEIGHT_SUM_TOLERANCE) is a ConfigError, never a runtime failure.
 */

import { z } from 'zod';
import { ConfigError, formatZodIssues } from '../lib/config/config-validator.js';

export const WEIGHT_SUM_TOLERANCE = 0.01;

export const ScoringWeightsSchema = z.object({
  implicit: z.number().min(0).max(1),
  explicit: z.number().min(0).max(1),
  novelty: z.number().min(0).max(1),
  context: z.number().min(0).max(1),
  quality: z.number().min(0).max(1)
}).strict();

export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  implicit: 0.25,
  explicit: 0.30,
  novelty: 0.20,
  context: 0.15,
  quality: 0.10
};

export const ScoringOptionsSchema = z.object({
  weights: ScoringWeightsSchema.default(DEFAULT_SCORING_WEIGHTS),
  maxCandidates: z.number().int().min(10).max(500).default(100),
  maxResults: z.number().int().min(1).max(50).default(20),
  defaultRadiusMeters: z.number().int().min(100).max(50_000).default(3000),
  reviewCountSmoothingFactor: z.number().min(1).max(200).default(50),
  minimumRating: z.number().min(0).max(5).default(0),
  distancePenaltyStartMeters: z.number().min(0).max(5000).default(500),
  distancePenaltyMaxMeters: z.number().min(1000).max(50_000).default(5000),
  enableDebugFields: z.boolean().default(false)
}).strict();

export type RecommendationScoringOptions = z.infer<typeof ScoringOptionsSchema>;
export type ScoringOptionsInput = z.input<typeof ScoringOptionsSchema>;

export function sumWeights(weights: ScoringWeights): number {
  return weights.implicit + weights.explicit + weights.novelty + weights.context + weights.quality;
}

/**
 * Check weight range and sum. Throws ConfigError.
 */
export function validateWeights(weights: ScoringWeights): void {
  for (const [name, value] of Object.entries(weights)) {
    if (value < 0 || value > 1) {
      throw new ConfigError(`Weight ${name} must be in [0, 1], got ${value}`);
    }
  }

  const sum = sumWeights(weights);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigError(
      `Scoring weights must sum to 1.0 (±${WEIGHT_SUM_TOLERANCE}), got ${sum.toFixed(3)}`
    );
  }
}

export function loadScoringOptions(raw: ScoringOptionsInput = {}): RecommendationScoringOptions {
  const parsed = ScoringOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ConfigError(`Invalid scoring options: ${issues.join('; ')}`, issues);
  }

  const options = parsed.data;
  validateWeights(options.weights);

  if (options.distancePenaltyMaxMeters <= options.distancePenaltyStartMeters) {
    throw new ConfigError('distancePenaltyMaxMeters must be greater than distancePenaltyStartMeters');
  }

  return options;
}

const ENV_NUMBER = z.coerce.number();

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = ENV_NUMBER.safeParse(raw);
  if (!parsed.success || Number.isNaN(parsed.data)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`, [key]);
  }
  return parsed.data;
}

/**
 * Build scoring options from SCORING_* environment variables
 */
export function scoringOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RecommendationScoringOptions {
  const weights: ScoringWeights = {
    implicit: readNumber(env, 'SCORING_IMPLICIT_WEIGHT') ?? DEFAULT_SCORING_WEIGHTS.implicit,
    explicit: readNumber(env, 'SCORING_EXPLICIT_WEIGHT') ?? DEFAULT_SCORING_WEIGHTS.explicit,
    novelty: readNumber(env, 'SCORING_NOVELTY_WEIGHT') ?? DEFAULT_SCORING_WEIGHTS.novelty,
    context: readNumber(env, 'SCORING_CONTEXT_WEIGHT') ?? DEFAULT_SCORING_WEIGHTS.context,
    quality: readNumber(env, 'SCORING_QUALITY_WEIGHT') ?? DEFAULT_SCORING_WEIGHTS.quality
  };

  return loadScoringOptions({
    weights,
    maxCandidates: readNumber(env, 'SCORING_MAX_CANDIDATES'),
    maxResults: readNumber(env, 'SCORING_MAX_RESULTS'),
    defaultRadiusMeters: readNumber(env, 'SCORING_DEFAULT_RADIUS_METERS'),
    reviewCountSmoothingFactor: readNumber(env, 'SCORING_REVIEW_SMOOTHING'),
    minimumRating: readNumber(env, 'SCORING_MINIMUM_RATING'),
    distancePenaltyStartMeters: readNumber(env, 'SCORING_DISTANCE_PENALTY_START_METERS'),
    distancePenaltyMaxMeters: readNumber(env, 'SCORING_DISTANCE_PENALTY_MAX_METERS'),
    enableDebugFields: env.SCORING_DEBUG_FIELDS === 'true'
  });
}
