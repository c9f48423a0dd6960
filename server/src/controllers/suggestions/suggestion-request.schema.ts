/**
 * Request body schema for POST /api/v1/suggestions
 * Shape only; range rules live in SuggestionPolicy.
 */

import { z } from 'zod';
import type { RequestBounds, SuggestionPolicy } from '../../services/suggestions/policy/suggestion-policy.js';
import {
  BUDGET_LEVELS,
  SUGGESTION_INTENTS,
  isSuggestionIntent,
  type SuggestionRequest
} from '../../services/suggestions/types.js';

const categoryList = (max: number) => z.array(z.string().trim().min(1).max(64)).max(max);

export function createSuggestionRequestSchema(defaultRadiusMeters: number) {
  return z.object({
    intent: z.enum(SUGGESTION_INTENTS),
    latitude: z.number().finite(),
    longitude: z.number().finite(),
    radiusMeters: z.number().int().default(defaultRadiusMeters),
    walkingDistanceMeters: z.number().int().optional(),
    budgetLevel: z.enum(BUDGET_LEVELS).optional(),
    includeCategories: categoryList(10).optional(),
    excludeCategories: categoryList(10).optional(),
    dietaryRestrictions: categoryList(5).optional(),
    areaName: z.string().max(100).optional(),
    debug: z.boolean().optional()
  });
}

export interface SuggestionRequestParserOptions {
  policy: SuggestionPolicy;
  defaultRadiusMeters: number;
}

export type ParseResult =
  | { success: true; data: SuggestionRequest }
  | { success: false; errors: string[] };

export type SuggestionRequestParser = (body: unknown) => ParseResult;

function numberField(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Fields of a rejected body that still carry the right type, for range checks
 */
function boundsOf(body: unknown): RequestBounds {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return {};
  }
  const record: Record<string, unknown> = { ...body };
  return {
    intent: isSuggestionIntent(record.intent) ? record.intent : undefined,
    latitude: numberField(record, 'latitude'),
    longitude: numberField(record, 'longitude'),
    radiusMeters: numberField(record, 'radiusMeters'),
    walkingDistanceMeters: numberField(record, 'walkingDistanceMeters')
  };
}

/**
 * Unknown keys (including any userId) are dropped. A body with shape errors
 * also gets the range errors of its well-typed fields.
 */
export function createSuggestionRequestParser(options: SuggestionRequestParserOptions): SuggestionRequestParser {
  const schema = createSuggestionRequestSchema(options.defaultRadiusMeters);

  return body => {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const shapeErrors = parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      return { success: false, errors: [...shapeErrors, ...options.policy.validateBounds(boundsOf(body))] };
    }

    return { success: true, data: parsed.data };
  };
}
