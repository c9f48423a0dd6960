/**
 * Suggestions Controller
 * POST /suggestions  - run the suggestion pipeline
 * GET  /quota/me     - caller's remaining credits
 */

import { Router, type Request, type Response, type RequestHandler } from 'express';
import type { QuotaService } from '../../services/quota/quota.service.js';
import type { SuggestionOrchestrator } from '../../services/suggestions/orchestrator/suggestion.orchestrator.js';
import {
  AdmissionSystemError,
  QuotaExceededError,
  RequestCancelledError,
  SuggestionValidationError,
  isSuggestionError
} from '../../services/suggestions/orchestrator/suggestion-errors.js';
import type { SuggestionPolicy } from '../../services/suggestions/policy/suggestion-policy.js';
import type { QuotaInfo, SuggestionResult } from '../../services/suggestions/types.js';
import { createSuggestionRequestParser } from './suggestion-request.schema.js';

export interface SuggestionsControllerDeps {
  orchestrator: SuggestionOrchestrator;
  quota: QuotaService;
  policy: SuggestionPolicy;
  /** Radius used when the body has none */
  defaultRadiusMeters: number;
  /** Applied to POST /suggestions only: optional auth, then the anonymous limiter */
  suggestionGuards: RequestHandler[];
  /** Applied to GET /quota/me */
  requireAuth: RequestHandler;
}

function setQuotaHeaders(res: Response, remaining: number | null, limit: number): void {
  if (remaining !== null) {
    res.setHeader('X-Quota-Remaining', remaining.toString());
  }
  res.setHeader('X-Quota-Limit', limit.toString());
}

/**
 * Wire shape: suggestions or a route, never both
 */
export function toResponseBody(result: SuggestionResult): Record<string, unknown> {
  if (result.kind === 'route') {
    const { kind: _kind, ...body } = result;
    return body;
  }
  const { kind: _kind, ...body } = result;
  return body;
}

export function sendSuggestionError(req: Request, res: Response, error: unknown): void {
  if (error instanceof RequestCancelledError && res.destroyed) {
    req.log.info({ event: 'response_skipped', stage: error.stage }, '[Suggestions] Client gone, no response written');
    return;
  }

  if (!isSuggestionError(error)) {
    req.log.error({
      event: 'suggestion_unhandled_error',
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined
    }, '[Suggestions] Unhandled error');
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR', traceId: req.traceId });
    return;
  }

  const body: Record<string, unknown> = {
    error: error.message,
    code: error.code,
    traceId: req.traceId
  };

  if (error instanceof SuggestionValidationError) {
    body.error = 'Invalid request';
    body.details = error.errors;
  } else if (error instanceof QuotaExceededError || error instanceof AdmissionSystemError) {
    // Same body for both: a backend outage must look like exhaustion
    const remaining = error instanceof QuotaExceededError ? error.remaining : 0;
    body.remaining = remaining;
    body.limit = error.limit;
    setQuotaHeaders(res, remaining, error.limit);
  } else if (error.code === 'SERVICE_UNAVAILABLE') {
    body.error = 'Service temporarily unavailable';
  }

  res.status(error.httpStatus).json(body);
}

export function createSuggestionsRouter(deps: SuggestionsControllerDeps): Router {
  const router = Router();
  const parseSuggestionRequest = createSuggestionRequestParser({
    policy: deps.policy,
    defaultRadiusMeters: deps.defaultRadiusMeters
  });

  router.post('/suggestions', ...deps.suggestionGuards, async (req: Request, res: Response) => {
    const parsed = parseSuggestionRequest(req.body);
    if (!parsed.success) {
      sendSuggestionError(req, res, new SuggestionValidationError(parsed.errors));
      return;
    }

    try {
      const outcome = await deps.orchestrator.execute(parsed.data, req.principal ?? {}, {
        requestId: req.requestId,
        traceId: req.traceId,
        log: req.log,
        signal: req.abortSignal
      });
      const quota: QuotaInfo | null = outcome.quota;
      if (quota) {
        setQuotaHeaders(res, quota.remaining, quota.limit);
      }
      res.json(toResponseBody(outcome.result));
    } catch (error) {
      sendSuggestionError(req, res, error);
    }
  });

  router.get('/quota/me', deps.requireAuth, async (req: Request, res: Response) => {
    const userId = req.principal?.userId;
    if (!userId) {
      res.status(401).json({ error: 'Unauthorized', code: 'MISSING_AUTH', traceId: req.traceId });
      return;
    }

    try {
      const info = await deps.quota.describe(userId, req.principal?.claims);
      setQuotaHeaders(res, info.remaining, info.limit);
      res.json({ remaining: info.remaining, limit: info.limit, isPremium: info.premium });
    } catch (error) {
      sendSuggestionError(req, res, error);
    }
  });

  return router;
}
