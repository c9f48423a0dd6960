/**
 * API v1 Router Aggregator
 *
 * - /api/v1/suggestions   POST (optional Bearer JWT; anonymous callers rate limited per IP)
 * - /api/v1/quota/me      GET  (Bearer JWT required)
 * - /api/v1/metrics       GET
 */

import { Router } from 'express';
import { createMetricsRouter } from '../../controllers/metrics/metrics.controller.js';
import { createSuggestionsRouter } from '../../controllers/suggestions/suggestions.controller.js';
import type { PerformanceMetrics } from '../../lib/metrics/performance-metrics.js';
import { createAuthMiddleware } from '../../middleware/auth.middleware.js';
import { createAnonymousRateLimiter, type RateLimitStore } from '../../middleware/rate-limit.middleware.js';
import type { QuotaService } from '../../services/quota/quota.service.js';
import type { SuggestionPolicy } from '../../services/suggestions/policy/suggestion-policy.js';
import type { SuggestionOrchestrator } from '../../services/suggestions/orchestrator/suggestion.orchestrator.js';

export interface V1RouterDeps {
  jwtSecret: string | undefined;
  anonRateLimit: { windowMs: number; max: number };
  rateLimitStore: RateLimitStore;
  orchestrator: SuggestionOrchestrator;
  quota: QuotaService;
  policy: SuggestionPolicy;
  defaultRadiusMeters: number;
  metrics: PerformanceMetrics;
}

export function createV1Router(deps: V1RouterDeps): Router {
  const router = Router();

  const optionalAuth = createAuthMiddleware({ secret: deps.jwtSecret, required: false });
  const requireAuth = createAuthMiddleware({ secret: deps.jwtSecret, required: true });
  const anonymousLimiter = createAnonymousRateLimiter({
    windowMs: deps.anonRateLimit.windowMs,
    maxRequests: deps.anonRateLimit.max,
    store: deps.rateLimitStore
  });

  router.use(createSuggestionsRouter({
    orchestrator: deps.orchestrator,
    quota: deps.quota,
    policy: deps.policy,
    defaultRadiusMeters: deps.defaultRadiusMeters,
    suggestionGuards: [optionalAuth, anonymousLimiter],
    requireAuth
  }));
  router.use(createMetricsRouter({ metrics: deps.metrics, quota: deps.quota }));

  return router;
}
