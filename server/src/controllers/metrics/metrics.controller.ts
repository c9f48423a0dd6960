/**
 * Metrics Controller
 * GET /metrics - pull snapshot of pipeline and quota counters
 */

import { Router, type Request, type Response } from 'express';
import type { PerformanceMetrics } from '../../lib/metrics/performance-metrics.js';
import type { QuotaService } from '../../services/quota/quota.service.js';

export interface MetricsControllerDeps {
  metrics: PerformanceMetrics;
  quota: QuotaService;
}

export function createMetricsRouter(deps: MetricsControllerDeps): Router {
  const router = Router();

  router.get('/metrics', (_req: Request, res: Response) => {
    res.json({
      pipeline: deps.metrics.getSnapshot(),
      quota: deps.quota.getQuotaSnapshot()
    });
  });

  return router;
}
