/**
 * Health & Readiness Endpoints
 * - /healthz: liveness, no dependency checks
 * - /ready: readiness; with the Redis quota backend the client must be ready
 */

import { Router, type Request, type Response } from 'express';
import type { Redis } from 'ioredis';
import type { QuotaBackend } from '../config/env.js';

export interface HealthControllerDeps {
  quotaBackend: QuotaBackend;
  redis: Pick<Redis, 'status'> | null;
}

export function createHealthRouter(deps: HealthControllerDeps): Router {
  const router = Router();

  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'UP',
      timestamp: new Date().toISOString()
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const quotaStore = deps.quotaBackend === 'memory'
      ? 'UP'
      : deps.redis?.status === 'ready' ? 'UP' : 'DOWN';
    const ready = quotaStore === 'UP';

    res.status(ready ? 200 : 503).json({
      status: ready ? 'UP' : 'DOWN',
      timestamp: new Date().toISOString(),
      checks: { quotaStore, quotaBackend: deps.quotaBackend }
    });
  });

  return router;
}
