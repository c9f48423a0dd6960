import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import type { Redis } from 'ioredis';
import type { QuotaBackend } from './config/env.js';
import { createHealthRouter } from './controllers/health.controller.js';
import type { Logger } from './lib/logger/structured-logger.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { createRequestContextMiddleware } from './middleware/requestContext.middleware.js';
import { createV1Router, type V1RouterDeps } from './routes/v1/index.js';

export interface AppDeps extends V1RouterDeps {
  logger: Logger;
  quotaBackend: QuotaBackend;
  redis: Redis | null;
  corsOrigins?: string[] | undefined;
}

function isBodyParseError(err: unknown): err is Error & { status: number; type: string } {
  return err instanceof Error && 'status' in err && 'type' in err
    && typeof err.status === 'number' && typeof err.type === 'string';
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(helmet());

  // Request context & logging (before body parsing, so parse errors carry a traceId)
  app.use(createRequestContextMiddleware(deps.logger));
  app.use(httpLoggingMiddleware);

  app.use(compression());
  app.use(express.json({ limit: '100kb' }));
  app.use(cors(deps.corsOrigins ? { origin: deps.corsOrigins } : undefined));

  app.use(createHealthRouter({ quotaBackend: deps.quotaBackend, redis: deps.redis }));
  app.use('/api/v1', createV1Router(deps));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND', traceId: req.traceId });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err) && err.status === 400) {
      res.status(400).json({
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        details: ['Request body must be valid JSON'],
        traceId: req.traceId
      });
      return;
    }

    req.log.error({
      event: 'unhandled_error',
      error: err instanceof Error ? err.message : String(err)
    }, '[App] Unhandled error');
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR', traceId: req.traceId });
  });

  return app;
}
