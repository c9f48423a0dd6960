/**
 * Request Context Middleware
 *
 * Every request gets:
 * - req.requestId (x-request-id from the client, or a fresh UUID)
 * - req.traceId (x-trace-id from the client, or the requestId)
 * - req.log, a child logger bound to both
 * - req.abortSignal, aborted when the client disconnects before the response is sent
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../lib/logger/structured-logger.js';

declare global {
  namespace Express {
    interface Request {
      requestId: string;
      traceId: string;
      log: Logger;
      abortSignal: AbortSignal;
    }
  }
}

const MAX_ID_LENGTH = 128;

function headerValue(req: Request, name: string): string | undefined {
  const raw = req.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (!value || value.length > MAX_ID_LENGTH) return undefined;
  return value;
}

export function createRequestContextMiddleware(baseLogger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = headerValue(req, 'x-request-id') ?? uuidv4();
    const traceId = headerValue(req, 'x-trace-id') ?? requestId;

    req.requestId = requestId;
    req.traceId = traceId;
    req.log = baseLogger.child({ requestId, traceId });

    const controller = new AbortController();
    req.abortSignal = controller.signal;
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort(new Error('client disconnected'));
      }
    });

    res.setHeader('x-request-id', requestId);
    res.setHeader('x-trace-id', traceId);

    next();
  };
}
