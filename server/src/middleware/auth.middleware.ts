/**
 * JWT Authentication Middleware
 *
 * The caller's identity comes only from a verified HS256 bearer token.
 * Request bodies never carry a userId.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { Principal } from '../services/suggestions/types.js';

declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
    }
  }
}

const ClaimsSchema = z.object({
  sub: z.string().min(1).optional(),
  userId: z.string().min(1).optional(),
  sessionId: z.string().min(1).optional(),
  subscription: z.string().optional(),
  roles: z.array(z.string()).optional()
});

export class InvalidTokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTokenError';
  }
}

/**
 * Verify a token and map its claims to a Principal.
 * Throws InvalidTokenError for a bad signature, expiry or malformed claims.
 */
export function verifyToken(token: string, secret: string): Principal {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
  } catch (error) {
    throw new InvalidTokenError(error instanceof Error ? error.message : 'verification failed');
  }

  const parsed = ClaimsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new InvalidTokenError('Malformed token claims');
  }

  const claims = parsed.data;
  const userId = claims.userId ?? claims.sub;
  if (!userId) {
    throw new InvalidTokenError('Token missing subject');
  }

  return {
    userId,
    ...(claims.sessionId && { sessionId: claims.sessionId }),
    claims: {
      ...(claims.subscription && { subscription: claims.subscription }),
      ...(claims.roles && { roles: claims.roles })
    }
  };
}

function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) return undefined;
  return header.substring(7).trim() || undefined;
}

function reject(req: Request, res: Response, code: 'MISSING_AUTH' | 'INVALID_TOKEN'): void {
  res.status(401).json({
    error: 'Unauthorized',
    code,
    traceId: req.traceId
  });
}

export interface AuthOptions {
  /** Absent secret: every bearer token is rejected, anonymous access still works */
  secret: string | undefined;
  /** Reject requests without a token */
  required: boolean;
}

/**
 * Sets req.principal. Anonymous callers get an empty principal unless the
 * route requires authentication. A presented token that fails verification
 * is always rejected.
 */
export function createAuthMiddleware(options: AuthOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = bearerToken(req);

    if (!token) {
      if (options.required) {
        req.log.warn({ event: 'auth_missing', path: req.path }, '[Auth] Missing or invalid Authorization header');
        reject(req, res, 'MISSING_AUTH');
        return;
      }
      req.principal = {};
      next();
      return;
    }

    if (!options.secret) {
      req.log.warn({ event: 'auth_unconfigured', path: req.path }, '[Auth] Token presented but JWT_SECRET is not set');
      reject(req, res, 'INVALID_TOKEN');
      return;
    }

    try {
      req.principal = verifyToken(token, options.secret);
      req.log.debug({ event: 'auth_verified', userId: req.principal.userId }, '[Auth] JWT verified');
      next();
    } catch (error) {
      req.log.warn({
        event: 'auth_failed',
        path: req.path,
        error: error instanceof Error ? error.message : 'unknown'
      }, '[Auth] JWT verification failed');
      reject(req, res, 'INVALID_TOKEN');
    }
  };
}
