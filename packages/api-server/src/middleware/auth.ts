import type { Request, RequestHandler } from 'express';
import type { AuthService } from '@blogboard/core';
import { asyncHandler } from './async-handler.js';
import { sendError } from './errors.js';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Username resolved from the bearer token by the auth middleware. */
      username?: string;
    }
  }
}

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Read the token from an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(req: Request): string | undefined {
  const header = req.headers['authorization'];
  if (typeof header !== 'string') {
    return undefined;
  }
  return BEARER_PATTERN.exec(header)?.[1];
}

/**
 * Reject requests without a valid bearer token with 401. On success the
 * token's subject is available as `req.username`; no route checks it
 * against resource ownership.
 */
export function createAuthMiddleware(auth: AuthService): RequestHandler {
  return asyncHandler(async (req, res, next) => {
    const identity = await auth.authenticate(extractBearerToken(req));

    if (identity.isErr()) {
      sendError(res, identity.error);
      return;
    }

    req.username = identity.value;
    next();
  });
}
