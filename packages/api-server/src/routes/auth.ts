import { Router } from 'express';
import { safeRecord, type AuthService } from '@blogboard/core';
import { asyncHandler } from '../middleware/async-handler.js';
import { sendError } from '../middleware/errors.js';

export interface AuthRouteDeps {
  readonly auth: AuthService;
}

/**
 * `POST /register` and `POST /login`. Both are open; everything under
 * `/api/posts` needs the token `/login` hands out.
 */
export function createAuthRouter(deps: AuthRouteDeps): Router {
  const router = Router();

  router.post('/register', asyncHandler(async (req, res) => {
    const result = await deps.auth.register(safeRecord(req.body, {}));

    if (result.isErr()) {
      sendError(res, result.error);
      return;
    }

    res.status(201).json({ message: 'User registered successfully' });
  }));

  router.post('/login', asyncHandler(async (req, res) => {
    const result = await deps.auth.login(safeRecord(req.body, {}));

    if (result.isErr()) {
      sendError(res, result.error);
      return;
    }

    res.status(200).json({ access_token: result.value });
  }));

  return router;
}
