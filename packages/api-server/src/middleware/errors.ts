import type { ErrorRequestHandler, Request, Response } from 'express';
import {
  ConflictError,
  InvalidInputError,
  NotFoundError,
  UnauthorizedError,
} from '@blogboard/core';

/**
 * HTTP status for a domain error. A duplicate username is reported as 400,
 * the same status as any other bad registration.
 */
export function statusForError(error: Error): number {
  if (error instanceof InvalidInputError || error instanceof ConflictError) return 400;
  if (error instanceof UnauthorizedError) return 401;
  if (error instanceof NotFoundError) return 404;
  return 500;
}

/** Respond with `{ error: message }` and the status matching `error`. */
export function sendError(res: Response, error: Error): void {
  const status = statusForError(error);
  res.status(status).json({
    error: status === 500 ? 'Internal Server Error' : error.message,
  });
}

/** Fallback for routes nothing else matched. */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not Found' });
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    if (typeof status === 'number' && status >= 400 && status < 500) {
      return status;
    }
  }
  return undefined;
}

/**
 * Final error middleware. Malformed JSON and other body-parser rejections
 * become 4xx responses; anything else is logged and answered with 500.
 */
export function createErrorHandler(
  log: (message: string) => void = (message) => {
    // eslint-disable-next-line no-console
    console.error(message);
  },
): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (isBodyParseError(error)) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }

    const status = clientErrorStatus(error);
    if (status !== undefined) {
      const message = error instanceof Error ? error.message : 'Bad Request';
      res.status(status).json({ error: message });
      return;
    }

    const message = error instanceof Error ? error.stack ?? error.message : String(error);
    log(`[api-server] Unhandled error on ${req.method} ${req.originalUrl}: ${message}`);
    res.status(500).json({ error: 'Internal Server Error' });
  };
}
