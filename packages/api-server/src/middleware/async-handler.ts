import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Adapt an async handler so a rejected promise reaches Express's error
 * middleware instead of being dropped.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
