import type { RequestHandler } from 'express';

/**
 * Log one line per finished request: `METHOD path status duration`.
 */
export function createRequestLogger(
  log: (message: string) => void = (message) => {
    // eslint-disable-next-line no-console
    console.log(message);
  },
): RequestHandler {
  return (req, res, next) => {
    const startedAt = process.hrtime.bigint();

    res.on('finish', () => {
      const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
      log(`[api-server] ${req.method} ${req.originalUrl} ${res.statusCode} ${elapsedMs.toFixed(1)}ms`);
    });

    next();
  };
}
