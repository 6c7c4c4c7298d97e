#!/usr/bin/env node

import { fileURLToPath } from 'node:url';
import { DEFAULT_JWT_SECRET } from '@blogboard/core';
import { ApiServer } from './server.js';
import { applyPortOverride, loadServerConfig } from './startup.js';

export { ApiServer, API_SERVER_VERSION } from './server.js';
export type { ApiServerOptions } from './server.js';

export { createAuthMiddleware, extractBearerToken } from './middleware/auth.js';
export { createErrorHandler, notFoundHandler, sendError, statusForError } from './middleware/errors.js';
export { createRequestLogger } from './middleware/request-logger.js';
export { asyncHandler } from './middleware/async-handler.js';

export { createAuthRouter } from './routes/auth.js';
export type { AuthRouteDeps } from './routes/auth.js';
export { createPostsRouter } from './routes/posts.js';
export type { PostsRouteDeps } from './routes/posts.js';

export { createOpenAPISpec } from './openapi.js';
export type { OpenAPISpec } from './openapi.js';

export { loadServerConfig, parsePort, applyPortOverride } from './startup.js';
export type { LoadedServerConfig } from './startup.js';

async function main(): Promise<void> {
  const rootDir = process.argv[2] ?? process.cwd();

  const loaded = await loadServerConfig(rootDir);
  if (loaded.isErr()) {
    // eslint-disable-next-line no-console
    console.error(`[api-server] ${loaded.error.message}`);
    process.exit(1);
  }

  if (loaded.value.usedDefaults) {
    // eslint-disable-next-line no-console
    console.warn('[api-server] No .blogboard.yaml found, using default configuration');
  }

  const configured = applyPortOverride(loaded.value.config, process.env['BLOGBOARD_PORT']);
  if (configured.isErr()) {
    // eslint-disable-next-line no-console
    console.error(`[api-server] ${configured.error.message}`);
    process.exit(1);
  }

  const config = configured.value;
  if (config.auth.jwtSecret === DEFAULT_JWT_SECRET) {
    // eslint-disable-next-line no-console
    console.warn('[api-server] auth.jwtSecret is the development default; set it before deploying');
  }

  const server = new ApiServer({ config, logRequests: true });
  const port = await server.start();

  const shutdown = (): void => {
    server.close().finally(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // eslint-disable-next-line no-console
  console.log(`[api-server] Blogboard API server listening on http://localhost:${port}`);
  // eslint-disable-next-line no-console
  console.log(`[api-server] OpenAPI spec: http://localhost:${port}/api/openapi.json`);
  // eslint-disable-next-line no-console
  console.log(`[api-server] Health check: http://localhost:${port}/health`);
}

// Only run main when this module is executed directly (not imported)
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  main().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
