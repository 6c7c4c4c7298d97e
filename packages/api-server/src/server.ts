import express, { type Express } from 'express';
import { createServer, type Server as HttpServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import { buildRuntime, DEFAULT_CONFIG, type BlogboardConfig, type BlogboardRuntime } from '@blogboard/core';
import { createAuthMiddleware } from './middleware/auth.js';
import { createErrorHandler, notFoundHandler } from './middleware/errors.js';
import { createRequestLogger } from './middleware/request-logger.js';
import { createAuthRouter } from './routes/auth.js';
import { createPostsRouter } from './routes/posts.js';
import { createOpenAPISpec } from './openapi.js';

export const API_SERVER_VERSION = '0.1.0';

export interface ApiServerOptions {
  /** Services to serve. Built from `config` when omitted. */
  readonly runtime?: BlogboardRuntime;
  /** Config used when no runtime is given. Default: DEFAULT_CONFIG */
  readonly config?: BlogboardConfig;
  /** Port to listen on. Default: the config's server.port */
  readonly port?: number;
  /** CORS origin. Default: the config's server.corsOrigin */
  readonly corsOrigin?: string;
  /** Log one line per request. Default: false */
  readonly logRequests?: boolean;
  /** Sink for request and error log lines. Default: console */
  readonly log?: (message: string) => void;
}

export class ApiServer {
  private readonly app: Express;
  private readonly runtime: BlogboardRuntime;
  private readonly port: number;
  private httpServer: HttpServer | null = null;

  constructor(options: ApiServerOptions = {}) {
    this.runtime = options.runtime ?? buildRuntime(options.config ?? DEFAULT_CONFIG);
    this.port = options.port ?? this.runtime.config.server.port;

    const corsOrigin = options.corsOrigin ?? this.runtime.config.server.corsOrigin;

    this.app = express();

    // --- Global Middleware ---

    if (options.logRequests) {
      this.app.use(createRequestLogger(options.log));
    }

    // CORS
    this.app.use((req, res, next) => {
      res.setHeader('Access-Control-Allow-Origin', corsOrigin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
      if (req.method === 'OPTIONS') {
        res.status(204).end();
        return;
      }
      next();
    });

    // JSON body parser; top-level primitives reach the routes as non-objects
    this.app.use(express.json({ strict: false }));

    // --- Unauthenticated Routes ---

    this.app.get('/health', (_req, res) => {
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    this.app.get('/api/openapi.json', (_req, res) => {
      res.json(createOpenAPISpec());
    });

    this.app.use(createAuthRouter({ auth: this.runtime.auth }));

    // --- Authenticated Routes ---

    this.app.use(
      '/api/posts',
      createAuthMiddleware(this.runtime.auth),
      createPostsRouter({ posts: this.runtime.posts }),
    );

    this.app.use(notFoundHandler);
    this.app.use(createErrorHandler(options.log));
  }

  /**
   * Start listening. Resolves with the bound port (useful with port 0).
   */
  async start(): Promise<number> {
    const httpServer = createServer(this.app);
    this.httpServer = httpServer;

    return new Promise<number>((resolvePromise, reject) => {
      httpServer.on('error', reject);
      httpServer.listen(this.port, () => {
        const address = httpServer.address();
        resolvePromise(isAddressInfo(address) ? address.port : this.port);
      });
    });
  }

  /**
   * Gracefully shut down the HTTP server.
   */
  async close(): Promise<void> {
    const httpServer = this.httpServer;
    if (httpServer) {
      await new Promise<void>((resolvePromise, reject) => {
        httpServer.close((closeErr) => {
          if (closeErr) reject(closeErr);
          else resolvePromise();
        });
      });
      this.httpServer = null;
    }
  }

  /** Expose Express app for testing with supertest. */
  getApp(): Express {
    return this.app;
  }

  getRuntime(): BlogboardRuntime {
    return this.runtime;
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === 'object';
}
