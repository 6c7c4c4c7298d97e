import { ok, err, type Result } from 'neverthrow';
import { loadConfig } from './config/config-parser.js';
import { AuthService } from './auth/auth-service.js';
import { JwtTokenService } from './auth/token-service.js';
import { PostStore } from './posts/post-store.js';
import { SEED_POSTS } from './posts/seed.js';
import type { BlogboardConfig } from './types/config.js';

/** All services a request handler needs, wired from one config. */
export interface BlogboardRuntime {
  readonly config: BlogboardConfig;
  readonly posts: PostStore;
  readonly auth: AuthService;
}

export interface RuntimeOptions {
  /** Project root directory (must contain .blogboard.yaml unless `config` is given). */
  readonly rootDir?: string;
  /** Use this config instead of loading one from `rootDir`. */
  readonly config?: BlogboardConfig;
}

export class RuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeError';
  }
}

/**
 * Build fresh, isolated stores and services for `config`.
 */
export function buildRuntime(config: BlogboardConfig): BlogboardRuntime {
  const posts = new PostStore({
    initialPosts: config.posts.seed ? SEED_POSTS : [],
    defaultPerPage: config.posts.perPage,
  });

  const auth = new AuthService({
    tokens: new JwtTokenService({
      secret: config.auth.jwtSecret,
      ttl: config.auth.tokenTtl,
    }),
  });

  return { config, posts, auth };
}

/**
 * Load config (unless given) and build a runtime from it.
 */
export async function createRuntime(
  options: RuntimeOptions,
): Promise<Result<BlogboardRuntime, RuntimeError>> {
  let config = options.config;

  if (!config) {
    const configResult = await loadConfig(options.rootDir ?? process.cwd());
    if (configResult.isErr()) {
      return err(new RuntimeError(`Config load failed: ${configResult.error.message}`));
    }
    config = configResult.value;
  }

  return ok(buildRuntime(config));
}
