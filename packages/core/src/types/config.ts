export interface ServerConfig {
  port: number;
  corsOrigin: string;
}

export interface AuthConfig {
  jwtSecret: string;
  /** Token lifetime as a duration string, e.g. `15m` or `1h`. */
  tokenTtl: string;
}

export interface PostsConfig {
  /** Start the store with the sample posts. */
  seed: boolean;
  /** Default page size for list requests. */
  perPage: number;
}

export interface BlogboardConfig {
  version: string;
  server: ServerConfig;
  auth: AuthConfig;
  posts: PostsConfig;
}
