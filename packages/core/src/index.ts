export type {
  BlogboardConfig,
  ServerConfig,
  AuthConfig,
  PostsConfig,
  Post,
  PostDraft,
  PostPatch,
  PostField,
  SortDirection,
  ListQuery,
  SearchFilters,
} from './types/index.js';

export { POST_FIELDS, InvalidInputError, ConflictError, NotFoundError } from './types/index.js';

export {
  loadConfig,
  parseConfig,
  serializeConfig,
  interpolateEnvVars,
  ConfigError,
  DEFAULT_CONFIG,
  DEFAULT_JWT_SECRET,
  CONFIG_FILE_NAME,
} from './config/config-parser.js';

export {
  PostStore,
  resolveListQuery,
  sortPosts,
  compareCodePoints,
  paginate,
  filterPosts,
  parsePostDraft,
  parsePostPatch,
  isValidPostDate,
  DEFAULT_PAGE,
  DEFAULT_PER_PAGE,
  SEED_POSTS,
} from './posts/index.js';
export type { PostStoreOptions, SortSpec, ResolvedListQuery } from './posts/index.js';

export type { User, Credentials, TokenService, PasswordHasher, AuthServiceDeps, JwtTokenServiceOptions } from './auth/index.js';
export {
  AuthError,
  UnauthorizedError,
  AuthService,
  JwtTokenService,
  ScryptPasswordHasher,
  UserStore,
} from './auth/index.js';

export { ReadWriteLock } from './utils/rw-lock.js';
export { safeString, safeRecord, safeInteger } from './utils/safe-cast.js';

export { createRuntime, buildRuntime, RuntimeError } from './runtime.js';
export type { BlogboardRuntime, RuntimeOptions } from './runtime.js';
