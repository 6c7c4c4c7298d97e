export type { ServerConfig, AuthConfig, PostsConfig, BlogboardConfig } from './config.js';
export type {
  Post,
  PostDraft,
  PostPatch,
  PostField,
  SortDirection,
  ListQuery,
  SearchFilters,
} from './post.js';
export { POST_FIELDS } from './post.js';
export { InvalidInputError, ConflictError, NotFoundError } from './errors.js';
