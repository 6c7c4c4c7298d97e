export { PostStore } from './post-store.js';
export type { PostStoreOptions } from './post-store.js';
export {
  resolveListQuery,
  sortPosts,
  compareCodePoints,
  paginate,
  filterPosts,
  DEFAULT_PAGE,
  DEFAULT_PER_PAGE,
} from './post-query.js';
export type { SortSpec, ResolvedListQuery } from './post-query.js';
export { parsePostDraft, parsePostPatch, isValidPostDate } from './post-validation.js';
export { SEED_POSTS } from './seed.js';
