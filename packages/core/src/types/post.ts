/** Fields a client may sort, search and update. */
export const POST_FIELDS = ['title', 'content', 'author', 'date'] as const;

export type PostField = (typeof POST_FIELDS)[number];

export type SortDirection = 'asc' | 'desc';

export interface Post {
  id: number;
  title: string;
  content: string;
  author: string;
  /** Calendar date in `YYYY-MM-DD` form. */
  date: string;
}

/** A validated post that has not been assigned an id yet. */
export type PostDraft = Omit<Post, 'id'>;

/** Partial update; absent fields keep their current value. */
export type PostPatch = Partial<PostDraft>;

export interface ListQuery {
  sort?: string;
  direction?: string;
  /** 1-based page number. Default: 1 */
  page?: number;
  /** Page size. Default: 10 */
  perPage?: number;
}

export type SearchFilters = Partial<Record<PostField, string>>;
