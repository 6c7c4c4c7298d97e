import { ok, err, type Result } from 'neverthrow';
import {
  POST_FIELDS,
  type ListQuery,
  type Post,
  type PostField,
  type SearchFilters,
  type SortDirection,
} from '../types/post.js';
import { InvalidInputError } from '../types/errors.js';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PER_PAGE = 10;

export interface SortSpec {
  readonly field: PostField;
  readonly direction: SortDirection;
}

export interface ResolvedListQuery {
  readonly sort: SortSpec | null;
  readonly page: number;
  readonly perPage: number;
}

function isPostField(value: string): value is PostField {
  return POST_FIELDS.some((field) => field === value);
}

function isSortDirection(value: string): value is SortDirection {
  return value === 'asc' || value === 'desc';
}

/**
 * Validate sort options and fill in paging defaults.
 */
export function resolveListQuery(
  query: ListQuery,
  defaultPerPage = DEFAULT_PER_PAGE,
): Result<ResolvedListQuery, InvalidInputError> {
  const { sort, direction } = query;

  if (sort !== undefined && !isPostField(sort)) {
    return err(
      new InvalidInputError("Invalid sort field. Must be 'title', 'content', 'author', or 'date'."),
    );
  }
  if (direction !== undefined && !isSortDirection(direction)) {
    return err(new InvalidInputError("Invalid sort direction. Must be 'asc' or 'desc'."));
  }

  return ok({
    sort: sort !== undefined ? { field: sort, direction: direction ?? 'asc' } : null,
    page: query.page ?? DEFAULT_PAGE,
    perPage: query.perPage ?? defaultPerPage,
  });
}

/**
 * Compare two strings by Unicode code point rather than UTF-16 code unit, so
 * characters outside the Basic Multilingual Plane sort after U+FFFF.
 */
export function compareCodePoints(left: string, right: string): number {
  let index = 0;
  while (index < left.length && index < right.length) {
    const a = left.codePointAt(index) ?? 0;
    const b = right.codePointAt(index) ?? 0;
    if (a !== b) return a < b ? -1 : 1;
    index += a > 0xffff ? 2 : 1;
  }
  return Math.sign(left.length - right.length);
}

/**
 * Stable sort by code-point order of one field. Descending order keeps ties
 * in their original relative order.
 */
export function sortPosts(posts: readonly Post[], sort: SortSpec): Post[] {
  const sign = sort.direction === 'desc' ? -1 : 1;
  return [...posts].sort((a, b) => {
    return compareCodePoints(a[sort.field], b[sort.field]) * sign;
  });
}

/**
 * Slice one page out of `posts`. Pages outside the collection are empty.
 */
export function paginate<T>(items: readonly T[], page: number, perPage: number): T[] {
  if (page < 1 || perPage < 1) return [];
  const start = (page - 1) * perPage;
  return items.slice(start, start + perPage);
}

/**
 * Narrow `posts` by every non-empty filter. Text fields match as
 * case-insensitive substrings; the date matches as a plain substring.
 */
export function filterPosts(posts: readonly Post[], filters: SearchFilters): Post[] {
  let results = [...posts];

  for (const field of POST_FIELDS) {
    const needle = filters[field];
    if (!needle) continue;

    if (field === 'date') {
      results = results.filter((post) => post.date.includes(needle));
    } else {
      const lowered = needle.toLowerCase();
      results = results.filter((post) => post[field].toLowerCase().includes(lowered));
    }
  }

  return results;
}
