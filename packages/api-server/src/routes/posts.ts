import { Router } from 'express';
import {
  NotFoundError,
  POST_FIELDS,
  safeInteger,
  safeRecord,
  safeString,
  type PostStore,
  type SearchFilters,
} from '@blogboard/core';
import { asyncHandler } from '../middleware/async-handler.js';
import { sendError } from '../middleware/errors.js';

export interface PostsRouteDeps {
  readonly posts: PostStore;
}

const ID_PATTERN = /^\d+$/;

/** First value of a query parameter, or undefined when absent or empty. */
function queryString(value: unknown): string | undefined {
  const first: unknown = Array.isArray(value) ? value[0] : value;
  const text = safeString(first, '');
  return text === '' ? undefined : text;
}

/** Query parameter as an integer; anything unparseable counts as absent. */
function queryInteger(value: unknown): number | undefined {
  const text = queryString(value);
  if (text === undefined) return undefined;
  const parsed = safeInteger(text, Number.NaN);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function parsePostId(raw: string): number | undefined {
  if (!ID_PATTERN.test(raw)) return undefined;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : undefined;
}

/**
 * Post collection routes, mounted at `/api/posts` behind the auth middleware.
 */
export function createPostsRouter(deps: PostsRouteDeps): Router {
  const router = Router();
  const postNotFound = new NotFoundError('Post not found');

  router.get('/', asyncHandler(async (req, res) => {
    const result = await deps.posts.list({
      sort: queryString(req.query['sort']),
      direction: queryString(req.query['direction']),
      page: queryInteger(req.query['page']),
      perPage: queryInteger(req.query['per_page']),
    });

    if (result.isErr()) {
      sendError(res, result.error);
      return;
    }

    res.json(result.value);
  }));

  router.post('/', asyncHandler(async (req, res) => {
    const result = await deps.posts.create(safeRecord(req.body, {}));

    if (result.isErr()) {
      sendError(res, result.error);
      return;
    }

    res.status(201).json(result.value);
  }));

  // Registered ahead of the `/:id` routes.
  router.get('/search', asyncHandler(async (req, res) => {
    const filters: SearchFilters = {};
    for (const field of POST_FIELDS) {
      const value = queryString(req.query[field]);
      if (value !== undefined) {
        filters[field] = value;
      }
    }

    res.status(200).json(await deps.posts.search(filters));
  }));

  router.put('/:id', asyncHandler(async (req, res) => {
    const id = parsePostId(req.params['id'] ?? '');
    if (id === undefined) {
      sendError(res, postNotFound);
      return;
    }

    const result = await deps.posts.update(id, safeRecord(req.body, {}));

    if (result.isErr()) {
      sendError(res, result.error);
      return;
    }

    res.status(200).json(result.value);
  }));

  router.delete('/:id', asyncHandler(async (req, res) => {
    const id = parsePostId(req.params['id'] ?? '');
    if (id === undefined) {
      sendError(res, postNotFound);
      return;
    }

    const result = await deps.posts.delete(id);

    if (result.isErr()) {
      sendError(res, result.error);
      return;
    }

    res.status(200).json({ message: result.value });
  }));

  return router;
}
