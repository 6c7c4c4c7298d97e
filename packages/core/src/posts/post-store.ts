import { ok, err, type Result } from 'neverthrow';
import type { ListQuery, Post, PostDraft, PostPatch, SearchFilters } from '../types/post.js';
import { InvalidInputError, NotFoundError } from '../types/errors.js';
import { ReadWriteLock } from '../utils/rw-lock.js';
import { filterPosts, paginate, resolveListQuery, sortPosts, DEFAULT_PER_PAGE } from './post-query.js';
import { parsePostDraft, parsePostPatch } from './post-validation.js';

export interface PostStoreOptions {
  /** Posts the store starts with, in insertion order. */
  readonly initialPosts?: readonly Post[];
  /** Page size used when a list query does not give one. Default: 10 */
  readonly defaultPerPage?: number;
}

/**
 * In-memory, insertion-ordered collection of posts.
 *
 * Ids come from a store-owned counter that only moves forward, so an id is
 * never handed out twice, even after the post holding it is deleted. Every
 * read-modify-write sequence runs under the write side of the store's lock.
 */
export class PostStore {
  private readonly posts: Post[];
  private readonly lock = new ReadWriteLock();
  private readonly defaultPerPage: number;
  private nextId: number;

  constructor(options: PostStoreOptions = {}) {
    this.posts = (options.initialPosts ?? []).map((post) => ({ ...post }));
    this.defaultPerPage = options.defaultPerPage ?? DEFAULT_PER_PAGE;
    this.nextId = this.posts.reduce((max, post) => Math.max(max, post.id), 0) + 1;
  }

  async list(query: ListQuery = {}): Promise<Result<Post[], InvalidInputError>> {
    const resolved = resolveListQuery(query, this.defaultPerPage);
    if (resolved.isErr()) {
      return err(resolved.error);
    }

    const { sort, page, perPage } = resolved.value;
    return this.lock.read((): Result<Post[], InvalidInputError> => {
      const ordered = sort ? sortPosts(this.posts, sort) : this.posts;
      return ok(paginate(ordered, page, perPage).map(clone));
    });
  }

  /**
   * Validate `input` as a draft and append it with the next id.
   */
  async create(input: Record<string, unknown>): Promise<Result<Post, InvalidInputError>> {
    const draft = parsePostDraft(input);
    if (draft.isErr()) {
      return err(draft.error);
    }
    return ok(await this.insert(draft.value));
  }

  /** Append an already-validated draft. */
  async insert(draft: PostDraft): Promise<Post> {
    return this.lock.write((): Post => {
      const post: Post = { id: this.nextId, ...draft };
      this.nextId += 1;
      this.posts.push(post);
      return clone(post);
    });
  }

  async update(
    id: number,
    input: Record<string, unknown>,
  ): Promise<Result<Post, NotFoundError | InvalidInputError>> {
    return this.lock.write((): Result<Post, NotFoundError | InvalidInputError> => {
      const post = this.posts.find((p) => p.id === id);
      if (!post) {
        return err(new NotFoundError('Post not found'));
      }

      const patch = parsePostPatch(input);
      if (patch.isErr()) {
        return err(patch.error);
      }

      applyPatch(post, patch.value);
      return ok(clone(post));
    });
  }

  /**
   * Remove a post. Resolves to the confirmation message.
   */
  async delete(id: number): Promise<Result<string, NotFoundError>> {
    return this.lock.write((): Result<string, NotFoundError> => {
      const index = this.posts.findIndex((p) => p.id === id);
      if (index === -1) {
        return err(new NotFoundError('Post not found'));
      }

      this.posts.splice(index, 1);
      return ok(`Post with id ${id} has been deleted successfully.`);
    });
  }

  async search(filters: SearchFilters = {}): Promise<Post[]> {
    return this.lock.read(() => filterPosts(this.posts, filters).map(clone));
  }

  /** Number of posts currently stored. */
  async count(): Promise<number> {
    return this.lock.read(() => this.posts.length);
  }
}

function applyPatch(post: Post, patch: PostPatch): void {
  if (patch.title !== undefined) post.title = patch.title;
  if (patch.content !== undefined) post.content = patch.content;
  if (patch.author !== undefined) post.author = patch.author;
  if (patch.date !== undefined) post.date = patch.date;
}

function clone(post: Post): Post {
  return { ...post };
}
