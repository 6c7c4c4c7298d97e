import { ok, err, type Result } from 'neverthrow';
import { ConflictError } from '../types/errors.js';
import { ReadWriteLock } from '../utils/rw-lock.js';
import type { User } from './types.js';

/**
 * In-memory user registry keyed by username.
 */
export class UserStore {
  private readonly users = new Map<string, User>();
  private readonly lock = new ReadWriteLock();

  /** Add a user; fails when the username is taken. */
  async add(user: User): Promise<Result<User, ConflictError>> {
    return this.lock.write((): Result<User, ConflictError> => {
      if (this.users.has(user.username)) {
        return err(new ConflictError('User already exists'));
      }
      this.users.set(user.username, user);
      return ok(user);
    });
  }

  async get(username: string): Promise<User | undefined> {
    return this.lock.read(() => this.users.get(username));
  }

  async has(username: string): Promise<boolean> {
    return this.lock.read(() => this.users.has(username));
  }

  async count(): Promise<number> {
    return this.lock.read(() => this.users.size);
  }
}
