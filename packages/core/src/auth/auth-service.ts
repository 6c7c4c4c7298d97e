import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { ConflictError, InvalidInputError } from '../types/errors.js';
import { ScryptPasswordHasher } from './password-hasher.js';
import { UserStore } from './user-store.js';
import {
  UnauthorizedError,
  type Credentials,
  type PasswordHasher,
  type TokenService,
} from './types.js';

const credentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export interface AuthServiceDeps {
  readonly tokens: TokenService;
  readonly hasher?: PasswordHasher;
  readonly users?: UserStore;
}

function parseCredentials(input: Record<string, unknown>): Result<Credentials, InvalidInputError> {
  const parsed = credentialsSchema.safeParse(input);
  if (!parsed.success) {
    return err(new InvalidInputError('Missing username or password'));
  }
  return ok(parsed.data);
}

/**
 * Registration, login and bearer-token checks.
 *
 * Authentication only establishes who the caller is; nothing here restricts
 * what an authenticated caller may do.
 */
export class AuthService {
  private readonly tokens: TokenService;
  private readonly hasher: PasswordHasher;
  private readonly users: UserStore;

  constructor(deps: AuthServiceDeps) {
    this.tokens = deps.tokens;
    this.hasher = deps.hasher ?? new ScryptPasswordHasher();
    this.users = deps.users ?? new UserStore();
  }

  async register(
    input: Record<string, unknown>,
  ): Promise<Result<string, InvalidInputError | ConflictError>> {
    const credentials = parseCredentials(input);
    if (credentials.isErr()) {
      return err(credentials.error);
    }

    const { username, password } = credentials.value;
    if (await this.users.has(username)) {
      return err(new ConflictError('User already exists'));
    }

    const passwordHash = await this.hasher.hash(password);
    const added = await this.users.add({ username, passwordHash });
    if (added.isErr()) {
      return err(added.error);
    }
    return ok(username);
  }

  /**
   * Check credentials and issue a new bearer token for the user.
   */
  async login(
    input: Record<string, unknown>,
  ): Promise<Result<string, InvalidInputError | UnauthorizedError>> {
    const credentials = parseCredentials(input);
    if (credentials.isErr()) {
      return err(credentials.error);
    }

    const { username, password } = credentials.value;
    const user = await this.users.get(username);
    if (!user || !(await this.hasher.verify(password, user.passwordHash))) {
      return err(new UnauthorizedError('Invalid username or password'));
    }

    return ok(await this.tokens.issue(username));
  }

  /**
   * Resolve a bearer token to the username it was issued for.
   */
  async authenticate(token: string | undefined): Promise<Result<string, UnauthorizedError>> {
    if (!token) {
      return err(new UnauthorizedError('Missing bearer token'));
    }

    const subject = await this.tokens.verify(token);
    if (subject.isErr()) {
      return err(new UnauthorizedError('Invalid or expired token'));
    }
    return ok(subject.value);
  }
}
