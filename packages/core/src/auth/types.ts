import type { Result } from 'neverthrow';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthError';
  }
}

/** Bad credentials, or a missing or unverifiable bearer token. */
export class UnauthorizedError extends AuthError {
  constructor(message: string) {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

// ---------------------------------------------------------------------------
// User
// ---------------------------------------------------------------------------

export interface User {
  readonly username: string;
  readonly passwordHash: string;
}

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

// ---------------------------------------------------------------------------
// Pluggable primitives
// ---------------------------------------------------------------------------

/**
 * Issues and verifies bearer tokens. The token format is opaque to callers;
 * only the subject (the username) round-trips.
 */
export interface TokenService {
  issue(subject: string): Promise<string>;
  verify(token: string): Promise<Result<string, AuthError>>;
}

/** One-way, salted password hashing. */
export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, passwordHash: string): Promise<boolean>;
}
