import { ok, err, type Result } from 'neverthrow';
import { SignJWT, jwtVerify } from 'jose';
import { AuthError, type TokenService } from './types.js';

const ALGORITHM = 'HS256';

export interface JwtTokenServiceOptions {
  /** Shared HMAC secret. */
  readonly secret: string;
  /** Lifetime as a duration string (`15m`, `1h`, ...). Default: `15m` */
  readonly ttl?: string;
}

/**
 * HS256 JWT tokens carrying the username in the `sub` claim.
 */
export class JwtTokenService implements TokenService {
  private readonly key: Uint8Array;
  private readonly ttl: string;

  constructor(options: JwtTokenServiceOptions) {
    if (options.secret.length === 0) {
      throw new AuthError('JWT secret must not be empty');
    }
    this.key = new TextEncoder().encode(options.secret);
    this.ttl = options.ttl ?? '15m';
  }

  async issue(subject: string): Promise<string> {
    return new SignJWT({})
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(subject)
      .setIssuedAt()
      .setExpirationTime(this.ttl)
      .sign(this.key);
  }

  async verify(token: string): Promise<Result<string, AuthError>> {
    try {
      const { payload } = await jwtVerify(token, this.key, { algorithms: [ALGORITHM] });
      if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        return err(new AuthError('Token has no subject'));
      }
      return ok(payload.sub);
    } catch (cause) {
      const message = cause instanceof Error ? cause.message : 'Unknown error';
      return err(new AuthError(`Token verification failed: ${message}`));
    }
  }
}
