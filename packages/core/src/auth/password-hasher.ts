import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import type { PasswordHasher } from './types.js';

const SCHEME = 'scrypt';
const SALT_BYTES = 16;
const KEY_LENGTH = 64;

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (error, key) => {
      if (error) reject(error);
      else resolve(key);
    });
  });
}

/**
 * scrypt-based hasher. Hashes are stored as `scrypt$<saltHex>$<keyHex>`.
 */
export class ScryptPasswordHasher implements PasswordHasher {
  async hash(password: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const key = await deriveKey(password, salt);
    return `${SCHEME}$${salt.toString('hex')}$${key.toString('hex')}`;
  }

  async verify(password: string, passwordHash: string): Promise<boolean> {
    const parts = passwordHash.split('$');
    const [scheme, saltHex, keyHex] = parts;
    if (parts.length !== 3 || scheme !== SCHEME || saltHex === undefined || keyHex === undefined) {
      return false;
    }

    const expected = Buffer.from(keyHex, 'hex');
    if (expected.length !== KEY_LENGTH) {
      return false;
    }

    const actual = await deriveKey(password, Buffer.from(saltHex, 'hex'));
    return timingSafeEqual(actual, expected);
  }
}
