import { describe, it, expect } from 'vitest';
import { ScryptPasswordHasher } from './password-hasher.js';

describe('ScryptPasswordHasher', () => {
  const hasher = new ScryptPasswordHasher();

  it('should not store the password in plaintext', async () => {
    const hash = await hasher.hash('hunter2');

    expect(hash).not.toContain('hunter2');
    expect(hash).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{128}$/);
  });

  it('should verify the original password', async () => {
    const hash = await hasher.hash('hunter2');
    expect(await hasher.verify('hunter2', hash)).toBe(true);
  });

  it('should reject a wrong password', async () => {
    const hash = await hasher.hash('hunter2');
    expect(await hasher.verify('hunter3', hash)).toBe(false);
  });

  it('should salt each hash', async () => {
    const first = await hasher.hash('same');
    const second = await hasher.hash('same');

    expect(first).not.toBe(second);
    expect(await hasher.verify('same', second)).toBe(true);
  });

  it('should reject malformed hashes', async () => {
    expect(await hasher.verify('x', 'plain-text')).toBe(false);
    expect(await hasher.verify('x', 'bcrypt$00$11')).toBe(false);
    expect(await hasher.verify('x', 'scrypt$00$11')).toBe(false);
  });
});
