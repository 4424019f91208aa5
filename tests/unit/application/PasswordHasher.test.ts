import { describe, it, expect } from 'vitest';
import { PasswordHasher } from '../../../src/application/auth/PasswordHasher.js';
import { CorruptHashError } from '../../../src/utils/errors.js';

describe('PasswordHasher', () => {
  const hasher = new PasswordHasher(4);

  it('verifies the password it hashed', async () => {
    const digest = await hasher.hash('s3cret');
    expect(await hasher.verify('s3cret', digest)).toBe(true);
  });

  it('rejects a different password', async () => {
    const digest = await hasher.hash('s3cret');
    expect(await hasher.verify('S3cret', digest)).toBe(false);
  });

  it('salts every hash', async () => {
    const [a, b] = await Promise.all([hasher.hash('same'), hasher.hash('same')]);
    expect(a).not.toBe(b);
    expect(a.startsWith('$2')).toBe(true);
  });

  it('throws CorruptHashError for a malformed digest', async () => {
    await expect(hasher.verify('s3cret', 'not-a-bcrypt-hash')).rejects.toBeInstanceOf(CorruptHashError);
  });
});
