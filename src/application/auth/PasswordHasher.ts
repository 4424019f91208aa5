// Application: Password hashing (bcrypt)

import bcrypt from 'bcryptjs';
import type { IPasswordHasher } from '@/domain/user/repository.js';
import { CorruptHashError } from '@/utils/errors.js';

const BCRYPT_DIGEST = /^\$2[abxy]?\$\d{2}\$[./A-Za-z0-9]{53}$/;

export class PasswordHasher implements IPasswordHasher {
  constructor(private readonly rounds: number = 10) {}

  async hash(plaintext: string): Promise<string> {
    return bcrypt.hash(plaintext, this.rounds);
  }

  /**
   * False for a wrong password; throws CorruptHashError when the stored digest is unusable
   */
  async verify(plaintext: string, digest: string): Promise<boolean> {
    if (!BCRYPT_DIGEST.test(digest)) {
      throw new CorruptHashError();
    }
    return bcrypt.compare(plaintext, digest);
  }
}
