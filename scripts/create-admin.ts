// Provisioning Script: create an administrator account
// The only way a user gets the admin role; roles never change after creation
//
// Usage: npm run create-admin -- --username admin --email admin@example.com --password <password>

import 'dotenv/config';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { DatabaseService } from '../src/infrastructure/database/DatabaseService.js';
import { PasswordHasher } from '../src/application/auth/PasswordHasher.js';
import { buildAuthConfig } from '../src/utils/config.js';
import { UniqueConstraintError } from '../src/utils/errors.js';
import { describeError } from '../src/utils/logger.js';

const ArgsSchema = z.object({
  username: z.string().trim().min(3).max(30).regex(/^[^@\s]+$/, 'Username must not contain @ or spaces'),
  email: z.string().trim().email().max(100),
  password: z.string().min(4).max(128),
});

async function createAdmin(): Promise<void> {
  const { values } = parseArgs({
    options: {
      username: { type: 'string' },
      email: { type: 'string' },
      password: { type: 'string' },
    },
  });
  const args = ArgsSchema.parse(values);

  const db = await DatabaseService.open({ path: process.env.DB_PATH || './data/contacts.json' });
  const hasher = new PasswordHasher(buildAuthConfig(process.env).bcryptRounds);

  try {
    const user = await db.users.create({
      username: args.username,
      email: args.email,
      passwordHash: await hasher.hash(args.password),
      role: 'admin',
      confirmed: true,
    });
    console.log(`Created admin ${user.username} (id ${user.id})`);
  } catch (error) {
    if (error instanceof UniqueConstraintError) {
      throw new Error(`A user with this ${error.field} already exists`);
    }
    throw error;
  } finally {
    await db.close();
  }
}

createAdmin()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error('Admin creation failed:', describeError(error));
    process.exit(1);
  });
