// User Repository - LowDB implementation
// Username and email uniqueness are enforced here, inside the atomic write

import { DatabaseConnection, type UserRecord } from './connection.js';
import type { User, NewUser } from '@/domain/user/types.js';
import type { IUserRepository } from '@/domain/user/repository.js';
import { UniqueConstraintError } from '@/utils/errors.js';

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class UserRepository implements IUserRepository {
  constructor(private db: DatabaseConnection) {}

  /**
   * Create a new user
   */
  async create(data: NewUser, avatar: string | null = null): Promise<User> {
    const record = await this.db.atomicUpdate((store) => {
      if (store.users.some((u) => sameText(u.username, data.username))) {
        throw new UniqueConstraintError('username', data.username);
      }
      if (store.users.some((u) => sameText(u.email, data.email))) {
        throw new UniqueConstraintError('email', data.email);
      }

      const newUser: UserRecord = {
        id: DatabaseConnection.nextId(store, 'users'),
        username: data.username,
        email: data.email,
        password_hash: data.passwordHash,
        confirmed: data.confirmed ? 1 : 0,
        role: data.role ?? 'user',
        avatar,
        created_at: new Date().toISOString(),
      };

      store.users.push(newUser);
      return { ...newUser };
    });

    return this.rowToUser(record);
  }

  /**
   * Get user by ID
   */
  async findById(id: number): Promise<User | null> {
    const user = this.db.getData().users.find((u) => u.id === id);
    return user ? this.rowToUser(user) : null;
  }

  /**
   * Get user by username
   */
  async findByUsername(username: string): Promise<User | null> {
    const user = this.db.getData().users.find((u) => sameText(u.username, username));
    return user ? this.rowToUser(user) : null;
  }

  /**
   * Get user by email
   */
  async findByEmail(email: string): Promise<User | null> {
    const user = this.db.getData().users.find((u) => sameText(u.email, email));
    return user ? this.rowToUser(user) : null;
  }

  /**
   * Mark the user's email as confirmed. Confirming twice is a no-op.
   * Returns false when no user has that email.
   */
  async confirmEmail(email: string): Promise<boolean> {
    return this.db.atomicUpdate((store) => {
      const user = store.users.find((u) => sameText(u.email, email));
      if (!user) return false;

      user.confirmed = 1;
      return true;
    });
  }

  /**
   * Update the avatar URL of the user with this email
   */
  async updateAvatarUrl(email: string, url: string): Promise<User | null> {
    const record = await this.db.atomicUpdate((store) => {
      const user = store.users.find((u) => sameText(u.email, email));
      if (!user) return null;

      user.avatar = url;
      return { ...user };
    });

    return record ? this.rowToUser(record) : null;
  }

  /**
   * Replace the stored password hash
   */
  async updatePasswordHash(userId: number, passwordHash: string): Promise<User | null> {
    const record = await this.db.atomicUpdate((store) => {
      const user = store.users.find((u) => u.id === userId);
      if (!user) return null;

      user.password_hash = passwordHash;
      return { ...user };
    });

    return record ? this.rowToUser(record) : null;
  }

  private rowToUser(row: UserRecord): User {
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      passwordHash: row.password_hash,
      confirmed: row.confirmed === 1,
      role: row.role,
      avatar: row.avatar,
      createdAt: new Date(row.created_at),
    };
  }
}
