// LowDB connection and database instance management
// JSON document storage; the process is the only writer of the file

import { Low, Memory } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdirSync } from 'fs';

// Database schema definition with version field for change tracking
export interface DatabaseSchema {
  _version: number;           // Incremented on every committed write
  _sequences: {
    users: number;
    contacts: number;
  };
  users: UserRecord[];
  contacts: ContactRecord[];
}

export interface UserRecord {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  confirmed: number;          // 0 | 1
  role: 'user' | 'admin';
  avatar: string | null;
  created_at: string;
}

export interface ContactRecord {
  id: number;
  user_id: number;
  name: string;
  surname: string;
  email: string;
  phone: string;
  birthday: string;           // YYYY-MM-DD
  info: string | null;
  created_at: string;
  updated_at: string;
}

// Fresh default data for a new database (never shared between instances)
export function createDefaultData(): DatabaseSchema {
  return {
    _version: 1,
    _sequences: { users: 0, contacts: 0 },
    users: [],
    contacts: [],
  };
}

// Database configuration
export type DatabaseConfig =
  | { path: string; inMemory?: false }
  | { inMemory: true };

/**
 * LowDB wrapper providing serialized, all-or-nothing writes
 */
export class DatabaseConnection {
  private db: Low<DatabaseSchema>;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(config: DatabaseConfig) {
    if (config.inMemory) {
      this.db = new Low(new Memory<DatabaseSchema>(), createDefaultData());
      return;
    }

    mkdirSync(dirname(config.path), { recursive: true });
    this.db = new Low(new JSONFile<DatabaseSchema>(config.path), createDefaultData());
  }

  /**
   * Initialize by reading data
   */
  async init(): Promise<void> {
    await this.db.read();

    // Databases written before sequences existed
    const data = this.db.data;
    if (data._version === undefined) {
      data._version = 1;
    }
    if (!data._sequences) {
      data._sequences = {
        users: data.users.reduce((max, u) => Math.max(max, u.id), 0),
        contacts: data.contacts.reduce((max, c) => Math.max(max, c.id), 0),
      };
    }
    data.contacts ??= [];
    await this.db.write();
  }

  /**
   * Get raw data (read-only use; mutate through atomicUpdate)
   */
  getData(): DatabaseSchema {
    return this.db.data;
  }

  /**
   * Atomic update: updates run one at a time; if the updater throws, the data is
   * restored to its previous state and nothing is written.
   */
  atomicUpdate<T>(updater: (data: DatabaseSchema) => T): Promise<T> {
    const run = async (): Promise<T> => {
      const snapshot = structuredClone(this.db.data);

      try {
        const result = updater(this.db.data);
        this.db.data._version += 1;
        await this.db.write();
        return result;
      } catch (error) {
        this.db.data = snapshot;
        throw error;
      }
    };

    const next = this.writeQueue.then(run);
    this.writeQueue = next.catch(() => undefined);
    return next;
  }

  /**
   * Allocate the next id of a sequence (call inside atomicUpdate)
   */
  static nextId(data: DatabaseSchema, sequence: keyof DatabaseSchema['_sequences']): number {
    data._sequences[sequence] += 1;
    return data._sequences[sequence];
  }

  /**
   * Get current version
   */
  getVersion(): number {
    return this.db.data._version;
  }

  /**
   * Round-trip check used by the health endpoint
   */
  async ping(): Promise<boolean> {
    await this.writeQueue;
    return typeof this.db.data._version === 'number';
  }

  /**
   * Close: wait for pending writes and flush
   */
  async close(): Promise<void> {
    await this.writeQueue;
    await this.db.write();
  }
}

export async function initDatabase(config: DatabaseConfig): Promise<DatabaseConnection> {
  const db = new DatabaseConnection(config);
  await db.init();
  return db;
}
