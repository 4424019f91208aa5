// Database Service - Main entry point for database operations
// Provides access to all repositories and handles initialization

import {
  initDatabase,
  type DatabaseConfig,
  type DatabaseConnection,
  UserRepository,
  ContactRepository,
} from './lowdb/index.js';

export class DatabaseService {
  // Repositories
  public readonly users: UserRepository;
  public readonly contacts: ContactRepository;

  private constructor(private readonly db: DatabaseConnection) {
    this.users = new UserRepository(db);
    this.contacts = new ContactRepository(db);
  }

  /**
   * Open the database and build the repositories
   */
  static async open(config: DatabaseConfig): Promise<DatabaseService> {
    const db = await initDatabase(config);
    return new DatabaseService(db);
  }

  /**
   * Verify the storage engine answers (health check)
   */
  async ping(): Promise<boolean> {
    return this.db.ping();
  }

  /**
   * Flush pending writes and close
   */
  async close(): Promise<void> {
    await this.db.close();
  }

  /**
   * Get database statistics
   */
  getStats(): { users: number; contacts: number; version: number } {
    const data = this.db.getData();
    return {
      users: data.users.length,
      contacts: data.contacts.length,
      version: this.db.getVersion(),
    };
  }
}

export default DatabaseService;
