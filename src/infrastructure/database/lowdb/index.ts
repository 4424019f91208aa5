// LowDB Repository exports

export { DatabaseConnection, initDatabase, createDefaultData } from './connection.js';
export { UserRepository } from './UserRepository.js';
export { ContactRepository } from './ContactRepository.js';

export type { DatabaseConfig, DatabaseSchema, UserRecord, ContactRecord } from './connection.js';
