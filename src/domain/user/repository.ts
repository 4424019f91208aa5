// Domain: User repository and auth service interfaces
// Defines the contracts the application layer depends on

import type { User, NewUser } from './types.js';

/**
 * Repository interface for User persistence
 * Implemented by infrastructure layer (LowDB)
 */
export interface IUserRepository {
  create(data: NewUser, avatar?: string | null): Promise<User>;
  findById(id: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;

  confirmEmail(email: string): Promise<boolean>;
  updateAvatarUrl(email: string, url: string): Promise<User | null>;
  updatePasswordHash(userId: number, passwordHash: string): Promise<User | null>;
}

/**
 * Lookup used to resolve a token subject into a user.
 * The identity cache implements this around a repository.
 */
export interface IUserLookup {
  findByUsername(username: string): Promise<User | null>;
}

/**
 * One-way password hashing
 */
export interface IPasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, digest: string): Promise<boolean>;
}

/**
 * Token claims as carried on the wire (decoded JWT payload)
 */
export interface TokenPayload {
  sub?: string;
  password?: string;          // reset tokens only: the new password hash
  purpose?: string;           // 'session' | 'confirm' | 'reset'
  iat: number;
  exp: number;
  [claim: string]: unknown;
}

/**
 * What a password reset token carries: the account and the already-hashed new password
 */
export interface PasswordResetClaims {
  email: string;
  passwordHash: string;
}

/**
 * Token service interface for JWT operations
 */
export interface ITokenService {
  mint(claims: Record<string, unknown>, lifetimeSeconds: number): Promise<string>;
  verify(token: string): Promise<TokenPayload>;

  mintSession(username: string): Promise<{ accessToken: string; expiresIn: number }>;
  mintEmailConfirmation(email: string): Promise<string>;
  mintPasswordReset(email: string, passwordHash: string): Promise<string>;

  usernameFromSession(token: string): Promise<string>;
  emailFromConfirmation(token: string): Promise<string>;
  resetClaims(token: string): Promise<PasswordResetClaims>;
}
