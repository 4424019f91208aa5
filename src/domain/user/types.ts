// Domain: User types
// Pure TypeScript interfaces for user management

export type UserRole = 'user' | 'admin';

/**
 * User entity representing an account owner (the authenticated principal)
 */
export interface User {
  id: number;
  username: string;
  email: string;
  passwordHash: string;          // bcrypt hash
  confirmed: boolean;            // Email confirmation flag
  role: UserRole;                // Fixed at creation
  avatar: string | null;
  createdAt: Date;
}

/**
 * Login credentials
 */
export interface LoginCredentials {
  username: string;
  password: string;
}

/**
 * Registration data
 */
export interface RegistrationData {
  username: string;
  email: string;
  password: string;
}

/**
 * Data persisted for a new user; the password is already hashed
 */
export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  role?: UserRole;
  confirmed?: boolean;
}

/**
 * User as returned to clients (without sensitive data)
 */
export interface PublicUser {
  id: number;
  username: string;
  email: string;
  avatar: string | null;
  role: UserRole;
  confirmed: boolean;
  createdAt: Date;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    avatar: user.avatar,
    role: user.role,
    confirmed: user.confirmed,
    createdAt: user.createdAt,
  };
}

export function isAdmin(user: Pick<User, 'role'>): boolean {
  return user.role === 'admin';
}
