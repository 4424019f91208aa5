// API Middleware: Authentication Module
// Resolves the bearer token into req.user and guards admin-only routes

import type { Request, Response, NextFunction } from 'express';
import type { User } from '@/domain/user/types.js';
import type { IdentityService } from '@/application/auth/IdentityService.js';
import { CREDENTIALS_ERROR } from '@/application/auth/IdentityService.js';
import { UnauthenticatedError } from '@/utils/errors.js';

export const ACCESS_TOKEN_COOKIE = 'access_token';

/**
 * Extract the bearer token (Authorization header first, then cookie)
 */
export function extractBearerToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    const token = authHeader.slice(7).trim();
    return token || undefined;
  }

  // Fall back to cookie
  const value: unknown = req.cookies?.[ACCESS_TOKEN_COOKIE];
  return typeof value === 'string' && value ? value : undefined;
}

/**
 * The principal attached by requireAuth
 */
export function principalOf(req: Request): User {
  if (!req.user) {
    throw new UnauthenticatedError(CREDENTIALS_ERROR);
  }
  return req.user;
}

export class AuthModule {
  constructor(private readonly identity: IdentityService) {}

  /**
   * API middleware: 401 unless a valid bearer token is presented
   */
  requireAuth = async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = extractBearerToken(req);
      if (!token) {
        throw new UnauthenticatedError(CREDENTIALS_ERROR);
      }

      req.user = await this.identity.resolvePrincipal(token);
      req.token = token;
      next();
    } catch (error) {
      next(error);
    }
  };

  /**
   * Admin-only middleware, must run after requireAuth
   */
  adminOnly = (req: Request, _res: Response, next: NextFunction): void => {
    try {
      this.identity.requireAdmin(principalOf(req));
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function createAuthModule(identity: IdentityService): AuthModule {
  return new AuthModule(identity);
}
