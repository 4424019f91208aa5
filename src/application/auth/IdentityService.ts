// Application: Identity Service
// Turns a bearer token into the authenticated principal

import type { User } from '@/domain/user/types.js';
import { isAdmin } from '@/domain/user/types.js';
import type { ITokenService, IUserLookup } from '@/domain/user/repository.js';
import { ForbiddenError, InvalidTokenError, UnauthenticatedError } from '@/utils/errors.js';
import { authLogger } from '@/utils/logger.js';

export const CREDENTIALS_ERROR = 'Could not validate credentials';

export class IdentityService {
  constructor(
    private tokens: ITokenService,
    private users: IUserLookup
  ) {}

  /**
   * Resolve the user a session token belongs to
   */
  async resolvePrincipal(token: string): Promise<User> {
    let username: string;
    try {
      username = await this.tokens.usernameFromSession(token);
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        throw new UnauthenticatedError(CREDENTIALS_ERROR);
      }
      throw error;
    }

    const user = await this.users.findByUsername(username);
    if (!user) {
      authLogger.debug('Token subject has no account', { username });
      throw new UnauthenticatedError(CREDENTIALS_ERROR);
    }
    return user;
  }

  requireAdmin(principal: User): User {
    if (!isAdmin(principal)) {
      throw new ForbiddenError('Admin access required');
    }
    return principal;
  }
}
