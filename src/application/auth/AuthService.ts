// Application: Authentication Service
// Registration, login, email confirmation, password reset and avatar changes

import type { PublicUser, RegistrationData, LoginCredentials, User } from '@/domain/user/types.js';
import { toPublicUser } from '@/domain/user/types.js';
import type { IPasswordHasher, ITokenService, IUserRepository } from '@/domain/user/repository.js';
import type { IMailer } from '@/domain/mail/types.js';
import type { AvatarUpload, IAvatarStore, IDefaultAvatarProvider } from '@/domain/avatar/types.js';
import type { BackgroundTasks } from '@/application/shared/BackgroundTasks.js';
import {
  ConflictError,
  NotFoundError,
  UnauthenticatedError,
  UniqueConstraintError,
  ValidationError,
} from '@/utils/errors.js';
import { authLogger, describeError } from '@/utils/logger.js';

export interface AuthServiceConfig {
  publicUrl: string;     // Base of links in outgoing mail (trailing slash)
  avatarFolder?: string; // default 'ContactBook'
}

export interface AuthServiceDeps {
  users: IUserRepository;
  hasher: IPasswordHasher;
  tokens: ITokenService;
  mailer: IMailer;
  avatars: IAvatarStore;
  defaultAvatars: IDefaultAvatarProvider;
  tasks: BackgroundTasks;
}

export interface AccessToken {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
}

export interface MessageResult {
  message: string;
}

export const AUTH_MESSAGES = {
  usernameTaken: 'User with this username already exists',
  emailTaken: 'User with this email already exists',
  invalidCredentials: 'Invalid username or password',
  notConfirmed: 'Email address not confirmed',
  verificationError: 'Verification error',
  alreadyConfirmed: 'Your email address is already confirmed',
  confirmed: 'Email successfully confirmed',
  checkConfirmation: 'Check your email for confirmation instructions',
  checkReset: 'Check your email for password reset instructions',
  resetNotConfirmed: 'Your email address is not confirmed',
  resetUserMissing: 'User with this email was not found',
  passwordChanged: 'Password has been successfully changed',
} as const;

export class AuthService {
  private readonly avatarFolder: string;

  constructor(
    private deps: AuthServiceDeps,
    private config: AuthServiceConfig
  ) {
    this.avatarFolder = config.avatarFolder ?? 'ContactBook';
  }

  /**
   * Register a new (unconfirmed) user and send the confirmation mail in the background
   */
  async register(data: RegistrationData): Promise<PublicUser> {
    const { users, hasher, defaultAvatars } = this.deps;

    if (await users.findByUsername(data.username)) {
      authLogger.warn('Registration failed: username taken', { username: data.username });
      throw new ConflictError(AUTH_MESSAGES.usernameTaken);
    }
    if (await users.findByEmail(data.email)) {
      authLogger.warn('Registration failed: email taken', { username: data.username });
      throw new ConflictError(AUTH_MESSAGES.emailTaken);
    }

    const passwordHash = await hasher.hash(data.password);

    let avatar: string | null = null;
    try {
      avatar = await defaultAvatars.avatarFor(data.email);
    } catch (error) {
      authLogger.warn('Default avatar unavailable', { username: data.username, error: describeError(error) });
    }

    let user: User;
    try {
      user = await users.create({ username: data.username, email: data.email, passwordHash }, avatar);
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new ConflictError(error.field === 'username' ? AUTH_MESSAGES.usernameTaken : AUTH_MESSAGES.emailTaken);
      }
      throw error;
    }

    authLogger.info('User registered', { userId: user.id, username: user.username });
    this.sendConfirmation(user);
    return toPublicUser(user);
  }

  /**
   * Exchange username + password for a session token
   */
  async login(credentials: LoginCredentials): Promise<AccessToken> {
    const user = await this.deps.users.findByUsername(credentials.username);
    if (!user || !(await this.deps.hasher.verify(credentials.password, user.passwordHash))) {
      authLogger.warn('Login failed: invalid credentials', { username: credentials.username });
      throw new UnauthenticatedError(AUTH_MESSAGES.invalidCredentials);
    }

    if (!user.confirmed) {
      authLogger.warn('Login failed: email not confirmed', { userId: user.id });
      throw new UnauthenticatedError(AUTH_MESSAGES.notConfirmed, 'EMAIL_NOT_CONFIRMED');
    }

    const session = await this.deps.tokens.mintSession(user.username);
    authLogger.info('User logged in', { userId: user.id, username: user.username });
    return { accessToken: session.accessToken, tokenType: 'bearer', expiresIn: session.expiresIn };
  }

  async confirmEmail(token: string): Promise<MessageResult> {
    const email = await this.deps.tokens.emailFromConfirmation(token);
    const user = await this.deps.users.findByEmail(email);
    if (!user) {
      throw new ValidationError(AUTH_MESSAGES.verificationError);
    }
    if (user.confirmed) {
      return { message: AUTH_MESSAGES.alreadyConfirmed };
    }

    await this.deps.users.confirmEmail(email);
    authLogger.info('Email confirmed', { userId: user.id });
    return { message: AUTH_MESSAGES.confirmed };
  }

  /**
   * Re-send the confirmation mail. The answer does not reveal whether the address is registered.
   */
  async requestConfirmationEmail(email: string): Promise<MessageResult> {
    const user = await this.deps.users.findByEmail(email);
    if (user?.confirmed) {
      return { message: AUTH_MESSAGES.alreadyConfirmed };
    }
    if (user) {
      this.sendConfirmation(user);
    }
    return { message: AUTH_MESSAGES.checkConfirmation };
  }

  /**
   * Mail a link that, once followed, replaces the password with `newPassword`
   */
  async requestPasswordReset(email: string, newPassword: string): Promise<MessageResult> {
    const user = await this.deps.users.findByEmail(email);
    if (!user) {
      return { message: AUTH_MESSAGES.checkReset };
    }
    if (!user.confirmed) {
      throw new ValidationError(AUTH_MESSAGES.resetNotConfirmed);
    }

    const passwordHash = await this.deps.hasher.hash(newPassword);
    const token = await this.deps.tokens.mintPasswordReset(user.email, passwordHash);
    const resetLink = `${this.config.publicUrl}api/auth/confirm_reset_password/${token}`;

    this.deps.tasks.run('reset-password-mail', () =>
      this.deps.mailer.send({
        to: user.email,
        template: 'reset-password',
        variables: { username: user.username, resetLink },
      })
    );
    authLogger.info('Password reset requested', { userId: user.id });
    return { message: AUTH_MESSAGES.checkReset };
  }

  async confirmPasswordReset(token: string): Promise<MessageResult> {
    const { email, passwordHash } = await this.deps.tokens.resetClaims(token);
    const user = await this.deps.users.findByEmail(email);
    if (!user) {
      throw new NotFoundError(AUTH_MESSAGES.resetUserMissing);
    }

    await this.deps.users.updatePasswordHash(user.id, passwordHash);
    authLogger.info('Password changed', { userId: user.id });
    return { message: AUTH_MESSAGES.passwordChanged };
  }

  /**
   * Upload a new avatar for the principal (callers check the admin role)
   */
  async updateAvatar(principal: User, image: AvatarUpload): Promise<PublicUser> {
    const url = await this.deps.avatars.upload(image, `${this.avatarFolder}/${principal.username}`);
    const updated = await this.deps.users.updateAvatarUrl(principal.email, url);
    if (!updated) {
      throw new NotFoundError(AUTH_MESSAGES.resetUserMissing);
    }
    authLogger.info('Avatar updated', { userId: updated.id });
    return toPublicUser(updated);
  }

  private sendConfirmation(user: User): void {
    this.deps.tasks.run('confirm-email-mail', async () => {
      const token = await this.deps.tokens.mintEmailConfirmation(user.email);
      await this.deps.mailer.send({
        to: user.email,
        template: 'confirm-email',
        variables: { username: user.username, host: this.config.publicUrl, token },
      });
    });
  }
}
