// Application: Token Service
// Signed, expiring JWTs for sessions, email confirmation and password reset

import { webcrypto, timingSafeEqual } from 'node:crypto';
import type { ITokenService, PasswordResetClaims, TokenPayload } from '@/domain/user/repository.js';
import type { AuthConfig, JwtAlgorithm } from '@/utils/config.js';
import { MIN_JWT_SECRET_LENGTH } from '@/utils/config.js';
import { InvalidTokenError, ValidationError } from '@/utils/errors.js';
import { authLogger } from '@/utils/logger.js';

export type { TokenPayload };

export interface TokenPair {
  accessToken: string;
  expiresIn: number;  // seconds
}

export interface TokenServiceConfig {
  secret: string;
  algorithm?: JwtAlgorithm;           // default HS256
  sessionTtlSeconds?: number;         // default 1 hour
  confirmationTtlSeconds?: number;    // default 7 days
  resetTtlSeconds?: number;           // default 7 days
}

const HASH_FOR: Record<JwtAlgorithm, string> = {
  HS256: 'SHA-256',
  HS384: 'SHA-384',
  HS512: 'SHA-512',
};

const SEVEN_DAYS = 7 * 24 * 60 * 60;

export type TokenPurpose = 'session' | 'confirm' | 'reset';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

// Only reset tokens carry a password claim
function isVariant(payload: TokenPayload, purpose: TokenPurpose): payload is TokenPayload & { sub: string } {
  if (payload.purpose !== purpose || typeof payload.sub !== 'string' || payload.sub === '') {
    return false;
  }
  return purpose === 'reset' || payload.password === undefined;
}

/**
 * TokenService - JWT management over HMAC
 *
 * Uses the Web Crypto API exposed by node:crypto for signing/verification
 */
export class TokenService implements ITokenService {
  private readonly algorithm: JwtAlgorithm;
  private readonly sessionTtl: number;
  private readonly confirmationTtl: number;
  private readonly resetTtl: number;
  private keyPromise?: Promise<webcrypto.CryptoKey>;

  constructor(private readonly config: TokenServiceConfig) {
    if (!config.secret) {
      throw new Error('JWT secret is required');
    }
    this.algorithm = config.algorithm ?? 'HS256';
    this.sessionTtl = config.sessionTtlSeconds ?? 3600;
    this.confirmationTtl = config.confirmationTtlSeconds ?? SEVEN_DAYS;
    this.resetTtl = config.resetTtlSeconds ?? SEVEN_DAYS;
  }

  /**
   * Sign arbitrary claims; iat/exp are set from the current clock
   */
  async mint(claims: Record<string, unknown>, lifetimeSeconds: number): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    const header = { alg: this.algorithm, typ: 'JWT' };
    const payload = { ...claims, iat: now, exp: now + lifetimeSeconds };

    const data = `${this.encodeJson(header)}.${this.encodeJson(payload)}`;
    const signature = await this.sign(data);
    return `${data}.${Buffer.from(signature).toString('base64url')}`;
  }

  /**
   * Verify signature, algorithm and expiry. Every failure is the same InvalidTokenError.
   */
  async verify(token: string): Promise<TokenPayload> {
    const parts = token.split('.');
    if (parts.length !== 3) {
      return this.reject('invalid format');
    }

    const [encodedHeader, encodedPayload, encodedSignature] = parts;
    const header = this.decodeJson(encodedHeader);
    const payload = this.decodeJson(encodedPayload);
    if (!header || !payload) {
      return this.reject('undecodable segment');
    }
    if (header.alg !== this.algorithm) {
      return this.reject('algorithm mismatch');
    }

    const expected = Buffer.from(await this.sign(`${encodedHeader}.${encodedPayload}`));
    const actual = Buffer.from(encodedSignature, 'base64url');
    if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
      return this.reject('invalid signature');
    }

    const { iat, exp, sub, password, purpose } = payload;
    if (typeof exp !== 'number' || typeof iat !== 'number') {
      return this.reject('missing iat/exp');
    }
    if (exp <= Math.floor(Date.now() / 1000)) {
      return this.reject('expired');
    }
    if (!isOptionalString(sub) || !isOptionalString(password) || !isOptionalString(purpose)) {
      return this.reject('malformed claims');
    }

    return { ...payload, iat, exp, sub, password, purpose };
  }

  async mintSession(username: string): Promise<TokenPair> {
    const accessToken = await this.mint({ sub: username, purpose: 'session' }, this.sessionTtl);
    return { accessToken, expiresIn: this.sessionTtl };
  }

  async mintEmailConfirmation(email: string): Promise<string> {
    return this.mint({ sub: email, purpose: 'confirm' }, this.confirmationTtl);
  }

  async mintPasswordReset(email: string, passwordHash: string): Promise<string> {
    return this.mint({ sub: email, password: passwordHash, purpose: 'reset' }, this.resetTtl);
  }

  /**
   * Subject of a session token. Confirmation and reset tokens are not sessions.
   */
  async usernameFromSession(token: string): Promise<string> {
    const payload = await this.verify(token);
    if (!isVariant(payload, 'session')) {
      return this.reject('not a session token');
    }
    return payload.sub;
  }

  async emailFromConfirmation(token: string): Promise<string> {
    const payload = await this.verify(token);
    if (!isVariant(payload, 'confirm')) {
      throw new ValidationError('Invalid email verification token', 422);
    }
    return payload.sub;
  }

  async resetClaims(token: string): Promise<PasswordResetClaims> {
    const payload = await this.verify(token);
    const { sub, password } = payload;
    if (!isVariant(payload, 'reset') || typeof sub !== 'string' || typeof password !== 'string' || password === '') {
      throw new ValidationError('Invalid password reset token', 422);
    }
    return { email: sub, passwordHash: password };
  }

  // ==================== Private Helper Methods ====================

  private reject(reason: string): never {
    authLogger.debug('Token verification failed', { reason });
    throw new InvalidTokenError();
  }

  private async sign(data: string): Promise<ArrayBuffer> {
    const key = await this.key();
    return webcrypto.subtle.sign('HMAC', key, new TextEncoder().encode(data));
  }

  private key(): Promise<webcrypto.CryptoKey> {
    this.keyPromise ??= webcrypto.subtle.importKey(
      'raw',
      new TextEncoder().encode(this.config.secret),
      { name: 'HMAC', hash: HASH_FOR[this.algorithm] },
      false,
      ['sign']
    );
    return this.keyPromise;
  }

  private encodeJson(value: object): string {
    return Buffer.from(JSON.stringify(value)).toString('base64url');
  }

  private decodeJson(segment: string): Record<string, unknown> | null {
    try {
      const parsed: unknown = JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
      return isRecord(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }
}

/**
 * Create TokenService from auth configuration
 */
export function createTokenService(config: AuthConfig): TokenService {
  if (config.jwtSecret.length < MIN_JWT_SECRET_LENGTH) {
    throw new Error(`JWT_SECRET is required (minimum ${MIN_JWT_SECRET_LENGTH} characters)`);
  }

  // Warn if secret is weak (repeated character)
  if (/^([a-zA-Z0-9])\1+$/.test(config.jwtSecret.trim())) {
    authLogger.warn('JWT_SECRET appears to be weak (repeated character). Use a strong, random secret key.');
  }

  return new TokenService({
    secret: config.jwtSecret,
    algorithm: config.jwtAlgorithm,
    sessionTtlSeconds: config.jwtExpirationSeconds,
  });
}
