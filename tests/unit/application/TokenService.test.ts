import { describe, it, expect, afterEach, vi } from 'vitest';
import { createHmac } from 'node:crypto';
import { TokenService, createTokenService } from '../../../src/application/auth/TokenService.js';
import { InvalidTokenError, ValidationError } from '../../../src/utils/errors.js';
import { TEST_SECRET, testAuthConfig } from '../../helpers/fakes.js';

function flipChar(token: string, index: number): string {
  const c = token[index];
  return token.slice(0, index) + (c === 'A' ? 'B' : 'A') + token.slice(index + 1);
}

describe('TokenService', () => {
  const tokens = new TokenService({ secret: TEST_SECRET });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('round-trips claims with iat and exp', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-05-01T12:00:00Z'));

    const token = await tokens.mint({ sub: 'alice', scope: 'x' }, 60);
    const payload = await tokens.verify(token);

    expect(payload.sub).toBe('alice');
    expect(payload.scope).toBe('x');
    expect(payload.iat).toBe(1714564800);
    expect(payload.exp).toBe(1714564860);
  });

  it('fails once the lifetime has elapsed', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-05-01T12:00:00Z'));
    const token = await tokens.mint({ sub: 'alice' }, 60);

    vi.setSystemTime(new Date('2024-05-01T12:00:59Z'));
    await expect(tokens.verify(token)).resolves.toMatchObject({ sub: 'alice' });

    vi.setSystemTime(new Date('2024-05-01T12:01:00Z'));
    await expect(tokens.verify(token)).rejects.toBeInstanceOf(InvalidTokenError);
  });

  it('rejects a token with a modified payload or signature', async () => {
    const token = await tokens.mint({ sub: 'alice' }, 60);
    const [header, payload, signature] = token.split('.');

    const forgedPayload = Buffer.from(JSON.stringify({ sub: 'mallory', iat: 1, exp: 9999999999 })).toString('base64url');
    await expect(tokens.verify(`${header}.${forgedPayload}.${signature}`)).rejects.toBeInstanceOf(InvalidTokenError);
    await expect(tokens.verify(`${header}.${payload}.${flipChar(signature, 3)}`)).rejects.toBeInstanceOf(
      InvalidTokenError
    );
  });

  it('rejects malformed tokens', async () => {
    await expect(tokens.verify('abc')).rejects.toThrow('Invalid or expired token');
    await expect(tokens.verify('a.b.c')).rejects.toBeInstanceOf(InvalidTokenError);
    await expect(tokens.verify('')).rejects.toBeInstanceOf(InvalidTokenError);
  });

  it('rejects tokens signed with another secret or algorithm', async () => {
    const other = new TokenService({ secret: 'another-test-secret-another-test-secret' });
    await expect(tokens.verify(await other.mint({ sub: 'alice' }, 60))).rejects.toBeInstanceOf(InvalidTokenError);

    const hs512 = new TokenService({ secret: TEST_SECRET, algorithm: 'HS512' });
    await expect(tokens.verify(await hs512.mint({ sub: 'alice' }, 60))).rejects.toBeInstanceOf(InvalidTokenError);
    await expect(hs512.verify(await hs512.mint({ sub: 'alice' }, 60))).resolves.toMatchObject({ sub: 'alice' });
  });

  it('accepts a standard HS256 JWT and rejects one without exp', async () => {
    const encode = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');
    const sign = (data: string) => createHmac('sha256', TEST_SECRET).update(data).digest('base64url');
    const header = encode({ alg: 'HS256', typ: 'JWT' });

    const now = Math.floor(Date.now() / 1000);
    const withExp = `${header}.${encode({ sub: 'alice', iat: now, exp: now + 60 })}`;
    await expect(tokens.verify(`${withExp}.${sign(withExp)}`)).resolves.toMatchObject({ sub: 'alice' });

    const withoutExp = `${header}.${encode({ sub: 'alice', iat: now })}`;
    await expect(tokens.verify(`${withoutExp}.${sign(withoutExp)}`)).rejects.toBeInstanceOf(InvalidTokenError);
  });

  describe('variants', () => {
    it('session tokens carry the username', async () => {
      const { accessToken, expiresIn } = await tokens.mintSession('alice');
      expect(expiresIn).toBe(3600);
      expect(await tokens.usernameFromSession(accessToken)).toBe('alice');
    });

    it('confirmation tokens carry the email', async () => {
      const token = await tokens.mintEmailConfirmation('alice@example.com');
      expect(await tokens.emailFromConfirmation(token)).toBe('alice@example.com');
    });

    it('reset tokens carry the email and new password hash', async () => {
      const token = await tokens.mintPasswordReset('alice@example.com', '$2a$04$hash');
      expect(await tokens.resetClaims(token)).toEqual({ email: 'alice@example.com', passwordHash: '$2a$04$hash' });
    });

    it('a reset token is not a session token', async () => {
      const token = await tokens.mintPasswordReset('alice@example.com', '$2a$04$hash');
      await expect(tokens.usernameFromSession(token)).rejects.toBeInstanceOf(InvalidTokenError);
      await expect(tokens.emailFromConfirmation(token)).rejects.toThrow('Invalid email verification token');
    });

    it('a session token is not a confirmation token', async () => {
      const { accessToken } = await tokens.mintSession('victim@x.com');
      await expect(tokens.emailFromConfirmation(accessToken)).rejects.toMatchObject({
        statusCode: 422,
        message: 'Invalid email verification token',
      });
      await expect(tokens.resetClaims(accessToken)).rejects.toMatchObject({ statusCode: 422 });
    });

    it('a confirmation token is not a session token', async () => {
      const token = await tokens.mintEmailConfirmation('alice@example.com');
      await expect(tokens.usernameFromSession(token)).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it('a token without a purpose claim matches no variant', async () => {
      const token = await tokens.mint({ sub: 'alice' }, 60);
      await expect(tokens.usernameFromSession(token)).rejects.toBeInstanceOf(InvalidTokenError);
      await expect(tokens.emailFromConfirmation(token)).rejects.toBeInstanceOf(ValidationError);
    });

    it('a reset-purpose token without a password claim is rejected', async () => {
      const token = await tokens.mint({ sub: 'alice@example.com', purpose: 'reset' }, 60);
      await expect(tokens.resetClaims(token)).rejects.toThrow('Invalid password reset token');
    });

    it('a token without sub is an invalid confirmation token (422)', async () => {
      const token = await tokens.mint({}, 60);
      const error = await tokens.emailFromConfirmation(token).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ statusCode: 422, message: 'Invalid email verification token' });
    });

    it('a token without password is an invalid reset token (422)', async () => {
      const token = await tokens.mintEmailConfirmation('alice@example.com');
      await expect(tokens.resetClaims(token)).rejects.toMatchObject({
        statusCode: 422,
        message: 'Invalid password reset token',
      });
    });
  });

  describe('createTokenService', () => {
    it('refuses a short secret', () => {
      expect(() => createTokenService(testAuthConfig({ jwtSecret: 'short' }))).toThrow(/minimum 32 characters/);
    });

    it('uses the configured session lifetime', async () => {
      const service = createTokenService(testAuthConfig({ jwtExpirationSeconds: 120 }));
      expect((await service.mintSession('alice')).expiresIn).toBe(120);
    });
  });
});
