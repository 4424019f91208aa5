import { describe, it, expect } from 'vitest';
import { buildAppConfig, validateConfig } from '../../../src/utils/config.js';

const SECRET = 'test-secret-test-secret-test-secret';

describe('config', () => {
  it('applies defaults', () => {
    const config = buildAppConfig({});

    expect(config.server).toMatchObject({ port: 8000, host: 'localhost', nodeEnv: 'development' });
    expect(config.server.publicUrl).toBe('http://localhost:8000/');
    expect(config.auth).toMatchObject({
      jwtAlgorithm: 'HS256',
      jwtExpirationSeconds: 3600,
      bcryptRounds: 10,
      identityCacheEnabled: true,
      identityCacheTtlSeconds: 300,
    });
    expect(config.mail.driver).toBe('console');
    expect(config.dbPath).toBe('./data/contacts.json');
  });

  it('reads overrides', () => {
    const config = buildAppConfig({
      PORT: '9000',
      PUBLIC_URL: 'https://contacts.test',
      CORS_ORIGINS: 'https://a.test, https://b.test',
      JWT_ALGORITHM: 'hs512',
      IDENTITY_CACHE_ENABLED: 'false',
      MAILER_DRIVER: 'smtp',
      SMTP_URL: 'smtp://localhost:2525',
      S3_ENDPOINT: 'http://minio.test',
      S3_BUCKET: 'pics',
    });

    expect(config.server.port).toBe(9000);
    expect(config.server.publicUrl).toBe('https://contacts.test/');
    expect(config.server.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
    expect(config.auth.jwtAlgorithm).toBe('HS512');
    expect(config.auth.identityCacheEnabled).toBe(false);
    expect(config.mail).toMatchObject({ driver: 'smtp', smtpUrl: 'smtp://localhost:2525' });
    expect(config.avatars.publicUrl).toBe('http://minio.test/pics');
  });

  it('validates required and malformed values', () => {
    const env = { JWT_ALGORITHM: 'RS256', BCRYPT_ROUNDS: '2', MAILER_DRIVER: 'smtp' };
    expect(validateConfig(buildAppConfig(env), env)).toEqual([
      'JWT_SECRET is required (minimum 32 characters)',
      'JWT_ALGORITHM must be one of HS256, HS384, HS512',
      'BCRYPT_ROUNDS must be between 4 and 31',
      'SMTP_URL must be configured when MAILER_DRIVER is set to smtp',
    ]);
  });

  it('refuses the console mailer in production', () => {
    const env = { JWT_SECRET: SECRET, NODE_ENV: 'production' };
    expect(validateConfig(buildAppConfig(env), env)).toEqual(['MAILER_DRIVER must be smtp in production']);

    const smtp = { ...env, MAILER_DRIVER: 'smtp', SMTP_URL: 'smtp://localhost:2525' };
    expect(validateConfig(buildAppConfig(smtp), smtp)).toEqual([]);
  });

  it('accepts a complete configuration', () => {
    const env = { JWT_SECRET: SECRET };
    expect(validateConfig(buildAppConfig(env), env)).toEqual([]);
  });
});
