// Utilities: Configuration management
// Pure functions, no external dependencies

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  publicUrl: string;       // Base URL used in links sent by email (trailing slash)
  corsOrigins: string[];
}

export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';

export const JWT_ALGORITHMS: readonly JwtAlgorithm[] = ['HS256', 'HS384', 'HS512'];

export interface AuthConfig {
  jwtSecret: string;
  jwtAlgorithm: JwtAlgorithm;
  jwtExpirationSeconds: number;
  bcryptRounds: number;
  identityCacheEnabled: boolean;
  identityCacheTtlSeconds: number;
}

export interface MailConfig {
  driver: 'console' | 'smtp';
  smtpUrl?: string;
  from: string;
  fromName?: string;
}

export interface AvatarStorageConfig {
  endpoint?: string;
  region: string;
  bucket: string;
  accessKey: string;
  secretKey: string;
  publicUrl: string;
}

export interface AppConfig {
  server: ServerConfig;
  auth: AuthConfig;
  mail: MailConfig;
  avatars: AvatarStorageConfig;
  dbPath: string;
}

export const MIN_JWT_SECRET_LENGTH = 32;

function parseNodeEnv(value: string | undefined): ServerConfig['nodeEnv'] {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function parseAlgorithm(value: string | undefined): JwtAlgorithm {
  const upper = (value || 'HS256').toUpperCase();
  return JWT_ALGORITHMS.find((alg) => alg === upper) ?? 'HS256';
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = parseInt(env.PORT || '8000', 10);
  const host = env.HOST || 'localhost';

  return {
    port,
    host,
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    publicUrl: withTrailingSlash(env.PUBLIC_URL || `http://${host}:${port}`),
    corsOrigins: (env.CORS_ORIGINS || 'http://localhost:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
  };
}

export function buildAuthConfig(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  return {
    jwtSecret: env.JWT_SECRET || '',
    jwtAlgorithm: parseAlgorithm(env.JWT_ALGORITHM),
    jwtExpirationSeconds: parseInt(env.JWT_EXPIRATION_SECONDS || '3600', 10),
    bcryptRounds: parseInt(env.BCRYPT_ROUNDS || '10', 10),
    identityCacheEnabled: parseBoolean(env.IDENTITY_CACHE_ENABLED, true),
    identityCacheTtlSeconds: parseInt(env.IDENTITY_CACHE_TTL_SECONDS || '300', 10),
  };
}

export function buildMailConfig(env: NodeJS.ProcessEnv = process.env): MailConfig {
  const driver = env.MAILER_DRIVER?.toLowerCase();

  return {
    driver: driver === 'smtp' || driver === 'nodemailer' ? 'smtp' : 'console',
    smtpUrl: env.SMTP_URL?.trim() || undefined,
    from: env.MAIL_FROM?.trim() || 'noreply@localhost',
    fromName: env.MAIL_FROM_NAME?.trim() || undefined,
  };
}

export function buildAvatarStorageConfig(env: NodeJS.ProcessEnv = process.env): AvatarStorageConfig {
  const bucket = env.S3_BUCKET || 'avatars';
  const endpoint = env.S3_ENDPOINT || undefined;

  return {
    endpoint,
    region: env.S3_REGION || 'us-east-1',
    bucket,
    accessKey: env.S3_ACCESS_KEY || '',
    secretKey: env.S3_SECRET_KEY || '',
    publicUrl: (env.S3_PUBLIC_URL || `${endpoint ?? 'https://s3.amazonaws.com'}/${bucket}`).replace(/\/+$/, ''),
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    auth: buildAuthConfig(env),
    mail: buildMailConfig(env),
    avatars: buildAvatarStorageConfig(env),
    dbPath: env.DB_PATH || './data/contacts.json',
  };
}

// Validation
export function validateConfig(config: AppConfig, env: NodeJS.ProcessEnv = process.env): string[] {
  const errors: string[] = [];

  if (config.auth.jwtSecret.length < MIN_JWT_SECRET_LENGTH) {
    errors.push(`JWT_SECRET is required (minimum ${MIN_JWT_SECRET_LENGTH} characters)`);
  }

  const requestedAlgorithm = env.JWT_ALGORITHM?.toUpperCase();
  if (requestedAlgorithm && !JWT_ALGORITHMS.some((alg) => alg === requestedAlgorithm)) {
    errors.push(`JWT_ALGORITHM must be one of ${JWT_ALGORITHMS.join(', ')}`);
  }

  if (!Number.isInteger(config.auth.jwtExpirationSeconds) || config.auth.jwtExpirationSeconds <= 0) {
    errors.push('JWT_EXPIRATION_SECONDS must be a positive integer');
  }

  if (!Number.isInteger(config.auth.bcryptRounds) || config.auth.bcryptRounds < 4 || config.auth.bcryptRounds > 31) {
    errors.push('BCRYPT_ROUNDS must be between 4 and 31');
  }

  if (!Number.isInteger(config.auth.identityCacheTtlSeconds) || config.auth.identityCacheTtlSeconds < 0) {
    errors.push('IDENTITY_CACHE_TTL_SECONDS must be zero or a positive integer');
  }

  if (config.server.port < 1 || config.server.port > 65535 || Number.isNaN(config.server.port)) {
    errors.push('Invalid port number');
  }

  if (config.mail.driver === 'smtp' && !config.mail.smtpUrl) {
    errors.push('SMTP_URL must be configured when MAILER_DRIVER is set to smtp');
  }

  if (config.mail.driver === 'console' && config.server.nodeEnv === 'production') {
    errors.push('MAILER_DRIVER must be smtp in production');
  }

  return errors;
}
