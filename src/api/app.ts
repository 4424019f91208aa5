// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type RequestHandler, type Response } from 'express';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createErrorHandler } from './middleware/errorHandler.js';
import { RateLimiter, RateLimitPresets, type RateLimitPreset } from './middleware/rateLimiter.js';
import type { AuthModule } from './middleware/AuthModule.js';
import { createAuthRouter } from './routes/auth.js';
import { createUsersRouter } from './routes/users.js';
import { createContactsRouter } from './routes/contacts.js';
import { createHealthRouter, type HealthProbe } from './routes/health.js';
import type { AuthService } from '@/application/auth/AuthService.js';
import type { ContactService } from '@/application/contacts/ContactService.js';
import { serverLogger } from '@/utils/logger.js';

export type RateLimiters = Record<RateLimitPreset, RequestHandler>;

export interface AppDeps {
  authService: AuthService;
  contactService: ContactService;
  authModule: AuthModule;
  db: HealthProbe;
}

export interface AppOptions {
  corsOrigins: string[];
  trustProxy: boolean;
  logFormat: string | null;     // null disables the access log
  rateLimits: boolean;
}

export interface CreatedApp {
  app: Application;
  /** Stop background timers owned by the app (rate limiter cleanup) */
  stop(): void;
}

const passThrough: RequestHandler = (_req, _res, next) => next();

function buildRateLimiters(enabled: boolean): { handlers: RateLimiters; limiters: RateLimiter[] } {
  if (!enabled) {
    return {
      handlers: { login: passThrough, register: passThrough, resetPassword: passThrough, me: passThrough },
      limiters: [],
    };
  }

  const login = new RateLimiter(RateLimitPresets.login);
  const register = new RateLimiter(RateLimitPresets.register);
  const resetPassword = new RateLimiter(RateLimitPresets.resetPassword);
  const me = new RateLimiter(RateLimitPresets.me);

  return {
    handlers: {
      login: login.middleware(),
      register: register.middleware(),
      resetPassword: resetPassword.middleware(),
      me: me.middleware(),
    },
    limiters: [login, register, resetPassword, me],
  };
}

export function createApp(deps: AppDeps, options: Partial<AppOptions> = {}): CreatedApp {
  const app = express();

  const {
    corsOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
    rateLimits = true,
  } = options;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API-only server
  }));

  app.use(cors({
    origin: corsOrigins,
    credentials: true,
  }));

  if (logFormat) {
    app.use(morgan(logFormat));
  }

  // Body parsing (avatar uploads use a raw parser on their own route)
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));
  app.use(cookieParser());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  const { handlers, limiters } = buildRateLimiters(rateLimits);

  app.use('/api', createHealthRouter(deps.db));
  app.use('/api/auth', createAuthRouter(deps.authService, handlers));
  app.use('/api/users', createUsersRouter(deps.authService, deps.authModule, handlers));
  app.use('/api/contacts', createContactsRouter(deps.contactService, deps.authModule));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
      },
    });
  });

  // Global error handler (must be last)
  app.use(createErrorHandler(serverLogger));

  return {
    app,
    stop: () => limiters.forEach((limiter) => limiter.stop()),
  };
}
