// API Middleware: Rate Limiter
// Sliding window rate limiting middleware for Express
// Each limiter owns its store, so separate app instances never share counters

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { authLogger } from '@/utils/logger.js';

export interface RateLimitConfig {
  name: string;
  windowMs: number;              // Time window in milliseconds
  maxAttempts: number;           // Max requests per window
  keyGenerator: (req: Request) => string;
  skipSuccessfulRequests?: boolean;  // Don't count 2xx responses
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
  windowStart: number;
}

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000; // 1 hour

export class RateLimiter {
  private store = new Map<string, RateLimitEntry>();
  private cleanupTimer: NodeJS.Timeout | null;

  constructor(private config: RateLimitConfig) {
    const timer = setInterval(() => this.cleanup(), CLEANUP_INTERVAL_MS);
    timer.unref();
    this.cleanupTimer = timer;
  }

  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const key = `${this.config.name}:${this.config.keyGenerator(req)}`;
      const entry = this.hit(key, Date.now());
      const { maxAttempts } = this.config;
      const now = Date.now();

      res.setHeader('X-RateLimit-Limit', maxAttempts);
      res.setHeader('X-RateLimit-Remaining', Math.max(0, maxAttempts - entry.count));
      res.setHeader('X-RateLimit-Reset', Math.ceil(entry.resetAt / 1000));

      if (entry.count > maxAttempts) {
        const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
        authLogger.warn('Rate limit exceeded', { limiter: this.config.name, ip: req.ip });
        res.setHeader('Retry-After', retryAfter);
        res.status(429).json({
          success: false,
          error: {
            code: 'RATE_LIMITED',
            message: 'Rate limit exceeded. Please try again later.',
            details: { retryAfter },
          },
        });
        return;
      }

      if (this.config.skipSuccessfulRequests) {
        res.on('finish', () => {
          if (res.statusCode >= 200 && res.statusCode < 300) {
            entry.count = Math.max(0, entry.count - 1);
          }
        });
      }

      next();
    };
  }

  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  private hit(key: string, now: number): RateLimitEntry {
    const entry = this.store.get(key);

    if (!entry || now > entry.resetAt) {
      const fresh = { count: 1, resetAt: now + this.config.windowMs, windowStart: now };
      this.store.set(key, fresh);
      return fresh;
    }

    // Sliding window: decay count based on time elapsed
    const windowElapsed = now - entry.windowStart;
    const decay = Math.floor((windowElapsed / this.config.windowMs) * entry.count);
    entry.count = Math.max(0, entry.count - decay) + 1;
    entry.windowStart = now - (windowElapsed % this.config.windowMs);
    return entry;
  }

  private cleanup(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.store.entries()) {
      if (entry.resetAt < now) {
        this.store.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      authLogger.debug('Cleaned up expired rate limit entries', { limiter: this.config.name, count: cleaned });
    }
  }
}

function clientIp(req: Request): string {
  return req.ip || 'unknown';
}

function bodyField(req: Request, field: string): string {
  const value: unknown = req.body?.[field];
  return typeof value === 'string' ? value.toLowerCase() : 'unknown';
}

/**
 * Predefined rate limit configurations
 */
export const RateLimitPresets = {
  login: {
    name: 'login',
    windowMs: 15 * 60 * 1000,  // 15 minutes
    maxAttempts: 5,
    keyGenerator: (req: Request) => `${clientIp(req)}:${bodyField(req, 'username')}`,
    skipSuccessfulRequests: true,
  },

  register: {
    name: 'register',
    windowMs: 60 * 60 * 1000,  // 1 hour
    maxAttempts: 5,
    keyGenerator: clientIp,
    skipSuccessfulRequests: true,
  },

  resetPassword: {
    name: 'reset-pwd',
    windowMs: 60 * 60 * 1000,  // 1 hour
    maxAttempts: 3,
    keyGenerator: clientIp,
  },

  me: {
    name: 'me',
    windowMs: 60 * 1000,  // 1 minute
    maxAttempts: 10,
    keyGenerator: (req: Request) => (req.user ? `user:${req.user.id}` : clientIp(req)),
  },
} satisfies Record<string, RateLimitConfig>;

export type RateLimitPreset = keyof typeof RateLimitPresets;
