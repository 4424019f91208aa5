// Infrastructure: Identity Cache
// Read-through cache of username -> user, used when resolving bearer tokens
// Entries are not invalidated on writes; staleness is bounded by the TTL

import type { User } from '@/domain/user/types.js';
import type { IUserLookup } from '@/domain/user/repository.js';
import { authLogger } from '@/utils/logger.js';

export interface IdentityCacheConfig {
  maxSize: number;           // Max cached users (default: 1000)
  ttlMs: number;             // Cache entry TTL (default: 5 minutes)
  cleanupIntervalMs: number; // Cleanup interval (default: 1 minute)
  enabled: boolean;
}

interface CachedUser {
  user: User;
  cachedAt: number;
  accessCount: number;       // For least-used eviction
}

/**
 * CachedUserLookup - wraps any IUserLookup with a TTL cache
 *
 * Misses are not cached, so a freshly registered user resolves immediately.
 */
export class CachedUserLookup implements IUserLookup {
  private cache: Map<string, CachedUser> = new Map();
  private cleanupTimer: NodeJS.Timeout | null = null;
  private hits = 0;
  private misses = 0;

  constructor(
    private inner: IUserLookup,
    private config: IdentityCacheConfig
  ) {
    if (this.config.enabled && this.config.ttlMs > 0) {
      this.startCleanup();
    }
  }

  async findByUsername(username: string): Promise<User | null> {
    if (!this.config.enabled || this.config.ttlMs <= 0) {
      return this.inner.findByUsername(username);
    }

    const key = username.toLowerCase();
    const cached = this.cache.get(key);
    const now = Date.now();

    if (cached) {
      if (now - cached.cachedAt < this.config.ttlMs) {
        cached.accessCount++;
        this.hits++;
        return cached.user;
      }
      this.cache.delete(key);
    }

    this.misses++;
    const user = await this.inner.findByUsername(username);
    if (user) {
      this.set(key, user);
    }
    return user;
  }

  getStats(): { size: number; maxSize: number; hitRate: number } {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      maxSize: this.config.maxSize,
      hitRate: total === 0 ? 0 : this.hits / total,
    };
  }

  /**
   * Stop the cleanup timer
   */
  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  // ==================== Private Methods ====================

  private set(key: string, user: User): void {
    if (this.cache.size >= this.config.maxSize && !this.cache.has(key)) {
      this.evictLeastUsed();
    }
    this.cache.set(key, { user, cachedAt: Date.now(), accessCount: 1 });
  }

  private evictLeastUsed(): void {
    let minAccess = Infinity;
    let evictKey: string | null = null;

    for (const [key, value] of this.cache.entries()) {
      if (value.accessCount < minAccess) {
        minAccess = value.accessCount;
        evictKey = key;
      }
    }

    if (evictKey !== null) {
      this.cache.delete(evictKey);
      authLogger.debug('Evicted cached identity', { username: evictKey, accessCount: minAccess });
    }
  }

  private startCleanup(): void {
    const timer = setInterval(() => this.cleanup(), this.config.cleanupIntervalMs);
    timer.unref();
    this.cleanupTimer = timer;
  }

  private cleanup(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, value] of this.cache.entries()) {
      if (now - value.cachedAt >= this.config.ttlMs) {
        this.cache.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      authLogger.debug('Cleaned expired identity cache entries', { count: cleaned });
    }
  }
}

export function defaultIdentityCacheConfig(): IdentityCacheConfig {
  return {
    maxSize: 1000,
    ttlMs: 5 * 60 * 1000,
    cleanupIntervalMs: 60 * 1000,
    enabled: true,
  };
}
