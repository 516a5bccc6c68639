import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuthenticatedIdentity } from './authenticated-identity';

type CacheEntry = {
  value: AuthenticatedIdentity;
  expiresAt: number;
};

const DEFAULT_TTL_MS = 30_000;

/**
 * Short-lived cache of validated sessions, keyed by session token.
 * A TTL of 0 disables caching.
 */
@Injectable()
export class SessionCache {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;

  constructor(@Inject(ConfigService) config: ConfigService) {
    const configured = Number(config.get<string | number>('SESSION_CACHE_TTL_MS') ?? DEFAULT_TTL_MS);
    this.ttlMs = Number.isFinite(configured) && configured >= 0 ? configured : DEFAULT_TTL_MS;
  }

  read(token: string, now: number = Date.now()): AuthenticatedIdentity | null {
    const entry = this.cache.get(token);
    if (!entry) return null;
    if (now > entry.expiresAt) {
      this.cache.delete(token);
      return null;
    }
    return entry.value;
  }

  write(token: string, value: AuthenticatedIdentity, now: number = Date.now()): void {
    if (this.ttlMs === 0) return;
    this.evictExpired(now);
    this.cache.set(token, { value, expiresAt: now + this.ttlMs });
  }

  private evictExpired(now: number): void {
    for (const [token, entry] of this.cache) {
      if (now > entry.expiresAt) {
        this.cache.delete(token);
      }
    }
  }
}
