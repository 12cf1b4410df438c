import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Cache } from 'cache-manager';

import { hashKeyForLogging } from '../utils/hash';
import { parseBoolean } from '../utils/parse-boolean';

type CacheStoreClient = {
  ping?: () => Promise<string>;
};

type CacheStore = {
  client?: CacheStoreClient;
  isFallback?: boolean;
  isRedis?: boolean;
  name?: string;
};

/**
 * Thin wrapper around the cache manager. Besides TTL-based value caching it
 * hands out the underlying Redis client, which the key store, rate limiter and
 * usage ledger use for their atomic counters and sorted sets.
 */
@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);
  private readonly defaultTtlSeconds: number;
  private readonly cacheDebug: boolean;

  constructor(
    @Inject(CACHE_MANAGER) private readonly cacheManager: Cache,
    private readonly configService: ConfigService,
  ) {
    this.defaultTtlSeconds = Number(this.configService.get('CACHE_TTL_DEFAULT') ?? 300);
    this.cacheDebug = parseBoolean(this.configService.get('CACHE_DEBUG'));
  }

  async get<T>(key: string): Promise<T | null> {
    if (!this.isCacheAvailable()) {
      return null;
    }

    try {
      const value = await this.cacheManager.get<T>(key);
      return value ?? null;
    } catch (error) {
      this.logger.warn(`Cache get failed for key hash: ${hashKeyForLogging(key)}`);
      return null;
    }
  }

  async set<T>(key: string, value: T, options?: { ttl?: number }): Promise<boolean> {
    if (!this.isCacheAvailable()) {
      return false;
    }

    const ttlSeconds = options?.ttl ?? this.defaultTtlSeconds;
    try {
      await this.cacheManager.set(key, value, this.normalizeTtl(ttlSeconds));
      if (this.cacheDebug) {
        this.logger.debug(
          JSON.stringify({
            message: 'Cache set',
            keyHash: hashKeyForLogging(key),
            ttlSeconds,
            ttlUnit: this.getTtlUnit(),
          }),
        );
      }
      return true;
    } catch (error) {
      this.logger.warn(`Cache set failed for key hash: ${hashKeyForLogging(key)}`);
      return false;
    }
  }

  /**
   * Raw client of the Redis store, or null when running on the fallback store.
   * Callers declare the command subset they need as a structural type.
   */
  getStoreClient<T>(): T | null {
    const store = this.getStore();
    if (!store || store.isFallback || !store.client) {
      return null;
    }
    return store.client as T;
  }

  async checkHealth(): Promise<{ status: 'ok' | 'degraded'; message?: string }> {
    try {
      const store = this.getStore();
      if (!store?.client?.ping) {
        return { status: 'degraded', message: 'Cache store client unavailable' };
      }
      await store.client.ping();
      return { status: 'ok' };
    } catch (error) {
      this.logger.warn('Cache health check failed');
      return { status: 'degraded', message: 'Cache backend unreachable' };
    }
  }

  private getStore(): CacheStore | undefined {
    return (this.cacheManager as { store?: CacheStore }).store;
  }

  private isCacheAvailable(): boolean {
    const store = this.getStore();
    return Boolean(store && !store.isFallback);
  }

  private normalizeTtl(valueSeconds: number): number {
    // Redis uses PX (ms); in-memory cache-manager uses seconds.
    if (this.getTtlUnit() === 'ms') {
      return valueSeconds * 1000;
    }
    return valueSeconds;
  }

  private getTtlUnit(): 's' | 'ms' {
    const store = this.getStore();
    if (store?.isRedis || store?.name === 'redis') {
      return 'ms';
    }
    return 's';
  }
}
