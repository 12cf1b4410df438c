import type { CacheStore } from '@nestjs/cache-manager';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { redisStore } from 'cache-manager-redis-yet';

export type StorageStore = CacheStore & {
  isFallback: boolean;
  isRedis: boolean;
  name: string;
};

export type CacheStoreOptions = {
  // Milliseconds for Redis, seconds for the offline store; cache-manager v5 differs per store.
  ttl: number;
  store: StorageStore;
};

const offlineStore = (): StorageStore => ({
  get: async <T>() => undefined as T | undefined,
  set: async () => undefined,
  del: async () => undefined,
  isFallback: true,
  isRedis: false,
  name: 'offline',
});

/**
 * Connect the Redis store that backs both the clip cache and the key, rate
 * limit and ledger data. Without Redis the app still boots; keyed routes then
 * answer 503 and /health/cache reports degraded.
 */
export async function createStorageStore(
  configService: ConfigService,
  logger = new Logger('CacheStore'),
): Promise<CacheStoreOptions> {
  const ttlSeconds = Number(configService.get('CACHE_TTL_DEFAULT') ?? 300);
  const redisUrl = configService.get<string>('REDIS_URL') ?? '';

  try {
    const store = (await redisStore({ url: redisUrl })) as CacheStore & { name?: string };
    const storage: StorageStore = Object.assign(store, {
      isFallback: false,
      isRedis: true,
      name: store.name ?? 'redis',
    });
    return { ttl: ttlSeconds * 1000, store: storage };
  } catch (error) {
    logger.error(
      `Redis unavailable (${error instanceof Error ? error.message : String(error)}); ` +
        'API key and usage storage are offline.',
    );
    return { ttl: ttlSeconds, store: offlineStore() };
  }
}
