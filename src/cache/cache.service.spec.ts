import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { CacheService } from './cache.service';

describe('CacheService', () => {
  let service: CacheService;
  let cacheStore: Map<string, unknown>;
  let cacheExpiry: Map<string, number>;
  let cacheManager: {
    get: jest.Mock;
    set: jest.Mock;
    store: {
      client: { ping: jest.Mock };
      isFallback?: boolean;
      isRedis?: boolean;
      name?: string;
    };
  };

  const buildService = async (): Promise<CacheService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CacheService,
        {
          provide: CACHE_MANAGER,
          useValue: cacheManager,
        },
        {
          provide: ConfigService,
          useValue: {
            get: (key: string) => (key === 'CACHE_TTL_DEFAULT' ? 1 : undefined),
          },
        },
      ],
    }).compile();

    return module.get<CacheService>(CacheService);
  };

  beforeEach(async () => {
    cacheStore = new Map();
    cacheExpiry = new Map();
    cacheManager = {
      get: jest.fn(async (key: string) => {
        const expiresAt = cacheExpiry.get(key);
        if (expiresAt !== undefined && Date.now() >= expiresAt) {
          cacheStore.delete(key);
          cacheExpiry.delete(key);
          return undefined;
        }

        return cacheStore.get(key);
      }),
      set: jest.fn(async (key: string, value: unknown, ttl?: number) => {
        cacheStore.set(key, value);
        if (ttl !== undefined) {
          cacheExpiry.set(key, Date.now() + ttl * 1000);
        }
      }),
      store: {
        client: {
          ping: jest.fn().mockResolvedValue('PONG'),
        },
        isFallback: false,
      },
    };

    service = await buildService();
  });

  it('stores and retrieves values', async () => {
    await expect(service.set('key', { audio: 'AAAA' })).resolves.toBe(true);
    await expect(service.get('key')).resolves.toEqual({ audio: 'AAAA' });
  });

  it('returns null on a miss', async () => {
    await expect(service.get('missing')).resolves.toBeNull();
  });

  it('expires values after ttl', async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-01-01T00:00:00Z'));

    await service.set('ttl-key', 'ttl-value', { ttl: 1 });
    await expect(service.get('ttl-key')).resolves.toEqual('ttl-value');

    await jest.advanceTimersByTimeAsync(1100);
    await expect(service.get('ttl-key')).resolves.toBeNull();

    jest.useRealTimers();
  });

  it('passes millisecond ttl to redis stores', async () => {
    cacheManager.store.isRedis = true;
    service = await buildService();

    await service.set('redis-key', 'value', { ttl: 30 });

    expect(cacheManager.set).toHaveBeenCalledWith('redis-key', 'value', 30000);
  });

  it('returns null and skips writes on the fallback store', async () => {
    cacheManager.store.isFallback = true;
    service = await buildService();

    await expect(service.set('key', 'value')).resolves.toBe(false);
    await expect(service.get('key')).resolves.toBeNull();
    expect(cacheManager.set).not.toHaveBeenCalled();
    expect(service.getStoreClient()).toBeNull();
  });

  it('exposes the store client when redis is connected', () => {
    expect(service.getStoreClient<{ ping: jest.Mock }>()).toBe(cacheManager.store.client);
  });

  it('swallows store errors on get', async () => {
    cacheManager.get.mockRejectedValueOnce(new Error('connection reset'));

    await expect(service.get('key')).resolves.toBeNull();
  });

  it('reports cache health', async () => {
    await expect(service.checkHealth()).resolves.toEqual({ status: 'ok' });
  });

  it('reports degraded health when ping fails', async () => {
    cacheManager.store.client.ping.mockRejectedValueOnce(new Error('down'));

    await expect(service.checkHealth()).resolves.toEqual({
      status: 'degraded',
      message: 'Cache backend unreachable',
    });
  });
});
