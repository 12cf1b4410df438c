import { ServiceUnavailableException } from '@nestjs/common';

import { InMemoryRedis } from '../../test/in-memory-redis';
import { buildCacheService, buildConfigService } from '../../test/stubs';
import { RateLimitService } from './rate-limit.service';

describe('RateLimitService', () => {
  let service: RateLimitService;
  let redis: InMemoryRedis;

  const start = new Date('2026-03-10T12:00:00.000Z');
  const at = (offsetSeconds: number) => {
    jest.setSystemTime(new Date(start.getTime() + offsetSeconds * 1000));
  };

  beforeEach(() => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
    at(0);
    redis = new InMemoryRedis();
    service = new RateLimitService(
      buildCacheService(redis),
      buildConfigService({
        API_KEYS_REDIS_PREFIX: 'test-limits',
        API_KEYS_RATE_LIMIT_WINDOW_SECONDS: 60,
        API_KEYS_RATE_LIMIT_MAX_REQUESTS: 2,
      }),
    );
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('consumeKeyLimit', () => {
    it('admits up to the limit and then rejects within the minute', async () => {
      await expect(service.consumeKeyLimit('key-1', 2)).resolves.toEqual({
        allowed: true,
        limit: 2,
        remaining: 1,
        retryAfter: 0,
        resetAt: start.getTime() / 1000 + 60,
      });
      await expect(service.consumeKeyLimit('key-1', 2)).resolves.toEqual(
        expect.objectContaining({ allowed: true, remaining: 0 }),
      );
      await expect(service.consumeKeyLimit('key-1', 2)).resolves.toEqual({
        allowed: false,
        limit: 2,
        remaining: 0,
        retryAfter: 60,
        resetAt: start.getTime() / 1000 + 60,
      });
    });

    it('admits again once the earliest request leaves the window', async () => {
      await service.consumeKeyLimit('key-1', 2);
      await service.consumeKeyLimit('key-1', 2);
      await expect(service.consumeKeyLimit('key-1', 2)).resolves.toEqual(
        expect.objectContaining({ allowed: false }),
      );

      at(61);

      await expect(service.consumeKeyLimit('key-1', 2)).resolves.toEqual(
        expect.objectContaining({ allowed: true, remaining: 1 }),
      );
    });

    it('enforces a rolling window rather than fixed minute buckets', async () => {
      at(30);
      await service.consumeKeyLimit('key-1', 2);
      at(59);
      await service.consumeKeyLimit('key-1', 2);

      // A fixed bucket would reset at 12:01:00; the rolling window still holds both.
      at(61);
      await expect(service.consumeKeyLimit('key-1', 2)).resolves.toEqual(
        expect.objectContaining({ allowed: false, retryAfter: 29 }),
      );

      at(90);
      await expect(service.consumeKeyLimit('key-1', 2)).resolves.toEqual(
        expect.objectContaining({ allowed: true }),
      );
    });

    it('does not count rejected attempts against the window', async () => {
      await service.consumeKeyLimit('key-1', 1);
      at(10);
      await service.consumeKeyLimit('key-1', 1);
      at(20);
      await service.consumeKeyLimit('key-1', 1);

      at(60);
      await expect(service.consumeKeyLimit('key-1', 1)).resolves.toEqual(
        expect.objectContaining({ allowed: true }),
      );
    });

    it('keeps keys independent', async () => {
      await service.consumeKeyLimit('key-1', 1);

      await expect(service.consumeKeyLimit('key-2', 1)).resolves.toEqual(
        expect.objectContaining({ allowed: true }),
      );
      await expect(service.consumeKeyLimit('key-1', 1)).resolves.toEqual(
        expect.objectContaining({ allowed: false }),
      );
    });

    it('admits no more than the limit from a concurrent burst', async () => {
      const results = await Promise.all(
        Array.from({ length: 8 }, () => service.consumeKeyLimit('burst', 5)),
      );

      expect(results.filter((result) => result.allowed).length).toBeLessThanOrEqual(5);
      await expect(service.consumeKeyLimit('burst', 5)).resolves.toEqual(
        expect.objectContaining({ allowed: true }),
      );
    });
  });

  describe('fixed-window throttles', () => {
    it('limits failed authentications per ip', async () => {
      at(30);
      await service.consumePreAuthLimit('203.0.113.1', 'tts_wrong');
      await service.consumePreAuthLimit('203.0.113.1', 'tts_wrong');

      await expect(service.consumePreAuthLimit('203.0.113.1', 'tts_wrong')).resolves.toEqual({
        allowed: false,
        limit: 2,
        remaining: 0,
        retryAfter: 30,
        resetAt: start.getTime() / 1000 + 60,
      });
      await expect(service.consumePreAuthLimit('203.0.113.2', 'tts_wrong')).resolves.toEqual(
        expect.objectContaining({ allowed: true, remaining: 1 }),
      );
    });

    it('buckets admin requests separately from pre-auth requests', async () => {
      await service.consumePreAuthLimit('203.0.113.1', null);
      await service.consumePreAuthLimit('203.0.113.1', null);

      await expect(service.consumeAdminLimit('203.0.113.1', null)).resolves.toEqual(
        expect.objectContaining({ allowed: true }),
      );
    });

    it('falls back to safe defaults when throttle config is invalid', async () => {
      const fallback = new RateLimitService(
        buildCacheService(redis),
        buildConfigService({
          API_KEYS_RATE_LIMIT_WINDOW_SECONDS: Number.NaN,
          API_KEYS_RATE_LIMIT_MAX_REQUESTS: 0,
        }),
      );

      await expect(fallback.consumeAdminLimit('198.51.100.4', 'token')).resolves.toEqual(
        expect.objectContaining({ allowed: true, limit: 120, remaining: 119 }),
      );
    });
  });

  it('throws ServiceUnavailableException without redis', async () => {
    const offline = new RateLimitService(buildCacheService(null), buildConfigService({}));

    await expect(offline.consumeKeyLimit('key-1', 5)).rejects.toBeInstanceOf(
      ServiceUnavailableException,
    );
  });
});
