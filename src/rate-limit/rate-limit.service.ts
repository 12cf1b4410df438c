import { randomUUID } from 'node:crypto';

import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CacheService } from '../cache/cache.service';
import { RateLimitResult } from './types';

type RedisClient = {
  incr: (key: string) => Promise<number>;
  expire: (key: string, seconds: number) => Promise<unknown>;
  zAdd: (key: string, member: { score: number; value: string }) => Promise<number>;
  zRem: (key: string, member: string) => Promise<number>;
  zRemRangeByScore: (key: string, min: number, max: number) => Promise<number>;
  zCard: (key: string) => Promise<number>;
  zRangeWithScores: (
    key: string,
    start: number,
    stop: number,
  ) => Promise<Array<{ value: string; score: number }>>;
};

type ThrottleScope = 'preauth' | 'admin';

const KEY_WINDOW_MS = 60_000;

@Injectable()
export class RateLimitService {
  private readonly logger = new Logger(RateLimitService.name);
  private readonly redisPrefix: string;
  private readonly throttleWindowSeconds: number;
  private readonly throttleMaxRequests: number;

  constructor(
    private readonly cacheService: CacheService,
    private readonly configService: ConfigService,
  ) {
    this.redisPrefix = this.configService.get<string>('API_KEYS_REDIS_PREFIX') ?? 'speech-gateway';
    this.throttleWindowSeconds = this.parsePositiveInteger(
      this.configService.get<unknown>('API_KEYS_RATE_LIMIT_WINDOW_SECONDS'),
      60,
      'API_KEYS_RATE_LIMIT_WINDOW_SECONDS',
    );
    this.throttleMaxRequests = this.parsePositiveInteger(
      this.configService.get<unknown>('API_KEYS_RATE_LIMIT_MAX_REQUESTS'),
      120,
      'API_KEYS_RATE_LIMIT_MAX_REQUESTS',
    );
  }

  /**
   * Sliding one-minute window per key over a sorted set of admission
   * timestamps. The request is added before counting, so concurrent callers
   * can only over-count; a rejected request is removed again so retries
   * during a block do not extend it.
   */
  async consumeKeyLimit(keyId: string, limitPerMinute: number): Promise<RateLimitResult> {
    const redis = this.getRedisClient();
    const limit = Math.max(1, Math.floor(limitPerMinute));
    const now = Date.now();
    const windowKey = this.keyWindowKey(keyId);
    const member = `${now}:${randomUUID()}`;

    await redis.zRemRangeByScore(windowKey, 0, now - KEY_WINDOW_MS);
    await redis.zAdd(windowKey, { score: now, value: member });
    const count = await redis.zCard(windowKey);
    await redis.expire(windowKey, KEY_WINDOW_MS / 1000 + 1);

    const allowed = count <= limit;
    if (!allowed) {
      await redis.zRem(windowKey, member);
    }

    const [oldest] = await redis.zRangeWithScores(windowKey, 0, 0);
    const freesAtMs = (oldest?.score ?? now) + KEY_WINDOW_MS;

    return {
      allowed,
      limit,
      remaining: Math.max(0, limit - Math.min(count, limit)),
      retryAfter: allowed ? 0 : Math.max(1, Math.ceil((freesAtMs - now) / 1000)),
      resetAt: Math.ceil(freesAtMs / 1000),
    };
  }

  /** Throttle for requests that failed authentication, bucketed per client IP. */
  async consumePreAuthLimit(
    ip: string | undefined,
    rawApiKey: string | null | undefined,
  ): Promise<RateLimitResult> {
    return this.consumeFixedWindow('preauth', this.buildIdentifier(ip, rawApiKey));
  }

  async consumeAdminLimit(
    ip: string | undefined,
    rawToken: string | null | undefined,
  ): Promise<RateLimitResult> {
    return this.consumeFixedWindow('admin', this.buildIdentifier(ip, rawToken));
  }

  private async consumeFixedWindow(
    scope: ThrottleScope,
    identifier: string,
  ): Promise<RateLimitResult> {
    const redis = this.getRedisClient();
    const nowSeconds = Math.floor(Date.now() / 1000);
    const windowStart =
      Math.floor(nowSeconds / this.throttleWindowSeconds) * this.throttleWindowSeconds;
    const retryAfter = Math.max(1, windowStart + this.throttleWindowSeconds - nowSeconds);
    const counterKey = this.throttleKey(scope, identifier, windowStart);
    const count = await redis.incr(counterKey);

    if (count === 1) {
      await redis.expire(counterKey, this.throttleWindowSeconds + 1);
    }

    return {
      allowed: count <= this.throttleMaxRequests,
      limit: this.throttleMaxRequests,
      remaining: Math.max(0, this.throttleMaxRequests - count),
      retryAfter,
      resetAt: windowStart + this.throttleWindowSeconds,
    };
  }

  private getRedisClient(): RedisClient {
    const client = this.cacheService.getStoreClient<RedisClient>();
    if (!client) {
      this.logger.error('Redis client unavailable for rate limiting');
      throw new ServiceUnavailableException('Rate limit backend unavailable');
    }

    return client;
  }

  private keyWindowKey(keyId: string): string {
    return `${this.redisPrefix}:ratelimit:key:${keyId}`;
  }

  private throttleKey(scope: ThrottleScope, identifier: string, windowStart: number): string {
    return `${this.redisPrefix}:ratelimit:${scope}:${identifier}:${windowStart}`;
  }

  private buildIdentifier(ip: string | undefined, credential: string | null | undefined): string {
    const normalizedIp = ip?.trim() || 'unknown';
    return credential?.trim() ? `${normalizedIp}:present` : `${normalizedIp}:missing`;
  }

  private parsePositiveInteger(value: unknown, fallback: number, fieldName: string): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }

    this.logger.warn(`${fieldName} is invalid; using fallback ${fallback}`);
    return fallback;
  }
}
