import { randomUUID } from 'node:crypto';

import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CacheService } from '../cache/cache.service';
import { AppendUsageInput, USAGE_STATUSES, UsageRecord, UsageStatus, UsageSummary } from './types';

type RedisClient = {
  zAdd: (key: string, member: { score: number; value: string }) => Promise<number>;
  zCount: (key: string, min: number | string, max: number | string) => Promise<number>;
  zRange: (key: string, start: number, stop: number, options?: { REV?: true }) => Promise<string[]>;
  zIncrBy: (key: string, increment: number, member: string) => Promise<number>;
  zRangeWithScores: (
    key: string,
    start: number,
    stop: number,
    options?: { REV?: true },
  ) => Promise<Array<{ value: string; score: number }>>;
  hIncrBy: (key: string, field: string, increment: number) => Promise<number>;
  hGetAll: (key: string) => Promise<Record<string, string>>;
};

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Append-only request log. Records are written once into time-ordered sorted
 * sets (global and per key) and folded into running aggregates; nothing here
 * updates or deletes a record.
 */
@Injectable()
export class UsageLedgerService {
  private readonly logger = new Logger(UsageLedgerService.name);
  private readonly redisPrefix: string;

  constructor(
    private readonly cacheService: CacheService,
    private readonly configService: ConfigService,
  ) {
    this.redisPrefix = this.configService.get<string>('API_KEYS_REDIS_PREFIX') ?? 'speech-gateway';
  }

  async append(input: AppendUsageInput): Promise<UsageRecord> {
    const redis = this.getRedisClient();
    const now = Date.now();
    const record: UsageRecord = {
      id: randomUUID(),
      keyId: input.keyId,
      endpoint: input.endpoint,
      status: input.status,
      createdAt: new Date(now).toISOString(),
      characters: input.characters ?? 0,
      bytesOut: input.bytesOut ?? 0,
      latencyMs: input.latencyMs ?? 0,
      voice: input.voice,
      ip: input.ip,
      error: input.error,
    };
    const payload = JSON.stringify(record);

    await redis.zAdd(this.allRecordsKey(), { score: now, value: payload });
    if (record.keyId) {
      await redis.zAdd(this.keyRecordsKey(record.keyId), { score: now, value: payload });
    }

    await redis.hIncrBy(this.statsKey(), 'total', 1);
    await redis.hIncrBy(this.statsKey(), `status:${record.status}`, 1);
    if (record.status === 'ok') {
      await redis.hIncrBy(this.statsKey(), 'characters', record.characters);
      await redis.hIncrBy(this.statsKey(), 'bytes', record.bytesOut);
      if (record.voice) {
        await redis.zIncrBy(this.topVoicesKey(), 1, record.voice);
      }
      if (record.keyId) {
        await redis.zIncrBy(this.topKeysKey(), 1, record.keyId);
      }
    }

    return record;
  }

  /** Records for a key with createdAt in [fromMs, toMs], inclusive. */
  async countForKey(keyId: string, fromMs: number, toMs: number = Date.now()): Promise<number> {
    const redis = this.getRedisClient();
    return redis.zCount(this.keyRecordsKey(keyId), fromMs, toMs);
  }

  async listForKey(keyId: string, limit = 50): Promise<UsageRecord[]> {
    const redis = this.getRedisClient();
    const count = Math.max(1, Math.floor(limit));
    const raw = await redis.zRange(this.keyRecordsKey(keyId), 0, count - 1, { REV: true });
    return raw
      .map((entry) => this.parseRecord(entry))
      .filter((entry): entry is UsageRecord => entry !== null);
  }

  async summarize(topN = 5): Promise<UsageSummary> {
    const redis = this.getRedisClient();
    const now = Date.now();
    const stop = Math.max(1, Math.floor(topN)) - 1;
    const [stats, requestsLast24h, topVoices, topKeys] = await Promise.all([
      redis.hGetAll(this.statsKey()),
      redis.zCount(this.allRecordsKey(), now - DAY_MS, now),
      redis.zRangeWithScores(this.topVoicesKey(), 0, stop, { REV: true }),
      redis.zRangeWithScores(this.topKeysKey(), 0, stop, { REV: true }),
    ]);

    const requestsByStatus = USAGE_STATUSES.reduce<Record<UsageStatus, number>>(
      (acc, status) => {
        acc[status] = this.toCount(stats[`status:${status}`]);
        return acc;
      },
      {
        ok: 0,
        unauthorized: 0,
        rate_limited: 0,
        invalid_request: 0,
        forbidden: 0,
        quota_exceeded: 0,
        error: 0,
      },
    );

    return {
      totalRequests: this.toCount(stats.total),
      requestsByStatus,
      charactersProcessed: this.toCount(stats.characters),
      bytesServed: this.toCount(stats.bytes),
      requestsLast24h,
      topVoices: topVoices.map((entry) => ({ voice: entry.value, count: entry.score })),
      topKeys: topKeys.map((entry) => ({ keyId: entry.value, count: entry.score })),
    };
  }

  private parseRecord(raw: string): UsageRecord | null {
    try {
      return JSON.parse(raw) as UsageRecord;
    } catch {
      this.logger.warn('Skipping unreadable usage record');
      return null;
    }
  }

  private toCount(raw: string | undefined): number {
    const parsed = Number(raw ?? '0');
    return Number.isFinite(parsed) ? parsed : 0;
  }

  private getRedisClient(): RedisClient {
    const client = this.cacheService.getStoreClient<RedisClient>();
    if (!client) {
      this.logger.error('Redis client unavailable for usage ledger');
      throw new ServiceUnavailableException('Usage ledger backend unavailable');
    }

    return client;
  }

  private allRecordsKey(): string {
    return `${this.redisPrefix}:usage-log:all`;
  }

  private keyRecordsKey(keyId: string): string {
    return `${this.redisPrefix}:usage-log:key:${keyId}`;
  }

  private statsKey(): string {
    return `${this.redisPrefix}:usage-log:stats`;
  }

  private topVoicesKey(): string {
    return `${this.redisPrefix}:usage-log:voices`;
  }

  private topKeysKey(): string {
    return `${this.redisPrefix}:usage-log:keys`;
  }
}
