import { randomBytes, randomUUID } from 'node:crypto';

import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CacheService } from '../cache/cache.service';
import { KeyCollisionError, QuotaExceededError } from '../common/errors';
import { currentUsageMonth } from '../quota/quota';
import { hashKeyForLogging, hmacSha256Hex } from '../utils/hash';
import { isPlanId, PLANS, PlanId } from './plans';
import {
  ApiKey,
  ApiKeyRecord,
  ApiKeyUsage,
  CreateApiKeyInput,
  CreateApiKeyResult,
  RecordUsageInput,
} from './types';

type RedisClient = {
  get: (key: string) => Promise<string | null>;
  set: (key: string, value: string, options?: { NX?: boolean }) => Promise<string | null>;
  incr: (key: string) => Promise<number>;
  incrBy: (key: string, increment: number) => Promise<number>;
  decrBy: (key: string, decrement: number) => Promise<number>;
  sAdd: (key: string, member: string) => Promise<number>;
  sMembers: (key: string) => Promise<string[]>;
  zAdd: (
    key: string,
    member: { score: number; value: string },
    options?: { GT?: true },
  ) => Promise<number>;
  zScore: (key: string, member: string) => Promise<number | null>;
};

const SECRET_PREFIX = 'tts_';
const DISPLAY_PREFIX_LENGTH = 8;
const MAX_CREATE_ATTEMPTS = 3;
const MAX_QUOTA = 1_000_000_000;

@Injectable()
export class ApiKeysService {
  private readonly logger = new Logger(ApiKeysService.name);
  private readonly redisPrefix: string;
  private readonly pepper: string;
  private readonly defaultPlan: PlanId;
  private readonly maxRateLimit: number;

  constructor(
    private readonly cacheService: CacheService,
    private readonly configService: ConfigService,
  ) {
    this.redisPrefix = this.configService.get<string>('API_KEYS_REDIS_PREFIX') ?? 'speech-gateway';
    this.pepper = this.configService.get<string>('API_KEYS_HASH_PEPPER') ?? '';
    if (this.pepper.length === 0) {
      throw new Error('API_KEYS_HASH_PEPPER must be configured');
    }

    const configuredPlan = this.configService.get<unknown>('API_KEYS_DEFAULT_PLAN');
    this.defaultPlan = isPlanId(configuredPlan) ? configuredPlan : 'free';
    this.maxRateLimit = this.parsePositiveInteger(
      this.configService.get<unknown>('API_KEYS_MAX_RATE_LIMIT'),
      1000,
      'API_KEYS_MAX_RATE_LIMIT',
    );
  }

  /**
   * Resolve a presented secret to its key. Unknown, malformed and revoked
   * secrets all return null so callers cannot tell them apart.
   */
  async authenticate(rawApiKey: string | null | undefined): Promise<ApiKey | null> {
    const presented = rawApiKey?.trim();
    if (!presented) {
      return null;
    }

    const redis = this.getRedisClient();
    const keyId = await redis.get(this.hashLookupKey(this.hashSecret(presented)));
    if (!keyId) {
      return null;
    }

    const record = await this.getRecord(keyId, redis);
    if (!record || record.status !== 'active') {
      return null;
    }

    return { ...record, ...(await this.readUsage(keyId, redis)) };
  }

  async createApiKey(input: CreateApiKeyInput): Promise<CreateApiKeyResult> {
    this.parseQuota(input.totalQuota ?? 0, 'totalQuota');
    this.parseQuota(input.monthlyCharacterQuota ?? 0, 'monthlyCharacterQuota');
    const redis = this.getRedisClient();

    for (let attempt = 1; attempt <= MAX_CREATE_ATTEMPTS; attempt += 1) {
      try {
        return await this.insertApiKey(input, redis);
      } catch (error) {
        if (!(error instanceof KeyCollisionError)) {
          throw error;
        }
        this.logger.warn(
          `API key hash collision on attempt ${attempt}/${MAX_CREATE_ATTEMPTS}; regenerating`,
        );
      }
    }

    throw new ServiceUnavailableException('Unable to allocate API key');
  }

  async getApiKey(keyId: string): Promise<ApiKey> {
    const redis = this.getRedisClient();
    const record = await this.getRecordOrThrow(keyId, redis);
    return { ...record, ...(await this.readUsage(keyId, redis)) };
  }

  async listApiKeys(): Promise<ApiKey[]> {
    const redis = this.getRedisClient();
    const keyIds = await redis.sMembers(this.indexKey());

    const keys: ApiKey[] = [];
    for (const keyId of keyIds) {
      const record = await this.getRecord(keyId, redis);
      if (record) {
        keys.push({ ...record, ...(await this.readUsage(keyId, redis)) });
      }
    }

    return keys.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  /** Logical delete; the record stays for audit and the secret never authenticates again. */
  async revokeApiKey(keyId: string): Promise<void> {
    const redis = this.getRedisClient();
    const record = await this.getRecordOrThrow(keyId, redis);
    if (record.status === 'revoked') {
      return;
    }

    const updated: ApiKeyRecord = {
      ...record,
      status: 'revoked',
      revokedAt: new Date().toISOString(),
    };

    await redis.set(this.recordKey(keyId), JSON.stringify(updated));
  }

  /**
   * Account one completed request. Each counter moves with a single atomic
   * INCR/INCRBY; an increment that lands above a non-zero ceiling is undone
   * and rejected, so concurrent callers can neither lose updates nor push
   * usage past the quota. Any failure part-way reverts the increments already
   * applied, so a request that errors is never billed.
   */
  async recordUsage(keyId: string, usage: RecordUsageInput): Promise<ApiKeyUsage> {
    const redis = this.getRedisClient();
    const record = await this.getRecordOrThrow(keyId, redis);
    const characters = Math.max(0, Math.floor(usage.characters));
    const bytesOut = Math.max(0, Math.floor(usage.bytesOut));
    const month = currentUsageMonth();
    const monthlyKey = this.monthlyCharactersKey(keyId, month);
    const applied: Array<{ key: string; amount: number }> = [];

    try {
      const usageCount = await redis.incr(this.usageCountKey(keyId));
      applied.push({ key: this.usageCountKey(keyId), amount: 1 });
      if (record.totalQuota > 0 && usageCount > record.totalQuota) {
        throw new QuotaExceededError('requests', record.totalQuota, record.totalQuota);
      }

      const charactersUsedThisMonth = await redis.incrBy(monthlyKey, characters);
      applied.push({ key: monthlyKey, amount: characters });
      if (
        record.monthlyCharacterQuota > 0 &&
        charactersUsedThisMonth > record.monthlyCharacterQuota
      ) {
        throw new QuotaExceededError(
          'monthly_characters',
          record.monthlyCharacterQuota,
          charactersUsedThisMonth - characters,
          characters,
        );
      }

      const charactersUsed = await redis.incrBy(this.charactersKey(keyId), characters);
      applied.push({ key: this.charactersKey(keyId), amount: characters });
      const totalBytesOut = await redis.incrBy(this.bytesOutKey(keyId), bytesOut);
      applied.push({ key: this.bytesOutKey(keyId), amount: bytesOut });

      const lastUsedAt = await this.touchLastUsed(keyId, redis);

      return {
        usageCount,
        charactersUsed,
        bytesOut: totalBytesOut,
        usageMonth: month,
        charactersUsedThisMonth,
        lastUsedAt,
      };
    } catch (error) {
      await this.revertIncrements(keyId, applied, redis);
      throw error;
    }
  }

  // GT keeps the newest timestamp when concurrent requests finish out of order.
  private async touchLastUsed(keyId: string, redis: RedisClient): Promise<string> {
    const now = Date.now();
    await redis.zAdd(this.lastUsedKey(), { score: now, value: keyId }, { GT: true });
    const latest = await redis.zScore(this.lastUsedKey(), keyId);
    return new Date(latest ?? now).toISOString();
  }

  private async revertIncrements(
    keyId: string,
    applied: Array<{ key: string; amount: number }>,
    redis: RedisClient,
  ): Promise<void> {
    for (const { key, amount } of applied.reverse()) {
      try {
        await redis.decrBy(key, amount);
      } catch (error) {
        this.logger.error(
          `Usage rollback failed for keyId hash ${hashKeyForLogging(keyId)}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
    }
  }

  private async insertApiKey(
    input: CreateApiKeyInput,
    redis: RedisClient,
  ): Promise<CreateApiKeyResult> {
    const apiKey = this.generateSecret();
    const hash = this.hashSecret(apiKey);
    const keyId = randomUUID();

    // The NX claim on the hash index is what makes hashes unique.
    const claimed = await redis.set(this.hashLookupKey(hash), keyId, { NX: true });
    if (claimed === null) {
      throw new KeyCollisionError();
    }

    const plan = PLANS[input.plan ?? this.defaultPlan];
    const record: ApiKeyRecord = {
      keyId,
      hash,
      prefix: apiKey.slice(0, DISPLAY_PREFIX_LENGTH),
      name: input.name,
      owner: input.owner,
      plan: plan.id,
      rateLimitPerMinute: this.clamp(
        input.rateLimitPerMinute ?? plan.rateLimitPerMinute,
        1,
        this.maxRateLimit,
      ),
      totalQuota: this.parseQuota(input.totalQuota ?? 0, 'totalQuota'),
      monthlyCharacterQuota: this.parseQuota(
        input.monthlyCharacterQuota ?? plan.monthlyCharacters,
        'monthlyCharacterQuota',
      ),
      status: 'active',
      createdAt: new Date().toISOString(),
      createdBy: input.createdBy,
    };

    await redis.set(this.recordKey(keyId), JSON.stringify(record));
    await redis.sAdd(this.indexKey(), keyId);

    return { apiKey, record };
  }

  private async readUsage(keyId: string, redis: RedisClient): Promise<ApiKeyUsage> {
    const month = currentUsageMonth();
    const [usageCount, charactersUsed, bytesOut, charactersUsedThisMonth, lastUsedAt] =
      await Promise.all([
        redis.get(this.usageCountKey(keyId)),
        redis.get(this.charactersKey(keyId)),
        redis.get(this.bytesOutKey(keyId)),
        redis.get(this.monthlyCharactersKey(keyId, month)),
        redis.zScore(this.lastUsedKey(), keyId),
      ]);

    return {
      usageCount: this.toCounter(usageCount),
      charactersUsed: this.toCounter(charactersUsed),
      bytesOut: this.toCounter(bytesOut),
      usageMonth: month,
      charactersUsedThisMonth: this.toCounter(charactersUsedThisMonth),
      lastUsedAt: lastUsedAt === null ? undefined : new Date(lastUsedAt).toISOString(),
    };
  }

  private getRedisClient(): RedisClient {
    const client = this.cacheService.getStoreClient<RedisClient>();
    if (!client) {
      this.logger.error('Redis client unavailable for API key storage');
      throw new ServiceUnavailableException('API key backend unavailable');
    }

    return client;
  }

  private async getRecordOrThrow(keyId: string, redis: RedisClient): Promise<ApiKeyRecord> {
    const record = await this.getRecord(keyId, redis);
    if (!record) {
      throw new NotFoundException('API key not found');
    }
    return record;
  }

  private async getRecord(keyId: string, redis: RedisClient): Promise<ApiKeyRecord | null> {
    const raw = await redis.get(this.recordKey(keyId));
    if (!raw) {
      return null;
    }

    try {
      return JSON.parse(raw) as ApiKeyRecord;
    } catch {
      this.logger.warn(`Invalid API key record payload for keyId hash ${hashKeyForLogging(keyId)}`);
      return null;
    }
  }

  private generateSecret(): string {
    return `${SECRET_PREFIX}${randomBytes(32).toString('base64url')}`;
  }

  private hashSecret(secret: string): string {
    return hmacSha256Hex(secret, this.pepper);
  }

  // 0 means unlimited, so a negative quota is rejected rather than clamped up to 0.
  private parseQuota(value: number, fieldName: string): number {
    if (!Number.isFinite(value) || value < 0) {
      throw new BadRequestException(`${fieldName} must be a non-negative integer`);
    }
    return Math.min(MAX_QUOTA, Math.floor(value));
  }

  private clamp(value: number, min: number, max: number): number {
    const normalized = Number.isFinite(value) ? Math.floor(value) : min;
    return Math.min(max, Math.max(min, normalized));
  }

  private toCounter(raw: string | null): number {
    const parsed = Number(raw ?? '0');
    return Number.isFinite(parsed) ? parsed : 0;
  }

  private recordKey(keyId: string): string {
    return `${this.redisPrefix}:key:${keyId}`;
  }

  private hashLookupKey(hash: string): string {
    return `${this.redisPrefix}:hash:${hash}`;
  }

  private indexKey(): string {
    return `${this.redisPrefix}:index`;
  }

  private usageCountKey(keyId: string): string {
    return `${this.redisPrefix}:usage:${keyId}`;
  }

  private charactersKey(keyId: string): string {
    return `${this.redisPrefix}:chars:${keyId}`;
  }

  private monthlyCharactersKey(keyId: string, month: string): string {
    return `${this.redisPrefix}:chars:${keyId}:${month}`;
  }

  private bytesOutKey(keyId: string): string {
    return `${this.redisPrefix}:bytes:${keyId}`;
  }

  private lastUsedKey(): string {
    return `${this.redisPrefix}:last-used`;
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
