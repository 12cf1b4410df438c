import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { ApiKeysService } from '../api-keys/api-keys.service';
import { PLANS, Plan } from '../api-keys/plans';
import { ApiKey, ApiKeyUsage } from '../api-keys/types';
import {
  ProviderError,
  QuotaExceededError,
  RateLimitExceededError,
  VoiceNotAllowedError,
} from '../common/errors';
import {
  charactersUsedInMonth,
  checkQuota,
  currentUsageMonth,
  remainingRequests,
} from '../quota/quota';
import { RateLimitService } from '../rate-limit/rate-limit.service';
import { RateLimitResult } from '../rate-limit/types';
import { SpeechSynthesisService, SynthesisResult } from '../synthesis/speech-synthesis.service';
import { DEFAULT_VOICE_ID, findVoice, Voice, VOICES } from '../synthesis/voices';
import { UsageStatus } from '../usage/types';
import { UsageLedgerService } from '../usage/usage-ledger.service';

export type SynthesizeInput = {
  text?: unknown;
  voiceId?: unknown;
};

export type RequestContext = {
  endpoint: string;
  ip?: string;
};

export type SynthesisOutcome = {
  audio: Buffer;
  contentType: string;
  voice: Voice;
  characters: number;
  processingMs: number;
  cached: boolean;
  usage: ApiKeyUsage;
  // Null when the key has no lifetime request quota.
  quotaRemaining: number | null;
  rateLimit: RateLimitResult;
};

export type UsageSnapshot = {
  keyId: string;
  name: string;
  prefix: string;
  plan: Plan;
  rateLimitPerMinute: number;
  totalQuota: number;
  monthlyCharacterQuota: number;
  usageCount: number;
  charactersUsed: number;
  bytesOut: number;
  usageMonth: string;
  charactersUsedThisMonth: number;
  quotaRemaining: number | null;
  monthlyCharactersRemaining: number | null;
  requestsLast24h: number;
  lastUsedAt: string | null;
};

type ValidatedRequest = {
  text: string;
  voice: Voice;
  characters: number;
};

type Rejection = {
  status: Exclude<UsageStatus, 'ok' | 'unauthorized'>;
  error: string;
  characters?: number;
  voice?: string;
};

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Request pipeline for an authenticated key: rate limit, input checks, quota,
 * synthesis, accounting. Cheap checks run first and nothing is billed until
 * synthesis has produced audio. Every outcome lands in the usage ledger.
 */
@Injectable()
export class GatewayService {
  private readonly logger = new Logger(GatewayService.name);
  private readonly maxTextLength: number;

  constructor(
    private readonly apiKeysService: ApiKeysService,
    private readonly rateLimitService: RateLimitService,
    private readonly synthesisService: SpeechSynthesisService,
    private readonly usageLedger: UsageLedgerService,
    private readonly configService: ConfigService,
  ) {
    this.maxTextLength = this.parsePositiveInteger(
      this.configService.get<unknown>('SYNTHESIS_MAX_TEXT_LENGTH'),
      1000,
      'SYNTHESIS_MAX_TEXT_LENGTH',
    );
  }

  async synthesize(
    apiKey: ApiKey,
    input: SynthesizeInput,
    context: RequestContext,
  ): Promise<SynthesisOutcome> {
    const startedAt = Date.now();

    const rateLimit = await this.rateLimitService.consumeKeyLimit(
      apiKey.keyId,
      apiKey.rateLimitPerMinute,
    );
    if (!rateLimit.allowed) {
      await this.reject(apiKey, context, startedAt, {
        status: 'rate_limited',
        error: 'rate_limit_exceeded',
      });
      throw new RateLimitExceededError(rateLimit.limit, rateLimit.retryAfter);
    }

    let request: ValidatedRequest;
    try {
      request = this.validate(apiKey, input);
    } catch (error) {
      await this.reject(apiKey, context, startedAt, {
        status: error instanceof VoiceNotAllowedError ? 'forbidden' : 'invalid_request',
        error: this.errorMessage(error),
      });
      throw error;
    }

    const decision = checkQuota(apiKey, request.characters, currentUsageMonth());
    if (!decision.allowed) {
      await this.reject(apiKey, context, startedAt, {
        status: 'quota_exceeded',
        error: `${decision.dimension}_quota_exceeded`,
        characters: request.characters,
        voice: request.voice.id,
      });
      throw new QuotaExceededError(
        decision.dimension,
        decision.quota,
        decision.used,
        decision.requested,
      );
    }

    let result: SynthesisResult;
    try {
      result = await this.synthesisService.synthesize(request.text, request.voice);
    } catch (error) {
      await this.reject(apiKey, context, startedAt, {
        status: 'error',
        error: error instanceof ProviderError ? error.reason : this.errorMessage(error),
        characters: request.characters,
        voice: request.voice.id,
      });
      throw error;
    }

    let usage: ApiKeyUsage;
    try {
      usage = await this.apiKeysService.recordUsage(apiKey.keyId, {
        characters: request.characters,
        bytesOut: result.audio.length,
      });
    } catch (error) {
      // A concurrent request can take the last unit of quota between the check and here.
      await this.reject(apiKey, context, startedAt, {
        status: error instanceof QuotaExceededError ? 'quota_exceeded' : 'error',
        error: this.errorMessage(error),
        characters: request.characters,
        voice: request.voice.id,
      });
      throw error;
    }

    const processingMs = Date.now() - startedAt;
    await this.appendToLedger(apiKey, context, 'ok', processingMs, {
      characters: request.characters,
      bytesOut: result.audio.length,
      voice: request.voice.id,
    });

    return {
      audio: result.audio,
      contentType: result.contentType,
      voice: request.voice,
      characters: request.characters,
      processingMs,
      cached: result.cached,
      usage,
      quotaRemaining: remainingRequests({
        totalQuota: apiKey.totalQuota,
        usageCount: usage.usageCount,
      }),
      rateLimit,
    };
  }

  async describeUsage(apiKey: ApiKey): Promise<UsageSnapshot> {
    const now = Date.now();
    const month = currentUsageMonth(new Date(now));
    const usedThisMonth = charactersUsedInMonth(apiKey, month);
    const requestsLast24h = await this.usageLedger.countForKey(apiKey.keyId, now - DAY_MS, now);

    return {
      keyId: apiKey.keyId,
      name: apiKey.name,
      prefix: apiKey.prefix,
      plan: PLANS[apiKey.plan],
      rateLimitPerMinute: apiKey.rateLimitPerMinute,
      totalQuota: apiKey.totalQuota,
      monthlyCharacterQuota: apiKey.monthlyCharacterQuota,
      usageCount: apiKey.usageCount,
      charactersUsed: apiKey.charactersUsed,
      bytesOut: apiKey.bytesOut,
      usageMonth: month,
      charactersUsedThisMonth: usedThisMonth,
      quotaRemaining: remainingRequests(apiKey),
      monthlyCharactersRemaining:
        apiKey.monthlyCharacterQuota === 0
          ? null
          : Math.max(0, apiKey.monthlyCharacterQuota - usedThisMonth),
      requestsLast24h,
      lastUsedAt: apiKey.lastUsedAt ?? null,
    };
  }

  listVoices(): { defaultVoice: string; voices: readonly Voice[]; plans: Plan[] } {
    return {
      defaultVoice: DEFAULT_VOICE_ID,
      voices: VOICES,
      plans: Object.values(PLANS),
    };
  }

  private validate(apiKey: ApiKey, input: SynthesizeInput): ValidatedRequest {
    if (typeof input.text !== 'string') {
      throw new BadRequestException('text is required');
    }

    const text = input.text.trim();
    if (text.length === 0) {
      throw new BadRequestException('text is required');
    }

    const characters = Array.from(text).length;
    if (characters > this.maxTextLength) {
      throw new BadRequestException(`text exceeds ${this.maxTextLength} characters`);
    }

    const voiceId = input.voiceId ?? DEFAULT_VOICE_ID;
    if (typeof voiceId !== 'string') {
      throw new BadRequestException('voice_id must be a string');
    }

    const voice = findVoice(voiceId.trim());
    if (!voice) {
      throw new BadRequestException(`Unknown voice ${voiceId}`);
    }

    if (voice.premium && !PLANS[apiKey.plan].premiumVoices) {
      throw new VoiceNotAllowedError(voice.id, apiKey.plan);
    }

    return { text, voice, characters };
  }

  private async reject(
    apiKey: ApiKey,
    context: RequestContext,
    startedAt: number,
    rejection: Rejection,
  ): Promise<void> {
    await this.appendToLedger(apiKey, context, rejection.status, Date.now() - startedAt, {
      characters: rejection.characters,
      voice: rejection.voice,
      error: rejection.error,
    });
  }

  private async appendToLedger(
    apiKey: ApiKey,
    context: RequestContext,
    status: UsageStatus,
    latencyMs: number,
    details: { characters?: number; bytesOut?: number; voice?: string; error?: string },
  ): Promise<void> {
    const payload = {
      event: 'synthesis_request',
      keyId: apiKey.keyId,
      endpoint: context.endpoint,
      status,
      latencyMs,
      ...details,
    };
    if (status === 'ok') {
      this.logger.log(JSON.stringify(payload));
    } else {
      this.logger.warn(JSON.stringify(payload));
    }

    try {
      await this.usageLedger.append({
        keyId: apiKey.keyId,
        endpoint: context.endpoint,
        status,
        ip: context.ip,
        latencyMs,
        ...details,
      });
    } catch (error) {
      this.logger.error(`Usage ledger append failed: ${this.errorMessage(error)}`);
    }
  }

  private errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
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
