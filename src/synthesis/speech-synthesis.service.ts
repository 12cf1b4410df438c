import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CacheService } from '../cache/cache.service';
import { ProviderError } from '../common/errors';
import { sha256Hex } from '../utils/hash';
import { SPEECH_PROVIDER, SpeechProvider, SynthesizedAudio } from './speech-provider';
import { Voice } from './voices';

export interface SynthesisResult extends SynthesizedAudio {
  cached: boolean;
}

type CachedClip = {
  audio: string;
  contentType: string;
};

@Injectable()
export class SpeechSynthesisService {
  private readonly logger = new Logger(SpeechSynthesisService.name);
  private readonly timeoutMs: number;
  private readonly cacheTtlSeconds: number;

  constructor(
    @Inject(SPEECH_PROVIDER) private readonly provider: SpeechProvider,
    private readonly cacheService: CacheService,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = this.parseInteger(
      this.configService.get<unknown>('SYNTHESIS_TIMEOUT_MS'),
      45000,
      1,
      'SYNTHESIS_TIMEOUT_MS',
    );
    this.cacheTtlSeconds = this.parseInteger(
      this.configService.get<unknown>('SYNTHESIS_CACHE_TTL'),
      3600,
      0,
      'SYNTHESIS_CACHE_TTL',
    );
  }

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Produce audio for the text, from cache when an identical clip was made
   * recently. Every provider failure, timeout and empty reply surfaces as a
   * ProviderError; nothing else escapes.
   */
  async synthesize(text: string, voice: Voice): Promise<SynthesisResult> {
    const cacheKey = this.buildCacheKey(text, voice);
    if (this.cacheTtlSeconds > 0) {
      const cached = await this.cacheService.get<CachedClip>(cacheKey);
      if (cached) {
        return {
          audio: Buffer.from(cached.audio, 'base64'),
          contentType: cached.contentType,
          cached: true,
        };
      }
    }

    const result = await this.callProvider(text, voice);

    if (this.cacheTtlSeconds > 0) {
      await this.cacheService.set<CachedClip>(
        cacheKey,
        { audio: result.audio.toString('base64'), contentType: result.contentType },
        { ttl: this.cacheTtlSeconds },
      );
    }

    return { ...result, cached: false };
  }

  private async callProvider(text: string, voice: Voice): Promise<SynthesizedAudio> {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new ProviderError(`Provider did not answer within ${this.timeoutMs}ms`, true));
      }, this.timeoutMs);
    });

    let result: SynthesizedAudio;
    try {
      result = await Promise.race([
        this.provider.synthesize({
          text,
          voiceId: voice.id,
          gender: voice.gender,
          signal: controller.signal,
        }),
        timeoutPromise,
      ]);
    } catch (error) {
      throw this.toProviderError(error, voice);
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }

    if (result.audio.length === 0) {
      throw this.toProviderError(new Error('Provider returned empty audio'), voice);
    }

    return result;
  }

  private toProviderError(error: unknown, voice: Voice): ProviderError {
    const providerError =
      error instanceof ProviderError
        ? error
        : new ProviderError(error instanceof Error ? error.message : String(error), false, error);

    this.logger.error(
      JSON.stringify({
        event: 'synthesis_provider_failure',
        provider: this.provider.name,
        voice: voice.id,
        timedOut: providerError.timedOut,
        reason: providerError.reason,
      }),
    );

    return providerError;
  }

  private buildCacheKey(text: string, voice: Voice): string {
    return `synthesis:${sha256Hex(`${voice.id}:${text}`)}`;
  }

  private parseInteger(value: unknown, fallback: number, min: number, fieldName: string): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (Number.isInteger(parsed) && parsed >= min) {
      return parsed;
    }

    this.logger.warn(`${fieldName} is invalid; using fallback ${fallback}`);
    return fallback;
  }
}
