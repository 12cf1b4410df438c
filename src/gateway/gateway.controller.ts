import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';

import { ApiKeyAuthGuard } from '../api-keys/api-key-auth.guard';
import { ApiKey } from '../api-keys/types';
import { AuthenticationError, RateLimitExceededError } from '../common/errors';
import { AuthenticatedRequest, requestPath } from '../common/request';
import { RateLimitResult } from '../rate-limit/types';
import { GatewayService, UsageSnapshot } from './gateway.service';

type SynthesizeBody = {
  text?: unknown;
  voice_id?: unknown;
};

@Controller('api/v1')
export class GatewayController {
  constructor(private readonly gatewayService: GatewayService) {}

  @Post('tts')
  @HttpCode(HttpStatus.OK)
  @UseGuards(ApiKeyAuthGuard)
  async synthesize(
    @Req() request: AuthenticatedRequest,
    @Body() body: SynthesizeBody | undefined,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<Buffer> {
    const apiKey = this.requireApiKey(request);

    try {
      const outcome = await this.gatewayService.synthesize(
        apiKey,
        { text: body?.text, voiceId: body?.voice_id },
        { endpoint: requestPath(request), ip: request.ip },
      );

      this.applyRateLimitHeaders(reply, outcome.rateLimit);
      reply.header('content-type', outcome.contentType);
      reply.header('cache-control', 'private, max-age=3600');
      reply.header('x-voice-id', outcome.voice.id);
      reply.header('x-character-count', String(outcome.characters));
      reply.header('x-processing-time', String(outcome.processingMs));
      reply.header('x-usage-count', String(outcome.usage.usageCount));
      reply.header('x-cache', outcome.cached ? 'HIT' : 'MISS');
      if (outcome.quotaRemaining !== null) {
        reply.header('x-quota-remaining', String(outcome.quotaRemaining));
      }

      return outcome.audio;
    } catch (error) {
      if (error instanceof RateLimitExceededError) {
        reply.header('x-ratelimit-limit', String(error.limit));
        reply.header('x-ratelimit-remaining', '0');
        reply.header('retry-after', String(error.retryAfterSeconds));
      }
      throw error;
    }
  }

  @Get('voices')
  listVoices(): ReturnType<GatewayService['listVoices']> {
    return this.gatewayService.listVoices();
  }

  @Get('usage')
  @UseGuards(ApiKeyAuthGuard)
  async usage(@Req() request: AuthenticatedRequest): Promise<UsageSnapshot> {
    return this.gatewayService.describeUsage(this.requireApiKey(request));
  }

  private requireApiKey(request: AuthenticatedRequest): ApiKey {
    // The guard attaches the key; a route without it is a wiring mistake.
    if (!request.apiKey) {
      throw new AuthenticationError();
    }
    return request.apiKey;
  }

  private applyRateLimitHeaders(reply: FastifyReply, rateLimit: RateLimitResult): void {
    reply.header('x-ratelimit-limit', String(rateLimit.limit));
    reply.header('x-ratelimit-remaining', String(rateLimit.remaining));
    reply.header('x-ratelimit-reset', String(rateLimit.resetAt));
  }
}
