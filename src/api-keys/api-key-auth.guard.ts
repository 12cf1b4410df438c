import {
  CanActivate,
  ExecutionContext,
  HttpException,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';

import { AuthenticationError, RateLimitExceededError } from '../common/errors';
import { AuthenticatedRequest, extractApiKey, requestPath } from '../common/request';
import { RateLimitService } from '../rate-limit/rate-limit.service';
import { UsageLedgerService } from '../usage/usage-ledger.service';
import { ApiKeysService } from './api-keys.service';

/**
 * Resolves the presented secret to an active key and attaches it to the
 * request. Failed attempts are throttled per client IP and written to the
 * usage ledger before the 401 goes out.
 */
@Injectable()
export class ApiKeyAuthGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyAuthGuard.name);

  constructor(
    private readonly apiKeysService: ApiKeysService,
    private readonly rateLimitService: RateLimitService,
    private readonly usageLedger: UsageLedgerService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const reply = context.switchToHttp().getResponse<FastifyReply>();
    const rawApiKey = extractApiKey(request);

    try {
      const apiKey = await this.apiKeysService.authenticate(rawApiKey);
      if (apiKey) {
        request.apiKey = apiKey;
        return true;
      }

      const preAuthLimit = await this.rateLimitService.consumePreAuthLimit(request.ip, rawApiKey);
      reply.header('x-ratelimit-limit', String(preAuthLimit.limit));
      reply.header('x-ratelimit-remaining', String(preAuthLimit.remaining));
      reply.header('x-ratelimit-reset', String(preAuthLimit.resetAt));

      await this.recordRejection(
        request,
        preAuthLimit.allowed ? 'missing_or_invalid_key' : 'throttled',
      );

      if (!preAuthLimit.allowed) {
        reply.header('retry-after', String(preAuthLimit.retryAfter));
        throw new RateLimitExceededError(preAuthLimit.limit, preAuthLimit.retryAfter);
      }

      throw new AuthenticationError();
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      this.logger.error(
        `API key validation failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new ServiceUnavailableException('API access validation failed');
    }
  }

  private async recordRejection(request: AuthenticatedRequest, reason: string): Promise<void> {
    try {
      await this.usageLedger.append({
        keyId: null,
        endpoint: requestPath(request),
        status: 'unauthorized',
        ip: request.ip,
        error: reason,
      });
    } catch (error) {
      this.logger.warn(
        `Usage ledger append failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
