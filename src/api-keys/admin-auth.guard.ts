import { timingSafeEqual } from 'node:crypto';

import {
  CanActivate,
  ExecutionContext,
  HttpException,
  Injectable,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FastifyReply } from 'fastify';

import { RateLimitExceededError } from '../common/errors';
import { extractBearerToken, RequestWithAdminIdentity } from '../common/request';
import { RateLimitService } from '../rate-limit/rate-limit.service';
import { hashKeyForLogging } from '../utils/hash';

/** Single configured admin bearer token, compared in constant time and throttled per IP. */
@Injectable()
export class AdminAuthGuard implements CanActivate {
  constructor(
    private readonly configService: ConfigService,
    private readonly rateLimitService: RateLimitService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<RequestWithAdminIdentity>();
    const reply = context.switchToHttp().getResponse<FastifyReply>();
    const configuredToken = this.configService.get<string>('ADMIN_API_TOKEN') ?? '';
    if (configuredToken.length === 0) {
      throw new UnauthorizedException('Admin token is not configured');
    }

    const token = extractBearerToken(request);

    try {
      const rateLimit = await this.rateLimitService.consumeAdminLimit(request.ip, token);
      if (!rateLimit.allowed) {
        reply.header('retry-after', String(rateLimit.retryAfter));
        throw new RateLimitExceededError(rateLimit.limit, rateLimit.retryAfter);
      }
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      throw new ServiceUnavailableException('Rate limit backend unavailable');
    }

    if (!token || !this.safeEquals(token, configuredToken)) {
      throw new UnauthorizedException('Invalid admin token');
    }

    request.adminIdentity = `token:${hashKeyForLogging(token)}`;
    return true;
  }

  private safeEquals(candidate: string, expected: string): boolean {
    const left = Buffer.from(candidate);
    const right = Buffer.from(expected);
    if (left.length !== right.length) {
      return false;
    }

    return timingSafeEqual(left, right);
  }
}
