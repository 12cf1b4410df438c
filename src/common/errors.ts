import { HttpException, HttpStatus, UnauthorizedException } from '@nestjs/common';

export type QuotaDimension = 'requests' | 'monthly_characters';

/** Missing, unknown and revoked keys all surface as this one error. */
export class AuthenticationError extends UnauthorizedException {
  constructor() {
    super('Invalid API key');
  }
}

export class RateLimitExceededError extends HttpException {
  constructor(
    readonly limit: number,
    readonly retryAfterSeconds: number,
  ) {
    super(
      {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        message: 'Rate limit exceeded',
        limit,
        retryAfterSeconds,
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}

export class QuotaExceededError extends HttpException {
  constructor(
    readonly dimension: QuotaDimension,
    readonly quota: number,
    readonly used: number,
    readonly requested = 1,
  ) {
    super(
      {
        statusCode: HttpStatus.PAYMENT_REQUIRED,
        message:
          dimension === 'requests' ? 'Request quota exceeded' : 'Monthly character quota exceeded',
        dimension,
        quota,
        used,
        requested,
      },
      HttpStatus.PAYMENT_REQUIRED,
    );
  }
}

export class VoiceNotAllowedError extends HttpException {
  constructor(
    readonly voice: string,
    readonly plan: string,
  ) {
    super(
      {
        statusCode: HttpStatus.FORBIDDEN,
        message: 'Voice requires a paid plan',
        voice,
        plan,
      },
      HttpStatus.FORBIDDEN,
    );
  }
}

/**
 * Synthesis failed or timed out. The cause is kept for operator logs only;
 * the response body never carries provider payloads.
 */
export class ProviderError extends HttpException {
  constructor(
    readonly reason: string,
    readonly timedOut = false,
    cause?: unknown,
  ) {
    super(
      {
        statusCode: timedOut ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.INTERNAL_SERVER_ERROR,
        message: timedOut ? 'Speech synthesis timed out' : 'Speech synthesis failed',
      },
      timedOut ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}

/** Generated key hash already claimed; retried with a fresh secret, never shown to callers. */
export class KeyCollisionError extends Error {
  constructor() {
    super('Generated API key hash already exists');
    this.name = 'KeyCollisionError';
  }
}
