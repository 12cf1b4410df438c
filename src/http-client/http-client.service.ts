import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { RequestInit } from 'undici';
import { Agent, fetch } from 'undici';

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  retries?: number;
  signal?: AbortSignal;
}

export interface HttpBinaryResponse {
  status: number;
  body: Buffer;
  contentType: string | null;
}

/** Non-2xx reply from the engine. Only a short excerpt of the body is kept for logs. */
export class UpstreamHttpError extends Error {
  constructor(
    readonly status: number,
    readonly responseExcerpt: string,
  ) {
    super(`Upstream request failed with status ${status}`);
    this.name = 'UpstreamHttpError';
  }
}

const RESPONSE_EXCERPT_LENGTH = 200;

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly logger = new Logger(HttpClientService.name);
  private readonly baseUrl: string;
  private readonly defaultTimeoutMs: number;
  private readonly defaultRetries: number;
  private readonly dispatcher: Agent;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('TTS_BACKEND_URL') ?? '';
    this.defaultTimeoutMs = this.normalizeTimeoutMs(
      this.configService.get('TTS_BACKEND_TIMEOUT'),
      30000,
    );
    this.defaultRetries = this.normalizeRetries(this.configService.get('TTS_BACKEND_RETRIES'), 1);
    this.dispatcher = new Agent({
      connections: 50,
      pipelining: 0,
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }

  /**
   * POST a JSON body and return the binary reply. Synthesis has no side
   * effects on the engine, so network failures and 5xx replies are retried;
   * 4xx replies and caller aborts are not.
   */
  async postForBinary(
    path: string,
    body: unknown,
    options?: HttpRequestOptions,
  ): Promise<HttpBinaryResponse> {
    const url = this.buildUrl(path);
    const timeoutMs = this.normalizeTimeoutMs(options?.timeoutMs, this.defaultTimeoutMs);
    const retries = this.normalizeRetries(options?.retries, this.defaultRetries);
    let lastError: unknown;

    for (let attempt = 0; attempt <= retries; attempt += 1) {
      try {
        return await this.executeRequest(url, body, options, timeoutMs);
      } catch (error) {
        lastError = error;

        if (attempt >= retries || !this.isRetryableError(error)) {
          break;
        }
        this.logger.warn(
          `HTTP POST ${url} failed (attempt ${attempt + 1}/${retries + 1}). Retrying.`,
        );
      }
    }

    if (lastError instanceof UpstreamHttpError) {
      this.logger.error(
        lastError.message,
        JSON.stringify({ url, status: lastError.status, responseBody: lastError.responseExcerpt }),
      );
    } else {
      const message = lastError instanceof Error ? lastError.message : 'Upstream request failed';
      this.logger.error(message, JSON.stringify({ url }));
    }

    throw lastError;
  }

  private async executeRequest(
    url: string,
    body: unknown,
    options: HttpRequestOptions | undefined,
    timeoutMs: number,
  ): Promise<HttpBinaryResponse> {
    const controller = new AbortController();
    const signal = this.attachAbortSignal(controller, options?.signal);

    const response = await this.fetchWithTimeout(
      url,
      {
        method: 'POST',
        headers: { ...(options?.headers ?? {}), 'content-type': 'application/json' },
        body: JSON.stringify(body),
        signal,
        dispatcher: this.dispatcher,
      },
      timeoutMs,
      controller,
    );

    const payload = Buffer.from(await response.arrayBuffer());
    if (!response.ok) {
      throw new UpstreamHttpError(
        response.status,
        payload.subarray(0, RESPONSE_EXCERPT_LENGTH).toString('utf8'),
      );
    }

    const contentType = response.headers.get('content-type') ?? '';
    return {
      status: response.status,
      body: payload,
      contentType: contentType.length > 0 ? contentType : null,
    };
  }

  private async fetchWithTimeout(
    url: string,
    init: RequestInit & { signal: AbortSignal },
    timeoutMs: number,
    controller: AbortController,
  ) {
    let timeoutId: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new Error('Request timed out'));
      }, timeoutMs);
    });

    try {
      return await Promise.race([fetch(url, init), timeoutPromise]);
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  private attachAbortSignal(controller: AbortController, signal?: AbortSignal): AbortSignal {
    if (!signal) {
      return controller.signal;
    }

    if (signal.aborted) {
      controller.abort();
      return controller.signal;
    }

    signal.addEventListener('abort', () => controller.abort(), { once: true });
    return controller.signal;
  }

  private buildUrl(path: string): string {
    if (path.startsWith('http://') || path.startsWith('https://') || path.startsWith('//')) {
      throw new Error('Absolute upstream URLs are not allowed');
    }

    if (!this.baseUrl) {
      throw new Error('TTS backend URL is not configured properly');
    }

    const baseUrl = new URL(this.baseUrl);
    if (baseUrl.pathname && baseUrl.pathname !== '/') {
      throw new Error('TTS backend URL must not include a path');
    }
    const url = new URL(path, baseUrl);

    if (url.origin !== baseUrl.origin) {
      throw new Error('Upstream path resolves outside the configured backend URL');
    }

    return url.toString();
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof UpstreamHttpError) {
      return error.status >= 500 && error.status < 600;
    }

    if (!(error instanceof Error)) {
      return false;
    }

    // Caller cancellations propagate immediately.
    return error.name !== 'AbortError';
  }

  private normalizeTimeoutMs(value: unknown, fallback: number): number {
    const candidate = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(candidate) || candidate <= 0) {
      return fallback;
    }
    return Math.floor(candidate);
  }

  private normalizeRetries(value: unknown, fallback: number): number {
    const candidate = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(candidate) || candidate < 0) {
      return fallback;
    }
    return Math.floor(candidate);
  }
}
