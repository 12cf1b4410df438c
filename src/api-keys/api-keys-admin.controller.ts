import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Logger,
  Param,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';

import { firstHeader, RequestWithAdminIdentity } from '../common/request';
import { UsageRecord, UsageSummary } from '../usage/types';
import { UsageLedgerService } from '../usage/usage-ledger.service';
import { AdminAuthGuard } from './admin-auth.guard';
import { ApiKeysService } from './api-keys.service';
import { isPlanId, PLANS } from './plans';
import { ApiKey, ApiKeyRecord, CreateApiKeyInput } from './types';

type CreateApiKeyBody = {
  name?: unknown;
  owner?: unknown;
  plan?: unknown;
  rateLimitPerMinute?: unknown;
  totalQuota?: unknown;
  monthlyCharacterQuota?: unknown;
  createdBy?: unknown;
};

type AdminAction = 'create' | 'list' | 'get' | 'revoke' | 'usage' | 'summary';

// Everything but the hash; the secret itself is never stored.
type ApiKeyView = Omit<ApiKey, 'hash'>;

const DEFAULT_HISTORY_LIMIT = 50;
const MAX_HISTORY_LIMIT = 500;
const DEFAULT_TOP_N = 5;
const MAX_TOP_N = 50;

@Controller('internal')
@UseGuards(AdminAuthGuard)
export class ApiKeysAdminController {
  private readonly logger = new Logger(ApiKeysAdminController.name);

  constructor(
    private readonly apiKeysService: ApiKeysService,
    private readonly usageLedger: UsageLedgerService,
  ) {}

  @Post('api-keys')
  async create(
    @Req() request: RequestWithAdminIdentity,
    @Body() body: CreateApiKeyBody | undefined,
  ): Promise<{ apiKey: string; key: Omit<ApiKeyRecord, 'hash'> }> {
    const input = this.parseCreateBody(body, request.adminIdentity);

    try {
      const { apiKey, record } = await this.apiKeysService.createApiKey(input);
      this.audit(request, 'create', 'ok', {
        keyId: record.keyId,
        plan: record.plan,
      });

      const { hash: _hash, ...key } = record;
      return { apiKey, key };
    } catch (error) {
      this.audit(request, 'create', 'error', {
        name: input.name,
        reason: this.errorReason(error),
      });
      throw error;
    }
  }

  @Get('api-keys')
  async list(@Req() request: RequestWithAdminIdentity): Promise<{ items: ApiKeyView[] }> {
    try {
      const items = await this.apiKeysService.listApiKeys();
      this.audit(request, 'list', 'ok', { count: items.length });

      return { items: items.map((item) => this.toView(item)) };
    } catch (error) {
      this.audit(request, 'list', 'error', { reason: this.errorReason(error) });
      throw error;
    }
  }

  @Get('api-keys/:keyId')
  async get(
    @Req() request: RequestWithAdminIdentity,
    @Param('keyId') keyId: string,
  ): Promise<ApiKeyView> {
    const parsedKeyId = this.parseKeyId(keyId);

    try {
      const key = await this.apiKeysService.getApiKey(parsedKeyId);
      this.audit(request, 'get', 'ok', { keyId: parsedKeyId });
      return this.toView(key);
    } catch (error) {
      this.audit(request, 'get', 'error', {
        keyId: parsedKeyId,
        reason: this.errorReason(error),
      });
      throw error;
    }
  }

  @Post('api-keys/:keyId/revoke')
  async revoke(
    @Req() request: RequestWithAdminIdentity,
    @Param('keyId') keyId: string,
  ): Promise<{ ok: true }> {
    const parsedKeyId = this.parseKeyId(keyId);

    try {
      await this.apiKeysService.revokeApiKey(parsedKeyId);
      this.audit(request, 'revoke', 'ok', { keyId: parsedKeyId });
      return { ok: true };
    } catch (error) {
      this.audit(request, 'revoke', 'error', {
        keyId: parsedKeyId,
        reason: this.errorReason(error),
      });
      throw error;
    }
  }

  @Get('api-keys/:keyId/usage')
  async usage(
    @Req() request: RequestWithAdminIdentity,
    @Param('keyId') keyId: string,
    @Query('limit') limit?: string,
  ): Promise<{ key: ApiKeyView; records: UsageRecord[] }> {
    const parsedKeyId = this.parseKeyId(keyId);
    const parsedLimit = this.parseLimit(
      limit,
      DEFAULT_HISTORY_LIMIT,
      MAX_HISTORY_LIMIT,
      'limit',
    );

    try {
      const key = await this.apiKeysService.getApiKey(parsedKeyId);
      const records = await this.usageLedger.listForKey(parsedKeyId, parsedLimit);
      this.audit(request, 'usage', 'ok', { keyId: parsedKeyId, count: records.length });
      return { key: this.toView(key), records };
    } catch (error) {
      this.audit(request, 'usage', 'error', {
        keyId: parsedKeyId,
        reason: this.errorReason(error),
      });
      throw error;
    }
  }

  @Get('usage/summary')
  async summary(
    @Req() request: RequestWithAdminIdentity,
    @Query('top') top?: string,
  ): Promise<UsageSummary> {
    const topN = this.parseLimit(top, DEFAULT_TOP_N, MAX_TOP_N, 'top');

    try {
      const summary = await this.usageLedger.summarize(topN);
      this.audit(request, 'summary', 'ok', { totalRequests: summary.totalRequests });
      return summary;
    } catch (error) {
      this.audit(request, 'summary', 'error', { reason: this.errorReason(error) });
      throw error;
    }
  }

  private parseCreateBody(
    body: CreateApiKeyBody | undefined,
    adminIdentity: string | undefined,
  ): CreateApiKeyInput {
    const name = typeof body?.name === 'string' ? body.name.trim() : '';
    if (name.length === 0) {
      throw new BadRequestException('name is required');
    }

    const plan = body?.plan;
    if (plan !== undefined && plan !== null && !isPlanId(plan)) {
      throw new BadRequestException(`plan must be one of ${Object.keys(PLANS).join(', ')}`);
    }

    return {
      name,
      owner: this.optionalString(body?.owner, 'owner'),
      plan: isPlanId(plan) ? plan : undefined,
      rateLimitPerMinute: this.optionalInteger(
        body?.rateLimitPerMinute,
        'rateLimitPerMinute',
        1,
      ),
      totalQuota: this.optionalInteger(body?.totalQuota, 'totalQuota', 0),
      monthlyCharacterQuota: this.optionalInteger(
        body?.monthlyCharacterQuota,
        'monthlyCharacterQuota',
        0,
      ),
      createdBy: this.optionalString(body?.createdBy, 'createdBy') ?? adminIdentity,
    };
  }

  private parseKeyId(value: string): string {
    const normalized = value?.trim();
    if (!normalized) {
      throw new BadRequestException('keyId is required');
    }

    return normalized;
  }

  private parseLimit(
    value: string | undefined,
    fallback: number,
    max: number,
    fieldName: string,
  ): number {
    if (value === undefined || value.trim() === '') {
      return fallback;
    }

    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new BadRequestException(`${fieldName} must be a positive integer`);
    }

    return Math.min(parsed, max);
  }

  private optionalString(value: unknown, fieldName: string): string | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value !== 'string') {
      throw new BadRequestException(`${fieldName} must be a string`);
    }

    const normalized = value.trim();
    return normalized.length > 0 ? normalized : undefined;
  }

  private optionalInteger(value: unknown, fieldName: string, min: number): number | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new BadRequestException(`${fieldName} must be an integer`);
    }

    if (value < min) {
      throw new BadRequestException(`${fieldName} must be at least ${min}`);
    }

    return value;
  }

  private toView(key: ApiKey): ApiKeyView {
    const { hash: _hash, ...view } = key;
    return view;
  }

  private audit(
    request: RequestWithAdminIdentity,
    action: AdminAction,
    result: 'ok' | 'error',
    details?: Record<string, unknown>,
  ): void {
    const requestId = firstHeader(request.headers['x-request-id']);
    const payload = {
      event: 'admin_api_key_audit',
      action,
      result,
      adminIdentity: request.adminIdentity ?? 'unknown',
      ip: request.ip ?? 'unknown',
      requestId: requestId ?? null,
      ...details,
    };

    if (result === 'error') {
      this.logger.warn(JSON.stringify(payload));
      return;
    }

    this.logger.log(JSON.stringify(payload));
  }

  private errorReason(error: unknown): string {
    if (error instanceof Error) {
      return error.name;
    }
    return 'UnknownError';
  }
}
