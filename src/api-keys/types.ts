import type { PlanId } from './plans';

export type ApiKeyStatus = 'active' | 'revoked';

/** Persisted key configuration. Counters live in separate Redis keys. */
export type ApiKeyRecord = {
  keyId: string;
  hash: string;
  prefix: string;
  name: string;
  owner?: string;
  plan: PlanId;
  rateLimitPerMinute: number;
  // 0 means unlimited for both quotas.
  totalQuota: number;
  monthlyCharacterQuota: number;
  status: ApiKeyStatus;
  createdAt: string;
  createdBy?: string;
  revokedAt?: string;
};

export type ApiKeyUsage = {
  usageCount: number;
  charactersUsed: number;
  bytesOut: number;
  // Calendar month (YYYY-MM, UTC) the monthly counter belongs to.
  usageMonth: string;
  charactersUsedThisMonth: number;
  lastUsedAt?: string;
};

export type ApiKey = ApiKeyRecord & ApiKeyUsage;

export type CreateApiKeyInput = {
  name: string;
  owner?: string;
  plan?: PlanId;
  rateLimitPerMinute?: number;
  totalQuota?: number;
  monthlyCharacterQuota?: number;
  createdBy?: string;
};

export type CreateApiKeyResult = {
  apiKey: string;
  record: ApiKeyRecord;
};

export type RecordUsageInput = {
  characters: number;
  bytesOut: number;
};
