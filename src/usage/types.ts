export const USAGE_STATUSES = [
  'ok',
  'unauthorized',
  'rate_limited',
  'invalid_request',
  'forbidden',
  'quota_exceeded',
  'error',
] as const;

export type UsageStatus = (typeof USAGE_STATUSES)[number];

export type UsageRecord = {
  id: string;
  // Null when the request never authenticated.
  keyId: string | null;
  endpoint: string;
  status: UsageStatus;
  createdAt: string;
  characters: number;
  bytesOut: number;
  latencyMs: number;
  voice?: string;
  ip?: string;
  error?: string;
};

type UsageCounters = 'characters' | 'bytesOut' | 'latencyMs';

export type AppendUsageInput = Omit<UsageRecord, 'id' | 'createdAt' | UsageCounters> &
  Partial<Pick<UsageRecord, UsageCounters>>;

export type UsageSummary = {
  totalRequests: number;
  requestsByStatus: Record<UsageStatus, number>;
  charactersProcessed: number;
  bytesServed: number;
  requestsLast24h: number;
  topVoices: Array<{ voice: string; count: number }>;
  topKeys: Array<{ keyId: string; count: number }>;
};
