import type { QuotaDimension } from '../common/errors';
import type { ApiKey } from '../api-keys/types';

export type QuotaDecision =
  | { allowed: true }
  | {
      allowed: false;
      dimension: QuotaDimension;
      quota: number;
      used: number;
      requested: number;
    };

/** Calendar month in UTC, e.g. "2026-03". Monthly counters are keyed by this string. */
export function currentUsageMonth(now: Date = new Date()): string {
  return now.toISOString().slice(0, 7);
}

export function allowsRequest(key: Pick<ApiKey, 'totalQuota' | 'usageCount'>): boolean {
  return key.totalQuota === 0 || key.usageCount < key.totalQuota;
}

/**
 * A snapshot taken in an earlier month counts as an empty month: rollover is
 * decided by month-string equality, never by elapsed time.
 */
export function charactersUsedInMonth(
  key: Pick<ApiKey, 'usageMonth' | 'charactersUsedThisMonth'>,
  month: string = currentUsageMonth(),
): number {
  return key.usageMonth === month ? key.charactersUsedThisMonth : 0;
}

export function allowsCharacters(
  key: Pick<ApiKey, 'monthlyCharacterQuota' | 'usageMonth' | 'charactersUsedThisMonth'>,
  requested: number,
  month: string = currentUsageMonth(),
): boolean {
  if (key.monthlyCharacterQuota === 0) {
    return true;
  }
  return charactersUsedInMonth(key, month) + requested <= key.monthlyCharacterQuota;
}

export function checkQuota(
  key: ApiKey,
  requestedCharacters: number,
  month: string = currentUsageMonth(),
): QuotaDecision {
  if (!allowsRequest(key)) {
    return {
      allowed: false,
      dimension: 'requests',
      quota: key.totalQuota,
      used: key.usageCount,
      requested: 1,
    };
  }

  if (!allowsCharacters(key, requestedCharacters, month)) {
    return {
      allowed: false,
      dimension: 'monthly_characters',
      quota: key.monthlyCharacterQuota,
      used: charactersUsedInMonth(key, month),
      requested: requestedCharacters,
    };
  }

  return { allowed: true };
}

export function remainingRequests(key: Pick<ApiKey, 'totalQuota' | 'usageCount'>): number | null {
  if (key.totalQuota === 0) {
    return null;
  }
  return Math.max(0, key.totalQuota - key.usageCount);
}
