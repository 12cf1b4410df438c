import type { ApiKey } from '../api-keys/types';
import {
  allowsCharacters,
  allowsRequest,
  charactersUsedInMonth,
  checkQuota,
  currentUsageMonth,
  remainingRequests,
} from './quota';

const buildKey = (overrides?: Partial<ApiKey>): ApiKey => ({
  keyId: 'key-1',
  hash: 'hash-1',
  prefix: 'tts_abcd',
  name: 'quota-test',
  plan: 'free',
  rateLimitPerMinute: 20,
  totalQuota: 0,
  monthlyCharacterQuota: 0,
  status: 'active',
  createdAt: '2026-03-01T00:00:00.000Z',
  usageCount: 0,
  charactersUsed: 0,
  bytesOut: 0,
  usageMonth: '2026-03',
  charactersUsedThisMonth: 0,
  ...(overrides ?? {}),
});

describe('currentUsageMonth', () => {
  it('formats the UTC calendar month', () => {
    expect(currentUsageMonth(new Date('2026-03-31T23:59:59.000Z'))).toBe('2026-03');
    expect(currentUsageMonth(new Date('2026-04-01T00:00:00.000Z'))).toBe('2026-04');
  });
});

describe('allowsRequest', () => {
  it('never blocks unlimited keys', () => {
    expect(allowsRequest({ totalQuota: 0, usageCount: 1_000_000 })).toBe(true);
  });

  it('allows until usage reaches the quota', () => {
    expect(allowsRequest({ totalQuota: 3, usageCount: 2 })).toBe(true);
    expect(allowsRequest({ totalQuota: 3, usageCount: 3 })).toBe(false);
  });
});

describe('monthly characters', () => {
  it('counts a snapshot from another month as empty', () => {
    const key = { usageMonth: '2026-02', charactersUsedThisMonth: 9_000 };

    expect(charactersUsedInMonth(key, '2026-03')).toBe(0);
    expect(charactersUsedInMonth(key, '2026-02')).toBe(9_000);
  });

  it('includes the requested characters in the comparison', () => {
    const key = {
      monthlyCharacterQuota: 100,
      usageMonth: '2026-03',
      charactersUsedThisMonth: 90,
    };

    expect(allowsCharacters(key, 10, '2026-03')).toBe(true);
    expect(allowsCharacters(key, 11, '2026-03')).toBe(false);
    expect(allowsCharacters(key, 11, '2026-04')).toBe(true);
  });
});

describe('checkQuota', () => {
  it('reports the request dimension first', () => {
    const key = buildKey({
      totalQuota: 2,
      usageCount: 2,
      monthlyCharacterQuota: 10,
      charactersUsedThisMonth: 10,
    });

    expect(checkQuota(key, 5, '2026-03')).toEqual({
      allowed: false,
      dimension: 'requests',
      quota: 2,
      used: 2,
      requested: 1,
    });
  });

  it('reports the monthly character dimension', () => {
    const key = buildKey({ monthlyCharacterQuota: 10, charactersUsedThisMonth: 8 });

    expect(checkQuota(key, 5, '2026-03')).toEqual({
      allowed: false,
      dimension: 'monthly_characters',
      quota: 10,
      used: 8,
      requested: 5,
    });
  });

  it('allows requests within both ceilings', () => {
    expect(checkQuota(buildKey({ totalQuota: 5, usageCount: 4 }), 50, '2026-03')).toEqual({
      allowed: true,
    });
  });
});

describe('remainingRequests', () => {
  it('returns null for unlimited keys', () => {
    expect(remainingRequests({ totalQuota: 0, usageCount: 7 })).toBeNull();
  });

  it('never goes below zero', () => {
    expect(remainingRequests({ totalQuota: 3, usageCount: 1 })).toBe(2);
    expect(remainingRequests({ totalQuota: 3, usageCount: 5 })).toBe(0);
  });
});
