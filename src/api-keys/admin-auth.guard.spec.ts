import { ExecutionContext, HttpStatus, UnauthorizedException } from '@nestjs/common';

import { buildConfigService } from '../../test/stubs';
import { RateLimitExceededError } from '../common/errors';
import { RateLimitService } from '../rate-limit/rate-limit.service';
import { hashKeyForLogging } from '../utils/hash';
import { AdminAuthGuard } from './admin-auth.guard';

describe('AdminAuthGuard', () => {
  const adminToken = 'test-admin-token';
  let header: jest.Mock;
  let consumeAdminLimit: jest.Mock;
  let guard: AdminAuthGuard;

  const buildContext = (request: Record<string, unknown>): ExecutionContext =>
    ({
      switchToHttp: () => ({
        getRequest: () => request,
        getResponse: () => ({ header }),
      }),
    }) as unknown as ExecutionContext;

  beforeEach(() => {
    header = jest.fn();
    consumeAdminLimit = jest.fn().mockResolvedValue({ allowed: true, limit: 120, retryAfter: 1 });
    guard = new AdminAuthGuard(
      buildConfigService({ ADMIN_API_TOKEN: adminToken }),
      { consumeAdminLimit } as unknown as RateLimitService,
    );
  });

  it('sets hashed adminIdentity on successful auth', async () => {
    const request: Record<string, unknown> = {
      ip: '203.0.113.9',
      headers: { authorization: `Bearer ${adminToken}` },
    };

    await expect(guard.canActivate(buildContext(request))).resolves.toBe(true);
    expect(request.adminIdentity).toBe(`token:${hashKeyForLogging(adminToken)}`);
    expect(consumeAdminLimit).toHaveBeenCalledWith('203.0.113.9', adminToken);
  });

  it('rejects invalid bearer token and does not set adminIdentity', async () => {
    const request: Record<string, unknown> = {
      ip: '203.0.113.9',
      headers: { authorization: 'Bearer invalid-token' },
    };

    await expect(guard.canActivate(buildContext(request))).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
    expect(request.adminIdentity).toBeUndefined();
  });

  it('rejects api keys presented as admin credentials', async () => {
    const request: Record<string, unknown> = {
      ip: '203.0.113.9',
      headers: { 'x-api-key': adminToken },
    };

    await expect(guard.canActivate(buildContext(request))).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
    expect(consumeAdminLimit).toHaveBeenCalledWith('203.0.113.9', null);
  });

  it('refuses every request when no admin token is configured', async () => {
    const unconfigured = new AdminAuthGuard(
      buildConfigService({ ADMIN_API_TOKEN: '' }),
      { consumeAdminLimit } as unknown as RateLimitService,
    );

    await expect(
      unconfigured.canActivate(buildContext({ headers: { authorization: 'Bearer ' } })),
    ).rejects.toThrow('Admin token is not configured');
    expect(consumeAdminLimit).not.toHaveBeenCalled();
  });

  it('throttles before comparing the token', async () => {
    consumeAdminLimit.mockResolvedValueOnce({ allowed: false, limit: 120, retryAfter: 17 });

    const failure = guard.canActivate(
      buildContext({ ip: '203.0.113.9', headers: { authorization: `Bearer ${adminToken}` } }),
    );

    await expect(failure).rejects.toBeInstanceOf(RateLimitExceededError);
    await failure.catch((error: RateLimitExceededError) => {
      expect(error.getStatus()).toBe(HttpStatus.TOO_MANY_REQUESTS);
    });
    expect(header).toHaveBeenCalledWith('retry-after', '17');
  });

  it('maps unexpected throttle failures to 503', async () => {
    consumeAdminLimit.mockRejectedValueOnce(new Error('connection reset'));

    await expect(
      guard.canActivate(
        buildContext({ ip: '203.0.113.9', headers: { authorization: `Bearer ${adminToken}` } }),
      ),
    ).rejects.toThrow('Rate limit backend unavailable');
  });

  it('parses the bearer header the same way as client keys', async () => {
    const request: Record<string, unknown> = {
      ip: '203.0.113.9',
      headers: { authorization: `  bearer   ${adminToken}  ` },
    };

    await expect(guard.canActivate(buildContext(request))).resolves.toBe(true);
    expect(consumeAdminLimit).toHaveBeenCalledWith('203.0.113.9', adminToken);
  });
});
