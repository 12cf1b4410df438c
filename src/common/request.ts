import type { FastifyRequest } from 'fastify';

import type { ApiKey } from '../api-keys/types';

export type AuthenticatedRequest = FastifyRequest & {
  apiKey?: ApiKey;
};

export type RequestWithAdminIdentity = FastifyRequest & {
  adminIdentity?: string;
};

export function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** Secret from `x-api-key`, else from `Authorization: Bearer`. Query strings are never read. */
export function extractApiKey(request: FastifyRequest): string | null {
  const headerKey = firstHeader(request.headers['x-api-key'])?.trim();
  if (headerKey) {
    return headerKey;
  }

  return extractBearerToken(request);
}

/** Token of an `Authorization: Bearer <token>` header; scheme is case-insensitive. */
export function extractBearerToken(request: FastifyRequest): string | null {
  const authorization = firstHeader(request.headers.authorization) ?? '';
  const [scheme, token, ...rest] = authorization.trim().split(/\s+/);
  if (!scheme || !token || rest.length > 0 || scheme.toLowerCase() !== 'bearer') {
    return null;
  }

  return token;
}

export function requestPath(request: FastifyRequest): string {
  return (request.url ?? '').split('?')[0] || '/';
}
