import { createHash, createHmac } from 'node:crypto';

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/**
 * Keyed digest used for stored API key hashes. The pepper never lives next to
 * the data, so a dump of the key index cannot be brute-forced offline.
 */
export function hmacSha256Hex(value: string, pepper: string): string {
  return createHmac('sha256', pepper).update(value).digest('hex');
}

export function hashKeyForLogging(key: string): string {
  // Short, stable digest for log lines; never log raw keys or secrets.
  return sha256Hex(key).substring(0, 32);
}
