export type RateLimitResult = {
  allowed: boolean;
  limit: number;
  remaining: number;
  // Seconds until another request would be admitted.
  retryAfter: number;
  // Unix seconds when the current window frees up.
  resetAt: number;
};
