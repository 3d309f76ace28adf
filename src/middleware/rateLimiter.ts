/**
 * Per-caller limit on ledger mutations, backed by Redis.
 *
 * Registrations, checks, completions, updates and role changes count
 * against the submitting identity over a sliding window. Reads are never
 * limited.
 *
 * @module middleware/rateLimiter
 */

import type { Redis } from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import type { RateLimitResult } from '../types/index.js';

// ─── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_MAX_REQUESTS = 60;

export const DEFAULT_WINDOW_SECONDS = 60;

/** Key prefix used in Redis to namespace rate-limit keys. */
export const RATE_LIMIT_PREFIX = 'rl:';

/** The part of the Redis client the limiter needs. */
export type RateLimitClient = Pick<Redis, 'eval'>;

/**
 * Build a rate-limit key for ledger mutations submitted by one caller.
 */
export function callerMutationKey(caller: string): string {
  return `${RATE_LIMIT_PREFIX}ledger:${caller}`;
}

// ─── Caller window ───────────────────────────────────────────────────────────

/**
 * One sorted set per caller, scored by submission time in ms. Runs as a
 * single script so concurrent submissions from the same caller cannot both
 * take the last slot. Replies with the number of mutations the caller had
 * in the window before this one; a refused mutation is not recorded.
 *
 * KEYS[1] caller key; ARGV: window start, limit, now, member, window seconds.
 */
export const CALLER_WINDOW_SCRIPT = `
  redis.call('ZREMRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
  local submitted = redis.call('ZCARD', KEYS[1])
  if submitted < tonumber(ARGV[2]) then
    redis.call('ZADD', KEYS[1], ARGV[3], ARGV[4])
  end
  redis.call('EXPIRE', KEYS[1], ARGV[5])
  return submitted
`;

/**
 * Admit or refuse one ledger mutation for the caller behind `key`.
 * `resetAt` is when a refused caller may submit again at the latest.
 */
export async function checkLimit(
  redis: RateLimitClient,
  key: string,
  limit: number = DEFAULT_MAX_REQUESTS,
  windowSeconds: number = DEFAULT_WINDOW_SECONDS,
): Promise<RateLimitResult> {
  const now = Date.now();
  const windowMs = windowSeconds * 1000;
  const submitted = Number(
    await redis.eval(
      CALLER_WINDOW_SCRIPT,
      1,
      key,
      String(now - windowMs),
      String(limit),
      String(now),
      `${now}:${uuidv4()}`,
      String(windowSeconds),
    ),
  );

  const allowed = submitted < limit;
  return {
    allowed,
    remaining: allowed ? Math.max(limit - submitted - 1, 0) : 0,
    resetAt: new Date(now + windowMs),
  };
}
