import type { RateLimitAction, RateLimitWindows } from "./user-store.types.js";

export type RateLimitRule = {
  windowMs: number;
  limit: number;
};

export type RateLimitConfig = Record<RateLimitAction, RateLimitRule>;

export const DEFAULT_RATE_LIMITS: RateLimitConfig = {
  command: { windowMs: 60_000, limit: 10 },
  feedAdd: { windowMs: 60 * 60_000, limit: 20 },
  digestRequest: { windowMs: 60 * 60_000, limit: 5 },
};

/**
 * Rate limit check result
 */
export type RateLimitDecision = { allowed: true } | { allowed: false; retryAfterMs: number };

/**
 * Sliding-window check for one action class.
 * Prunes expired timestamps in place and records `now` when the action is allowed.
 */
export function checkAndRecord(
  limits: RateLimitWindows,
  action: RateLimitAction,
  now: number,
  config: RateLimitConfig = DEFAULT_RATE_LIMITS,
): RateLimitDecision {
  const { windowMs, limit } = config[action];
  const recent = limits[action].filter((ts) => now - ts < windowMs);
  limits[action] = recent;

  if (recent.length < limit) {
    recent.push(now);
    return { allowed: true };
  }

  const oldest = recent[0] ?? now;
  return { allowed: false, retryAfterMs: Math.max(1, oldest + windowMs - now) };
}

/**
 * Seconds to show in a "try again" reply
 */
export function retryAfterSeconds(retryAfterMs: number): number {
  return Math.max(1, Math.ceil(retryAfterMs / 1000));
}
