import type { UserRecord } from "./user-store.types.js";
import type { RateLimitConfig } from "./rate-limit.js";
import { checkAndRecord, retryAfterSeconds } from "./rate-limit.js";

export const BLOCKED_REPLY = "⛔ Your access to this bot has been suspended.";
export const DEFAULT_MAX_FAILED_ATTEMPTS = 20;
const AUTO_BLOCK_REASON = "Too many unauthorized attempts.";

/**
 * Access check result
 */
export type AccessCheckResult =
  | { allowed: true }
  | { allowed: false; reason: "blocked" }
  | { allowed: false; reason: "rate_limited"; retryAfterMs: number };

export type AccessCheckOptions = {
  privileged: boolean;
  rateLimits: RateLimitConfig;
};

/**
 * Gate one incoming command.
 * Blocked users are rejected before their rate-limit budget is touched.
 */
export function checkCommandAccess(
  record: UserRecord,
  now: number,
  options: AccessCheckOptions,
): AccessCheckResult {
  if (record.security.blocked) {
    return { allowed: false, reason: "blocked" };
  }

  // Owner and admins bypass rate limits
  if (options.privileged) {
    return { allowed: true };
  }

  const decision = checkAndRecord(record.rateLimits, "command", now, options.rateLimits);
  if (!decision.allowed) {
    return { allowed: false, reason: "rate_limited", retryAfterMs: decision.retryAfterMs };
  }
  return { allowed: true };
}

/**
 * Count an unauthorized attempt; blocks the user once the threshold is reached.
 * Returns true when this call blocked the user.
 */
export function recordSecurityViolation(
  record: UserRecord,
  maxFailedAttempts: number = DEFAULT_MAX_FAILED_ATTEMPTS,
): boolean {
  record.security.failedAttempts += 1;
  if (!record.security.blocked && record.security.failedAttempts >= maxFailedAttempts) {
    blockUser(record, AUTO_BLOCK_REASON);
    return true;
  }
  return false;
}

export function blockUser(record: UserRecord, reason: string): void {
  record.security.blocked = true;
  record.security.blockReason = reason;
}

/**
 * Lift a block and reset the failed-attempt counter
 */
export function unblockUser(record: UserRecord): void {
  record.security.blocked = false;
  record.security.blockReason = null;
  record.security.failedAttempts = 0;
}

/**
 * Format access denied message
 */
export function formatAccessDeniedMessage(result: AccessCheckResult): string {
  if (result.allowed) {
    return "";
  }

  switch (result.reason) {
    case "blocked":
      return BLOCKED_REPLY;
    case "rate_limited":
      return `⚠️ Slow down! Too many commands. Try again in ${retryAfterSeconds(result.retryAfterMs)} seconds.`;
    default: {
      const _exhaustive: never = result;
      return _exhaustive;
    }
  }
}
