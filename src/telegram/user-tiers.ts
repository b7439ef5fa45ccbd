import type { SubscriptionTier, UserRecord } from "./user-store.types.js";
import { SUBSCRIPTION_TIERS } from "./user-store.types.js";

/**
 * Tier limits configuration
 */
export type TierLimits = {
  maxFeeds: number;
  aiSummaries: boolean;
  priceMonthly: number; // USD
};

export const TIER_LIMITS: Readonly<Record<SubscriptionTier, TierLimits>> = {
  free: { maxFeeds: 3, aiSummaries: false, priceMonthly: 0 },
  basic: { maxFeeds: 15, aiSummaries: true, priceMonthly: 5 },
  pro: { maxFeeds: 50, aiSummaries: true, priceMonthly: 10 },
};

export type Capabilities = {
  maxFeeds: number;
  aiSummariesEnabled: boolean;
};

export type CapabilityOptions = {
  // Owner/admin chat ids get pro limits regardless of the stored tier
  privileged?: boolean;
};

/**
 * A tier change approved by the subscription policy
 */
export type SubscriptionMutation =
  | {
      kind: "upgrade";
      tier: SubscriptionTier;
      customerId?: string | null;
      subscriptionId?: string | null;
      expiresAt?: number | null;
    }
  | { kind: "downgrade"; reason: "expired" | "cancelled" };

export type SubscriptionEvaluation = {
  capabilities: Capabilities;
  mutation: SubscriptionMutation | null;
};

export function isTier(value: unknown): value is SubscriptionTier {
  return typeof value === "string" && SUBSCRIPTION_TIERS.some((tier) => tier === value);
}

/**
 * Negative when `a` is lower than `b`
 */
export function compareTiers(a: SubscriptionTier, b: SubscriptionTier): number {
  return SUBSCRIPTION_TIERS.indexOf(a) - SUBSCRIPTION_TIERS.indexOf(b);
}

function toCapabilities(tier: SubscriptionTier): Capabilities {
  const limits = TIER_LIMITS[tier];
  return { maxFeeds: limits.maxFeeds, aiSummariesEnabled: limits.aiSummaries };
}

/**
 * Check if a paid subscription has run past its expiry
 */
export function isExpired(record: UserRecord, now: number): boolean {
  const { tier, expiresAt } = record.subscription;
  if (tier === "free") {
    return false;
  }
  return expiresAt !== null && expiresAt !== undefined && expiresAt <= now;
}

/**
 * Tier the user is effectively on right now
 */
export function effectiveTier(
  record: UserRecord,
  now: number,
  options: CapabilityOptions = {},
): SubscriptionTier {
  if (options.privileged) {
    return "pro";
  }
  return isExpired(record, now) ? "free" : record.subscription.tier;
}

export function capabilities(
  record: UserRecord,
  now: number,
  options: CapabilityOptions = {},
): Capabilities {
  return toCapabilities(effectiveTier(record, now, options));
}

/**
 * Pure expiry check. Callers apply the returned mutation before saving.
 */
export function evaluateSubscription(
  record: UserRecord,
  now: number,
  options: CapabilityOptions = {},
): SubscriptionEvaluation {
  return {
    capabilities: capabilities(record, now, options),
    mutation: isExpired(record, now) ? { kind: "downgrade", reason: "expired" } : null,
  };
}

/**
 * Apply a tier change in place. Returns true when the record changed.
 */
export function applySubscriptionMutation(
  record: UserRecord,
  mutation: SubscriptionMutation,
): boolean {
  const subscription = record.subscription;
  const before = JSON.stringify([subscription, record.feeds.length]);

  switch (mutation.kind) {
    case "upgrade": {
      subscription.tier = mutation.tier;
      if (mutation.customerId) {
        subscription.customerId = mutation.customerId;
      }
      if (mutation.subscriptionId !== undefined) {
        subscription.subscriptionId = mutation.subscriptionId;
      }
      if (mutation.expiresAt !== undefined) {
        subscription.expiresAt = mutation.expiresAt;
      }
      break;
    }
    case "downgrade": {
      subscription.tier = "free";
      subscription.subscriptionId = null;
      subscription.expiresAt = null;
      // Oldest feeds are kept
      const maxFeeds = TIER_LIMITS.free.maxFeeds;
      if (record.feeds.length > maxFeeds) {
        record.feeds = record.feeds.slice(0, maxFeeds);
      }
      break;
    }
    default: {
      const _exhaustive: never = mutation;
      return _exhaustive;
    }
  }

  return JSON.stringify([subscription, record.feeds.length]) !== before;
}

/**
 * Evaluate and apply lazy expiry. Returns true when the record was downgraded.
 */
export function applyLazyExpiry(record: UserRecord, now: number): boolean {
  const { mutation } = evaluateSubscription(record, now);
  if (!mutation) {
    return false;
  }
  return applySubscriptionMutation(record, mutation);
}

/**
 * Check if the stored subscription is paid and not expired
 */
export function isSubscriptionActive(record: UserRecord, now: number): boolean {
  return record.subscription.tier !== "free" && !isExpired(record, now);
}

/**
 * Format expiration date
 */
export function formatExpirationDate(timestamp: number | null | undefined): string | null {
  if (!timestamp) {
    return null;
  }
  return new Date(timestamp).toISOString().slice(0, 10); // YYYY-MM-DD
}

export function formatTierName(tier: SubscriptionTier): string {
  return tier.toUpperCase();
}
