import type { UserState } from "../telegram/user-store.js";
import type { SubscriptionTier, UserRecord } from "../telegram/user-store.types.js";
import type { SubscriptionEvent } from "./stripe-webhook.js";
import { isAdmin } from "../telegram/owner-config.js";
import { applySubscriptionMutation, formatTierName, TIER_LIMITS } from "../telegram/user-tiers.js";

export type SubscriptionEventOutcome =
  | { status: "applied"; userId: string; changed: boolean; notice: string | null }
  | { status: "ignored"; reason: string };

// Billing period assumed when the event carries no period end
const DEFAULT_PERIOD_MS = 30 * 24 * 60 * 60 * 1000;

export type SubscriptionEventOptions = {
  adminIds?: readonly string[];
};

const PAYMENT_FAILED_NOTICE = [
  "⚠️ <b>Payment Failed</b>",
  "",
  "We couldn't process your subscription payment.",
  "Please update your payment method to avoid service interruption.",
  "",
  "Use /manage to update your billing info.",
].join("\n");

export function formatActivatedNotice(tier: SubscriptionTier): string {
  const limits = TIER_LIMITS[tier];
  return [
    "🎉 <b>Subscription Activated!</b>",
    "",
    `You're now on the <b>${formatTierName(tier)}</b> plan.`,
    `• Max feeds: ${limits.maxFeeds}`,
    `• AI summaries: ${limits.aiSummaries ? "✅" : "❌"}`,
    "",
    "Enjoy your enhanced digest experience!",
  ].join("\n");
}

export function formatCancelledNotice(): string {
  return [
    "😢 <b>Subscription Cancelled</b>",
    "",
    "Your subscription has ended. You've been moved to the free plan.",
    `• Max feeds: ${TIER_LIMITS.free.maxFeeds}`,
    "• AI summaries: ❌",
    "",
    "Use /upgrade anytime to resubscribe!",
  ].join("\n");
}

/**
 * Customer id first; the chat id from checkout metadata covers first purchases
 */
function resolveTarget(
  state: UserState,
  event: SubscriptionEvent,
): { userId: string; record: UserRecord } | undefined {
  if (event.customerId) {
    const byCustomer = state.findByCustomerId(event.customerId);
    if (byCustomer) {
      return byCustomer;
    }
  }
  if (event.userId) {
    const record = state.get(event.userId);
    if (record) {
      return { userId: event.userId, record };
    }
  }
  return undefined;
}

/**
 * Apply a verified billing event to the in-memory state. The caller saves and
 * delivers the returned notice.
 */
export function applySubscriptionEvent(
  state: UserState,
  event: SubscriptionEvent,
  now: number,
  options: SubscriptionEventOptions = {},
): SubscriptionEventOutcome {
  const target = resolveTarget(state, event);
  if (!target) {
    return { status: "ignored", reason: "unmatched" };
  }
  const { userId, record } = target;

  switch (event.type) {
    case "checkout.session.completed": {
      if (!event.tier) {
        return { status: "ignored", reason: "missing tier" };
      }
      const changed = applySubscriptionMutation(record, {
        kind: "upgrade",
        tier: event.tier,
        customerId: event.customerId,
        subscriptionId: event.subscriptionId,
        expiresAt: event.expiresAt ?? now + DEFAULT_PERIOD_MS,
      });
      // Redelivered events do not notify twice
      return {
        status: "applied",
        userId,
        changed,
        notice: changed ? formatActivatedNotice(event.tier) : null,
      };
    }
    case "customer.subscription.updated": {
      if (event.status !== "active" || !event.tier) {
        return { status: "ignored", reason: `subscription status ${event.status ?? "unknown"}` };
      }
      const changed = applySubscriptionMutation(record, {
        kind: "upgrade",
        tier: event.tier,
        customerId: event.customerId,
        subscriptionId: event.subscriptionId,
        expiresAt: event.expiresAt ?? now + DEFAULT_PERIOD_MS,
      });
      // Renewals are silent
      return { status: "applied", userId, changed, notice: null };
    }
    case "customer.subscription.deleted": {
      if (isAdmin(userId, options.adminIds ?? [])) {
        return { status: "ignored", reason: "privileged user" };
      }
      const current = record.subscription.subscriptionId;
      if (current && event.subscriptionId && current !== event.subscriptionId) {
        return { status: "ignored", reason: "stale subscription" };
      }
      const changed = applySubscriptionMutation(record, { kind: "downgrade", reason: "cancelled" });
      return { status: "applied", userId, changed, notice: changed ? formatCancelledNotice() : null };
    }
    case "invoice.payment_failed":
      return { status: "applied", userId, changed: false, notice: PAYMENT_FAILED_NOTICE };
    default: {
      const _exhaustive: never = event.type;
      return _exhaustive;
    }
  }
}
