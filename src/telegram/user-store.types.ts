/**
 * Subscription tiers, lowest first
 */
export const SUBSCRIPTION_TIERS = ["free", "basic", "pro"] as const;

export type SubscriptionTier = (typeof SUBSCRIPTION_TIERS)[number];

/**
 * Rate-limited action classes
 */
export type RateLimitAction = "command" | "feedAdd" | "digestRequest";

export type Subscription = {
  tier: SubscriptionTier;
  customerId?: string | null; // Stripe customer
  subscriptionId?: string | null; // Stripe subscription
  expiresAt?: number | null; // Unix timestamp (ms); null = never expires
  readonly createdAt: number; // Unix timestamp (ms)
};

export type SecurityState = {
  blocked: boolean;
  blockReason?: string | null;
  failedAttempts: number;
};

/**
 * Accepted-action timestamps (ms), oldest first
 */
export type RateLimitWindows = Record<RateLimitAction, number[]>;

/**
 * Complete user record, keyed by chat id in the state file
 */
export type UserRecord = {
  // Feeds (normalized URLs, insertion order)
  feeds: string[];

  // Scheduling
  digestTime: string; // HH:MM
  lastSentDate: string | null; // YYYY-MM-DD (UTC)
  lastDigestAt: number | null; // Unix timestamp (ms) of the last confirmed digest
  feedMarkers: Record<string, number>; // feed URL -> newest delivered post (ms)

  subscription: Subscription;
  rateLimits: RateLimitWindows;
  security: SecurityState;
};

/**
 * Persisted shape of a record (snake_case, ISO timestamps)
 */
export type UserRow = {
  feeds: string[];
  digest_time: string;
  last_sent_date: string | null;
  last_digest_at: string | null;
  feed_markers: Record<string, string>;
  subscription: {
    tier: SubscriptionTier;
    stripe_customer_id: string | null;
    stripe_subscription_id: string | null;
    expires_at: string | null;
    created_at: string;
  };
  rate_limits: {
    command_timestamps: number[];
    feed_add_timestamps: number[];
    digest_request_timestamps: number[];
  };
  security: {
    blocked: boolean;
    block_reason: string | null;
    failed_attempts: number;
  };
};

/**
 * Aggregate counts for the owner /stats command
 */
export type UserStateStats = {
  totalUsers: number;
  totalFeeds: number;
  byTier: Record<SubscriptionTier, number>;
  blocked: number;
};
