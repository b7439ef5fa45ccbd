import type { PaymentGateway } from "../billing/stripe.js";
import type { DigestBuilder } from "../digest/digest-builder.js";
import type { BotLogger } from "../logging.js";
import type { RateLimitConfig } from "./rate-limit.js";
import type { UserState, UserStateStore } from "./user-store.js";
import type { RateLimitAction, SubscriptionTier, UserRecord } from "./user-store.types.js";
import {
  PersistenceError,
  RateLimitError,
  SecurityViolation,
  ValidationError,
  describeError,
} from "../errors.js";
import { escapeHtml } from "../digest/format.js";
import { getChildLogger } from "../logging.js";
import {
  blockUser,
  checkCommandAccess,
  DEFAULT_MAX_FAILED_ATTEMPTS,
  formatAccessDeniedMessage,
  recordSecurityViolation,
  unblockUser,
  BLOCKED_REPLY,
} from "./access-control.js";
import { validateFeedUrl } from "./feed-url.js";
import { isAdmin, isChatId } from "./owner-config.js";
import { checkAndRecord, retryAfterSeconds } from "./rate-limit.js";
import { SUBSCRIPTION_TIERS } from "./user-store.types.js";
import {
  applyLazyExpiry,
  capabilities,
  compareTiers,
  effectiveTier,
  formatExpirationDate,
  formatTierName,
  isExpired,
  isSubscriptionActive,
  isTier,
  TIER_LIMITS,
} from "./user-tiers.js";

export const HELP_TEXT = [
  "👋 <b>Welcome to Feed Digest!</b>",
  "",
  "I send you a daily digest of new posts from your favorite Substacks and other RSS feeds.",
  "",
  "<b>Commands</b>",
  "/addfeed &lt;url&gt; - Add a feed",
  "/removefeed &lt;number|url&gt; - Remove a feed",
  "/feedlist - Show your feeds",
  "/digest - Get your digest now",
  "/status - Subscription status",
  "/upgrade - Upgrade your plan",
  "/manage - Manage billing",
  "/help - Show this message",
].join("\n");

export const UNKNOWN_COMMAND_REPLY = "Unknown command. Try /help for available commands.";
export const GENERIC_FAILURE_REPLY = "⚠️ Something went wrong. Please try again later.";
const RESTRICTED_REPLY = "⛔ This command is restricted.";
const PAYMENTS_DISABLED_REPLY = "💳 Payments are not configured yet.";

/**
 * Decoded chat command. Arguments are raw, trimmed text.
 */
export type ParsedCommand =
  | { kind: "start" }
  | { kind: "help" }
  | { kind: "feedlist" }
  | { kind: "addfeed"; url: string | null }
  | { kind: "removefeed"; target: string | null }
  | { kind: "digest" }
  | { kind: "status" }
  | { kind: "upgrade"; tier: string | null }
  | { kind: "manage" }
  | { kind: "block"; targetId: string | null; reason: string | null }
  | { kind: "unblock"; targetId: string | null }
  | { kind: "stats" }
  | { kind: "unknown"; name: string };

/**
 * Decode a message once. Plain text (no leading "/") yields null.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith("/")) {
    return null;
  }
  const [head = "", ...rest] = trimmed.split(/\s+/);
  // "/cmd@botname" is addressed to this bot in groups
  const name = head.slice(1).split("@")[0]?.toLowerCase() ?? "";
  const firstArg = rest[0] ?? null;

  switch (name) {
    case "start":
      return { kind: "start" };
    case "help":
      return { kind: "help" };
    case "feedlist":
      return { kind: "feedlist" };
    case "addfeed":
      return { kind: "addfeed", url: firstArg };
    case "removefeed":
      return { kind: "removefeed", target: rest.length > 0 ? rest.join(" ") : null };
    case "digest":
    case "dailydigest":
      return { kind: "digest" };
    case "status":
      return { kind: "status" };
    case "upgrade":
      return { kind: "upgrade", tier: firstArg?.toLowerCase() ?? null };
    case "manage":
      return { kind: "manage" };
    case "block":
      return {
        kind: "block",
        targetId: firstArg,
        reason: rest.length > 1 ? rest.slice(1).join(" ") : null,
      };
    case "unblock":
      return { kind: "unblock", targetId: firstArg };
    case "stats":
      return { kind: "stats" };
    default:
      return { kind: "unknown", name };
  }
}

export type CommandInput = {
  userId: string;
  text: string;
  now: number;
};

export type CommandResult = {
  reply: string | null;
};

export type CommandProcessorDeps = {
  store: UserStateStore;
  digestBuilder: Pick<DigestBuilder, "deliverDigest">;
  payments?: PaymentGateway;
  adminIds: string[];
  rateLimits: RateLimitConfig;
  maxFailedAttempts?: number;
  log?: BotLogger;
};

type CommandContext = {
  userId: string;
  record: UserRecord;
  state: UserState;
  now: number;
  privileged: boolean;
};

function formatPlanLine(tier: SubscriptionTier): string {
  const limits = TIER_LIMITS[tier];
  const ai = limits.aiSummaries ? "AI summaries" : "no AI summaries";
  return `• <b>${formatTierName(tier)}</b>: ${limits.maxFeeds} feeds, ${ai}, $${limits.priceMonthly}/mo`;
}

function formatPlanTable(): string {
  return SUBSCRIPTION_TIERS.map(formatPlanLine).join("\n");
}

function formatRateLimited(retryAfterMs: number): string {
  return `⚠️ Rate limit exceeded. Try again in ${retryAfterSeconds(retryAfterMs)} seconds.`;
}

/**
 * Handles one chat command against the persisted user state
 */
export class CommandProcessor {
  private readonly log: BotLogger;
  private readonly maxFailedAttempts: number;

  constructor(private readonly deps: CommandProcessorDeps) {
    this.log = deps.log ?? getChildLogger({ module: "commands" });
    this.maxFailedAttempts = deps.maxFailedAttempts ?? DEFAULT_MAX_FAILED_ATTEMPTS;
  }

  async handle(input: CommandInput): Promise<CommandResult> {
    const command = parseCommand(input.text);
    if (!command) {
      return { reply: null };
    }

    const state = await this.deps.store.load();
    const record = state.getOrCreate(input.userId, input.now);
    const ctx: CommandContext = {
      userId: input.userId,
      record,
      state,
      now: input.now,
      privileged: isAdmin(input.userId, this.deps.adminIds),
    };

    let reply: string;
    try {
      reply = await this.process(ctx, command);
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      this.log.error(`Command /${command.kind} failed for ${input.userId}: ${describeError(error)}`);
      reply = GENERIC_FAILURE_REPLY;
    }

    await this.deps.store.save(state);
    return { reply };
  }

  private async process(ctx: CommandContext, command: ParsedCommand): Promise<string> {
    // Blocked users are answered before expiry or rate limits touch the record
    if (ctx.record.security.blocked) {
      return BLOCKED_REPLY;
    }
    if (applyLazyExpiry(ctx.record, ctx.now)) {
      this.log.info(`Subscription for ${ctx.userId} expired, downgraded to free`);
    }
    const access = checkCommandAccess(ctx.record, ctx.now, {
      privileged: ctx.privileged,
      rateLimits: this.deps.rateLimits,
    });
    if (!access.allowed) {
      return formatAccessDeniedMessage(access);
    }
    try {
      return await this.dispatch(ctx, command);
    } catch (error) {
      return this.replyForUserError(ctx, error);
    }
  }

  /**
   * Turn a user-triggered failure into a reply; anything else propagates.
   */
  private replyForUserError(ctx: CommandContext, error: unknown): string {
    if (error instanceof ValidationError) {
      return error.message;
    }
    if (error instanceof RateLimitError) {
      return formatRateLimited(error.retryAfterMs);
    }
    if (error instanceof SecurityViolation) {
      this.log.warn(`Security violation by ${ctx.userId}: ${error.attempt}`);
      if (recordSecurityViolation(ctx.record, this.maxFailedAttempts)) {
        this.log.warn(`User ${ctx.userId} blocked after ${ctx.record.security.failedAttempts} attempts`);
        return BLOCKED_REPLY;
      }
      return error.message;
    }
    throw error;
  }

  private async dispatch(ctx: CommandContext, command: ParsedCommand): Promise<string> {
    switch (command.kind) {
      case "start":
      case "help":
        return HELP_TEXT;
      case "feedlist":
        return this.feedList(ctx);
      case "addfeed":
        return this.addFeed(ctx, command.url);
      case "removefeed":
        return this.removeFeed(ctx, command.target);
      case "digest":
        return this.digest(ctx);
      case "status":
        return this.status(ctx);
      case "upgrade":
        return this.upgrade(ctx, command.tier);
      case "manage":
        return this.manage(ctx);
      case "block":
      case "unblock":
      case "stats":
        return this.admin(ctx, command);
      case "unknown":
        return UNKNOWN_COMMAND_REPLY;
      default: {
        const _exhaustive: never = command;
        return _exhaustive;
      }
    }
  }

  private consume(ctx: CommandContext, action: RateLimitAction): void {
    if (ctx.privileged) {
      return;
    }
    const decision = checkAndRecord(ctx.record.rateLimits, action, ctx.now, this.deps.rateLimits);
    if (!decision.allowed) {
      throw new RateLimitError(`${action} limit exceeded`, decision.retryAfterMs);
    }
  }

  private feedList(ctx: CommandContext): string {
    const { record } = ctx;
    if (record.feeds.length === 0) {
      return "📭 You haven't added any feeds yet.\n\nUse /addfeed &lt;url&gt; to add one!";
    }
    const tier = effectiveTier(record, ctx.now, { privileged: ctx.privileged });
    const lines = record.feeds.map((url, index) => `${index + 1}. ${escapeHtml(url)}`);
    return [
      `📚 <b>Your feeds</b> (${record.feeds.length}/${TIER_LIMITS[tier].maxFeeds}, ${formatTierName(tier)} plan):`,
      "",
      ...lines,
    ].join("\n");
  }

  private addFeed(ctx: CommandContext, rawUrl: string | null): string {
    if (!rawUrl) {
      return "Usage: /addfeed &lt;url&gt;\n\nExample: /addfeed https://example.substack.com/feed";
    }
    this.consume(ctx, "feedAdd");

    const validated = validateFeedUrl(rawUrl);
    if (!validated.ok) {
      const reply = `⚠️ ${validated.message}`;
      if (validated.reason === "PrivateAddress") {
        throw new SecurityViolation(reply, `private feed URL ${rawUrl}`);
      }
      throw new ValidationError(reply);
    }

    const { record } = ctx;
    if (record.feeds.includes(validated.url)) {
      return "Feed already added.";
    }
    const tier = effectiveTier(record, ctx.now, { privileged: ctx.privileged });
    const { maxFeeds } = capabilities(record, ctx.now, { privileged: ctx.privileged });
    if (record.feeds.length >= maxFeeds) {
      const hint = tier === "pro" ? "" : " Upgrade for more feeds: /upgrade";
      return `Feed limit reached (${maxFeeds} for ${tier} tier).${hint}`;
    }

    record.feeds.push(validated.url);
    this.log.info(`Feed added for ${ctx.userId}: ${validated.url}`);
    return `✅ Added feed:\n${escapeHtml(validated.url)}`;
  }

  private removeFeed(ctx: CommandContext, target: string | null): string {
    if (!target) {
      return "Usage: /removefeed &lt;number|url&gt;\n\nSee /feedlist for numbers.";
    }
    const { record } = ctx;
    let index: number;
    if (/^\d+$/.test(target)) {
      index = Number(target) - 1;
      if (index < 0 || index >= record.feeds.length) {
        throw new ValidationError("Invalid index.");
      }
    } else {
      index = record.feeds.indexOf(target);
      if (index === -1) {
        const normalized = validateFeedUrl(target);
        if (normalized.ok) {
          index = record.feeds.indexOf(normalized.url);
        }
      }
      if (index === -1) {
        throw new ValidationError("Feed not found.");
      }
    }

    const [removed] = record.feeds.splice(index, 1);
    if (removed === undefined) {
      return "Feed not found.";
    }
    delete record.feedMarkers[removed];
    return `❌ Removed:\n${escapeHtml(removed)}`;
  }

  private async digest(ctx: CommandContext): Promise<string> {
    this.consume(ctx, "digestRequest");
    if (ctx.record.feeds.length === 0) {
      return "📭 You haven't added any feeds yet.\n\nUse /addfeed to add feeds first!";
    }
    const outcome = await this.deps.digestBuilder.deliverDigest(ctx.userId, ctx.record, ctx.now, {
      force: true,
    });
    switch (outcome.status) {
      case "sent":
        return `✅ Digest delivered with ${outcome.posts} new post(s).`;
      case "skipped":
        return `Digest skipped (${outcome.reason}).`;
      case "failed":
        this.log.error(`On-demand digest failed for ${ctx.userId}: ${outcome.error}`);
        return "⚠️ Could not deliver your digest. Please try again later.";
      default: {
        const _exhaustive: never = outcome;
        return _exhaustive;
      }
    }
  }

  private status(ctx: CommandContext): string {
    const { record, now, privileged } = ctx;
    const tier = effectiveTier(record, now, { privileged });
    const caps = capabilities(record, now, { privileged });
    const lines = [
      "📊 <b>Subscription Status</b>",
      "",
      `Plan: <b>${formatTierName(tier)}</b>${privileged ? " (admin)" : ""}`,
      `Status: ${isSubscriptionActive(record, now) ? "✅ Active" : "Free"}`,
    ];
    const expires = formatExpirationDate(record.subscription.expiresAt);
    if (expires && record.subscription.tier !== "free") {
      lines.push(`Renews: ${expires}`);
    }
    lines.push(
      `Feeds: ${record.feeds.length}/${caps.maxFeeds}`,
      `AI summaries: ${caps.aiSummariesEnabled ? "✅ Enabled" : "❌ Disabled"}`,
      "",
      "<b>Plans</b>",
      formatPlanTable(),
    );
    if (tier !== "pro") {
      lines.push("", "Use /upgrade to get more feeds and AI summaries.");
    }
    return lines.join("\n");
  }

  private async upgrade(ctx: CommandContext, requested: string | null): Promise<string> {
    if (!requested) {
      return [
        "💎 <b>Upgrade your plan</b>",
        "",
        formatPlanTable(),
        "",
        "Use /upgrade basic or /upgrade pro",
      ].join("\n");
    }
    if (!isTier(requested) || requested === "free") {
      throw new ValidationError("Usage: /upgrade basic or /upgrade pro");
    }
    const payments = this.deps.payments;
    if (!payments) {
      return PAYMENTS_DISABLED_REPLY;
    }

    const { record, now } = ctx;
    const current = effectiveTier(record, now, { privileged: ctx.privileged });
    if (compareTiers(requested, current) <= 0) {
      return `You're already on the ${formatTierName(current)} plan.`;
    }
    if (record.subscription.subscriptionId && !isExpired(record, now)) {
      return "You already have an active or pending subscription. Use /manage to change it.";
    }

    const session = await payments.createCheckout({
      userId: ctx.userId,
      tier: requested,
      customerId: record.subscription.customerId ?? null,
    });
    // Only the billing account is remembered; the tier waits for the webhook
    record.subscription.customerId = session.customerId;
    const price = TIER_LIMITS[requested].priceMonthly;
    return `💳 Upgrade to <b>${formatTierName(requested)}</b> ($${price}/month):\n${escapeHtml(session.url)}`;
  }

  private async manage(ctx: CommandContext): Promise<string> {
    const payments = this.deps.payments;
    if (!payments) {
      return PAYMENTS_DISABLED_REPLY;
    }
    const customerId = ctx.record.subscription.customerId;
    if (!customerId) {
      return "No billing account yet. Use /upgrade to subscribe.";
    }
    const url = await payments.createPortal(customerId);
    return `⚙️ Manage your subscription:\n${escapeHtml(url)}`;
  }

  private admin(
    ctx: CommandContext,
    command: Extract<ParsedCommand, { kind: "block" | "unblock" | "stats" }>,
  ): string {
    if (!ctx.privileged) {
      throw new SecurityViolation(RESTRICTED_REPLY, `admin command /${command.kind}`);
    }

    switch (command.kind) {
      case "stats": {
        const stats = ctx.state.stats();
        return [
          "📈 <b>Bot stats</b>",
          "",
          `Users: ${stats.totalUsers}`,
          `Feeds: ${stats.totalFeeds}`,
          SUBSCRIPTION_TIERS.map((tier) => `${formatTierName(tier)}: ${stats.byTier[tier]}`).join(
            " · ",
          ),
          `Blocked: ${stats.blocked}`,
        ].join("\n");
      }
      case "block": {
        const targetId = command.targetId;
        if (!targetId || !isChatId(targetId)) {
          return "Usage: /block &lt;user id&gt; [reason]";
        }
        if (isAdmin(targetId, this.deps.adminIds)) {
          return "Admins cannot be blocked.";
        }
        const target = ctx.state.get(targetId);
        if (!target) {
          return "User not found.";
        }
        blockUser(target, command.reason ?? "Blocked by admin.");
        this.log.info(`User ${targetId} blocked by ${ctx.userId}`);
        return `🚫 Blocked user ${targetId}.`;
      }
      case "unblock": {
        const targetId = command.targetId;
        if (!targetId || !isChatId(targetId)) {
          return "Usage: /unblock &lt;user id&gt;";
        }
        const target = ctx.state.get(targetId);
        if (!target) {
          return "User not found.";
        }
        unblockUser(target);
        this.log.info(`User ${targetId} unblocked by ${ctx.userId}`);
        return `✅ Unblocked user ${targetId}.`;
      }
      default: {
        const _exhaustive: never = command;
        return _exhaustive;
      }
    }
  }
}
