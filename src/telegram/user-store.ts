import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type {
  RateLimitWindows,
  SubscriptionTier,
  UserRecord,
  UserRow,
  UserStateStats,
} from "./user-store.types.js";
import { PersistenceError, describeError } from "../errors.js";
import type { BotLogger } from "../logging.js";
import { getChildLogger } from "../logging.js";
import { isTier } from "./user-tiers.js";

const DEFAULT_DIGEST_TIME = "08:00";
const DIGEST_TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
// Epoch values below this are seconds, not milliseconds
const EPOCH_SECONDS_CUTOFF = 1e11;

/**
 * Fresh free-tier record for a first interaction
 */
export function createDefaultRecord(now: number): UserRecord {
  return {
    feeds: [],
    digestTime: DEFAULT_DIGEST_TIME,
    lastSentDate: null,
    lastDigestAt: null,
    feedMarkers: {},
    subscription: {
      tier: "free",
      customerId: null,
      subscriptionId: null,
      expiresAt: null,
      createdAt: now,
    },
    rateLimits: { command: [], feedAdd: [], digestRequest: [] },
    security: { blocked: false, blockReason: null, failedAttempts: 0 },
  };
}

/**
 * In-memory view of every user, loaded from and saved to one state file
 */
export class UserState {
  private readonly records: Map<string, UserRecord>;

  constructor(entries: Iterable<[string, UserRecord]> = []) {
    this.records = new Map(entries);
  }

  get size(): number {
    return this.records.size;
  }

  get(userId: string): UserRecord | undefined {
    return this.records.get(userId);
  }

  has(userId: string): boolean {
    return this.records.has(userId);
  }

  /**
   * Existing record, or a default one added to this in-memory state
   */
  getOrCreate(userId: string, now: number): UserRecord {
    const existing = this.records.get(userId);
    if (existing) {
      return existing;
    }
    const created = createDefaultRecord(now);
    this.records.set(userId, created);
    return created;
  }

  ids(): string[] {
    return [...this.records.keys()];
  }

  entries(): Array<[string, UserRecord]> {
    return [...this.records.entries()];
  }

  findByCustomerId(customerId: string): { userId: string; record: UserRecord } | undefined {
    for (const [userId, record] of this.records) {
      if (record.subscription.customerId === customerId) {
        return { userId, record };
      }
    }
    return undefined;
  }

  stats(): UserStateStats {
    const byTier: Record<SubscriptionTier, number> = { free: 0, basic: 0, pro: 0 };
    let totalFeeds = 0;
    let blocked = 0;
    for (const record of this.records.values()) {
      byTier[record.subscription.tier] += 1;
      totalFeeds += record.feeds.length;
      if (record.security.blocked) {
        blocked += 1;
      }
    }
    return { totalUsers: this.records.size, totalFeeds, byTier, blocked };
  }
}

/**
 * Whole-state persistence used by the command, digest and webhook paths
 */
export interface UserStateStore {
  load(): Promise<UserState>;
  save(state: UserState): Promise<void>;
}

type JsonUserStoreOptions = {
  log?: BotLogger;
};

/**
 * JSON-file user store.
 * Reads the full mapping on every load and replaces the file atomically on save.
 */
export class JsonUserStore implements UserStateStore {
  private readonly log: BotLogger;

  constructor(
    readonly filePath: string,
    options: JsonUserStoreOptions = {},
  ) {
    this.log = options.log ?? getChildLogger({ module: "user-store" });
  }

  async load(): Promise<UserState> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isNotFoundError(error)) {
        return new UserState();
      }
      throw new PersistenceError(`Failed to read ${this.filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`State file ${this.filePath} is not valid JSON`, {
        cause: error,
      });
    }
    if (!isPlainObject(parsed)) {
      throw new PersistenceError(`State file ${this.filePath} must contain a JSON object`);
    }

    const entries: Array<[string, UserRecord]> = [];
    const now = Date.now();
    for (const [userId, candidate] of Object.entries(parsed)) {
      const record = normalizeLegacyRecord(candidate, now);
      if (!record) {
        this.log.warn(`Skipping malformed record for user ${userId}`);
        continue;
      }
      entries.push([userId, record]);
    }
    return new UserState(entries);
  }

  async save(state: UserState): Promise<void> {
    const rows: Record<string, UserRow> = {};
    for (const [userId, record] of state.entries()) {
      rows[userId] = recordToRow(record);
    }
    const payload = `${JSON.stringify(rows, null, 2)}\n`;
    const tmpPath = `${this.filePath}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, payload, "utf8");
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw new PersistenceError(`Failed to save ${this.filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}

function isNotFoundError(error: unknown): boolean {
  return isPlainObject(error) && error.code === "ENOENT";
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read an ISO string or epoch number (seconds or milliseconds) as epoch ms
 */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      return null;
    }
    return value < EPOCH_SECONDS_CUTOFF ? Math.round(value * 1000) : Math.round(value);
  }
  if (typeof value === "string" && value.trim() !== "") {
    const trimmed = value.trim();
    if (/^\d+(\.\d+)?$/.test(trimmed)) {
      return parseTimestamp(Number(trimmed));
    }
    const parsed = Date.parse(trimmed);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

function toIso(timestamp: number | null | undefined): string | null {
  return timestamp === null || timestamp === undefined ? null : new Date(timestamp).toISOString();
}

function readString(value: unknown): string | null {
  return typeof value === "string" && value.trim() !== "" ? value : null;
}

function readTimestamps(value: unknown): number[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((entry) => parseTimestamp(entry))
    .filter((entry): entry is number => entry !== null)
    .sort((a, b) => a - b);
}

/**
 * Build a record from whatever an older or hand-edited state file holds.
 * Missing fields take defaults; returns null when the entry is not an object.
 */
export function normalizeLegacyRecord(candidate: unknown, now: number): UserRecord | null {
  if (!isPlainObject(candidate)) {
    return null;
  }
  const defaults = createDefaultRecord(now);

  const feeds: string[] = [];
  if (Array.isArray(candidate.feeds)) {
    for (const feed of candidate.feeds) {
      if (typeof feed === "string" && feed.trim() !== "" && !feeds.includes(feed.trim())) {
        feeds.push(feed.trim());
      }
    }
  }

  const digestTime =
    typeof candidate.digest_time === "string" && DIGEST_TIME_PATTERN.test(candidate.digest_time)
      ? candidate.digest_time
      : defaults.digestTime;
  const lastSentDate =
    typeof candidate.last_sent_date === "string" && DATE_PATTERN.test(candidate.last_sent_date)
      ? candidate.last_sent_date
      : null;

  const feedMarkers: Record<string, number> = {};
  if (isPlainObject(candidate.feed_markers)) {
    for (const [url, marker] of Object.entries(candidate.feed_markers)) {
      const parsed = parseTimestamp(marker);
      if (parsed !== null) {
        feedMarkers[url] = parsed;
      }
    }
  }

  const sub = isPlainObject(candidate.subscription) ? candidate.subscription : {};
  const limits = isPlainObject(candidate.rate_limits) ? candidate.rate_limits : {};
  const security = isPlainObject(candidate.security) ? candidate.security : {};

  const failedAttempts =
    typeof security.failed_attempts === "number" && Number.isFinite(security.failed_attempts)
      ? Math.max(0, Math.floor(security.failed_attempts))
      : 0;

  const rateLimits: RateLimitWindows = {
    command: readTimestamps(limits.command_timestamps),
    feedAdd: readTimestamps(limits.feed_add_timestamps),
    digestRequest: readTimestamps(limits.digest_request_timestamps),
  };

  return {
    feeds,
    digestTime,
    lastSentDate,
    lastDigestAt: parseTimestamp(candidate.last_digest_at),
    feedMarkers,
    subscription: {
      tier: isTier(sub.tier) ? sub.tier : "free",
      customerId: readString(sub.stripe_customer_id),
      subscriptionId: readString(sub.stripe_subscription_id),
      expiresAt: parseTimestamp(sub.expires_at),
      createdAt: parseTimestamp(sub.created_at) ?? now,
    },
    rateLimits,
    security: {
      blocked: security.blocked === true,
      blockReason: readString(security.block_reason),
      failedAttempts,
    },
  };
}

export function recordToRow(record: UserRecord): UserRow {
  const feedMarkers: Record<string, string> = {};
  for (const [url, marker] of Object.entries(record.feedMarkers)) {
    feedMarkers[url] = new Date(marker).toISOString();
  }

  return {
    feeds: [...record.feeds],
    digest_time: record.digestTime,
    last_sent_date: record.lastSentDate,
    last_digest_at: toIso(record.lastDigestAt),
    feed_markers: feedMarkers,
    subscription: {
      tier: record.subscription.tier,
      stripe_customer_id: record.subscription.customerId ?? null,
      stripe_subscription_id: record.subscription.subscriptionId ?? null,
      expires_at: toIso(record.subscription.expiresAt),
      created_at: new Date(record.subscription.createdAt).toISOString(),
    },
    rate_limits: {
      command_timestamps: [...record.rateLimits.command],
      feed_add_timestamps: [...record.rateLimits.feedAdd],
      digest_request_timestamps: [...record.rateLimits.digestRequest],
    },
    security: {
      blocked: record.security.blocked,
      block_reason: record.security.blockReason ?? null,
      failed_attempts: record.security.failedAttempts,
    },
  };
}
