import type { ChatSender } from "../telegram/telegram-transport.js";
import type { UserRecord } from "../telegram/user-store.types.js";
import type { UserStateStore } from "../telegram/user-store.js";
import type { BotLogger } from "../logging.js";
import type { FeedFetcher, FeedPost } from "./feed-fetcher.js";
import type { Summarizer } from "./summarizer.js";
import type { DigestEntry } from "./format.js";
import { PersistenceError, describeError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { isAdmin } from "../telegram/owner-config.js";
import { applyLazyExpiry, capabilities } from "../telegram/user-tiers.js";
import { buildDigestMessages } from "./format.js";

const HOUR_MS = 60 * 60 * 1000;

export type DigestBuilderDeps = {
  store: UserStateStore;
  fetcher: FeedFetcher;
  sender: ChatSender;
  summarizer?: Summarizer;
  adminIds: string[];
  lookbackHours: number;
  maxSummaries: number;
  log?: BotLogger;
};

export type DigestOutcome =
  | { status: "sent"; posts: number }
  | { status: "skipped"; reason: "blocked" | "no_feeds" | "already_sent" }
  | { status: "failed"; error: string };

export type DigestRunSummary = {
  sent: number;
  skipped: number;
  failed: number;
};

/**
 * YYYY-MM-DD (UTC)
 */
export function utcDate(now: number): string {
  return new Date(now).toISOString().slice(0, 10);
}

/**
 * Posts newer than both the last confirmed digest (or the lookback window)
 * and their feed's marker, newest first
 */
export function selectUnseenPosts(
  record: UserRecord,
  posts: FeedPost[],
  now: number,
  lookbackMs: number,
): FeedPost[] {
  const floor = record.lastDigestAt ?? now - lookbackMs;
  return posts
    .filter((post) => {
      const marker = record.feedMarkers[post.feedUrl] ?? Number.NEGATIVE_INFINITY;
      return post.publishedAt > Math.max(floor, marker) && post.publishedAt <= now;
    })
    .sort((a, b) => b.publishedAt - a.publishedAt);
}

export class DigestBuilder {
  private readonly log: BotLogger;

  constructor(private readonly deps: DigestBuilderDeps) {
    this.log = deps.log ?? getChildLogger({ module: "digest" });
  }

  /**
   * Scheduled run over every user. State is saved after each user whose record changed.
   */
  async runDigest(now: number = Date.now()): Promise<DigestRunSummary> {
    const state = await this.deps.store.load();
    const summary: DigestRunSummary = { sent: 0, skipped: 0, failed: 0 };

    for (const [userId, record] of state.entries()) {
      const before = JSON.stringify(record);
      let outcome: DigestOutcome;
      try {
        outcome = await this.deliverDigest(userId, record, now, { force: false });
      } catch (error) {
        if (error instanceof PersistenceError) {
          throw error;
        }
        outcome = { status: "failed", error: describeError(error) };
      }

      switch (outcome.status) {
        case "sent":
          summary.sent += 1;
          this.log.info(`Digest sent to ${userId} with ${outcome.posts} post(s)`);
          break;
        case "skipped":
          summary.skipped += 1;
          this.log.debug(`Digest skipped for ${userId}: ${outcome.reason}`);
          break;
        case "failed":
          summary.failed += 1;
          this.log.error(`Digest failed for ${userId}: ${outcome.error}`);
          break;
        default: {
          const _exhaustive: never = outcome;
          return _exhaustive;
        }
      }

      if (JSON.stringify(record) !== before) {
        // PersistenceError aborts the run
        await this.deps.store.save(state);
      }
    }

    this.log.info(
      `Digest run finished: ${summary.sent} sent, ${summary.skipped} skipped, ${summary.failed} failed`,
    );
    return summary;
  }

  /**
   * Build and send one user's digest, updating delivery bookkeeping in place
   * only after a confirmed send. The caller saves.
   */
  async deliverDigest(
    userId: string,
    record: UserRecord,
    now: number,
    options: { force: boolean },
  ): Promise<DigestOutcome> {
    if (record.security.blocked) {
      return { status: "skipped", reason: "blocked" };
    }
    applyLazyExpiry(record, now);
    if (record.feeds.length === 0) {
      return { status: "skipped", reason: "no_feeds" };
    }
    const today = utcDate(now);
    if (!options.force && record.lastSentDate === today) {
      return { status: "skipped", reason: "already_sent" };
    }

    const results = await Promise.allSettled(record.feeds.map((url) => this.deps.fetcher.fetch(url)));
    const posts: FeedPost[] = [];
    const failedFeeds: string[] = [];
    results.forEach((result, index) => {
      const url = record.feeds[index] ?? "";
      if (result.status === "fulfilled") {
        posts.push(...result.value);
      } else {
        failedFeeds.push(url);
        this.log.warn(`Feed fetch failed for ${userId}: ${describeError(result.reason)}`);
      }
    });

    const unseen = selectUnseenPosts(record, posts, now, this.deps.lookbackHours * HOUR_MS);
    const caps = capabilities(record, now, { privileged: isAdmin(userId, this.deps.adminIds) });
    const entries = await this.summarize(unseen, caps.aiSummariesEnabled);
    const messages = buildDigestMessages(entries, {
      failedFeeds,
      showUpgradeHint: !caps.aiSummariesEnabled && this.deps.summarizer !== undefined,
    });

    // Bookkeeping only moves once every part is delivered; a partly sent digest is sent again
    for (const [index, message] of messages.entries()) {
      try {
        await this.deps.sender.send(userId, message);
      } catch (error) {
        if (index > 0) {
          this.log.warn(`Digest for ${userId} stopped after ${index} of ${messages.length} message(s)`);
        }
        return { status: "failed", error: describeError(error) };
      }
    }

    if (!options.force) {
      record.lastSentDate = today;
    }
    record.lastDigestAt = now;
    for (const post of unseen) {
      const marker = record.feedMarkers[post.feedUrl];
      if (marker === undefined || post.publishedAt > marker) {
        record.feedMarkers[post.feedUrl] = post.publishedAt;
      }
    }
    return { status: "sent", posts: unseen.length };
  }

  private async summarize(posts: FeedPost[], enabled: boolean): Promise<DigestEntry[]> {
    const summarizer = this.deps.summarizer;
    if (!enabled || !summarizer) {
      return posts;
    }
    const entries: DigestEntry[] = [];
    for (const [index, post] of posts.entries()) {
      if (index >= this.deps.maxSummaries) {
        entries.push(post);
        continue;
      }
      try {
        const summary = await summarizer.summarize({
          title: post.title,
          text: post.excerpt,
          feedTitle: post.feedTitle,
        });
        entries.push({ ...post, summary });
      } catch (error) {
        this.log.warn(`Summary failed for "${post.title}": ${describeError(error)}`);
        entries.push(post);
      }
    }
    return entries;
  }
}
