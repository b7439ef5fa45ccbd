import { beforeEach, describe, expect, it, vi } from "vitest";
import type { UserStateStore } from "../telegram/user-store.js";
import type { FeedPost } from "./feed-fetcher.js";
import { DeliveryError, FetchError, PersistenceError } from "../errors.js";
import { createDefaultRecord, UserState } from "../telegram/user-store.js";
import { DigestBuilder, selectUnseenPosts, utcDate } from "./digest-builder.js";

const HOUR = 60 * 60 * 1000;
const NOW = Date.parse("2024-03-10T08:00:00.000Z");
const FEED_A = "https://a.example.com/feed";
const FEED_B = "https://b.example.com/feed";

function post(feedUrl: string, title: string, publishedAt: number): FeedPost {
  return {
    title,
    link: `${feedUrl.replace("/feed", "")}/p/${encodeURIComponent(title)}`,
    publishedAt,
    excerpt: `${title} excerpt`,
    feedTitle: feedUrl,
    feedUrl,
  };
}

function buildStoreStub(state: UserState) {
  const save = vi.fn().mockResolvedValue(undefined);
  const store: UserStateStore = {
    load: vi.fn().mockResolvedValue(state),
    save,
  };
  return { store, save };
}

describe("selectUnseenPosts", () => {
  it("uses the lookback window before the first digest", () => {
    const record = createDefaultRecord(NOW);
    const posts = [
      post(FEED_A, "old", NOW - 25 * HOUR),
      post(FEED_A, "recent", NOW - 2 * HOUR),
      post(FEED_A, "newest", NOW - HOUR),
    ];

    expect(selectUnseenPosts(record, posts, NOW, 24 * HOUR).map((p) => p.title)).toEqual([
      "newest",
      "recent",
    ]);
  });

  it("uses lastDigestAt and per-feed markers", () => {
    const record = createDefaultRecord(NOW);
    record.lastDigestAt = NOW - 10 * HOUR;
    record.feedMarkers[FEED_B] = NOW - 3 * HOUR;
    const posts = [
      post(FEED_A, "a-before-digest", NOW - 11 * HOUR),
      post(FEED_A, "a-after-digest", NOW - 5 * HOUR),
      post(FEED_B, "b-before-marker", NOW - 4 * HOUR),
      post(FEED_B, "b-after-marker", NOW - 2 * HOUR),
    ];

    expect(selectUnseenPosts(record, posts, NOW, 24 * HOUR).map((p) => p.title)).toEqual([
      "b-after-marker",
      "a-after-digest",
    ]);
  });

  it("ignores posts dated in the future", () => {
    const record = createDefaultRecord(NOW);
    expect(selectUnseenPosts(record, [post(FEED_A, "future", NOW + HOUR)], NOW, 24 * HOUR)).toEqual(
      [],
    );
  });
});

describe("DigestBuilder", () => {
  const fetch = vi.fn();
  const send = vi.fn();
  const summarize = vi.fn();

  beforeEach(() => {
    fetch.mockReset();
    send.mockReset().mockResolvedValue(undefined);
    summarize.mockReset();
  });

  function buildBuilder(store: UserStateStore, withSummarizer = false) {
    return new DigestBuilder({
      store,
      fetcher: { fetch },
      sender: { send },
      summarizer: withSummarizer ? { summarize } : undefined,
      adminIds: ["999"],
      lookbackHours: 24,
      maxSummaries: 1,
    });
  }

  it("sends once per day and advances bookkeeping only after a confirmed send", async () => {
    const state = new UserState();
    state.getOrCreate("1", NOW).feeds.push(FEED_A);
    const { store, save } = buildStoreStub(state);
    fetch.mockResolvedValue([post(FEED_A, "fresh", NOW - HOUR)]);
    const builder = buildBuilder(store);

    await expect(builder.runDigest(NOW)).resolves.toEqual({ sent: 1, skipped: 0, failed: 0 });

    const record = state.get("1");
    expect(record?.lastSentDate).toBe("2024-03-10");
    expect(record?.lastDigestAt).toBe(NOW);
    expect(record?.feedMarkers).toEqual({ [FEED_A]: NOW - HOUR });
    expect(save).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0]?.[0]).toBe("1");
    expect(send.mock.calls[0]?.[1]).toContain("<b>1. fresh</b>");

    // Same day: nothing new is sent
    await expect(builder.runDigest(NOW + HOUR)).resolves.toEqual({ sent: 0, skipped: 1, failed: 0 });
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("sends a no-new-posts digest when a forced digest finds nothing unseen", async () => {
    const state = new UserState();
    const record = state.getOrCreate("1", NOW);
    record.feeds.push(FEED_A);
    record.lastDigestAt = NOW - HOUR;
    record.feedMarkers[FEED_A] = NOW - 2 * HOUR;
    record.lastSentDate = "2024-03-10";
    fetch.mockResolvedValue([post(FEED_A, "already delivered", NOW - 2 * HOUR)]);
    const builder = buildBuilder(buildStoreStub(state).store);

    const outcome = await builder.deliverDigest("1", record, NOW, { force: true });

    expect(outcome).toEqual({ status: "sent", posts: 0 });
    expect(send).toHaveBeenCalledWith("1", "📭 <b>No new posts</b> since your last digest.\n");
    expect(record.lastDigestAt).toBe(NOW);
    expect(record.lastSentDate).toBe("2024-03-10");
  });

  it("does not set lastSentDate for a forced digest", async () => {
    const record = createDefaultRecord(NOW);
    record.feeds.push(FEED_A);
    fetch.mockResolvedValue([]);
    const builder = buildBuilder(buildStoreStub(new UserState()).store);

    await builder.deliverDigest("1", record, NOW, { force: true });

    expect(record.lastSentDate).toBeNull();
    expect(record.lastDigestAt).toBe(NOW);
  });

  it("leaves state unchanged when delivery fails", async () => {
    const state = new UserState();
    const record = state.getOrCreate("1", NOW);
    record.feeds.push(FEED_A);
    const { store, save } = buildStoreStub(state);
    fetch.mockResolvedValue([post(FEED_A, "fresh", NOW - HOUR)]);
    send.mockRejectedValue(new DeliveryError("sendMessage to 1 failed: 403 Forbidden"));
    const before = structuredClone(record);

    await expect(buildBuilder(store).runDigest(NOW)).resolves.toEqual({
      sent: 0,
      skipped: 0,
      failed: 1,
    });

    expect(record).toEqual(before);
    expect(save).not.toHaveBeenCalled();
  });

  it("keeps going when one user's delivery fails", async () => {
    const state = new UserState();
    state.getOrCreate("1", NOW).feeds.push(FEED_A);
    state.getOrCreate("2", NOW).feeds.push(FEED_A);
    fetch.mockResolvedValue([post(FEED_A, "fresh", NOW - HOUR)]);
    send.mockRejectedValueOnce(new DeliveryError("boom")).mockResolvedValueOnce(undefined);

    const summary = await buildBuilder(buildStoreStub(state).store).runDigest(NOW);

    expect(summary).toEqual({ sent: 1, skipped: 0, failed: 1 });
    expect(state.get("1")?.lastSentDate).toBeNull();
    expect(state.get("2")?.lastSentDate).toBe("2024-03-10");
  });

  it("skips blocked users and users without feeds", async () => {
    const state = new UserState();
    state.getOrCreate("1", NOW);
    const blocked = state.getOrCreate("2", NOW);
    blocked.feeds.push(FEED_A);
    blocked.security.blocked = true;

    const summary = await buildBuilder(buildStoreStub(state).store).runDigest(NOW);

    expect(summary).toEqual({ sent: 0, skipped: 2, failed: 0 });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("notes failed feeds and still delivers the others", async () => {
    const record = createDefaultRecord(NOW);
    record.feeds.push(FEED_A, FEED_B);
    fetch.mockImplementation(async (url: string) => {
      if (url === FEED_B) {
        throw new FetchError(`Failed to fetch feed ${url}: timeout`);
      }
      return [post(FEED_A, "fresh", NOW - HOUR)];
    });

    const outcome = await buildBuilder(buildStoreStub(new UserState()).store).deliverDigest(
      "1",
      record,
      NOW,
      { force: false },
    );

    expect(outcome).toEqual({ status: "sent", posts: 1 });
    const message = String(send.mock.calls[0]?.[1]);
    expect(message).toContain("<b>1. fresh</b>");
    expect(message).toContain(`⚠️ Could not load 1 feed(s):\n• ${FEED_B}\n`);
    expect(record.feedMarkers).toEqual({ [FEED_A]: NOW - HOUR });
  });

  it("summarizes up to maxSummaries posts for paid tiers and falls back on failure", async () => {
    const record = createDefaultRecord(NOW);
    record.subscription.tier = "basic";
    record.feeds.push(FEED_A);
    fetch.mockResolvedValue([post(FEED_A, "first", NOW - HOUR), post(FEED_A, "second", NOW - 2 * HOUR)]);
    summarize.mockResolvedValue({
      situation: "S",
      complication: "C",
      question: "Q",
      resolution: "R",
    });

    await buildBuilder(buildStoreStub(new UserState()).store, true).deliverDigest("1", record, NOW, {
      force: false,
    });

    expect(summarize).toHaveBeenCalledTimes(1);
    expect(summarize).toHaveBeenCalledWith({
      title: "first",
      text: "first excerpt",
      feedTitle: FEED_A,
    });
    const message = String(send.mock.calls[0]?.[1]);
    expect(message).toContain("<b>S:</b> S");
    expect(message).toContain("<i>second excerpt</i>");
  });

  it("shows the upgrade hint to free users instead of summarizing", async () => {
    const record = createDefaultRecord(NOW);
    record.feeds.push(FEED_A);
    fetch.mockResolvedValue([post(FEED_A, "first", NOW - HOUR)]);

    await buildBuilder(buildStoreStub(new UserState()).store, true).deliverDigest("1", record, NOW, {
      force: false,
    });

    expect(summarize).not.toHaveBeenCalled();
    expect(String(send.mock.calls[0]?.[1])).toContain("/upgrade</i>");
  });

  it("gives admins summaries on the free tier", async () => {
    const record = createDefaultRecord(NOW);
    record.feeds.push(FEED_A);
    fetch.mockResolvedValue([post(FEED_A, "first", NOW - HOUR)]);
    summarize.mockRejectedValue(new Error("quota"));

    await buildBuilder(buildStoreStub(new UserState()).store, true).deliverDigest("999", record, NOW, {
      force: false,
    });

    expect(summarize).toHaveBeenCalledTimes(1);
    expect(String(send.mock.calls[0]?.[1])).toContain("<i>first excerpt</i>");
  });

  it("downgrades an expired subscription before building the digest", async () => {
    const state = new UserState();
    const record = state.getOrCreate("1", NOW);
    record.subscription.tier = "pro";
    record.subscription.expiresAt = NOW - 24 * HOUR;
    const { store, save } = buildStoreStub(state);

    await buildBuilder(store).runDigest(NOW);

    expect(record.subscription.tier).toBe("free");
    expect(save).toHaveBeenCalledTimes(1);
  });

  it("delivers every unseen post of a long digest before advancing markers", async () => {
    const state = new UserState();
    const record = state.getOrCreate("1", NOW);
    record.feeds.push(FEED_A, FEED_B);
    const longPosts = Array.from({ length: 30 }, (_, i) => ({
      ...post(FEED_A, `a-${i + 1}`, NOW - (i + 1) * 60_000),
      excerpt: "x".repeat(190),
    }));
    const older = post(FEED_B, "b-older", NOW - 5 * HOUR);
    fetch.mockImplementation(async (url: string) => (url === FEED_A ? longPosts : [older]));
    const builder = buildBuilder(buildStoreStub(state).store);

    const outcome = await builder.deliverDigest("1", record, NOW, { force: false });

    expect(outcome).toEqual({ status: "sent", posts: 31 });
    expect(send.mock.calls.length).toBeGreaterThan(1);
    const delivered = send.mock.calls.map(([, html]) => String(html)).join("");
    expect(delivered).toContain("<b>31. b-older</b>");
    expect(record.feedMarkers).toEqual({ [FEED_A]: NOW - 60_000, [FEED_B]: NOW - 5 * HOUR });

    send.mockClear();
    record.lastSentDate = null;
    await builder.deliverDigest("1", record, NOW + HOUR, { force: false });
    expect(send).toHaveBeenCalledWith("1", "📭 <b>No new posts</b> since your last digest.\n");
  });

  it("keeps bookkeeping when a later part of the digest fails", async () => {
    const state = new UserState();
    const record = state.getOrCreate("1", NOW);
    record.feeds.push(FEED_A);
    fetch.mockResolvedValue(
      Array.from({ length: 30 }, (_, i) => ({
        ...post(FEED_A, `a-${i + 1}`, NOW - (i + 1) * 60_000),
        excerpt: "x".repeat(190),
      })),
    );
    send
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new DeliveryError("sendMessage to 1 failed: 429 Too Many Requests"));
    const builder = buildBuilder(buildStoreStub(state).store);

    const outcome = await builder.deliverDigest("1", record, NOW, { force: false });

    expect(outcome.status).toBe("failed");
    expect(record.lastSentDate).toBeNull();
    expect(record.lastDigestAt).toBeNull();
    expect(record.feedMarkers).toEqual({});
  });

  it("aborts the run on a persistence failure", async () => {
    const state = new UserState();
    state.getOrCreate("1", NOW).feeds.push(FEED_A);
    state.getOrCreate("2", NOW).feeds.push(FEED_A);
    const { store, save } = buildStoreStub(state);
    save.mockRejectedValue(new PersistenceError("disk full"));
    fetch.mockResolvedValue([]);

    await expect(buildBuilder(store).runDigest(NOW)).rejects.toBeInstanceOf(PersistenceError);
    expect(send).toHaveBeenCalledTimes(1);
  });
});

describe("utcDate", () => {
  it("formats the UTC calendar day", () => {
    expect(utcDate(Date.parse("2024-03-10T23:59:59.000Z"))).toBe("2024-03-10");
  });
});
