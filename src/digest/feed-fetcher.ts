import Parser from "rss-parser";
import { FetchError, describeError } from "../errors.js";
import { cleanHtml } from "./format.js";

const DEFAULT_FETCH_TIMEOUT_MS = 20_000;
const MAX_EXCERPT_LENGTH = 2000;
const USER_AGENT = "feed-digest-bot/1.0 (+https://core.telegram.org/bots)";

export type FeedPost = {
  title: string;
  link: string;
  publishedAt: number; // Unix timestamp (ms)
  excerpt: string; // plain text
  feedTitle: string;
  feedUrl: string;
};

export interface FeedFetcher {
  fetch(url: string): Promise<FeedPost[]>;
}

type ParsedFeed = {
  title?: string;
  items: Parser.Item[];
};

function readPublishedAt(item: Parser.Item): number | null {
  for (const candidate of [item.isoDate, item.pubDate]) {
    if (!candidate) {
      continue;
    }
    const parsed = Date.parse(candidate);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  return null;
}

/**
 * Map parsed feed items to posts. Items without a usable date are skipped.
 */
export function toFeedPosts(feedUrl: string, feed: ParsedFeed): FeedPost[] {
  const feedTitle = feed.title?.trim() || feedUrl;
  const posts: FeedPost[] = [];
  for (const item of feed.items) {
    const publishedAt = readPublishedAt(item);
    if (publishedAt === null) {
      continue;
    }
    const rawContent = item.content || item.contentSnippet || item.summary || "";
    posts.push({
      title: item.title?.trim() || "Untitled",
      link: item.link?.trim() ?? "",
      publishedAt,
      excerpt: cleanHtml(rawContent).slice(0, MAX_EXCERPT_LENGTH),
      feedTitle,
      feedUrl,
    });
  }
  return posts;
}

export class RssFeedFetcher implements FeedFetcher {
  private readonly parser: Parser;

  constructor(options: { timeoutMs?: number } = {}) {
    this.parser = new Parser({
      timeout: options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      headers: { "User-Agent": USER_AGENT },
    });
  }

  async fetch(url: string): Promise<FeedPost[]> {
    let feed: ParsedFeed;
    try {
      feed = await this.parser.parseURL(url);
    } catch (error) {
      throw new FetchError(`Failed to fetch feed ${url}: ${describeError(error)}`, {
        cause: error,
      });
    }
    return toFeedPosts(url, feed);
  }
}
