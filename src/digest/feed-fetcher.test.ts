import { beforeEach, describe, expect, it, vi } from "vitest";

const parseURL = vi.hoisted(() => vi.fn());

vi.mock("rss-parser", () => ({
  default: class {
    parseURL = parseURL;
  },
}));

import { FetchError } from "../errors.js";
import { RssFeedFetcher, toFeedPosts } from "./feed-fetcher.js";

const FEED_URL = "https://example.substack.com/feed";

describe("toFeedPosts", () => {
  it("maps items and cleans their content", () => {
    const posts = toFeedPosts(FEED_URL, {
      title: "Example Letters",
      items: [
        {
          title: "  First post ",
          link: "https://example.substack.com/p/first",
          isoDate: "2024-03-10T08:00:00.000Z",
          content: "<p>Hello&nbsp;<b>world</b> &amp; friends</p>",
        },
      ],
    });

    expect(posts).toEqual([
      {
        title: "First post",
        link: "https://example.substack.com/p/first",
        publishedAt: Date.parse("2024-03-10T08:00:00.000Z"),
        excerpt: "Hello world & friends",
        feedTitle: "Example Letters",
        feedUrl: FEED_URL,
      },
    ]);
  });

  it("falls back to pubDate and default titles", () => {
    const posts = toFeedPosts(FEED_URL, {
      items: [{ pubDate: "Sun, 10 Mar 2024 08:00:00 GMT", contentSnippet: "snippet" }],
    });

    expect(posts).toEqual([
      {
        title: "Untitled",
        link: "",
        publishedAt: Date.parse("2024-03-10T08:00:00.000Z"),
        excerpt: "snippet",
        feedTitle: FEED_URL,
        feedUrl: FEED_URL,
      },
    ]);
  });

  it("skips items without a usable date", () => {
    const posts = toFeedPosts(FEED_URL, {
      items: [{ title: "no date" }, { title: "bad date", pubDate: "someday" }],
    });
    expect(posts).toEqual([]);
  });
});

describe("RssFeedFetcher", () => {
  beforeEach(() => {
    parseURL.mockReset();
  });

  it("parses the feed at the given URL", async () => {
    parseURL.mockResolvedValue({
      title: "Feed",
      items: [{ title: "A", link: "https://a.example.com/1", isoDate: "2024-03-10T00:00:00Z" }],
    });

    const posts = await new RssFeedFetcher().fetch(FEED_URL);

    expect(parseURL).toHaveBeenCalledWith(FEED_URL);
    expect(posts.map((post) => post.title)).toEqual(["A"]);
  });

  it("wraps parser failures in FetchError", async () => {
    parseURL.mockRejectedValue(new Error("Status code 404"));

    const result = new RssFeedFetcher().fetch(FEED_URL);

    await expect(result).rejects.toBeInstanceOf(FetchError);
    await expect(result).rejects.toThrow(`Failed to fetch feed ${FEED_URL}: Status code 404`);
  });
});
