import { describe, expect, it } from "vitest";
import type { DigestEntry } from "./format.js";
import {
  buildDigestMessages,
  cleanHtml,
  escapeHtml,
  formatPostDate,
  MAX_MESSAGE_LENGTH,
  truncateText,
} from "./format.js";

const DIVIDER = "━━━━━━━━━━━━━━━━━━━━";

function entry(overrides: Partial<DigestEntry> = {}): DigestEntry {
  return {
    title: "Hello <world>",
    link: "https://example.com/p?a=1&b=2",
    publishedAt: Date.parse("2024-03-10T09:05:00.000Z"),
    excerpt: "Short excerpt",
    feedTitle: "Example & Co",
    feedUrl: "https://example.com/feed",
    ...overrides,
  };
}

describe("escapeHtml", () => {
  it("escapes the characters Telegram HTML parses", () => {
    expect(escapeHtml(`a & b <c> "d"`)).toBe(`a &amp; b &lt;c&gt; "d"`);
  });
});

describe("cleanHtml", () => {
  it("strips tags and decodes entities", () => {
    expect(cleanHtml("<p>One&nbsp;two</p>\n<p>&quot;three&quot; &#39;four&#39;</p>")).toBe(
      `One two "three" 'four'`,
    );
  });
});

describe("truncateText", () => {
  it("leaves short text alone", () => {
    expect(truncateText("abc", 5)).toBe("abc");
  });

  it("adds an ellipsis", () => {
    expect(truncateText("abcdefghij", 6)).toBe("abc...");
  });
});

describe("formatPostDate", () => {
  it("formats in UTC", () => {
    expect(formatPostDate(Date.parse("2024-03-10T09:05:00.000Z"))).toBe("Mar 10, 09:05");
  });
});

describe("buildDigestMessages", () => {
  it("renders an empty digest", () => {
    expect(buildDigestMessages([])).toEqual(["📭 <b>No new posts</b> since your last digest.\n"]);
  });

  it("renders entries with excerpts, escaping everything", () => {
    expect(buildDigestMessages([entry()])).toEqual([
      [
        "📚 <b>Daily Digest</b> — 1 new post(s)",
        DIVIDER,
        "",
        "<b>1. Hello &lt;world&gt;</b>",
        "📰 Example &amp; Co • Mar 10, 09:05",
        "🔗 https://example.com/p?a=1&amp;b=2",
        "",
        "<i>Short excerpt</i>",
        "",
        DIVIDER,
        "",
        "",
      ].join("\n"),
    ]);
  });

  it("renders SCQR summaries instead of the excerpt", () => {
    const [message] = buildDigestMessages([
      entry({
        summary: { situation: "S1", complication: "C1", question: "Q1", resolution: "R1 & more" },
      }),
    ]);

    expect(message).toContain(
      "<b>📋 SCQR Summary:</b>\n<b>S:</b> S1\n<b>C:</b> C1\n<b>Q:</b> Q1\n<b>R:</b> R1 &amp; more\n",
    );
    expect(message).not.toContain("<i>Short excerpt</i>");
  });

  it("appends failed feeds and the upgrade hint", () => {
    const messages = buildDigestMessages([], {
      failedFeeds: ["https://broken.example.com/feed"],
      showUpgradeHint: true,
    });

    expect(messages).toEqual([
      "📭 <b>No new posts</b> since your last digest.\n" +
        "\n⚠️ Could not load 1 feed(s):\n• https://broken.example.com/feed\n" +
        "\n💡 <i>Upgrade to get AI-powered SCQR summaries! /upgrade</i>",
    ]);
  });

  it("splits long digests across messages without dropping entries", () => {
    const entries = Array.from({ length: 60 }, (_, i) =>
      entry({ title: `Post ${i + 1}`, excerpt: "y".repeat(190) }),
    );

    const messages = buildDigestMessages(entries, { showUpgradeHint: true });

    expect(messages.length).toBeGreaterThan(1);
    for (const message of messages) {
      expect(message.length).toBeLessThanOrEqual(MAX_MESSAGE_LENGTH);
    }
    expect(messages[0]?.startsWith("📚 <b>Daily Digest</b> — 60 new post(s)")).toBe(true);
    expect(messages[1]?.startsWith("<b>")).toBe(true);
    const joined = messages.join("");
    for (let i = 1; i <= 60; i += 1) {
      expect(joined).toContain(`<b>${i}. Post ${i}</b>`);
    }
    expect(messages.at(-1)?.endsWith("/upgrade</i>")).toBe(true);
  });

  it("leaves out links too long to be useful", () => {
    const [message] = buildDigestMessages([entry({ link: `https://example.com/${"x".repeat(1200)}` })]);
    expect(message).not.toContain("🔗");
  });
});
