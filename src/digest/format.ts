import type { FeedPost } from "./feed-fetcher.js";
import type { ScqrSummary } from "./summarizer.js";

/** Telegram caps messages at 4096 characters; leave room for entities. */
export const MAX_MESSAGE_LENGTH = 4000;

const DIVIDER = "━━━━━━━━━━━━━━━━━━━━";
const MAX_TITLE_LENGTH = 200;
const MAX_EXCERPT_LENGTH = 200;
const MAX_SUMMARY_FIELD_LENGTH = 300;
const MAX_LISTED_FAILURES = 5;
const MAX_LINK_LENGTH = 1000;
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

export type DigestEntry = FeedPost & {
  summary?: ScqrSummary;
};

export type DigestMessageOptions = {
  // Feed URLs that failed to load
  failedFeeds?: string[];
  // Show the upgrade hint (summaries exist but this user's tier lacks them)
  showUpgradeHint?: boolean;
};

/**
 * Escape HTML special characters for Telegram
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Strip tags, decode common entities and collapse whitespace
 */
export function cleanHtml(text: string): string {
  return text
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&")
    .replace(/\s+/g, " ")
    .trim();
}

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, Math.max(0, maxLength - 3)).trimEnd()}...`;
}

/**
 * "Mar 10, 09:05" in UTC
 */
export function formatPostDate(timestamp: number): string {
  const date = new Date(timestamp);
  const day = String(date.getUTCDate()).padStart(2, "0");
  const hours = String(date.getUTCHours()).padStart(2, "0");
  const minutes = String(date.getUTCMinutes()).padStart(2, "0");
  return `${MONTHS[date.getUTCMonth()]} ${day}, ${hours}:${minutes}`;
}

function formatEntry(entry: DigestEntry, index: number): string {
  const lines = [
    `<b>${index}. ${escapeHtml(truncateText(entry.title, MAX_TITLE_LENGTH))}</b>`,
    `📰 ${escapeHtml(truncateText(entry.feedTitle, MAX_TITLE_LENGTH))} • ${formatPostDate(entry.publishedAt)}`,
  ];
  // A cut link is useless; very long ones are left out
  if (entry.link && entry.link.length <= MAX_LINK_LENGTH) {
    lines.push(`🔗 ${escapeHtml(entry.link)}`);
  }
  lines.push("");

  const summary = entry.summary;
  if (summary) {
    const field = (value: string) => escapeHtml(truncateText(value, MAX_SUMMARY_FIELD_LENGTH));
    lines.push(
      "<b>📋 SCQR Summary:</b>",
      `<b>S:</b> ${field(summary.situation)}`,
      `<b>C:</b> ${field(summary.complication)}`,
      `<b>Q:</b> ${field(summary.question)}`,
      `<b>R:</b> ${field(summary.resolution)}`,
    );
  } else if (entry.excerpt) {
    lines.push(`<i>${escapeHtml(truncateText(entry.excerpt, MAX_EXCERPT_LENGTH))}</i>`);
  }

  return `${lines.join("\n")}\n\n${DIVIDER}\n\n`;
}

function formatFooter(options: DigestMessageOptions): string {
  let footer = "";
  const failed = options.failedFeeds ?? [];
  if (failed.length > 0) {
    footer += `\n⚠️ Could not load ${failed.length} feed(s):\n`;
    footer += failed
      .slice(0, MAX_LISTED_FAILURES)
      .map((url) => `• ${escapeHtml(truncateText(url, MAX_TITLE_LENGTH))}`)
      .join("\n");
    footer += failed.length > MAX_LISTED_FAILURES ? "\n• …\n" : "\n";
  }
  if (options.showUpgradeHint) {
    footer += "\n💡 <i>Upgrade to get AI-powered SCQR summaries! /upgrade</i>";
  }
  return footer;
}

/**
 * Render a digest as Telegram HTML messages of at most MAX_MESSAGE_LENGTH
 * characters each. Entries are never split across messages and never dropped;
 * the footer closes the last message.
 */
export function buildDigestMessages(
  entries: DigestEntry[],
  options: DigestMessageOptions = {},
): string[] {
  const footer = formatFooter(options);
  if (entries.length === 0) {
    return [`📭 <b>No new posts</b> since your last digest.\n${footer}`];
  }

  const messages: string[] = [];
  let current = `📚 <b>Daily Digest</b> — ${entries.length} new post(s)\n${DIVIDER}\n\n`;
  let currentEntries = 0;
  for (const [i, entry] of entries.entries()) {
    const block = formatEntry(entry, i + 1);
    if (currentEntries > 0 && current.length + block.length > MAX_MESSAGE_LENGTH) {
      messages.push(current);
      current = "";
      currentEntries = 0;
    }
    current += block;
    currentEntries += 1;
  }

  if (current.length + footer.length > MAX_MESSAGE_LENGTH) {
    messages.push(current);
    current = footer.trimStart();
  } else {
    current += footer;
  }
  messages.push(current);
  return messages;
}
