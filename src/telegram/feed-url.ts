/**
 * Feed URL validation.
 *
 * Rejects targets a bot on a shared host should never fetch (loopback, private
 * networks, link-local, intranet names) and normalizes newsletter hosts to
 * their feed endpoint. Purely syntactic: no DNS lookups.
 */

export type FeedUrlRejection = "MalformedUrl" | "InvalidScheme" | "PrivateAddress" | "UnsupportedHost";

export type FeedUrlResult =
  | { ok: true; url: string }
  | { ok: false; reason: FeedUrlRejection; message: string };

// http on these hosts (and subdomains) is rewritten to https
const HTTPS_UPGRADE_HOSTS = ["substack.com", "medium.com", "ghost.io"];
// Newsletter hosts whose feed lives at /feed
const FEED_PATH_HOSTS = ["substack.com"];
const INTRANET_SUFFIXES = [".local", ".internal", ".lan", ".home.arpa"];

// [network, prefix length]
const PRIVATE_IPV4_RANGES: ReadonlyArray<readonly [string, number]> = [
  ["0.0.0.0", 8],
  ["10.0.0.0", 8],
  ["100.64.0.0", 10],
  ["127.0.0.0", 8],
  ["169.254.0.0", 16],
  ["172.16.0.0", 12],
  ["192.0.0.0", 24],
  ["192.168.0.0", 16],
  ["198.18.0.0", 15],
  ["224.0.0.0", 3], // multicast, reserved, broadcast
];

const REJECTION_MESSAGES: Record<FeedUrlRejection, string> = {
  MalformedUrl: "Invalid URL format.",
  InvalidScheme: "Only https:// feed URLs are supported.",
  PrivateAddress: "URL not allowed for security reasons.",
  UnsupportedHost: "This host is not supported.",
};

function reject(reason: FeedUrlRejection): FeedUrlResult {
  return { ok: false, reason, message: REJECTION_MESSAGES[reason] };
}

function matchesHost(hostname: string, domains: readonly string[]): boolean {
  return domains.some((domain) => hostname === domain || hostname.endsWith(`.${domain}`));
}

function parseIpv4(address: string): number | null {
  const parts = address.split(".");
  if (parts.length !== 4) {
    return null;
  }
  let value = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) {
      return null;
    }
    const octet = Number(part);
    if (octet > 255) {
      return null;
    }
    value = value * 256 + octet;
  }
  return value;
}

function isPrivateIpv4(value: number): boolean {
  return PRIVATE_IPV4_RANGES.some(([network, prefix]) => {
    const base = parseIpv4(network) ?? 0;
    const size = 2 ** (32 - prefix);
    return value >= base && value < base + size;
  });
}

/**
 * Expand a serialized IPv6 literal (without brackets) into eight 16-bit groups.
 * WHATWG URL parsing always serializes IPv6 hosts as compressed hex groups.
 */
function expandIpv6(address: string): number[] | null {
  const halves = address.toLowerCase().split("::");
  if (halves.length > 2) {
    return null;
  }
  const parseGroups = (chunk: string | undefined): number[] | null => {
    if (!chunk) {
      return [];
    }
    const out: number[] = [];
    for (const group of chunk.split(":")) {
      if (!/^[0-9a-f]{1,4}$/.test(group)) {
        return null;
      }
      out.push(Number.parseInt(group, 16));
    }
    return out;
  };

  const head = parseGroups(halves[0]);
  const tail = halves.length === 2 ? parseGroups(halves[1]) : [];
  if (!head || !tail) {
    return null;
  }
  const padding = halves.length === 2 ? 8 - head.length - tail.length : 0;
  if (padding < 0) {
    return null;
  }
  const groups = [...head, ...new Array<number>(padding).fill(0), ...tail];
  return groups.length === 8 ? groups : null;
}

function isPrivateIpv6(groups: number[]): boolean {
  const [first = 0, , , , , sixth = 0, seventh = 0, eighth = 0] = groups;
  const leadingZeros = groups.slice(0, 5).every((group) => group === 0);

  if (groups.every((group) => group === 0)) {
    return true; // ::
  }
  if (groups.slice(0, 7).every((group) => group === 0) && eighth === 1) {
    return true; // ::1
  }
  if ((first & 0xfe00) === 0xfc00) {
    return true; // unique local
  }
  if ((first & 0xffc0) === 0xfe80) {
    return true; // link-local
  }
  if (leadingZeros && (sixth === 0xffff || sixth === 0)) {
    // IPv4-mapped or IPv4-compatible
    return isPrivateIpv4(seventh * 65536 + eighth);
  }
  return false;
}

function isPrivateHost(hostname: string): boolean {
  if (hostname === "localhost" || hostname.endsWith(".localhost")) {
    return true;
  }
  if (hostname.startsWith("[") && hostname.endsWith("]")) {
    const groups = expandIpv6(hostname.slice(1, -1));
    // Unparseable literals are not fetched either
    return groups === null || isPrivateIpv6(groups);
  }
  const ipv4 = parseIpv4(hostname);
  return ipv4 !== null && isPrivateIpv4(ipv4);
}

function isIpLiteral(hostname: string): boolean {
  return hostname.startsWith("[") || parseIpv4(hostname) !== null;
}

/**
 * Validate and normalize a candidate feed URL
 */
export function validateFeedUrl(input: string): FeedUrlResult {
  const trimmed = input.trim();
  if (trimmed === "") {
    return reject("MalformedUrl");
  }

  // "host:port/path" has no scheme; "javascript:..." does
  const hasScheme = /^[a-z][a-z0-9+.-]*:(?!\d)/i.test(trimmed);
  let url: URL;
  try {
    url = new URL(hasScheme ? trimmed : `https://${trimmed}`);
  } catch {
    return reject("MalformedUrl");
  }

  const hostname = url.hostname.toLowerCase().replace(/\.$/, "");
  if (hostname !== "") {
    if (isPrivateHost(hostname)) {
      return reject("PrivateAddress");
    }
    if (url.username !== "" || url.password !== "") {
      return reject("UnsupportedHost");
    }
    if (!isIpLiteral(hostname)) {
      if (!hostname.includes(".") || INTRANET_SUFFIXES.some((suffix) => hostname.endsWith(suffix))) {
        return reject("UnsupportedHost");
      }
    }
  }

  if (url.protocol === "http:" && matchesHost(hostname, HTTPS_UPGRADE_HOSTS)) {
    url.protocol = "https:";
  }
  if (url.protocol !== "https:") {
    return reject("InvalidScheme");
  }

  if (matchesHost(hostname, FEED_PATH_HOSTS)) {
    const path = url.pathname.replace(/\/+$/, "");
    if (!path.endsWith("/feed")) {
      url.pathname = `${path}/feed`;
    }
  }

  url.hash = "";
  return { ok: true, url: url.href };
}
