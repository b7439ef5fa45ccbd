const CHAT_ID_PATTERN = /^-?\d+$/;

/**
 * Parse admin Telegram IDs from environment variable
 * Format: comma-separated list of chat IDs
 * Example: "123456789,987654321"
 */
export function parseAdminTelegramIds(envValue: string | undefined): string[] {
  if (!envValue || envValue.trim() === "") {
    return [];
  }

  const ids = envValue
    .split(",")
    .map((id) => id.trim())
    .filter((id) => CHAT_ID_PATTERN.test(id));
  return [...new Set(ids)];
}

/**
 * Check if a chat ID is an admin
 */
export function isAdmin(userId: string, adminIds: readonly string[]): boolean {
  return adminIds.includes(userId);
}

/**
 * Whether a string looks like a Telegram chat ID
 */
export function isChatId(value: string): boolean {
  return CHAT_ID_PATTERN.test(value);
}
