import { isAbsolute, join } from "node:path";
import type { RateLimitConfig } from "./telegram/rate-limit.js";
import { DEFAULT_RATE_LIMITS } from "./telegram/rate-limit.js";
import { DEFAULT_MAX_FAILED_ATTEMPTS } from "./telegram/access-control.js";
import { parseAdminTelegramIds } from "./telegram/owner-config.js";

const DEFAULT_STATE_FILE = "user_state.json";
const DEFAULT_SUMMARY_MODEL = "claude-3-5-haiku-latest";
const DEFAULT_LOOKBACK_HOURS = 24;
const DEFAULT_MAX_SUMMARIES = 10;
const DEFAULT_PORT = 8080;
const DEFAULT_COMMAND_POLL_SECONDS = 300;

export type StripeConfig = {
  secretKey: string;
  priceIds: { basic: string; pro: string };
};

export type BotConfig = {
  telegramToken?: string;
  stateFile: string;
  adminIds: string[];
  anthropicApiKey?: string;
  summaryModel: string;
  lookbackHours: number;
  maxSummaries: number;
  maxFailedAttempts: number;
  rateLimits: RateLimitConfig;
  stripe?: StripeConfig;
  stripeWebhookSecret?: string;
  publicUrl?: string;
  port: number;
  commandPollSeconds: number;
};

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(1, Math.floor(value));
}

function readOptional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function resolveStateFile(env: NodeJS.ProcessEnv): string {
  const file = readOptional(env, "STATE_FILE") ?? DEFAULT_STATE_FILE;
  const dataDir = readOptional(env, "DATA_DIR");
  if (!dataDir || isAbsolute(file)) {
    return file;
  }
  return join(dataDir, file);
}

function normalizePublicUrl(raw: string | undefined): string | undefined {
  if (!raw) {
    return undefined;
  }
  const candidate = /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;
  try {
    const parsed = new URL(candidate);
    return parsed.toString().replace(/\/+$/, "");
  } catch {
    return undefined;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const stripeSecretKey = readOptional(env, "STRIPE_SECRET_KEY");
  const stripeWebhookSecret = readOptional(env, "STRIPE_WEBHOOK_SECRET");

  return {
    telegramToken: readOptional(env, "TELEGRAM_BOT_TOKEN"),
    stateFile: resolveStateFile(env),
    adminIds: parseAdminTelegramIds(env.ADMIN_TELEGRAM_IDS),
    anthropicApiKey: readOptional(env, "ANTHROPIC_API_KEY"),
    summaryModel: readOptional(env, "SUMMARY_MODEL") ?? DEFAULT_SUMMARY_MODEL,
    lookbackHours: readPositiveInt(env, "DIGEST_LOOKBACK_HOURS", DEFAULT_LOOKBACK_HOURS),
    maxSummaries: readPositiveInt(env, "DIGEST_MAX_SUMMARIES", DEFAULT_MAX_SUMMARIES),
    maxFailedAttempts: readPositiveInt(
      env,
      "SECURITY_MAX_FAILED_ATTEMPTS",
      DEFAULT_MAX_FAILED_ATTEMPTS,
    ),
    rateLimits: {
      command: {
        ...DEFAULT_RATE_LIMITS.command,
        limit: readPositiveInt(
          env,
          "RATE_LIMIT_COMMANDS_PER_MINUTE",
          DEFAULT_RATE_LIMITS.command.limit,
        ),
      },
      feedAdd: {
        ...DEFAULT_RATE_LIMITS.feedAdd,
        limit: readPositiveInt(
          env,
          "RATE_LIMIT_FEED_ADDS_PER_HOUR",
          DEFAULT_RATE_LIMITS.feedAdd.limit,
        ),
      },
      digestRequest: {
        ...DEFAULT_RATE_LIMITS.digestRequest,
        limit: readPositiveInt(
          env,
          "RATE_LIMIT_DIGESTS_PER_HOUR",
          DEFAULT_RATE_LIMITS.digestRequest.limit,
        ),
      },
    },
    stripe: stripeSecretKey
      ? {
          secretKey: stripeSecretKey,
          priceIds: {
            basic: readOptional(env, "STRIPE_PRICE_BASIC") ?? "price_basic_monthly",
            pro: readOptional(env, "STRIPE_PRICE_PRO") ?? "price_pro_monthly",
          },
        }
      : undefined,
    stripeWebhookSecret,
    publicUrl: normalizePublicUrl(readOptional(env, "PUBLIC_URL")),
    port: readPositiveInt(env, "PORT", DEFAULT_PORT),
    commandPollSeconds: readPositiveInt(env, "COMMAND_POLL_SECONDS", DEFAULT_COMMAND_POLL_SECONDS),
  };
}
