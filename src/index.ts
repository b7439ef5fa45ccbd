#!/usr/bin/env node
/**
 * Feed digest bot entry point.
 *
 * Usage:
 *   feed-digest-bot                          send today's digests
 *   feed-digest-bot --commands [--duration=N] poll chat commands for N seconds
 *   feed-digest-bot --webhook                 serve the Stripe webhook
 */
import type { BotConfig } from "./config.js";
import { StripeGateway } from "./billing/stripe.js";
import { startWebhookServer } from "./billing/webhook-server.js";
import { loadConfig } from "./config.js";
import { DigestBuilder } from "./digest/digest-builder.js";
import { RssFeedFetcher } from "./digest/feed-fetcher.js";
import { AnthropicSummarizer } from "./digest/summarizer.js";
import { PersistenceError, describeError } from "./errors.js";
import { getLogger } from "./logging.js";
import { CommandProcessor } from "./telegram/bot-commands.js";
import { createTelegramMessageProcessor, pollCommands } from "./telegram/bot-message.js";
import { TelegramTransport } from "./telegram/telegram-transport.js";
import { JsonUserStore } from "./telegram/user-store.js";
import { parseRunMode } from "./run-mode.js";

function requireToken(config: BotConfig): string {
  if (!config.telegramToken) {
    throw new Error("TELEGRAM_BOT_TOKEN is required");
  }
  return config.telegramToken;
}

async function runDigestMode(config: BotConfig): Promise<void> {
  const log = getLogger();
  const transport = TelegramTransport.fromToken(requireToken(config));
  const summarizer = config.anthropicApiKey
    ? new AnthropicSummarizer({ apiKey: config.anthropicApiKey, model: config.summaryModel })
    : undefined;
  if (!summarizer) {
    log.info("ANTHROPIC_API_KEY not set, AI summaries disabled");
  }

  const builder = new DigestBuilder({
    store: new JsonUserStore(config.stateFile),
    fetcher: new RssFeedFetcher(),
    sender: transport,
    summarizer,
    adminIds: config.adminIds,
    lookbackHours: config.lookbackHours,
    maxSummaries: config.maxSummaries,
  });
  await builder.runDigest();
}

async function runCommandMode(config: BotConfig, durationSeconds: number): Promise<void> {
  const log = getLogger();
  const transport = TelegramTransport.fromToken(requireToken(config));
  const store = new JsonUserStore(config.stateFile);
  const payments =
    config.stripe && config.publicUrl
      ? new StripeGateway({
          secretKey: config.stripe.secretKey,
          priceIds: config.stripe.priceIds,
          publicUrl: config.publicUrl,
        })
      : undefined;
  if (!payments) {
    log.info("Stripe not configured, /upgrade and /manage are disabled");
  }

  const digestBuilder = new DigestBuilder({
    store,
    fetcher: new RssFeedFetcher(),
    sender: transport,
    summarizer: config.anthropicApiKey
      ? new AnthropicSummarizer({ apiKey: config.anthropicApiKey, model: config.summaryModel })
      : undefined,
    adminIds: config.adminIds,
    lookbackHours: config.lookbackHours,
    maxSummaries: config.maxSummaries,
  });
  const processor = new CommandProcessor({
    store,
    digestBuilder,
    payments,
    adminIds: config.adminIds,
    rateLimits: config.rateLimits,
    maxFailedAttempts: config.maxFailedAttempts,
  });

  try {
    await transport.registerCommands();
  } catch (error) {
    log.warn(`Could not register bot commands: ${describeError(error)}`);
  }

  log.info(`Polling commands for ${durationSeconds}s`);
  await pollCommands({
    transport,
    processMessage: createTelegramMessageProcessor({ processor, sender: transport }),
    durationMs: durationSeconds * 1000,
  });
}

async function runWebhookMode(config: BotConfig): Promise<void> {
  const log = getLogger();
  if (!config.stripeWebhookSecret) {
    throw new Error("STRIPE_WEBHOOK_SECRET is required");
  }
  const sender = config.telegramToken ? TelegramTransport.fromToken(config.telegramToken) : undefined;
  if (!sender) {
    log.warn("TELEGRAM_BOT_TOKEN not set, subscription notices will not be sent");
  }

  const server = await startWebhookServer(
    {
      store: new JsonUserStore(config.stateFile),
      webhookSecret: config.stripeWebhookSecret,
      sender,
      adminIds: config.adminIds,
    },
    config.port,
  );
  log.info(`Webhook server listening on port ${config.port}`);

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down webhook server`);
    server.close((error) => {
      if (error) {
        log.error(`Webhook server close failed: ${describeError(error)}`);
        process.exitCode = 1;
      }
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const config = loadConfig();
  const mode = parseRunMode(argv, config.commandPollSeconds);
  switch (mode.kind) {
    case "digest":
      await runDigestMode(config);
      return;
    case "commands":
      await runCommandMode(config, mode.durationSeconds);
      return;
    case "webhook":
      await runWebhookMode(config);
      return;
    default: {
      const _exhaustive: never = mode;
      return _exhaustive;
    }
  }
}

main().catch((error: unknown) => {
  const log = getLogger();
  if (error instanceof PersistenceError) {
    log.fatal(`State could not be persisted: ${error.message}`);
  } else {
    log.fatal(`Bot failed: ${describeError(error)}`);
  }
  process.exitCode = 1;
});
