import { Api, GrammyError, HttpError } from "grammy";
import type { Update } from "grammy/types";
import { DeliveryError, describeError } from "../errors.js";

const DEFAULT_TIMEOUT_SECONDS = 30;
const DEFAULT_POLL_TIMEOUT_SECONDS = 10;

export type IncomingMessage = {
  updateId: number;
  userId: string;
  chatId: string;
  text: string;
};

export interface ChatSender {
  send(chatId: string, html: string): Promise<void>;
}

export interface ChatTransport extends ChatSender {
  receive(): Promise<IncomingMessage[]>;
  /** Confirm updates up to `upToUpdateId`, or everything received so far. */
  acknowledge(upToUpdateId?: number): Promise<void>;
}

type TelegramApi = Pick<Api, "sendMessage" | "getUpdates" | "setMyCommands">;

export type BotCommandSpec = { command: string; description: string };

export const BOT_COMMANDS: BotCommandSpec[] = [
  { command: "start", description: "Welcome message and command list" },
  { command: "feedlist", description: "Show your subscribed feeds" },
  { command: "addfeed", description: "Add a feed: /addfeed <url>" },
  { command: "removefeed", description: "Remove a feed by number or URL" },
  { command: "digest", description: "Get your digest now" },
  { command: "status", description: "View your subscription status" },
  { command: "upgrade", description: "Upgrade for more feeds and AI summaries" },
  { command: "manage", description: "Manage billing" },
  { command: "help", description: "Show help" },
];

function describeTelegramError(error: unknown): string {
  if (error instanceof GrammyError) {
    return `${error.error_code} ${error.description}`;
  }
  if (error instanceof HttpError) {
    return `network error: ${describeError(error.error)}`;
  }
  return describeError(error);
}

/**
 * Map raw updates to text messages. Updates without text or sender are dropped.
 */
export function toIncomingMessages(updates: Update[]): IncomingMessage[] {
  const messages: IncomingMessage[] = [];
  for (const update of updates) {
    const message = update.message;
    if (!message?.text || !message.from) {
      continue;
    }
    messages.push({
      updateId: update.update_id,
      userId: String(message.from.id),
      chatId: String(message.chat.id),
      text: message.text,
    });
  }
  return messages;
}

/**
 * Bot API transport: HTML messages out, long-polled updates in
 */
export class TelegramTransport implements ChatTransport {
  private offset: number | undefined;

  constructor(
    private readonly api: TelegramApi,
    private readonly pollTimeoutSeconds: number = DEFAULT_POLL_TIMEOUT_SECONDS,
  ) {}

  static fromToken(token: string): TelegramTransport {
    return new TelegramTransport(new Api(token, { timeoutSeconds: DEFAULT_TIMEOUT_SECONDS }));
  }

  async send(chatId: string, html: string): Promise<void> {
    try {
      await this.api.sendMessage(chatId, html, {
        parse_mode: "HTML",
        link_preview_options: { is_disabled: true },
      });
    } catch (error) {
      throw new DeliveryError(`sendMessage to ${chatId} failed: ${describeTelegramError(error)}`, {
        cause: error,
      });
    }
  }

  async receive(): Promise<IncomingMessage[]> {
    let updates: Update[];
    try {
      updates = await this.api.getUpdates({
        offset: this.offset,
        timeout: this.pollTimeoutSeconds,
        allowed_updates: ["message"],
      });
    } catch (error) {
      throw new DeliveryError(`getUpdates failed: ${describeTelegramError(error)}`, { cause: error });
    }
    for (const update of updates) {
      this.offset = Math.max(this.offset ?? 0, update.update_id + 1);
    }
    return toIncomingMessages(updates);
  }

  /**
   * Telegram only forgets updates once a later getUpdates call carries a
   * higher offset. The one update this call may return stays unconfirmed.
   */
  async acknowledge(upToUpdateId?: number): Promise<void> {
    const offset = upToUpdateId === undefined ? this.offset : upToUpdateId + 1;
    if (offset === undefined) {
      return;
    }
    try {
      await this.api.getUpdates({ offset, timeout: 0, limit: 1 });
    } catch (error) {
      throw new DeliveryError(`getUpdates confirm failed: ${describeTelegramError(error)}`, {
        cause: error,
      });
    }
  }

  async registerCommands(commands: BotCommandSpec[] = BOT_COMMANDS): Promise<void> {
    try {
      await this.api.setMyCommands(commands);
    } catch (error) {
      throw new DeliveryError(`setMyCommands failed: ${describeTelegramError(error)}`, {
        cause: error,
      });
    }
  }
}
