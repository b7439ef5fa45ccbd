import type { BotLogger } from "../logging.js";
import type { CommandProcessor } from "./bot-commands.js";
import type { ChatSender, ChatTransport, IncomingMessage } from "./telegram-transport.js";
import { PersistenceError, describeError } from "../errors.js";
import { getChildLogger } from "../logging.js";

const RECEIVE_RETRY_DELAY_MS = 1_000;

/** Dependencies injected once when creating the message processor. */
type TelegramMessageProcessorDeps = {
  processor: Pick<CommandProcessor, "handle">;
  sender: ChatSender;
  log?: BotLogger;
  now?: () => number;
};

export type MessageProcessor = (message: IncomingMessage) => Promise<void>;

/**
 * Runs one incoming message through the command processor and sends the reply.
 * Only persistence failures escape.
 */
export const createTelegramMessageProcessor = (
  deps: TelegramMessageProcessorDeps,
): MessageProcessor => {
  const log = deps.log ?? getChildLogger({ module: "messages" });
  const now = deps.now ?? Date.now;

  return async (message) => {
    const { reply } = await deps.processor.handle({
      userId: message.userId,
      text: message.text,
      now: now(),
    });
    if (reply === null) {
      return;
    }
    try {
      await deps.sender.send(message.chatId, reply);
    } catch (error) {
      log.warn(`Reply to ${message.chatId} failed: ${describeError(error)}`);
    }
  };
};

export type PollCommandsOptions = {
  transport: Pick<ChatTransport, "receive" | "acknowledge">;
  processMessage: MessageProcessor;
  durationMs: number;
  log?: BotLogger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Long-poll for commands until `durationMs` has elapsed, then confirm the
 * handled updates so the next run does not see them again. Returns the number
 * of messages processed.
 */
export async function pollCommands(options: PollCommandsOptions): Promise<number> {
  const log = options.log ?? getChildLogger({ module: "messages" });
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const deadline = now() + options.durationMs;
  let processed = 0;
  let lastHandled: number | undefined;

  const acknowledge = async (upToUpdateId?: number) => {
    try {
      await options.transport.acknowledge(upToUpdateId);
    } catch (error) {
      log.warn(`Could not confirm handled updates: ${describeError(error)}`);
    }
  };

  while (now() < deadline) {
    let messages: IncomingMessage[];
    try {
      messages = await options.transport.receive();
    } catch (error) {
      log.warn(`Polling failed: ${describeError(error)}`);
      await sleep(RECEIVE_RETRY_DELAY_MS);
      continue;
    }

    for (const message of messages) {
      try {
        await options.processMessage(message);
      } catch (error) {
        if (error instanceof PersistenceError) {
          // This message was not saved; only the ones before it are confirmed
          if (lastHandled !== undefined) {
            await acknowledge(lastHandled);
          }
          throw error;
        }
        log.error(`Message ${message.updateId} from ${message.userId} failed: ${describeError(error)}`);
      }
      lastHandled = message.updateId;
      processed += 1;
    }
  }

  await acknowledge();

  log.info(`Command polling finished: ${processed} message(s) processed`);
  return processed;
}
