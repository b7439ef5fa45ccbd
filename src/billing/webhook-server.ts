import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { ChatSender } from "../telegram/telegram-transport.js";
import type { UserStateStore } from "../telegram/user-store.js";
import type { BotLogger } from "../logging.js";
import { PersistenceError, describeError } from "../errors.js";
import { escapeHtml } from "../digest/format.js";
import { getChildLogger } from "../logging.js";
import { parseStripeEvent, verifyStripeSignature, type SignatureCheck } from "./stripe-webhook.js";
import { applySubscriptionEvent, type SubscriptionEventOutcome } from "./subscription-events.js";

export const STRIPE_WEBHOOK_PATH = "/webhook/stripe";
const MAX_BODY_BYTES = 1024 * 1024;

export type WebhookServerDeps = {
  store: UserStateStore;
  webhookSecret: string;
  sender?: ChatSender;
  adminIds: string[];
  log?: BotLogger;
  now?: () => number;
};

type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

class PayloadTooLargeError extends Error {
  override readonly name = "PayloadTooLargeError";
}

function mapSignatureErrorToMessage(error: Exclude<SignatureCheck, { ok: true }>["error"]): string {
  switch (error) {
    case "missing":
      return "Missing signature";
    case "expired":
      return "Signature timestamp outside tolerance";
    case "signature":
      return "Invalid signature";
    case "invalid":
    default:
      return "Malformed signature header";
  }
}

function sendJson(res: ServerResponse, status: number, body: Record<string, string>): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(body));
}

function sendMethodNotAllowed(res: ServerResponse, allow: string): void {
  res.statusCode = 405;
  res.setHeader("Allow", allow);
  res.setHeader("Content-Type", "text/plain; charset=utf-8");
  res.end("Method Not Allowed");
}

export function sendHtmlPage(params: {
  res: ServerResponse;
  status: number;
  title: string;
  message: string;
}): void {
  const title = escapeHtml(params.title);
  const message = escapeHtml(params.message);
  params.res.statusCode = params.status;
  params.res.setHeader("Content-Type", "text/html; charset=utf-8");
  params.res.end(`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title}</title>
  </head>
  <body>
    <main>
      <h1>${title}</h1>
      <p>${message}</p>
    </main>
  </body>
</html>`);
}

async function readRawBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new PayloadTooLargeError(`request body exceeds ${MAX_BODY_BYTES} bytes`);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Routes for the billing webhook, checkout landing pages and health checks
 */
export function createWebhookHandler(deps: WebhookServerDeps): RequestHandler {
  const log = deps.log ?? getChildLogger({ module: "webhook" });
  const now = deps.now ?? Date.now;

  // One state writer at a time: each event loads what the previous one saved
  let stateQueue: Promise<void> = Promise.resolve();
  const withStateLock = <T>(task: () => Promise<T>): Promise<T> => {
    const run = stateQueue.then(task);
    // The caller sees the failure through `run`; the queue only waits for it
    stateQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };

  const handleStripeWebhook = async (req: IncomingMessage, res: ServerResponse) => {
    let payload: string;
    try {
      payload = await readRawBody(req);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        sendJson(res, 413, { error: "Payload too large" });
        return;
      }
      throw error;
    }

    const signatureHeader = req.headers["stripe-signature"];
    const verified = verifyStripeSignature({
      payload,
      header: Array.isArray(signatureHeader) ? signatureHeader[0] : signatureHeader,
      secret: deps.webhookSecret,
      nowMs: now(),
    });
    if (!verified.ok) {
      log.warn(`Rejected webhook: ${mapSignatureErrorToMessage(verified.error)}`);
      sendJson(res, 400, { error: mapSignatureErrorToMessage(verified.error) });
      return;
    }

    const parsed = parseStripeEvent(payload);
    if (!parsed.ok) {
      sendJson(res, 400, { error: parsed.error });
      return;
    }
    if (!parsed.event) {
      sendJson(res, 200, { status: "ignored" });
      return;
    }
    const event = parsed.event;

    let outcome: SubscriptionEventOutcome;
    try {
      outcome = await withStateLock(async () => {
        const state = await deps.store.load();
        const applied = applySubscriptionEvent(state, event, now(), { adminIds: deps.adminIds });
        if (applied.status === "applied" && applied.changed) {
          await deps.store.save(state);
        }
        return applied;
      });
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      log.error(`Webhook ${event.id} (${event.type}) not persisted: ${error.message}`);
      // Stripe retries on 5xx
      sendJson(res, 500, { error: "Event processing failed" });
      return;
    }

    if (outcome.status === "ignored") {
      log.info(`Webhook ${event.id} (${event.type}) ignored: ${outcome.reason}`);
      sendJson(res, 200, { status: "ignored" });
      return;
    }

    log.info(`Webhook ${event.id} (${event.type}) applied to ${outcome.userId}`);
    if (outcome.notice && deps.sender) {
      try {
        await deps.sender.send(outcome.userId, outcome.notice);
      } catch (error) {
        log.warn(`Failed to notify ${outcome.userId}: ${describeError(error)}`);
      }
    }
    sendJson(res, 200, { status: "ok" });
  };

  return async (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    try {
      switch (url.pathname) {
        case STRIPE_WEBHOOK_PATH:
          if (method !== "POST") {
            sendMethodNotAllowed(res, "POST");
            return;
          }
          await handleStripeWebhook(req, res);
          return;
        case "/health":
          if (method !== "GET") {
            sendMethodNotAllowed(res, "GET");
            return;
          }
          sendJson(res, 200, { status: "healthy" });
          return;
        case "/success":
          sendHtmlPage({
            res,
            status: 200,
            title: "Payment Received",
            message: "Thanks! Your subscription will be active in a moment. You can return to Telegram.",
          });
          return;
        case "/cancel":
          sendHtmlPage({
            res,
            status: 200,
            title: "Checkout Cancelled",
            message: "No charge was made. Use /upgrade in Telegram whenever you're ready.",
          });
          return;
        default:
          sendJson(res, 404, { error: "Not found" });
      }
    } catch (error) {
      log.error(`${method} ${url.pathname} failed: ${describeError(error)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal error" });
      }
    }
  };
}

/**
 * Listen on `port`; resolves once the server is accepting connections
 */
export function startWebhookServer(
  deps: WebhookServerDeps,
  port: number,
  host?: string,
): Promise<Server> {
  const handler = createWebhookHandler(deps);
  const log = deps.log ?? getChildLogger({ module: "webhook" });
  const server = createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      log.error(`Unhandled webhook error: ${describeError(error)}`);
      res.destroy();
    });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
