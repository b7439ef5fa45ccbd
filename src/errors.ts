/**
 * Error taxonomy shared by the command, digest and billing paths.
 *
 * User-facing errors (validation, rate limits, security violations) are turned
 * into replies. Collaborator errors are logged and degraded around.
 * A PersistenceError is fatal for the invocation.
 */

export class ValidationError extends Error {
  override readonly name = "ValidationError";
}

export class RateLimitError extends Error {
  override readonly name = "RateLimitError";

  constructor(
    message: string,
    readonly retryAfterMs: number,
  ) {
    super(message);
  }
}

/** `message` is the reply; `attempt` describes what was tried, for the log. */
export class SecurityViolation extends Error {
  override readonly name = "SecurityViolation";

  constructor(
    message: string,
    readonly attempt: string,
  ) {
    super(message);
  }
}

export class PersistenceError extends Error {
  override readonly name = "PersistenceError";
}

/** Failure of an external collaborator (feed host, summarizer, Telegram, Stripe). */
export class CollaboratorError extends Error {
  override readonly name: string = "CollaboratorError";
}

export class FetchError extends CollaboratorError {
  override readonly name = "FetchError";
}

export class SummarizerError extends CollaboratorError {
  override readonly name = "SummarizerError";
}

export class DeliveryError extends CollaboratorError {
  override readonly name = "DeliveryError";
}

export class PaymentError extends CollaboratorError {
  override readonly name = "PaymentError";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
