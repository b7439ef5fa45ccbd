import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { SubscriptionTier } from "../telegram/user-store.types.js";
import { PaymentError, describeError } from "../errors.js";

export const STRIPE_API_BASE = "https://api.stripe.com/v1";
const DEFAULT_TIMEOUT_MS = 30_000;

export type PaidTier = Exclude<SubscriptionTier, "free">;

export type CheckoutRequest = {
  userId: string;
  tier: PaidTier;
  customerId: string | null;
};

export type CheckoutSession = {
  url: string;
  /** The customer the session bills; new when the request had none */
  customerId: string;
};

/**
 * Hosted checkout and billing-portal sessions
 */
export interface PaymentGateway {
  createCheckout(request: CheckoutRequest): Promise<CheckoutSession>;
  createPortal(customerId: string): Promise<string>;
}

export type StripeGatewayOptions = {
  secretKey: string;
  priceIds: Record<PaidTier, string>;
  publicUrl: string;
  apiBase?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

const StripeObjectSchema = Type.Object({ id: Type.String() });

const StripeSessionSchema = Type.Object({
  id: Type.String(),
  url: Type.String(),
});

type StripeSession = Static<typeof StripeSessionSchema>;

/**
 * Stripe REST client for subscription checkout. Requests are form-encoded.
 */
export class StripeGateway implements PaymentGateway {
  private readonly apiBase: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: StripeGatewayOptions) {
    this.apiBase = (options.apiBase ?? STRIPE_API_BASE).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async createCheckout(request: CheckoutRequest): Promise<CheckoutSession> {
    const customerId = request.customerId ?? (await this.createCustomer(request.userId));
    const session = await this.post(
      "checkout/sessions",
      {
        mode: "subscription",
        customer: customerId,
        client_reference_id: request.userId,
        "line_items[0][price]": this.options.priceIds[request.tier],
        "line_items[0][quantity]": "1",
        success_url: `${this.options.publicUrl}/success?user=${encodeURIComponent(request.userId)}`,
        cancel_url: `${this.options.publicUrl}/cancel`,
        "metadata[telegram_user_id]": request.userId,
        "metadata[tier]": request.tier,
        "subscription_data[metadata][telegram_user_id]": request.userId,
        "subscription_data[metadata][tier]": request.tier,
      },
      StripeSessionSchema,
    );
    return { url: session.url, customerId };
  }

  async createPortal(customerId: string): Promise<string> {
    const session: StripeSession = await this.post(
      "billing_portal/sessions",
      {
        customer: customerId,
        return_url: `${this.options.publicUrl}/`,
      },
      StripeSessionSchema,
    );
    return session.url;
  }

  private async createCustomer(userId: string): Promise<string> {
    const customer = await this.post(
      "customers",
      { "metadata[telegram_user_id]": userId },
      StripeObjectSchema,
    );
    return customer.id;
  }

  private async post<T extends TSchema>(
    endpoint: string,
    form: Record<string, string>,
    schema: T,
  ): Promise<Static<T>> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiBase}/${endpoint}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.secretKey}`,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams(form),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new PaymentError(`stripe ${endpoint} request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const rawBody = await response.text();
    if (!response.ok) {
      throw new PaymentError(`stripe ${endpoint} failed (${response.status}): ${rawBody.slice(0, 500)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody);
    } catch {
      throw new PaymentError(`stripe ${endpoint} returned non-JSON payload`);
    }
    if (!Value.Check(schema, parsed)) {
      throw new PaymentError(`stripe ${endpoint} returned an unexpected payload`);
    }
    return parsed;
  }
}
