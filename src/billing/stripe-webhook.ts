import { createHmac, timingSafeEqual } from "node:crypto";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { SubscriptionTier } from "../telegram/user-store.types.js";
import { isTier } from "../telegram/user-tiers.js";

export const STRIPE_SIGNATURE_TOLERANCE_SECONDS = 300;

export const SUBSCRIPTION_EVENT_TYPES = [
  "checkout.session.completed",
  "customer.subscription.updated",
  "customer.subscription.deleted",
  "invoice.payment_failed",
] as const;

export type SubscriptionEventType = (typeof SUBSCRIPTION_EVENT_TYPES)[number];

/**
 * Billing event reduced to what the subscription policy needs
 */
export type SubscriptionEvent = {
  id: string;
  type: SubscriptionEventType;
  customerId: string | null;
  subscriptionId: string | null;
  tier: SubscriptionTier | null;
  expiresAt: number | null; // ms; null when the event carries no period end
  userId: string | null;
  status: string | null;
};

export type SignatureCheck =
  | { ok: true }
  | { ok: false; error: "missing" | "invalid" | "signature" | "expired" };

const StripeEventSchema = Type.Object({
  id: Type.String(),
  type: Type.String(),
  data: Type.Object({
    object: Type.Object({
      id: Type.Optional(Type.String()),
      // Expanded objects are ignored; only ids are used
      customer: Type.Optional(Type.Unknown()),
      subscription: Type.Optional(Type.Unknown()),
      client_reference_id: Type.Optional(Type.Union([Type.String(), Type.Null()])),
      status: Type.Optional(Type.String()),
      current_period_end: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
      metadata: Type.Optional(
        Type.Union([Type.Record(Type.String(), Type.String()), Type.Null()]),
      ),
    }),
  }),
});

type StripeEventObject = Static<typeof StripeEventSchema>["data"]["object"];

function signatureForPayload(signedPayload: string, secret: string): string {
  return createHmac("sha256", secret).update(signedPayload).digest("hex");
}

function safeEqualStrings(left: string, right: string): boolean {
  const a = Buffer.from(left);
  const b = Buffer.from(right);
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}

/**
 * Verify a `Stripe-Signature` header (`t=<unix>,v1=<hex>[,v1=...]`) over the raw body
 */
export function verifyStripeSignature(params: {
  payload: string;
  header: string | undefined;
  secret: string;
  nowMs?: number;
  toleranceSeconds?: number;
}): SignatureCheck {
  const header = params.header?.trim() ?? "";
  if (!header) {
    return { ok: false, error: "missing" };
  }

  let timestamp: number | null = null;
  const signatures: string[] = [];
  for (const part of header.split(",")) {
    const sep = part.indexOf("=");
    if (sep <= 0) {
      continue;
    }
    const key = part.slice(0, sep).trim();
    const value = part.slice(sep + 1).trim();
    if (key === "t" && /^\d+$/.test(value)) {
      timestamp = Number(value);
    } else if (key === "v1" && value) {
      signatures.push(value);
    }
  }
  if (timestamp === null || signatures.length === 0) {
    return { ok: false, error: "invalid" };
  }

  const expected = signatureForPayload(`${timestamp}.${params.payload}`, params.secret);
  if (!signatures.some((signature) => safeEqualStrings(signature, expected))) {
    return { ok: false, error: "signature" };
  }

  const nowSeconds = Math.floor((params.nowMs ?? Date.now()) / 1000);
  const tolerance = params.toleranceSeconds ?? STRIPE_SIGNATURE_TOLERANCE_SECONDS;
  if (Math.abs(nowSeconds - timestamp) > tolerance) {
    return { ok: false, error: "expired" };
  }
  return { ok: true };
}

function isSubscriptionEventType(value: string): value is SubscriptionEventType {
  return SUBSCRIPTION_EVENT_TYPES.some((type) => type === value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

function paidTierOrNull(value: string | undefined): SubscriptionTier | null {
  return isTier(value) && value !== "free" ? value : null;
}

function periodEnd(object: StripeEventObject): number | null {
  const end = object.current_period_end;
  return typeof end === "number" && end > 0 ? end * 1000 : null;
}

/**
 * Decode a webhook body. Unhandled event types yield `event: null`.
 */
export function parseStripeEvent(
  payload: string,
): { ok: true; event: SubscriptionEvent | null } | { ok: false; error: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return { ok: false, error: "Invalid JSON" };
  }
  if (!Value.Check(StripeEventSchema, parsed)) {
    return { ok: false, error: "Invalid event payload" };
  }
  if (!isSubscriptionEventType(parsed.type)) {
    return { ok: true, event: null };
  }

  const object = parsed.data.object;
  const metadata: Record<string, string> = object.metadata ?? {};
  const customerId = stringOrNull(object.customer);
  const userId = stringOrNull(metadata.telegram_user_id) ?? stringOrNull(object.client_reference_id);
  const base = {
    id: parsed.id,
    type: parsed.type,
    customerId,
    userId,
    status: object.status ?? null,
  };

  switch (parsed.type) {
    case "checkout.session.completed":
      return {
        ok: true,
        event: {
          ...base,
          subscriptionId: stringOrNull(object.subscription),
          tier: paidTierOrNull(metadata.tier),
          expiresAt: null,
        },
      };
    case "customer.subscription.updated":
    case "customer.subscription.deleted":
      return {
        ok: true,
        event: {
          ...base,
          subscriptionId: stringOrNull(object.id),
          tier: paidTierOrNull(metadata.tier) ?? "basic",
          expiresAt: periodEnd(object),
        },
      };
    case "invoice.payment_failed":
      return {
        ok: true,
        event: {
          ...base,
          subscriptionId: stringOrNull(object.subscription),
          tier: null,
          expiresAt: null,
        },
      };
    default: {
      const _exhaustive: never = parsed.type;
      return _exhaustive;
    }
  }
}
