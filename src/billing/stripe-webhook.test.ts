import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import { parseStripeEvent, verifyStripeSignature } from "./stripe-webhook.js";

const SECRET = "test-secret";
const NOW_MS = 1_710_000_000_000;
const NOW_SECONDS = NOW_MS / 1000;

function sign(payload: string, timestamp: number, secret = SECRET): string {
  const digest = createHmac("sha256", secret).update(`${timestamp}.${payload}`).digest("hex");
  return `t=${timestamp},v1=${digest}`;
}

describe("verifyStripeSignature", () => {
  const payload = JSON.stringify({ id: "evt_1", type: "ping" });

  it("accepts a fresh valid signature", () => {
    expect(
      verifyStripeSignature({
        payload,
        header: sign(payload, NOW_SECONDS),
        secret: SECRET,
        nowMs: NOW_MS,
      }),
    ).toEqual({ ok: true });
  });

  it("accepts when any v1 entry matches", () => {
    const valid = sign(payload, NOW_SECONDS).split(",v1=")[1];
    const header = `t=${NOW_SECONDS},v1=${"f".repeat(64)},v1=${valid}`;
    expect(verifyStripeSignature({ payload, header, secret: SECRET, nowMs: NOW_MS })).toEqual({
      ok: true,
    });
  });

  it("rejects a missing header", () => {
    expect(verifyStripeSignature({ payload, header: undefined, secret: SECRET })).toEqual({
      ok: false,
      error: "missing",
    });
  });

  it("rejects a header without timestamp", () => {
    expect(verifyStripeSignature({ payload, header: "v1=abc", secret: SECRET })).toEqual({
      ok: false,
      error: "invalid",
    });
  });

  it("rejects a tampered body", () => {
    expect(
      verifyStripeSignature({
        payload: `${payload} `,
        header: sign(payload, NOW_SECONDS),
        secret: SECRET,
        nowMs: NOW_MS,
      }),
    ).toEqual({ ok: false, error: "signature" });
  });

  it("rejects a different secret", () => {
    expect(
      verifyStripeSignature({
        payload,
        header: sign(payload, NOW_SECONDS, "other-secret"),
        secret: SECRET,
        nowMs: NOW_MS,
      }),
    ).toEqual({ ok: false, error: "signature" });
  });

  it("rejects timestamps outside the tolerance", () => {
    expect(
      verifyStripeSignature({
        payload,
        header: sign(payload, NOW_SECONDS - 301),
        secret: SECRET,
        nowMs: NOW_MS,
      }),
    ).toEqual({ ok: false, error: "expired" });
    expect(
      verifyStripeSignature({
        payload,
        header: sign(payload, NOW_SECONDS - 300),
        secret: SECRET,
        nowMs: NOW_MS,
      }),
    ).toEqual({ ok: true });
  });
});

describe("parseStripeEvent", () => {
  it("decodes a completed checkout", () => {
    const result = parseStripeEvent(
      JSON.stringify({
        id: "evt_checkout",
        type: "checkout.session.completed",
        data: {
          object: {
            id: "cs_1",
            customer: "cus_1",
            subscription: "sub_1",
            client_reference_id: "42",
            metadata: { tier: "pro", telegram_user_id: "42" },
          },
        },
      }),
    );

    expect(result).toEqual({
      ok: true,
      event: {
        id: "evt_checkout",
        type: "checkout.session.completed",
        customerId: "cus_1",
        subscriptionId: "sub_1",
        tier: "pro",
        expiresAt: null,
        userId: "42",
        status: null,
      },
    });
  });

  it("falls back to client_reference_id for the chat id", () => {
    const result = parseStripeEvent(
      JSON.stringify({
        id: "evt_checkout",
        type: "checkout.session.completed",
        data: { object: { customer: "cus_1", client_reference_id: "77", metadata: null } },
      }),
    );

    expect(result.ok && result.event?.userId).toBe("77");
    expect(result.ok && result.event?.tier).toBeNull();
  });

  it("decodes a subscription update with period end and default tier", () => {
    const result = parseStripeEvent(
      JSON.stringify({
        id: "evt_update",
        type: "customer.subscription.updated",
        data: {
          object: {
            id: "sub_1",
            customer: "cus_1",
            status: "active",
            current_period_end: 1_712_000_000,
            metadata: {},
          },
        },
      }),
    );

    expect(result).toEqual({
      ok: true,
      event: {
        id: "evt_update",
        type: "customer.subscription.updated",
        customerId: "cus_1",
        subscriptionId: "sub_1",
        tier: "basic",
        expiresAt: 1_712_000_000_000,
        userId: null,
        status: "active",
      },
    });
  });

  it("ignores unhandled event types", () => {
    expect(
      parseStripeEvent(JSON.stringify({ id: "evt_x", type: "charge.succeeded", data: { object: {} } })),
    ).toEqual({ ok: true, event: null });
  });

  it("rejects malformed payloads", () => {
    expect(parseStripeEvent("{not json")).toEqual({ ok: false, error: "Invalid JSON" });
    expect(parseStripeEvent(JSON.stringify({ type: "checkout.session.completed" }))).toEqual({
      ok: false,
      error: "Invalid event payload",
    });
  });
});
