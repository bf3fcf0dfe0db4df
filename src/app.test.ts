import { describe, expect, it, vi } from "vitest";
import { buildApp } from "./app";
import { createDecisionRing } from "./lib/debug/decisionRing";
import { AuthenticationError } from "./lib/errors";
import { createBookingVerifier } from "./services/bookingVerifier";
import { createRefundPipeline } from "./services/pipeline";
import type { DecisionResult } from "./types/refund";

const TOKEN = "test-secret";

const approved: DecisionResult = {
  decision: "Approved",
  reasoning: "Cancelled 10 days before the event.",
  policy_applied: "Pre-Arrival (7+ days before event)",
  confidence: "high",
  cancellation_reason: "Pre-arrival",
  booking_info_found: true,
  method_used: "rules",
  processing_time_ms: 1,
  key_factors: [],
};

const booking = (id: number, status: string) => ({
  id,
  start_time: "2025-11-15T18:00:00Z",
  end_time: "2025-11-15T23:00:00Z",
  location: { id: 55, name: "Arena Lot" },
  status,
});

const setup = async (options: { debugEndpoints?: boolean; bookings?: () => Promise<unknown[]> } = {}) => {
  const makeDecision = vi.fn(async () => approved);
  const verifier = createBookingVerifier({
    client: { getCustomerBookings: vi.fn(options.bookings ?? (async () => [booking(7001, "confirmed")])) },
    maxAttempts: 1,
    retryBaseMs: 1,
    searchPaddingDays: 1,
  });
  const pipeline = createRefundPipeline({
    decisionMaker: { makeDecision },
    verifier,
    llmTimeoutMs: 50,
    pipelineTimeoutMs: 1_000,
  });
  const ring = createDecisionRing();
  const app = await buildApp(
    () => ({ pipeline, ring, bearerToken: TOKEN, debugEndpoints: options.debugEndpoints ?? true }),
    { logger: false }
  );
  return { app, makeDecision, ring };
};

const auth = { authorization: `Bearer ${TOKEN}` };

describe("buildApp", () => {
  it("reports health without a token", async () => {
    const { app } = await setup();
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, git_sha: "unknown", build_time: "unknown" });
  });

  it("rejects a missing or wrong bearer token", async () => {
    const { app, makeDecision } = await setup();
    const res = await app.inject({
      method: "POST",
      url: "/refund/decide",
      headers: { authorization: "Bearer wrong" },
      payload: { ticket: { ticket_id: "T-1" } },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ ok: false, error_code: "UNAUTHORIZED", message: "Unauthorized" });
    expect(makeDecision).not.toHaveBeenCalled();
  });

  it("reports missing fields as a validation error", async () => {
    const { app } = await setup();
    const res = await app.inject({ method: "POST", url: "/refund/decide", headers: auth, payload: {} });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: false,
      error_code: "VALIDATION_ERROR",
      message: "Validation failed",
      missing_fields: ["ticket"],
    });
  });

  it("decides a refund and records it for the debug endpoint", async () => {
    const { app, makeDecision } = await setup();
    const res = await app.inject({
      method: "POST",
      url: "/refund/decide",
      headers: auth,
      payload: { ticket: { ticket_id: 42, description: "Booking ID: 509266779" }, notes: "see thread" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, decision: approved });
    expect(makeDecision).toHaveBeenCalledWith(
      { ticket_id: "42", subject: "", description: "Booking ID: 509266779" },
      "see thread",
      {}
    );

    const debug = await app.inject({ method: "GET", url: "/debug/decisions", headers: auth });
    expect(debug.json()).toMatchObject({
      ok: true,
      decisions: [{ ticket_id: "42", endpoint: "/refund/decide", decision: "Approved", customer_email: null }],
    });
  });

  it("hides the debug endpoint when disabled", async () => {
    const { app } = await setup({ debugEndpoints: false });
    const res = await app.inject({ method: "GET", url: "/debug/decisions", headers: auth });
    expect(res.statusCode).toBe(404);
  });

  it("verifies a booking", async () => {
    const { app } = await setup();
    const res = await app.inject({
      method: "POST",
      url: "/booking/verify",
      headers: auth,
      payload: { customer_info: { email: "driver@example.com", arrival_date: "2025-11-15", exit_date: "2025-11-15" } },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      ok: true,
      verification: { outcome: "verified", verified_booking: { booking_id: "7001", pass_usage_status: "not_used" } },
    });
  });

  it("maps provider authentication failures to 502", async () => {
    const { app } = await setup({
      bookings: async () => {
        throw new AuthenticationError("ParkWhiz token exchange rejected", { status: 401 });
      },
    });
    const res = await app.inject({
      method: "POST",
      url: "/booking/verify",
      headers: auth,
      payload: { customer_info: { email: "driver@example.com", arrival_date: "2025-11-15" } },
    });
    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({
      ok: false,
      error_code: "PROVIDER_AUTH_FAILED",
      message: "ParkWhiz token exchange rejected",
    });
  });

  it("rejects an invalid search window", async () => {
    const { app } = await setup();
    const res = await app.inject({
      method: "POST",
      url: "/booking/verify",
      headers: auth,
      payload: {
        customer_info: { email: "driver@example.com" },
        search_window: { start_date: "2025-11-20", end_date: "2025-11-10" },
      },
    });
    expect(res.json()).toEqual({
      ok: false,
      error_code: "VALIDATION_ERROR",
      message: "search_window.end_date: start_date must not be after end_date",
      missing_fields: [],
    });
  });

  it("analyzes duplicates", async () => {
    const { app } = await setup();
    const res = await app.inject({
      method: "POST",
      url: "/booking/duplicates",
      headers: auth,
      payload: { bookings: [booking(1, "completed"), booking(2, "confirmed"), "not a booking"] },
    });
    expect(res.json()).toMatchObject({
      ok: true,
      result: { has_duplicates: true, action: "refund_duplicate", used_booking_id: "1", unused_booking_id: "2" },
    });
  });

  it("renders a note", async () => {
    const { app } = await setup();
    const res = await app.inject({
      method: "POST",
      url: "/notes/render",
      headers: auth,
      payload: { decision: approved },
    });
    const body = res.json();
    expect(body.ok).toBe(true);
    expect(body.note).toContain("Refund Decision: Approved");
  });

  it("processes a ticket end to end", async () => {
    const { app } = await setup();
    const res = await app.inject({
      method: "POST",
      url: "/ticket/process",
      headers: auth,
      payload: {
        ticket: {
          ticket_id: "T-9",
          subject: "Refund",
          description: "Arrival: 11/15/2025\nEmail: driver@example.com",
          tags: ["zapier_failed"],
        },
      },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      ok: true,
      tags: ["refund_approved", "zapier_failure"],
      verification: { outcome: "verified" },
    });
  });
});
