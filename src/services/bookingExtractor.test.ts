import { describe, expect, it, vi } from "vitest";
import type { CompletionOutcome, LanguageModel } from "../lib/llm/gemini";
import { extractBookingInfo } from "./bookingExtractor";

const fakeModel = (outcome: CompletionOutcome) => {
  const complete = vi.fn(async (_prompt: string, _options: { timeoutMs: number }) => outcome);
  const model: LanguageModel = { complete };
  return { model, complete };
};

const structuredNotes = [
  "Booking ID: 509266779",
  "Parking date: November 20, 2025",
  "Location: Arena Lot",
  "Paid $25.00",
].join("\n");

const vagueNotes = "Please refund my parking for next Friday, something came up";

describe("extractBookingInfo", () => {
  it("returns nothing for empty notes", async () => {
    const { model, complete } = fakeModel({ ok: true, text: "{}" });
    expect(await extractBookingInfo({ notes: "   ", model })).toMatchObject({ found: false, source: "none" });
    expect(complete).not.toHaveBeenCalled();
  });

  it("skips the model when patterns are confident", async () => {
    const { model, complete } = fakeModel({ ok: true, text: "{}" });
    const result = await extractBookingInfo({ notes: structuredNotes, model });
    expect(result).toMatchObject({
      found: true,
      confidence: "medium",
      source: "pattern",
      booking_info: { booking_id: "509266779", event_date: "2025-11-20", location: "Arena Lot", amount: 25 },
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it("asks the model when patterns find too little", async () => {
    const { model, complete } = fakeModel({
      ok: true,
      text: JSON.stringify({
        found: true,
        booking_id: "PW-7788",
        event_date: "Nov 21, 2025",
        location: "Arena",
        booking_type: "on-demand",
        amount: "$12.50",
        customer_email: "not an email",
      }),
    });

    const result = await extractBookingInfo({ notes: vagueNotes, model, timeoutMs: 250 });

    expect(complete.mock.calls[0][1]).toEqual({ timeoutMs: 250 });
    expect(result).toEqual({
      found: true,
      source: "llm",
      confidence: "high",
      booking_info: {
        booking_id: "PW-7788",
        event_date: "2025-11-21",
        reservation_date: null,
        cancellation_date: null,
        booking_type: "on-demand",
        amount: 12.5,
        location: "Arena",
        customer_email: null,
      },
    });
  });

  it("falls back to the pattern result when the model fails", async () => {
    const { model } = fakeModel({ ok: false, error_code: "TIMEOUT", message: "timed out" });
    const result = await extractBookingInfo({ notes: vagueNotes, model });
    expect(result).toMatchObject({ found: false, source: "pattern", confidence: "low" });
  });

  it("falls back to the pattern result when the model answers with prose", async () => {
    const { model } = fakeModel({ ok: true, text: "I could not find a booking." });
    const result = await extractBookingInfo({ notes: vagueNotes, model });
    expect(result.source).toBe("pattern");
  });

  it("returns the pattern result when no model is configured", async () => {
    const result = await extractBookingInfo({ notes: vagueNotes });
    expect(result).toMatchObject({ found: false, source: "pattern" });
  });
});
