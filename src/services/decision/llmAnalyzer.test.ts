import { describe, expect, it, vi } from "vitest";
import type { CompletionOutcome, LanguageModel } from "../../lib/llm/gemini";
import type { TicketData } from "../../types/refund";
import { emptyBookingInfo } from "../bookingPatterns";
import { analyzeWithLlm, buildAnalysisPrompt } from "./llmAnalyzer";

const fakeModel = (outcome: CompletionOutcome) => {
  const complete = vi.fn(async (_prompt: string, _options: { timeoutMs: number }) => outcome);
  const model: LanguageModel = { complete };
  return { model, complete };
};

const ticket: TicketData = {
  ticket_id: "T-200",
  subject: "Refund please",
  description: "My flight was cancelled so I could not use the pass.",
};

const bookingInfo = { ...emptyBookingInfo(), booking_id: "509266779", event_date: "2025-11-20", amount: 18 };

const analyze = (model: LanguageModel) =>
  analyzeWithLlm({ model, ticket, booking_info: bookingInfo, policy_text: "Refund policy text", timeoutMs: 500 });

describe("buildAnalysisPrompt", () => {
  it("includes the policy, ticket, booking facts and rule context", () => {
    const prompt = buildAnalysisPrompt({
      ticket,
      booking_info: bookingInfo,
      policy_text: "Refund policy text",
      rule_outcome: {
        decision: "Uncertain",
        confidence: "low",
        policy_rule: "Short Notice Cancellation (<3 days)",
        reasoning: "Short notice cancellation (1 days) with booking type unknown.",
        key_factors: [],
        has_evidence: true,
      },
    });
    expect(prompt).toContain("Refund policy text");
    expect(prompt).toContain("- Ticket ID: T-200");
    expect(prompt).toContain("- Booking ID: 509266779");
    expect(prompt).toContain("- Amount: $18.00");
    expect(prompt).toContain("- Policy Rule: Short Notice Cancellation (<3 days)");
    expect(prompt).not.toContain("- Location:");
  });

  it("truncates long descriptions", () => {
    const prompt = buildAnalysisPrompt({
      ticket: { ...ticket, description: "x".repeat(1500) },
      booking_info: bookingInfo,
      policy_text: "",
    });
    expect(prompt).toContain(`- Description: ${"x".repeat(1000)}... (truncated)`);
  });
});

describe("analyzeWithLlm", () => {
  it("returns a validated verdict", async () => {
    const { model, complete } = fakeModel({
      ok: true,
      text: JSON.stringify({
        decision: "Approved",
        reasoning: "Flight cancellation is outside the customer's control.",
        policy_applied: "Special Circumstances",
        confidence: "high",
        key_factors: ["Flight cancelled"],
      }),
    });

    const result = await analyze(model);

    expect(result).toEqual({
      ok: true,
      verdict: {
        decision: "Approved",
        reasoning: "Flight cancellation is outside the customer's control.",
        policy_applied: "Special Circumstances",
        confidence: "high",
        key_factors: ["Flight cancelled"],
      },
    });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][1]).toEqual({ timeoutMs: 500 });
  });

  it("defaults an invalid confidence to medium and missing factors to empty", async () => {
    const { model } = fakeModel({
      ok: true,
      text: '```json\n{"decision":"Denied","reasoning":"Pass was used.","policy_applied":"Post-Event","confidence":"certain"}\n```',
    });
    const result = await analyze(model);
    expect(result).toMatchObject({ ok: true, verdict: { confidence: "medium", key_factors: [] } });
  });

  it("rejects an unknown decision", async () => {
    const { model } = fakeModel({
      ok: true,
      text: '{"decision":"Maybe","reasoning":"Unsure.","policy_applied":"None","confidence":"low","key_factors":[]}',
    });
    expect(await analyze(model)).toEqual({
      ok: false,
      error_code: "INVALID_RESPONSE",
      message: "LLM verdict invalid: decision",
    });
  });

  it("rejects text that is not JSON", async () => {
    const { model } = fakeModel({ ok: true, text: "I think this should be approved." });
    expect(await analyze(model)).toEqual({
      ok: false,
      error_code: "INVALID_RESPONSE",
      message: "LLM response was not a JSON object",
    });
  });

  it("passes transport failures through", async () => {
    const { model } = fakeModel({ ok: false, error_code: "TIMEOUT", message: "Gemini generateContent timed out after 500ms" });
    expect(await analyze(model)).toEqual({
      ok: false,
      error_code: "TIMEOUT",
      message: "Gemini generateContent timed out after 500ms",
    });
  });
});
