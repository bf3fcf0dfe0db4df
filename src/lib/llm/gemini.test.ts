import { describe, expect, it, vi } from "vitest";
import { createGeminiModel, parseJsonObject } from "./gemini";

describe("createGeminiModel", () => {
  it("returns the candidate text", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(
        JSON.stringify({ candidates: [{ content: { parts: [{ text: '{"decision":' }, { text: '"Approved"}' }] } }] }),
        { status: 200 }
      )
    );
    const model = createGeminiModel({ apiKey: "test-key", model: "gemini-test", fetchImpl });

    const outcome = await model.complete("prompt", { timeoutMs: 500 });

    expect(outcome).toEqual({ ok: true, text: '{"decision":"Approved"}' });
    const url = new URL(fetchImpl.mock.calls[0][0]);
    expect(url.pathname).toBe("/v1beta/models/gemini-test:generateContent");
    expect(url.searchParams.get("key")).toBe("test-key");
  });

  it("reports a deadline hit as TIMEOUT", async () => {
    const model = createGeminiModel({
      apiKey: "test-key",
      model: "gemini-test",
      fetchImpl: async () => {
        const err = new Error("aborted");
        err.name = "TimeoutError";
        throw err;
      },
    });
    const outcome = await model.complete("prompt", { timeoutMs: 10 });
    expect(outcome).toEqual({ ok: false, error_code: "TIMEOUT", message: "Gemini generateContent timed out after 10ms" });
  });

  it("reports non-2xx responses as REQUEST_FAILED", async () => {
    const model = createGeminiModel({
      apiKey: "test-key",
      model: "gemini-test",
      fetchImpl: async () => new Response("{}", { status: 503 }),
    });
    expect(await model.complete("prompt", { timeoutMs: 10 })).toEqual({
      ok: false,
      error_code: "REQUEST_FAILED",
      message: "Gemini returned 503",
    });
  });
});

describe("parseJsonObject", () => {
  it("reads fenced json", () => {
    expect(parseJsonObject('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it("returns null for prose or arrays", () => {
    expect(parseJsonObject("I think it should be approved")).toBeNull();
    expect(parseJsonObject("[1, 2]")).toBeNull();
  });
});
