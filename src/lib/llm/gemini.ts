import { errorMessage, TimeoutError } from "../errors";
import { fetchWithTimeout, isRecord, type FetchLike } from "../http";

export type CompletionOutcome =
  | { ok: true; text: string }
  | { ok: false; error_code: "TIMEOUT" | "REQUEST_FAILED"; message: string };

export interface LanguageModel {
  complete(prompt: string, options: { timeoutMs: number }): Promise<CompletionOutcome>;
}

const toFailedOutcome = (err: unknown): CompletionOutcome =>
  err instanceof TimeoutError
    ? { ok: false, error_code: "TIMEOUT", message: err.message }
    : { ok: false, error_code: "REQUEST_FAILED", message: errorMessage(err) };

/** Calls `model.complete`; a rejected call becomes a failed outcome. */
export const completeSafely = async (
  model: LanguageModel,
  prompt: string,
  options: { timeoutMs: number }
): Promise<CompletionOutcome> => {
  try {
    return await model.complete(prompt, options);
  } catch (err) {
    return toFailedOutcome(err);
  }
};

const extractText = (data: unknown): string | null => {
  if (!isRecord(data) || !Array.isArray(data.candidates)) {
    return null;
  }
  const first: unknown = data.candidates[0];
  if (!isRecord(first) || !isRecord(first.content) || !Array.isArray(first.content.parts)) {
    return null;
  }
  const text = first.content.parts
    .map((part: unknown) => (isRecord(part) && typeof part.text === "string" ? part.text : ""))
    .join("");
  return text.trim() === "" ? null : text;
};

/** Gemini generateContent over REST, asking for JSON output. */
export const createGeminiModel = (options: {
  apiKey: string;
  model: string;
  baseUrl?: string;
  fetchImpl?: FetchLike;
}): LanguageModel => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const baseUrl = options.baseUrl ?? "https://generativelanguage.googleapis.com/v1beta";

  return {
    async complete(prompt, { timeoutMs }) {
      const url = new URL(`${baseUrl}/models/${options.model}:generateContent`);
      url.searchParams.set("key", options.apiKey);
      try {
        const { res, data } = await fetchWithTimeout(
          fetchImpl,
          url.toString(),
          {
            method: "POST",
            headers: { "Content-Type": "application/json", Accept: "application/json" },
            body: JSON.stringify({
              contents: [{ role: "user", parts: [{ text: prompt }] }],
              generationConfig: { temperature: 0.1, responseMimeType: "application/json" },
            }),
          },
          timeoutMs,
          "Gemini generateContent"
        );
        if (!res.ok) {
          return { ok: false, error_code: "REQUEST_FAILED", message: `Gemini returned ${res.status}` };
        }
        const text = extractText(data);
        if (!text) {
          return { ok: false, error_code: "REQUEST_FAILED", message: "Gemini returned no text" };
        }
        return { ok: true, text };
      } catch (err) {
        return toFailedOutcome(err);
      }
    },
  };
};

/** Parses a JSON object out of model text, tolerating ```json fences. */
export const parseJsonObject = (text: string): Record<string, unknown> | null => {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidate = (fenced ? fenced[1] : text).trim();
  const start = candidate.indexOf("{");
  const end = candidate.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(candidate.slice(start, end + 1));
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
};
