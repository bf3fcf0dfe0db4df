import { ParkWhizError, TimeoutError } from "./errors";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const isAbortError = (err: unknown) =>
  err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");

const parseBody = (text: string): unknown => {
  try {
    return text ? JSON.parse(text) : null;
  } catch {
    return { raw: text };
  }
};

/**
 * fetch plus body read under one deadline. A deadline hit during either step surfaces as
 * TimeoutError, other transport failures as ParkWhizError.
 */
export const fetchWithTimeout = async (
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  label: string
): Promise<{ res: Response; data: unknown }> => {
  try {
    const res = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    const text = await res.text();
    return { res, data: parseBody(text) };
  } catch (err) {
    if (isAbortError(err)) {
      throw new TimeoutError(`${label} timed out after ${timeoutMs}ms`);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ParkWhizError(`${label} failed: ${message}`);
  }
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
