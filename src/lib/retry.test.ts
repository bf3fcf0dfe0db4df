import { describe, expect, it, vi } from "vitest";
import { TimeoutError } from "./errors";
import { withRetry } from "./retry";

const noWait = () => Promise.resolve();

describe("withRetry", () => {
  it("retries retryable failures with exponential delays", async () => {
    const delays: number[] = [];
    const task = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new TimeoutError("slow"))
      .mockRejectedValueOnce(new TimeoutError("slow"))
      .mockResolvedValueOnce("done");

    const result = await withRetry(task, {
      maxAttempts: 3,
      baseDelayMs: 100,
      shouldRetry: (err) => err instanceof TimeoutError,
      onRetry: ({ delay_ms }) => delays.push(delay_ms),
      wait: noWait,
    });

    expect(result).toBe("done");
    expect(task).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
  });

  it("rethrows immediately when the error is not retryable", async () => {
    const task = vi.fn<[number], Promise<string>>().mockRejectedValue(new Error("bad request"));
    await expect(
      withRetry(task, { maxAttempts: 3, baseDelayMs: 1, shouldRetry: () => false, wait: noWait })
    ).rejects.toThrow("bad request");
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("gives up after maxAttempts", async () => {
    const task = vi.fn<[number], Promise<string>>().mockRejectedValue(new TimeoutError("slow"));
    await expect(
      withRetry(task, { maxAttempts: 3, baseDelayMs: 1, shouldRetry: () => true, wait: noWait })
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(task).toHaveBeenCalledTimes(3);
  });
});
