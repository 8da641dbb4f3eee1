import { describe, it, expect, vi } from "vitest";
import { createTaggedError, isRetryable, withRetry } from "../src/core/Retry.js";

describe("withRetry", () => {
  it("runs once when no retries are configured", async () => {
    const fn = vi.fn(async (attempt: number) => attempt);
    await expect(withRetry(fn)).resolves.toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries until the function succeeds", async () => {
    let calls = 0;
    const onRetry = vi.fn();
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`fail ${calls}`);
        return "ok";
      },
      { maxRetries: 2, onRetry },
    );
    expect(result).toBe("ok");
    expect(calls).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map((c) => c[1])).toEqual([1, 2]);
  });

  it("gives up after maxRetries and rethrows the last error", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`fail ${calls}`);
        },
        { maxRetries: 2 },
      ),
    ).rejects.toThrow("fail 3");
    expect(calls).toBe(3);
  });

  it("does not retry non-retryable kinds", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw createTaggedError("input-invalid", "bad args");
        },
        { maxRetries: 5 },
      ),
    ).rejects.toThrow("bad args");
    expect(calls).toBe(1);
  });

  it("honours shouldRetry", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error("nope");
        },
        { maxRetries: 3, shouldRetry: () => false },
      ),
    ).rejects.toThrow("nope");
    expect(calls).toBe(1);
  });
});

describe("isRetryable", () => {
  it("classifies tagged kinds", () => {
    expect(isRetryable(createTaggedError("tool-not-found", "x"))).toBe(false);
    expect(isRetryable(createTaggedError("cancelled", "x"))).toBe(false);
    expect(isRetryable(createTaggedError("timeout", "x"))).toBe(true);
    expect(isRetryable(new Error("plain"))).toBe(true);
  });
});
