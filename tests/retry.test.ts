import { describe, it, expect, vi } from "vitest";
import { isRetryable, withRetry } from "../src/core/retry.js";
import { AuthError, NoCapacityError, UpstreamError } from "../src/errors.js";
import { createAbortError } from "../src/core/abort.js";

const upstream = (status?: number, retryable = true, retryAfter?: number) =>
  new UpstreamError("upstream failed", "openai", status, undefined, undefined, retryable, retryAfter);

describe("isRetryable", () => {
  it("should retry transient upstream statuses only", () => {
    expect(isRetryable(upstream(503))).toBe(true);
    expect(isRetryable(upstream(429))).toBe(true);
    expect(isRetryable(upstream(400))).toBe(false);
  });

  it("should fall back to the retryable flag without a status", () => {
    expect(isRetryable(upstream(undefined, true))).toBe(true);
    expect(isRetryable(upstream(undefined, false))).toBe(false);
  });

  it("should never retry credential, capacity or abort failures", () => {
    expect(isRetryable(new AuthError("bad key", "openai"))).toBe(false);
    expect(isRetryable(new NoCapacityError("openai", "rate_limited"))).toBe(false);
    expect(isRetryable(createAbortError())).toBe(false);
    expect(isRetryable(new Error("plain"))).toBe(false);
  });
});

describe("withRetry", () => {
  it("should succeed on first attempt", async () => {
    const fn = vi.fn(async (_attempt: number) => "success");
    const result = await withRetry(fn);
    expect(result).toBe("success");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should make a single attempt by default", async () => {
    const fn = vi.fn(async (_attempt: number): Promise<string> => {
      throw upstream(503);
    });
    await expect(withRetry(fn)).rejects.toBeInstanceOf(UpstreamError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should retry on failure and eventually succeed", async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw upstream(502);
      return "success";
    });
    const onRetry = vi.fn();

    const result = await withRetry(fn, { maxAttempts: 3, baseMs: 1, jitter: "none", onRetry });

    expect(result).toBe("success");
    expect(fn.mock.calls.map((c) => c[0])).toEqual([1, 2, 3]);
    expect(onRetry.mock.calls.map((c) => c[0].waitMs)).toEqual([1, 2]);
  });

  it("should fail after max attempts", async () => {
    const fn = vi.fn(async (_attempt: number): Promise<string> => {
      throw upstream(500);
    });
    await expect(withRetry(fn, { maxAttempts: 2, baseMs: 1, jitter: "none" })).rejects.toThrow("upstream failed");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should not retry on non-retryable errors", async () => {
    const fn = vi.fn(async (_attempt: number): Promise<string> => {
      throw new AuthError("bad key", "openai");
    });
    await expect(withRetry(fn, { maxAttempts: 3, baseMs: 1 })).rejects.toBeInstanceOf(AuthError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should respect Retry-After", async () => {
    const fn = vi
      .fn(async (_attempt: number) => "success")
      .mockRejectedValueOnce(upstream(429, true, 0.05));
    const onRetry = vi.fn();

    await withRetry(fn, { maxAttempts: 2, baseMs: 1, jitter: "none", onRetry });

    expect(onRetry.mock.calls[0]?.[0].waitMs).toBe(50);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should stop waiting when the signal aborts", async () => {
    const controller = new AbortController();
    const fn = vi.fn(async (_attempt: number): Promise<string> => {
      throw upstream(503);
    });
    const pending = withRetry(fn, {
      maxAttempts: 5,
      baseMs: 10_000,
      jitter: "none",
      signal: controller.signal,
      onRetry: () => controller.abort()
    });

    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
