import type { RetryOpts } from "../types.js";
import { UpstreamError, isAbortError } from "../errors.js";
import { createAbortError } from "./abort.js";

const defaultStatusRetry = (s: number) =>
  s === 408 || s === 429 || (s >= 500 && s <= 599);

/**
 * Only upstream failures are candidates: credential rejections, validation
 * and capacity errors fail immediately, as does a caller abort.
 */
export function isRetryable(error: unknown, statusRetry: (status: number) => boolean = defaultStatusRetry): boolean {
  if (isAbortError(error) || !(error instanceof UpstreamError)) return false;
  if (typeof error.upstreamStatus === "number") return statusRetry(error.upstreamStatus);
  return error.retryable;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOpts = {}
): Promise<T> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 1);
  const base = opts.baseMs ?? 250;
  const cap = opts.maxMs ?? 3000;
  const jitter = opts.jitter ?? "full";
  const retryPolicy = opts.statusRetry ?? defaultStatusRetry;
  const start = Date.now();

  let attempt = 0;
  while (true) {
    if (opts.signal?.aborted) throw createAbortError(opts.signal.reason);

    try {
      return await fn(attempt + 1);
    } catch (e: unknown) {
      attempt++;
      if (attempt >= maxAttempts || !isRetryable(e, retryPolicy)) throw e;

      // Respect Retry-After when the upstream sent one
      let wait = Math.min(cap, base * 2 ** (attempt - 1));
      if (e instanceof UpstreamError && typeof e.retryAfter === "number") {
        wait = Math.max(wait, e.retryAfter * 1000);
      }

      const waitMs = jitter === "full" ? wait * (0.5 + Math.random()) : wait;
      if (opts.maxTotalMs && Date.now() + waitMs - start > opts.maxTotalMs) throw e;

      opts.onRetry?.({ attempt, waitMs, error: e });
      await delay(waitMs, opts.signal);
    }
  }
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError(signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(createAbortError(signal?.reason));
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
