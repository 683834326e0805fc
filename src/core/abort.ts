/**
 * Creates a standardised AbortError instance. The optional reason is preserved
 * when provided by upstream signals.
 */
export function createAbortError(reason?: unknown): Error {
  if (reason instanceof Error) {
    reason.name = "AbortError";
    return reason;
  }
  const error = new Error(typeof reason === "string" ? reason : "Aborted");
  error.name = "AbortError";
  return error;
}

/**
 * Forwards abort events from the source signal to the target controller. A
 * cleanup function is returned so callers can remove the listener once the
 * operation completes.
 */
export function forwardAbortSignal(
  source: AbortSignal | undefined,
  target: AbortController
): () => void {
  if (!source) {
    return () => {};
  }

  if (source.aborted) {
    target.abort(source.reason);
    return () => {};
  }

  const abortListener = () => {
    if (!target.signal.aborted) {
      target.abort(source.reason);
    }
  };

  source.addEventListener("abort", abortListener, { once: true });
  return () => {
    source.removeEventListener("abort", abortListener);
  };
}

/**
 * An abort signal tied to the caller's signal plus a re-armable timer. The
 * transport arms it once for the connect phase and again around each body read.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private readonly release: () => void;
  private timer?: ReturnType<typeof setTimeout>;
  private timedOut = false;

  constructor(source?: AbortSignal) {
    this.release = forwardAbortSignal(source, this.controller);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** True once the timer, not the caller, aborted the signal. */
  get expired(): boolean {
    return this.timedOut;
  }

  arm(timeoutMs: number | undefined): void {
    this.disarm();
    if (!timeoutMs || timeoutMs <= 0) return;
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort(createAbortError(`Deadline of ${timeoutMs}ms exceeded`));
    }, timeoutMs);
  }

  disarm(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
  }

  dispose(): void {
    this.disarm();
    this.release();
  }
}
