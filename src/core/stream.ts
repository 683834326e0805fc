import type { CallOpts } from "../types.js";
import { createAbortError } from "./abort.js";

export interface SseMessage {
  /** Value of the most recent `event:` field of the current frame, if any. */
  event?: string;
  data: unknown;
}

/**
 * Reads a `text/event-stream` body and yields each `data:` payload parsed as
 * JSON. Ends at `data: [DONE]` (reported through `onDone`) or at end of body.
 * Leaving the loop early, or aborting `opts.signal`, cancels the underlying
 * reader so the upstream connection is released.
 */
export async function* sseEvents(
  resp: Response,
  opts?: CallOpts,
  onDone?: () => void
): AsyncGenerator<SseMessage> {
  if (!resp.body) throw new Error(`stream error ${resp.status}: response has no body`);

  const reader = resp.body.getReader();
  const dec = new TextDecoder();
  const signal = opts?.signal;
  let buf = "";
  let event: string | undefined;
  let exhausted = false;
  let aborted = false;
  let failed = false;

  const onAbort = () => {
    if (aborted) return;
    aborted = true;
    // cancel() rejects only for a body that already failed; the pending read reports that failure
    reader.cancel(signal?.reason).catch(() => undefined);
  };

  if (signal) {
    if (signal.aborted) {
      onAbort();
      reader.releaseLock();
      throw createAbortError(signal.reason);
    }
    signal.addEventListener("abort", onAbort, { once: true });
  }

  // Returns the parsed payload, "done" for the terminator, or undefined to skip.
  const parseLine = (line: string): SseMessage | "done" | undefined => {
    const t = line.trim();
    if (!t) {
      event = undefined; // frame boundary
      return undefined;
    }
    if (t.startsWith(":")) return undefined; // heartbeat
    if (t.startsWith("event:")) {
      event = t.slice(6).trim();
      return undefined;
    }
    if (!t.startsWith("data:")) return undefined;

    const payload = t.slice(5).trim();
    if (payload === "[DONE]") return "done";
    try {
      return { event, data: JSON.parse(payload) };
    } catch {
      // Ignore malformed JSON
      return undefined;
    }
  };

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        exhausted = true;
        break;
      }

      buf += dec.decode(value, { stream: true });
      let nl;
      while ((nl = buf.search(/\r?\n/)) >= 0) {
        const line = buf.slice(0, nl);
        buf = buf.slice(nl + (buf[nl] === "\r" && buf[nl + 1] === "\n" ? 2 : 1));
        const parsed = parseLine(line);
        if (parsed === "done") {
          onDone?.();
          return;
        }
        if (parsed) yield parsed;
      }
    }

    buf += dec.decode();
    if (buf) {
      const parsed = parseLine(buf);
      if (parsed === "done") onDone?.();
      else if (parsed) yield parsed;
    }
  } catch (error) {
    failed = true;
    throw error;
  } finally {
    signal?.removeEventListener("abort", onAbort);
    if (!exhausted && !aborted && !failed) {
      await reader.cancel();
    }
    reader.releaseLock();
    if (aborted) {
      throw createAbortError(signal?.reason);
    }
  }
}
