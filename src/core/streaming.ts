import type { StreamOutcome } from "../types.js";
import { forwardAbortSignal } from "./abort.js";
import { Channel } from "./channel.js";

export const DEFAULT_STREAM_CAPACITY = 32;

/** Fragments of an opened stream. Iterate once; `return()` or `cancel()` tears the upstream down. */
export interface FragmentStream extends AsyncIterable<string> {
  cancel(reason?: unknown): void;
  /** Settles once the producer has stopped and `onEnd` has run; rejects only if `onEnd` throws. */
  readonly done: Promise<StreamOutcome>;
}

export interface OpenStreamOptions {
  /** Starts the upstream iteration; must stop when `signal` aborts. */
  source: (signal: AbortSignal) => AsyncIterable<string>;
  signal?: AbortSignal;
  capacity?: number;
  /** Called as each fragment is handed to the consumer. */
  onFragment?: (fragment: string) => void;
  /** `fragments` counts what the consumer received. */
  onEnd?: (outcome: StreamOutcome, fragments: number, error?: unknown) => Promise<void> | void;
}

/**
 * Runs `source` as a producer task writing into a bounded channel and waits
 * until the first fragment (or the end) is available. A failure before the
 * first fragment is thrown from here; a later one rejects the iteration.
 * Unless cancelled, `onEnd` runs after the consumer has read to the end or
 * to the error.
 */
export async function openFragmentStream(opts: OpenStreamOptions): Promise<FragmentStream> {
  const controller = new AbortController();
  const release = forwardAbortSignal(opts.signal, controller);
  const channel = new Channel<string>(opts.capacity ?? DEFAULT_STREAM_CAPACITY);
  let delivered = 0;
  let consumerDone: () => void = () => {};
  const consumed = new Promise<void>((resolve) => {
    consumerDone = resolve;
  });

  const cancel = (reason?: unknown) => {
    channel.cancel();
    consumerDone();
    if (!controller.signal.aborted) controller.abort(reason);
  };

  const next = async (): Promise<IteratorResult<string, undefined>> => {
    try {
      const result = await channel.next();
      if (result.done) {
        consumerDone();
      } else {
        delivered++;
        opts.onFragment?.(result.value);
      }
      return result;
    } catch (error) {
      consumerDone();
      throw error;
    }
  };

  const pump = async (): Promise<StreamOutcome> => {
    let outcome: StreamOutcome = "completed";
    let failure: unknown;
    try {
      for await (const fragment of opts.source(controller.signal)) {
        if (!(await channel.push(fragment))) break;
      }
      if (channel.isCancelled || controller.signal.aborted) {
        outcome = "cancelled";
      }
      channel.close();
    } catch (error) {
      if (channel.isCancelled || controller.signal.aborted) {
        outcome = "cancelled";
        channel.close();
      } else {
        outcome = "failed";
        failure = error;
        channel.close(error);
      }
    } finally {
      release();
    }
    if (outcome !== "cancelled") {
      await consumed;
      // The consumer left before reading the end
      if (outcome === "completed" && channel.isCancelled) outcome = "cancelled";
    }
    await opts.onEnd?.(outcome, delivered, failure);
    return outcome;
  };

  const done = pump();

  await channel.ready();
  const early = channel.pendingError();
  if (early) {
    consumerDone();
    await done;
    throw early.error;
  }

  return {
    [Symbol.asyncIterator]: () => {
      return {
        next,
        return: async () => {
          cancel();
          return { value: undefined, done: true };
        }
      };
    },
    cancel,
    done
  };
}
