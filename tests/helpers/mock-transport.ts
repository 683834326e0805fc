import type { CallOpts } from "../../src/types.js";
import type { Transport, TransportRequest } from "../../src/providers/transport.js";

const encoder = new TextEncoder();

export interface RecordedCall {
  req: TransportRequest;
  streaming: boolean;
  signal?: AbortSignal;
}

type Responder = (req: TransportRequest, opts?: CallOpts) => Response | Promise<Response>;

/** Scripted transport: each call takes the next queued responder, in order. */
export class MockTransport implements Transport {
  readonly calls: RecordedCall[] = [];
  private readonly queue: Responder[] = [];

  respond(responder: Responder): this {
    this.queue.push(responder);
    return this;
  }

  respondJson(status: number, body: unknown, headers: Record<string, string> = {}): this {
    return this.respond(() => jsonResponse(status, body, headers));
  }

  respondSse(...chunks: string[]): this {
    return this.respond(() => sseResponse(...chunks));
  }

  fail(error: unknown): this {
    return this.respond(() => {
      throw error;
    });
  }

  async send(req: TransportRequest, opts?: CallOpts): Promise<Response> {
    return this.dispatch(req, false, opts);
  }

  async sendStreaming(req: TransportRequest, opts?: CallOpts): Promise<Response> {
    return this.dispatch(req, true, opts);
  }

  /** Parsed JSON body of the n-th call. */
  bodyOf(index: number): Record<string, unknown> {
    const body = this.calls[index]?.req.body;
    if (typeof body !== "object" || body === null) throw new Error(`call ${index} has no object body`);
    return Object.fromEntries(Object.entries(body));
  }

  private async dispatch(req: TransportRequest, streaming: boolean, opts?: CallOpts): Promise<Response> {
    this.calls.push({ req, streaming, signal: opts?.signal });
    const next = this.queue.shift();
    if (!next) throw new Error(`Unexpected ${req.method} ${req.url}`);
    return next(req, opts);
  }
}

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers }
  });
}

export function sseResponse(...chunks: string[]): Response {
  let index = 0;
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (index < chunks.length) {
        controller.enqueue(encoder.encode(chunks[index++]));
      } else {
        controller.close();
      }
    }
  });
  return new Response(body, { status: 200, headers: { "content-type": "text/event-stream" } });
}

/** `data:` line of an OpenAI-style delta chunk. */
export const openaiDelta = (content: string) =>
  `data: ${JSON.stringify({ choices: [{ delta: { content } }] })}\n\n`;

/**
 * SSE body fed by hand. `cancelled` resolves with the reason once the
 * consumer cancels the body.
 */
export function controlledSse() {
  let ctrl: ReadableStreamDefaultController<Uint8Array> | undefined;
  let onCancel: (reason: unknown) => void = () => {};
  const cancelled = new Promise<unknown>((resolve) => {
    onCancel = resolve;
  });
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      ctrl = controller;
    },
    cancel(reason) {
      onCancel(reason);
    }
  });
  return {
    response: new Response(body, { status: 200, headers: { "content-type": "text/event-stream" } }),
    push(text: string) {
      ctrl?.enqueue(encoder.encode(text));
    },
    close() {
      ctrl?.close();
    },
    error(error: unknown) {
      ctrl?.error(error);
    },
    cancelled
  };
}
