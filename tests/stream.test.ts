import { describe, it, expect } from "vitest";
import { sseEvents, type SseMessage } from "../src/core/stream.js";
import { controlledSse, sseResponse } from "./helpers/mock-transport.js";

async function collect(response: Response, signal?: AbortSignal): Promise<SseMessage[]> {
  const out: SseMessage[] = [];
  for await (const message of sseEvents(response, { signal })) out.push(message);
  return out;
}

describe("sseEvents", () => {
  it("should parse basic SSE data", async () => {
    expect(await collect(sseResponse('data: {"content": "hello"}\n\n'))).toEqual([
      { event: undefined, data: { content: "hello" } }
    ]);
  });

  it("should reassemble lines split across chunks", async () => {
    const messages = await collect(sseResponse('data: {"a"', ':1}\n\ndata: {"a":2}\r\n', "\r\n"));
    expect(messages.map((m) => m.data)).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it("should attach the event name to its frame only", async () => {
    const messages = await collect(
      sseResponse('event: message_start\ndata: {"n":1}\n\n', 'data: {"n":2}\n\n')
    );
    expect(messages).toEqual([
      { event: "message_start", data: { n: 1 } },
      { event: undefined, data: { n: 2 } }
    ]);
  });

  it("should skip heartbeats and malformed JSON", async () => {
    const messages = await collect(sseResponse(": ping\n\n", "data: not-json\n\n", 'data: {"ok":true}\n\n'));
    expect(messages.map((m) => m.data)).toEqual([{ ok: true }]);
  });

  it("should stop at [DONE]", async () => {
    const messages = await collect(sseResponse('data: {"n":1}\n\n', "data: [DONE]\n\n", 'data: {"n":2}\n\n'));
    expect(messages.map((m) => m.data)).toEqual([{ n: 1 }]);
  });

  it("should report the terminator only when it arrives", async () => {
    let done = 0;
    for await (const _message of sseEvents(sseResponse('data: {"n":1}\n\n', "data: [DONE]\n\n"), undefined, () => done++)) {
      // drain
    }
    expect(done).toBe(1);

    let truncated = 0;
    for await (const _message of sseEvents(sseResponse('data: {"n":1}\n\n'), undefined, () => truncated++)) {
      // drain
    }
    expect(truncated).toBe(0);
  });

  it("should parse a trailing line without a newline", async () => {
    const messages = await collect(sseResponse('data: {"tail":1}'));
    expect(messages.map((m) => m.data)).toEqual([{ tail: 1 }]);
  });

  it("should cancel the body when the consumer leaves early", async () => {
    const upstream = controlledSse();
    upstream.push('data: {"n":1}\n\n');

    for await (const _message of sseEvents(upstream.response)) {
      break;
    }

    await expect(upstream.cancelled).resolves.toBeUndefined();
  });

  it("should reject with AbortError when the signal fires", async () => {
    const upstream = controlledSse();
    const controller = new AbortController();
    upstream.push('data: {"n":1}\n\n');

    const seen: unknown[] = [];
    const run = (async () => {
      for await (const message of sseEvents(upstream.response, { signal: controller.signal })) {
        seen.push(message.data);
        controller.abort();
      }
    })();

    await expect(run).rejects.toMatchObject({ name: "AbortError" });
    expect(seen).toEqual([{ n: 1 }]);
  });

  it("should throw when the response has no body", async () => {
    await expect(collect(new Response(null, { status: 204 }))).rejects.toThrow("response has no body");
  });
});
