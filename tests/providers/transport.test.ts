import { describe, it, expect } from "vitest";
import { fetchTransport } from "../../src/providers/transport.js";
import { UpstreamError } from "../../src/errors.js";
import { jsonResponse } from "../helpers/mock-transport.js";
import { USER_AGENT } from "../../src/version.js";

const encoder = new TextEncoder();

describe("fetchTransport", () => {
  it("should send JSON with the default headers", async () => {
    const seen: RequestInit[] = [];
    const transport = fetchTransport({
      fetch: async (_url, init) => {
        if (init) seen.push(init);
        return jsonResponse(200, { ok: true });
      }
    });

    const response = await transport.send({
      provider: "openai",
      method: "POST",
      url: "https://api.test/v1/chat/completions",
      headers: { authorization: "Bearer test-key" },
      body: { model: "m" }
    });

    expect(await response.json()).toEqual({ ok: true });
    expect(seen[0]?.body).toBe('{"model":"m"}');
    expect(seen[0]?.headers).toEqual({
      accept: "application/json",
      "user-agent": USER_AGENT,
      authorization: "Bearer test-key",
      "content-type": "application/json"
    });
  });

  it("should wrap network failures in UpstreamError", async () => {
    const transport = fetchTransport({
      fetch: async () => {
        throw new TypeError("fetch failed");
      }
    });

    const failure = await transport.send({ provider: "ollama", method: "GET", url: "http://localhost:11434/v1/models" }).catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(UpstreamError);
    expect(failure).toMatchObject({ message: "ollama network error: fetch failed", provider: "ollama" });
  });

  it("should time out when headers never arrive", async () => {
    const transport = fetchTransport({
      connectTimeoutMs: 20,
      fetch: (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          signal?.addEventListener("abort", () => reject(signal?.reason));
        })
    });

    await expect(transport.send({ provider: "openai", method: "GET", url: "https://api.test/v1/models" })).rejects.toThrow(
      "openai request timed out"
    );
  });

  it("should pass a caller abort through unchanged", async () => {
    const controller = new AbortController();
    const transport = fetchTransport({
      fetch: (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          signal?.addEventListener("abort", () => reject(signal?.reason));
        })
    });

    const pending = transport.send({ provider: "openai", method: "GET", url: "https://api.test" }, { signal: controller.signal });
    controller.abort(new DOMException("stop", "AbortError"));

    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
  });

  it("should fail a stream that goes quiet longer than the read timeout", async () => {
    const transport = fetchTransport({
      readTimeoutMs: 20,
      fetch: async (_url, init) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(encoder.encode("data: {}\n\n"));
            const signal = init?.signal;
            signal?.addEventListener("abort", () => controller.error(signal?.reason));
          }
        });
        return new Response(body, { status: 200 });
      }
    });

    const response = await transport.sendStreaming({ provider: "anthropic", method: "POST", url: "https://api.test", body: {} });
    const reader = response.body?.getReader();
    expect((await reader?.read())?.done).toBe(false);
    await expect(reader?.read()).rejects.toThrow("anthropic request timed out");
  });
});
