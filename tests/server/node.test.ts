import { describe, it, expect, afterEach } from "vitest";
import type http from "node:http";
import { createNodeServer, listen } from "../../src/server/node.js";

let server: http.Server | undefined;

afterEach(async () => {
  const s = server;
  server = undefined;
  if (!s) return;
  const closed = new Promise<void>((resolve) => s.close(() => resolve()));
  s.closeAllConnections();
  await closed;
});

describe("createNodeServer", () => {
  it("should pass method, path, headers and body to the handler", async () => {
    server = createNodeServer(async (request) =>
      Response.json({
        method: request.method,
        path: new URL(request.url).pathname,
        auth: request.headers.get("authorization"),
        body: await request.text()
      })
    );
    const { port } = await listen(server, { host: "127.0.0.1", port: 0 });

    const response = await fetch(`http://127.0.0.1:${port}/v1/chat/completions`, {
      method: "POST",
      headers: { authorization: "Bearer test-token" },
      body: '{"model":"m"}'
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      method: "POST",
      path: "/v1/chat/completions",
      auth: "Bearer test-token",
      body: '{"model":"m"}'
    });
  });

  it("should stream response bodies and keep the status", async () => {
    const encoder = new TextEncoder();
    server = createNodeServer(async () => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(encoder.encode("data: 1\n\n"));
          controller.enqueue(encoder.encode("data: [DONE]\n\n"));
          controller.close();
        }
      });
      return new Response(body, { status: 201, headers: { "content-type": "text/event-stream" } });
    });
    const { port } = await listen(server, { port: 0 });

    const response = await fetch(`http://127.0.0.1:${port}/`);

    expect(response.status).toBe(201);
    expect(response.headers.get("content-type")).toBe("text/event-stream");
    expect(await response.text()).toBe("data: 1\n\ndata: [DONE]\n\n");
  });

  it("should answer 500 when the handler throws", async () => {
    server = createNodeServer(async () => {
      throw new Error("handler broke");
    });
    const { port } = await listen(server, { port: 0 });

    const response = await fetch(`http://127.0.0.1:${port}/`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: { message: "Internal server error", type: "server_error", code: "internal_error" }
    });
  });
});
