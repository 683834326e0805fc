import http from "node:http";
import { Readable } from "node:stream";
import type { RequestHandler } from "./handler.js";

export interface NodeServerOptions {
  host?: string;
  port?: number;
}

function toRequest(req: http.IncomingMessage, signal: AbortSignal): Request {
  const host = req.headers.host ?? "localhost";
  const url = new URL(req.url ?? "/", `http://${host}`);
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) value.forEach((v) => headers.append(name, v));
    else headers.set(name, value);
  }
  const hasBody = req.method !== "GET" && req.method !== "HEAD";
  // undici requires `duplex` whenever the body is a stream
  const init: RequestInit & { duplex: "half" } = {
    method: req.method,
    headers,
    body: hasBody ? Readable.toWeb(req) : undefined,
    signal,
    duplex: "half"
  };
  return new Request(url, init);
}

async function writeResponse(response: Response, res: http.ServerResponse): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => res.setHeader(name, value));
  if (!response.body) {
    res.end();
    return;
  }
  res.flushHeaders();
  const reader = response.body.getReader();
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      if (!res.write(value)) {
        await new Promise<void>((resolve) => {
          const settle = () => {
            res.off("drain", settle);
            res.off("close", settle);
            resolve();
          };
          res.once("drain", settle);
          res.once("close", settle);
        });
      }
      if (res.destroyed) break;
    }
  } finally {
    if (res.destroyed) {
      await reader.cancel(new Error("client disconnected"));
    }
    reader.releaseLock();
    res.end();
  }
}

/**
 * Serves a fetch-style handler over `node:http`. A client that disconnects
 * aborts the request signal and cancels the response body.
 */
export function createNodeServer(handler: RequestHandler): http.Server {
  return http.createServer((req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort(new Error("client disconnected"));
    });

    handler(toRequest(req, controller.signal))
      .then((response) => writeResponse(response, res))
      .catch((error: unknown) => {
        if (!res.headersSent) {
          res.statusCode = 500;
          res.setHeader("content-type", "application/json");
          res.end(JSON.stringify({ error: { message: "Internal server error", type: "server_error", code: "internal_error" } }));
        } else {
          res.destroy(error instanceof Error ? error : undefined);
        }
      });
  });
}

export async function listen(server: http.Server, opts: NodeServerOptions = {}): Promise<{ host: string; port: number }> {
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port ?? 8080, opts.host ?? "127.0.0.1", () => {
      server.off("error", reject);
      resolve();
    });
  });
  const address = server.address();
  if (address && typeof address === "object") return { host: address.address, port: address.port };
  return { host: opts.host ?? "127.0.0.1", port: opts.port ?? 8080 };
}
