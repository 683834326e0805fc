import type { CallOpts } from "../types.js";
import { Deadline } from "../core/abort.js";
import { GatewayError, UpstreamError, errorMessage, isAbortError } from "../errors.js";
import { USER_AGENT } from "../version.js";

export interface TransportRequest {
  /** Provider id, used to label transport failures. */
  provider: string;
  method: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  /** Serialized as JSON when present. */
  body?: unknown;
}

/**
 * The only way adapters reach the network. `send` returns a fully buffered
 * response; `sendStreaming` returns as soon as headers arrive and leaves the
 * body open for incremental reads.
 */
export interface Transport {
  send(req: TransportRequest, opts?: CallOpts): Promise<Response>;
  sendStreaming(req: TransportRequest, opts?: CallOpts): Promise<Response>;
}

export interface TransportTimeouts {
  /** Time allowed until response headers arrive. */
  connectTimeoutMs?: number;
  /** Time allowed for the buffered body, or between two chunks of a stream. */
  readTimeoutMs?: number;
}

export interface FetchTransportOptions extends TransportTimeouts {
  fetch?: typeof fetch;
}

export function fetchTransport(options: FetchTransportOptions = {}): Transport {
  const fetchImpl = options.fetch ?? globalThis.fetch;

  const init = (req: TransportRequest, signal: AbortSignal, accept: string): RequestInit => {
    const headers: Record<string, string> = {
      accept,
      "user-agent": USER_AGENT,
      ...req.headers
    };
    if (req.body !== undefined) headers["content-type"] = "application/json";
    return {
      method: req.method,
      headers,
      body: req.body === undefined ? undefined : JSON.stringify(req.body),
      signal
    };
  };

  return {
    async send(req, opts) {
      const deadline = new Deadline(opts?.signal);
      deadline.arm(options.connectTimeoutMs);
      try {
        const response = await fetchImpl(req.url, init(req, deadline.signal, "application/json"));
        deadline.arm(options.readTimeoutMs);
        const text = await response.text();
        return new Response(text === "" ? null : text, {
          status: response.status,
          statusText: response.statusText,
          headers: response.headers
        });
      } catch (error) {
        throw transportFailure(error, req, deadline.expired);
      } finally {
        deadline.dispose();
      }
    },

    async sendStreaming(req, opts) {
      const deadline = new Deadline(opts?.signal);
      deadline.arm(options.connectTimeoutMs);
      let response: Response;
      try {
        response = await fetchImpl(req.url, init(req, deadline.signal, "text/event-stream"));
      } catch (error) {
        deadline.dispose();
        throw transportFailure(error, req, deadline.expired);
      }
      deadline.disarm();

      const upstream = response.body;
      if (!upstream) {
        deadline.dispose();
        return response;
      }

      const reader = upstream.getReader();
      const body = new ReadableStream<Uint8Array>({
        async pull(controller) {
          deadline.arm(options.readTimeoutMs);
          try {
            const { value, done } = await reader.read();
            deadline.disarm();
            if (done) {
              deadline.dispose();
              controller.close();
              return;
            }
            controller.enqueue(value);
          } catch (error) {
            deadline.dispose();
            controller.error(transportFailure(error, req, deadline.expired));
          }
        },
        async cancel(reason) {
          deadline.dispose();
          await reader.cancel(reason);
        }
      });

      return new Response(body, {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers
      });
    }
  };
}

function transportFailure(error: unknown, req: TransportRequest, expired: boolean): unknown {
  if (expired) {
    return new UpstreamError(
      `${req.provider} request timed out`,
      req.provider,
      undefined,
      errorMessage(error)
    );
  }
  if (isAbortError(error) || error instanceof GatewayError) {
    return error;
  }
  return new UpstreamError(
    `${req.provider} network error: ${errorMessage(error)}`,
    req.provider,
    undefined,
    errorMessage(error)
  );
}
