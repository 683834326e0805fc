import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { ChatRequest } from "../types.js";
import { GatewayError, NotFoundError, ValidationError, isAbortError } from "../errors.js";
import type { Gateway, OpenedStream } from "../core/gateway.js";
import type { CredentialService } from "../credentials/service.js";

export type RequestHandler = (request: Request) => Promise<Response>;

export interface GatewayHandlerOptions {
  gateway: Gateway;
  credentials: CredentialService;
  /** Prefix of every route, e.g. `/v1`. */
  basePath?: string;
}

const ChatCompletionBodySchema = z.object({
  model: z.string().min(1),
  messages: z
    .array(z.object({ role: z.enum(["system", "user", "assistant"]), content: z.string() }))
    .min(1),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  stream: z.boolean().optional()
});

type ChatCompletionBody = z.infer<typeof ChatCompletionBodySchema>;

const ERROR_TYPES: Record<number, string> = {
  400: "invalid_request_error",
  401: "authentication_error",
  403: "permission_error",
  404: "not_found_error",
  405: "invalid_request_error",
  429: "rate_limit_error",
  499: "client_closed_request",
  502: "upstream_error"
};

export function errorBody(error: unknown): { status: number; body: { error: { message: string; type: string; code: string } } } {
  if (error instanceof GatewayError) {
    return {
      status: error.status,
      body: { error: { message: error.message, type: ERROR_TYPES[error.status] ?? "server_error", code: error.code } }
    };
  }
  if (isAbortError(error)) {
    return { status: 499, body: { error: { message: "Request was cancelled", type: ERROR_TYPES[499], code: "cancelled" } } };
  }
  return { status: 500, body: { error: { message: "Internal server error", type: "server_error", code: "internal_error" } } };
}

const json = (status: number, body: unknown, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers }
  });

function bearerToken(request: Request): string | undefined {
  const header = request.headers.get("authorization");
  if (!header) return undefined;
  const [scheme, token] = header.trim().split(/\s+/, 2);
  return scheme?.toLowerCase() === "bearer" && token ? token : undefined;
}

async function readBody(request: Request): Promise<ChatCompletionBody> {
  let raw: unknown;
  try {
    raw = await request.json();
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
  const parsed = ChatCompletionBodySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`);
    throw new ValidationError(`Invalid request: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

/**
 * OpenAI-compatible routes over the gateway as a fetch-style handler:
 * `POST {basePath}/chat/completions` and `GET {basePath}/models`. Callers
 * authenticate with a gateway client token before anything else happens.
 */
export function createGatewayHandler(opts: GatewayHandlerOptions): RequestHandler {
  const base = (opts.basePath ?? "/v1").replace(/\/+$/, "");
  const routes = {
    completions: `${base}/chat/completions`,
    models: `${base}/models`
  };

  const chatCompletions = async (request: Request, ownerId: string): Promise<Response> => {
    const body = await readBody(request);
    const req: ChatRequest = {
      model: body.model,
      messages: body.messages,
      temperature: body.temperature,
      maxTokens: body.max_tokens
    };
    const id = `chatcmpl-${randomUUID()}`;
    const created = Math.floor(Date.now() / 1000);

    if (body.stream) {
      const opened = await opts.gateway.openStream(ownerId, req, { signal: request.signal });
      return new Response(sseBody(opened, id, created, body.model), {
        status: 200,
        headers: {
          "content-type": "text/event-stream",
          "cache-control": "no-cache",
          connection: "keep-alive"
        }
      });
    }

    const { result } = await opts.gateway.complete(ownerId, req, { signal: request.signal });
    return json(200, {
      id,
      object: "chat.completion",
      created,
      model: body.model,
      choices: [
        {
          index: 0,
          message: { role: "assistant", content: result.content },
          finish_reason: result.finishReason ?? "stop"
        }
      ],
      usage: result.usage
        ? {
            prompt_tokens: result.usage.promptTokens,
            completion_tokens: result.usage.completionTokens,
            total_tokens: result.usage.totalTokens
          }
        : null
    });
  };

  const listModels = async (request: Request, ownerId: string): Promise<Response> => {
    const listed = await opts.gateway.listModels(ownerId, { signal: request.signal });
    const seen = new Set<string>();
    const data: Array<{ id: string; object: "model"; owned_by: string }> = [];
    for (const m of listed) {
      if (seen.has(m.id)) continue;
      seen.add(m.id);
      data.push({ id: m.id, object: "model", owned_by: m.provider });
    }
    return json(200, { object: "list", data });
  };

  return async (request: Request): Promise<Response> => {
    try {
      const { pathname } = new URL(request.url);
      const route =
        pathname === routes.completions ? "completions" : pathname === routes.models ? "models" : undefined;
      if (!route) throw new NotFoundError(`No route for ${pathname}`);

      const allowed = route === "completions" ? "POST" : "GET";
      if (request.method !== allowed) {
        return json(
          405,
          { error: { message: `Method ${request.method} not allowed`, type: ERROR_TYPES[405], code: "method_not_allowed" } },
          { allow: allowed }
        );
      }

      const client = await opts.credentials.authenticateClient(bearerToken(request));
      return route === "completions"
        ? await chatCompletions(request, client.ownerId)
        : await listModels(request, client.ownerId);
    } catch (error) {
      const { status, body } = errorBody(error);
      return json(status, body);
    }
  };
}

/**
 * Frames fragments as `chat.completion.chunk` events followed by `[DONE]`.
 * A failure after the first fragment ends the body with an `error` event
 * and no `[DONE]`. Cancelling the body cancels the upstream.
 */
export function sseBody(opened: OpenedStream, id: string, created: number, model: string): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const iterator = opened.fragments[Symbol.asyncIterator]();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { value, done } = await iterator.next();
        if (done) {
          controller.enqueue(encoder.encode("data: [DONE]\n\n"));
          controller.close();
          return;
        }
        const chunk = {
          id,
          object: "chat.completion.chunk",
          created,
          model,
          choices: [{ delta: { content: value }, index: 0, finish_reason: null }]
        };
        controller.enqueue(encoder.encode(`data: ${JSON.stringify(chunk)}\n\n`));
      } catch (error) {
        controller.enqueue(encoder.encode(`event: error\ndata: ${JSON.stringify(errorBody(error).body)}\n\n`));
        controller.close();
      }
    },
    async cancel(reason) {
      opened.fragments.cancel(reason);
      await iterator.return?.();
    }
  });
}
