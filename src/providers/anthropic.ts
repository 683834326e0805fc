import { z } from "zod";
import type { ProviderAdapter } from "./base.js";
import type { ChatCompletionResult, ChatMessage, ChatRequest, CallOpts, Usage } from "../types.js";
import { DEFAULT_TEMPERATURE } from "../types.js";
import { ConfigError, UpstreamError } from "../errors.js";
import { sseEvents } from "../core/stream.js";
import { fetchTransport, type Transport } from "./transport.js";
import { ANTHROPIC_PRICING, estimateFromTable } from "./pricing.js";
import { assertHttpUrl, readJson, upstreamFailure } from "./http.js";

export const ANTHROPIC_BASE_URL = "https://api.anthropic.com/v1";
export const ANTHROPIC_VERSION = "2023-06-01";
/** The Messages API rejects requests without max_tokens. */
export const ANTHROPIC_DEFAULT_MAX_TOKENS = 4096;

export const ANTHROPIC_MODELS: readonly string[] = [
  "claude-3-opus-20240229",
  "claude-3-sonnet-20240229",
  "claude-3-haiku-20240307",
  "claude-3-5-sonnet-20241022"
];

export interface AnthropicConfig {
  apiKey: string;
  baseUrl?: string;
  transport?: Transport;
}

type AnthropicMsg = { role: "user" | "assistant"; content: string };

/**
 * Splits the conversation into the top-level `system` prompt (first system
 * message) and the user/assistant turns. Further system messages are dropped.
 */
export function mapMessages(msgs: readonly ChatMessage[]): { system?: string; messages: AnthropicMsg[] } {
  let system: string | undefined;
  const messages: AnthropicMsg[] = [];
  for (const m of msgs) {
    if (m.role === "system") {
      system ??= m.content;
    } else {
      messages.push({ role: m.role, content: m.content });
    }
  }
  return { system, messages };
}

const MessageSchema = z
  .object({
    id: z.string().optional(),
    model: z.string().optional(),
    content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
    stop_reason: z.string().nullable().optional(),
    usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).passthrough().optional()
  })
  .passthrough();

const StreamEventSchema = z
  .object({
    type: z.string(),
    delta: z.object({ type: z.string().optional(), text: z.string().optional() }).passthrough().optional(),
    error: z.object({ type: z.string().optional(), message: z.string().optional() }).passthrough().optional()
  })
  .passthrough();

export function anthropic(cfg: AnthropicConfig): ProviderAdapter {
  const base = (cfg.baseUrl ?? ANTHROPIC_BASE_URL).replace(/\/+$/, "");
  const transport = cfg.transport ?? fetchTransport();
  const headers = (): Record<string, string> => ({
    "x-api-key": cfg.apiKey,
    "anthropic-version": ANTHROPIC_VERSION
  });

  const body = (req: ChatRequest, stream: boolean) => {
    const { system, messages } = mapMessages(req.messages);
    return {
      ...req.providerOptions,
      model: req.model,
      messages,
      ...(system !== undefined ? { system } : {}),
      max_tokens: req.maxTokens ?? ANTHROPIC_DEFAULT_MAX_TOKENS,
      temperature: req.temperature ?? DEFAULT_TEMPERATURE,
      stream
    };
  };

  const adapter: ProviderAdapter = {
    id: "anthropic",

    async chat(req: ChatRequest, opts?: CallOpts): Promise<ChatCompletionResult> {
      const response = await transport.send(
        { provider: "anthropic", method: "POST", url: `${base}/messages`, headers: headers(), body: body(req, false) },
        opts
      );
      if (!response.ok) throw await upstreamFailure(response, "anthropic", "Anthropic");

      const json = await readJson(response, MessageSchema, "anthropic", "Anthropic");
      const content = json.content
        .filter((block) => block.type === "text")
        .map((block) => block.text ?? "")
        .join("");
      const usage: Usage | undefined = json.usage
        ? {
            promptTokens: json.usage.input_tokens,
            completionTokens: json.usage.output_tokens,
            totalTokens: json.usage.input_tokens + json.usage.output_tokens
          }
        : undefined;
      const costUsd = usage
        ? adapter.estimateCost(req.model, usage.promptTokens, usage.completionTokens)
        : undefined;

      return {
        content,
        model: req.model,
        usage,
        finishReason: json.stop_reason ?? undefined,
        costUsd,
        providerMetadata: {
          ...(costUsd !== undefined ? { cost: costUsd } : {}),
          ...(json.id ? { response_id: json.id } : {})
        }
      };
    },

    async *streamChat(req: ChatRequest, opts?: CallOpts): AsyncIterable<string> {
      const response = await transport.sendStreaming(
        { provider: "anthropic", method: "POST", url: `${base}/messages`, headers: headers(), body: body(req, true) },
        opts
      );
      if (!response.ok || !response.body) throw await upstreamFailure(response, "anthropic", "Anthropic stream");

      for await (const message of sseEvents(response, opts)) {
        const event = StreamEventSchema.safeParse(message.data);
        if (!event.success) continue;
        if (event.data.type === "error") {
          const detail = event.data.error?.message ?? "stream failed";
          const retryable = event.data.error?.type === "overloaded_error";
          throw new UpstreamError(`Anthropic stream error: ${detail}`, "anthropic", undefined, detail, undefined, retryable);
        }
        if (event.data.type === "message_stop") return;
        if (event.data.type === "content_block_delta" && event.data.delta?.text) {
          yield event.data.delta.text;
        }
      }
      throw new UpstreamError("Anthropic stream ended early", "anthropic", undefined, "missing message_stop");
    },

    // No listing endpoint is used; the known model ids are served locally.
    async listModels(): Promise<string[]> {
      return [...ANTHROPIC_MODELS];
    },

    validateConfiguration(): true {
      if (!cfg.apiKey) throw new ConfigError("Anthropic API key is required");
      assertHttpUrl(base, "Anthropic");
      return true;
    },

    estimateCost(model: string, promptTokens: number, completionTokens: number): number {
      return estimateFromTable(ANTHROPIC_PRICING, model, promptTokens, completionTokens);
    }
  };

  adapter.validateConfiguration();
  return adapter;
}
