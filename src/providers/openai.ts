import { z } from "zod";
import type { ProviderAdapter, ProviderId } from "./base.js";
import type { ChatCompletionResult, ChatRequest, CallOpts, Usage } from "../types.js";
import { DEFAULT_TEMPERATURE } from "../types.js";
import { ConfigError, UpstreamError } from "../errors.js";
import { sseEvents } from "../core/stream.js";
import { fetchTransport, type Transport } from "./transport.js";
import { OPENAI_PRICING, estimateFromTable, type PricingTable } from "./pricing.js";
import { assertHttpUrl, readJson, upstreamFailure } from "./http.js";

export const OPENAI_BASE_URL = "https://api.openai.com/v1";

const CompletionSchema = z
  .object({
    id: z.string().optional(),
    model: z.string().optional(),
    choices: z
      .array(
        z
          .object({
            message: z.object({ content: z.string().nullable().optional() }).passthrough().optional(),
            finish_reason: z.string().nullable().optional()
          })
          .passthrough()
      )
      .default([]),
    usage: z
      .object({
        prompt_tokens: z.number(),
        completion_tokens: z.number(),
        total_tokens: z.number().optional()
      })
      .passthrough()
      .nullable()
      .optional()
  })
  .passthrough();

const ChunkSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            delta: z.object({ content: z.string().nullable().optional() }).passthrough().optional()
          })
          .passthrough()
      )
      .optional(),
    error: z.object({ message: z.string().optional() }).passthrough().optional()
  })
  .passthrough();

const ModelListSchema = z.object({ data: z.array(z.object({ id: z.string() }).passthrough()) }).passthrough();

export interface OpenAICompatibleConfig {
  id: ProviderId;
  /** Human-readable upstream name used in error messages. */
  label: string;
  apiKey?: string;
  baseUrl?: string;
  transport?: Transport;
  pricing?: PricingTable;
  /** Whether an API key must be supplied. */
  requireApiKey?: boolean;
  /** Return [] instead of failing when the upstream cannot list models. */
  tolerateListFailure?: boolean;
  /** Merged into every result's providerMetadata. */
  metadata?: Record<string, unknown>;
}

/**
 * Chat Completions wire format shared by OpenAI, custom OpenAI-compatible
 * endpoints and local servers. System messages are passed inline.
 */
export function openaiCompatible(cfg: OpenAICompatibleConfig): ProviderAdapter {
  const base = (cfg.baseUrl ?? "").replace(/\/+$/, "");
  const transport = cfg.transport ?? fetchTransport();
  const pricing = cfg.pricing ?? [];
  const headers = (): Record<string, string> => ({ authorization: `Bearer ${cfg.apiKey ?? ""}` });

  const body = (req: ChatRequest, stream: boolean) => ({
    ...req.providerOptions,
    model: req.model,
    messages: req.messages.map((m) => ({ role: m.role, content: m.content })),
    temperature: req.temperature ?? DEFAULT_TEMPERATURE,
    max_tokens: req.maxTokens,
    stream
  });

  const adapter: ProviderAdapter = {
    id: cfg.id,

    async chat(req: ChatRequest, opts?: CallOpts): Promise<ChatCompletionResult> {
      const response = await transport.send(
        { provider: cfg.id, method: "POST", url: `${base}/chat/completions`, headers: headers(), body: body(req, false) },
        opts
      );
      if (!response.ok) throw await upstreamFailure(response, cfg.id, cfg.label);

      const json = await readJson(response, CompletionSchema, cfg.id, cfg.label);
      const choice = json.choices[0];
      const usage: Usage | undefined = json.usage
        ? {
            promptTokens: json.usage.prompt_tokens,
            completionTokens: json.usage.completion_tokens,
            totalTokens: json.usage.total_tokens ?? json.usage.prompt_tokens + json.usage.completion_tokens
          }
        : undefined;
      const costUsd = usage
        ? adapter.estimateCost(req.model, usage.promptTokens, usage.completionTokens)
        : undefined;

      return {
        content: choice?.message?.content ?? "",
        model: req.model,
        usage,
        finishReason: choice?.finish_reason ?? undefined,
        costUsd,
        providerMetadata: {
          ...cfg.metadata,
          ...(costUsd !== undefined ? { cost: costUsd } : {}),
          ...(json.id ? { response_id: json.id } : {}),
          ...(json.model ? { upstream_model: json.model } : {})
        }
      };
    },

    async *streamChat(req: ChatRequest, opts?: CallOpts): AsyncIterable<string> {
      const response = await transport.sendStreaming(
        { provider: cfg.id, method: "POST", url: `${base}/chat/completions`, headers: headers(), body: body(req, true) },
        opts
      );
      if (!response.ok || !response.body) throw await upstreamFailure(response, cfg.id, `${cfg.label} stream`);

      let terminated = false;
      for await (const message of sseEvents(response, opts, () => (terminated = true))) {
        const chunk = ChunkSchema.safeParse(message.data);
        if (!chunk.success) continue;
        if (chunk.data.error) {
          const detail = chunk.data.error.message ?? "stream failed";
          throw new UpstreamError(`${cfg.label} stream error: ${detail}`, cfg.id, undefined, detail, undefined, false);
        }
        const delta = chunk.data.choices?.[0]?.delta?.content;
        if (delta) yield delta;
      }
      if (!terminated) {
        throw new UpstreamError(`${cfg.label} stream ended early`, cfg.id, undefined, "missing [DONE]");
      }
    },

    async listModels(opts?: CallOpts): Promise<string[]> {
      try {
        const response = await transport.send(
          { provider: cfg.id, method: "GET", url: `${base}/models`, headers: headers() },
          opts
        );
        if (!response.ok) throw await upstreamFailure(response, cfg.id, `${cfg.label} models`);
        const json = await readJson(response, ModelListSchema, cfg.id, `${cfg.label} models`);
        return json.data.map((m) => m.id);
      } catch (error) {
        if (cfg.tolerateListFailure && !(opts?.signal?.aborted ?? false)) return [];
        throw error;
      }
    },

    validateConfiguration(): true {
      if ((cfg.requireApiKey ?? true) && !cfg.apiKey) {
        throw new ConfigError(`${cfg.label} API key is required`);
      }
      assertHttpUrl(cfg.baseUrl, cfg.label);
      return true;
    },

    estimateCost(model: string, promptTokens: number, completionTokens: number): number {
      return estimateFromTable(pricing, model, promptTokens, completionTokens);
    }
  };

  adapter.validateConfiguration();
  return adapter;
}

export interface OpenAIConfig {
  apiKey: string;
  baseUrl?: string;
  transport?: Transport;
}

export function openai(cfg: OpenAIConfig): ProviderAdapter {
  return openaiCompatible({
    id: "openai",
    label: "OpenAI",
    apiKey: cfg.apiKey,
    baseUrl: cfg.baseUrl ?? OPENAI_BASE_URL,
    transport: cfg.transport,
    pricing: OPENAI_PRICING
  });
}
