import { z } from "zod";
import type { ProviderAdapter } from "./base.js";
import type { ChatCompletionResult, ChatMessage, ChatRequest, CallOpts, Usage } from "../types.js";
import { DEFAULT_TEMPERATURE } from "../types.js";
import { ConfigError, UpstreamError } from "../errors.js";
import { sseEvents } from "../core/stream.js";
import { fetchTransport, type Transport } from "./transport.js";
import { GOOGLE_PRICING, estimateFromTable } from "./pricing.js";
import { assertHttpUrl, readJson, upstreamFailure } from "./http.js";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

export interface GeminiConfig {
  apiKey: string;
  baseUrl?: string;
  transport?: Transport;
}

export interface GeminiContent {
  role: "user" | "model";
  parts: Array<{ text: string }>;
}

/** System messages have no slot in `contents` and are dropped; assistant turns become `model`. */
export function mapContents(msgs: readonly ChatMessage[]): GeminiContent[] {
  const contents: GeminiContent[] = [];
  for (const m of msgs) {
    if (m.role === "system") continue;
    contents.push({ role: m.role === "assistant" ? "model" : "user", parts: [{ text: m.content }] });
  }
  return contents;
}

const CandidateSchema = z
  .object({
    content: z
      .object({ parts: z.array(z.object({ text: z.string().optional() }).passthrough()).default([]) })
      .passthrough()
      .optional(),
    finishReason: z.string().optional()
  })
  .passthrough();

const GenerateSchema = z
  .object({
    candidates: z.array(CandidateSchema).default([]),
    usageMetadata: z
      .object({
        promptTokenCount: z.number().default(0),
        candidatesTokenCount: z.number().default(0),
        totalTokenCount: z.number().optional()
      })
      .passthrough()
      .optional(),
    error: z.object({ message: z.string().optional() }).passthrough().optional()
  })
  .passthrough();

const ModelListSchema = z
  .object({
    models: z
      .array(
        z
          .object({
            name: z.string(),
            supportedGenerationMethods: z.array(z.string()).default([])
          })
          .passthrough()
      )
      .default([])
  })
  .passthrough();

const textOf = (candidate: z.output<typeof CandidateSchema> | undefined): string =>
  (candidate?.content?.parts ?? []).map((p) => p.text ?? "").join("");

export function gemini(cfg: GeminiConfig): ProviderAdapter {
  const base = (cfg.baseUrl ?? GEMINI_BASE_URL).replace(/\/+$/, "");
  const transport = cfg.transport ?? fetchTransport();
  const headers = (): Record<string, string> => ({ "x-goog-api-key": cfg.apiKey });

  const body = (req: ChatRequest) => ({
    ...req.providerOptions,
    contents: mapContents(req.messages),
    generationConfig: {
      temperature: req.temperature ?? DEFAULT_TEMPERATURE,
      ...(req.maxTokens !== undefined ? { maxOutputTokens: req.maxTokens } : {})
    }
  });

  const modelPath = (model: string) => `${base}/models/${encodeURIComponent(model.replace(/^models\//, ""))}`;

  const adapter: ProviderAdapter = {
    id: "google",

    async chat(req: ChatRequest, opts?: CallOpts): Promise<ChatCompletionResult> {
      const response = await transport.send(
        { provider: "google", method: "POST", url: `${modelPath(req.model)}:generateContent`, headers: headers(), body: body(req) },
        opts
      );
      if (!response.ok) throw await upstreamFailure(response, "google", "Gemini");

      const json = await readJson(response, GenerateSchema, "google", "Gemini");
      const candidate = json.candidates[0];
      const meta = json.usageMetadata;
      const usage: Usage | undefined = meta
        ? {
            promptTokens: meta.promptTokenCount,
            completionTokens: meta.candidatesTokenCount,
            totalTokens: meta.totalTokenCount ?? meta.promptTokenCount + meta.candidatesTokenCount
          }
        : undefined;
      const costUsd = usage
        ? adapter.estimateCost(req.model, usage.promptTokens, usage.completionTokens)
        : undefined;

      return {
        content: textOf(candidate),
        model: req.model,
        usage,
        finishReason: candidate?.finishReason?.toLowerCase(),
        costUsd,
        providerMetadata: costUsd !== undefined ? { cost: costUsd } : {}
      };
    },

    async *streamChat(req: ChatRequest, opts?: CallOpts): AsyncIterable<string> {
      const response = await transport.sendStreaming(
        {
          provider: "google",
          method: "POST",
          url: `${modelPath(req.model)}:streamGenerateContent?alt=sse`,
          headers: headers(),
          body: body(req)
        },
        opts
      );
      if (!response.ok || !response.body) throw await upstreamFailure(response, "google", "Gemini stream");

      for await (const message of sseEvents(response, opts)) {
        const chunk = GenerateSchema.safeParse(message.data);
        if (!chunk.success) continue;
        if (chunk.data.error) {
          const detail = chunk.data.error.message ?? "stream failed";
          throw new UpstreamError(`Gemini stream error: ${detail}`, "google", undefined, detail, undefined, false);
        }
        const text = textOf(chunk.data.candidates[0]);
        if (text) yield text;
      }
    },

    async listModels(opts?: CallOpts): Promise<string[]> {
      const response = await transport.send(
        { provider: "google", method: "GET", url: `${base}/models`, headers: headers() },
        opts
      );
      if (!response.ok) throw await upstreamFailure(response, "google", "Gemini models");
      const json = await readJson(response, ModelListSchema, "google", "Gemini models");
      return json.models
        .filter((m) => m.supportedGenerationMethods.includes("generateContent"))
        .map((m) => m.name.replace(/^models\//, ""));
    },

    validateConfiguration(): true {
      if (!cfg.apiKey) throw new ConfigError("Gemini API key is required");
      assertHttpUrl(base, "Gemini");
      return true;
    },

    estimateCost(model: string, promptTokens: number, completionTokens: number): number {
      return estimateFromTable(GOOGLE_PRICING, model, promptTokens, completionTokens);
    }
  };

  adapter.validateConfiguration();
  return adapter;
}
