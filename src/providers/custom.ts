import type { ProviderAdapter } from "./base.js";
import type { ModelPrice } from "../types.js";
import type { Transport } from "./transport.js";
import { openaiCompatible } from "./openai.js";

export interface CustomConfig {
  apiKey: string;
  baseUrl: string;
  /** Free-form label of the upstream flavour, reported in result metadata. */
  modelType?: string;
  /** Flat price applied to every model served by the endpoint. */
  pricing?: ModelPrice;
  transport?: Transport;
}

/**
 * Any OpenAI-compatible endpoint (vLLM, OneAPI, FastChat, ...). The base URL
 * is used as given. Model listing failures yield an empty list, since many
 * such servers do not implement `/models`.
 */
export function custom(cfg: CustomConfig): ProviderAdapter {
  const modelType = cfg.modelType ?? "openai-compatible";
  return openaiCompatible({
    id: "custom",
    label: `Custom endpoint ${cfg.baseUrl}`,
    apiKey: cfg.apiKey,
    baseUrl: cfg.baseUrl,
    transport: cfg.transport,
    pricing: cfg.pricing ? [["", cfg.pricing]] : [],
    tolerateListFailure: true,
    metadata: { base_url: cfg.baseUrl, model_type: modelType }
  });
}
