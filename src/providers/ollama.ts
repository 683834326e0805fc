import type { ProviderAdapter } from "./base.js";
import type { ModelPrice } from "../types.js";
import type { Transport } from "./transport.js";
import { openaiCompatible } from "./openai.js";

export const OLLAMA_BASE_URL = "http://localhost:11434";

// The compatibility layer insists on a bearer token but never checks it.
const PLACEHOLDER_TOKEN = "ollama";

export interface OllamaConfig {
  baseUrl?: string;
  pricing?: ModelPrice;
  transport?: Transport;
}

export function ollamaBaseUrl(raw: string | undefined): string {
  const url = (raw ?? OLLAMA_BASE_URL).replace(/\/+$/, "");
  return url.endsWith("/v1") ? url : `${url}/v1`;
}

/** Local models through Ollama's OpenAI-compatible `/v1` API. Free unless priced explicitly. */
export function ollama(cfg: OllamaConfig = {}): ProviderAdapter {
  const baseUrl = ollamaBaseUrl(cfg.baseUrl);
  return openaiCompatible({
    id: "ollama",
    label: "Ollama",
    apiKey: PLACEHOLDER_TOKEN,
    baseUrl,
    transport: cfg.transport,
    pricing: cfg.pricing ? [["", cfg.pricing]] : [],
    requireApiKey: false,
    tolerateListFailure: true,
    metadata: { base_url: baseUrl }
  });
}
