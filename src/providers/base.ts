import type { CallOpts, ChatCompletionResult, ChatRequest } from "../types.js";
import { UnsupportedProviderError } from "../errors.js";

export const PROVIDER_IDS = ["openai", "anthropic", "google", "ollama", "custom"] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

const ALIASES = new Map<string, ProviderId>([
  ["openai", "openai"],
  ["anthropic", "anthropic"],
  ["claude", "anthropic"],
  ["google", "google"],
  ["gemini", "google"],
  ["ollama", "ollama"],
  ["local", "ollama"],
  ["custom", "custom"]
]);

/** Case-insensitive alias resolution; throws UnsupportedProviderError for unknown ids. */
export function normalizeProvider(provider: string): ProviderId {
  const id = ALIASES.get(provider.trim().toLowerCase());
  if (!id) throw new UnsupportedProviderError(provider);
  return id;
}

export function isProviderId(provider: string): boolean {
  return ALIASES.has(provider.trim().toLowerCase());
}

/** Every lower-case spelling that normalizes to `id`, canonical name first. */
export function providerAliases(id: ProviderId): string[] {
  return [id, ...[...ALIASES].filter(([alias, target]) => alias !== id && target === id).map(([alias]) => alias)];
}

export function supportedProviders(): string[] {
  return [...ALIASES.keys()];
}

export interface ProviderAdapter {
  readonly id: ProviderId;
  chat(req: ChatRequest, opts?: CallOpts): Promise<ChatCompletionResult>;
  /** Incremental content deltas in arrival order. Not restartable. */
  streamChat(req: ChatRequest, opts?: CallOpts): AsyncIterable<string>;
  listModels(opts?: CallOpts): Promise<string[]>;
  validateConfiguration(): true;
  estimateCost(model: string, promptTokens: number, completionTokens: number): number;
}
