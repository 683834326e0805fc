import { z } from "zod";
import type { ModelPrice } from "../types.js";
import { ConfigError, UnsupportedProviderError } from "../errors.js";
import type { SecretCipher } from "../credentials/cipher.js";
import type { Credential } from "../credentials/types.js";
import { normalizeProvider, supportedProviders, type ProviderAdapter } from "./base.js";
import { fetchTransport, type Transport, type TransportTimeouts } from "./transport.js";
import { openai } from "./openai.js";
import { anthropic } from "./anthropic.js";
import { gemini } from "./gemini.js";
import { custom } from "./custom.js";
import { ollama, OLLAMA_BASE_URL } from "./ollama.js";

/** Shape of a credential's `extraConfig` as far as adapters care. Other keys pass through. */
export const CredentialConfigSchema = z
  .object({
    base_url: z.string().min(1).optional(),
    model_type: z.string().optional(),
    /** USD per million tokens. */
    pricing: z
      .object({ input: z.number().nonnegative(), output: z.number().nonnegative() })
      .optional()
  })
  .passthrough();

export type CredentialConfig = z.infer<typeof CredentialConfigSchema>;

export const DEFAULT_CLOUD_TIMEOUTS: Required<TransportTimeouts> = { connectTimeoutMs: 60_000, readTimeoutMs: 60_000 };
// Buffered local generations only send headers once the whole answer is ready.
export const DEFAULT_LOCAL_TIMEOUTS: Required<TransportTimeouts> = { connectTimeoutMs: 300_000, readTimeoutMs: 120_000 };

export interface AdapterFactoryOptions {
  /** Needed by `createAdapterFromCredential` to open stored secrets. */
  cipher?: SecretCipher;
  ollamaBaseUrl?: string;
  /** Replaces the fetch transport for every provider (tests). */
  transport?: Transport;
  fetch?: typeof fetch;
  timeouts?: { cloud?: TransportTimeouts; local?: TransportTimeouts };
}

function parseConfig(raw: Record<string, unknown> | undefined): CredentialConfig {
  const parsed = CredentialConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid provider configuration",
      parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`)
    );
  }
  return parsed.data;
}

const toPrice = (pricing: CredentialConfig["pricing"]): ModelPrice | undefined =>
  pricing ? { inputPerMillion: pricing.input, outputPerMillion: pricing.output } : undefined;

export class AdapterFactory {
  private readonly cloud: Transport;
  private readonly local: Transport;

  constructor(private readonly opts: AdapterFactoryOptions = {}) {
    this.cloud =
      opts.transport ?? fetchTransport({ ...DEFAULT_CLOUD_TIMEOUTS, ...opts.timeouts?.cloud, fetch: opts.fetch });
    this.local =
      opts.transport ?? fetchTransport({ ...DEFAULT_LOCAL_TIMEOUTS, ...opts.timeouts?.local, fetch: opts.fetch });
  }

  supportedProviders(): string[] {
    return supportedProviders();
  }

  /**
   * Builds a ready-to-use adapter. Provider names are case-insensitive and
   * accept aliases; the adapter validates its configuration before returning.
   */
  createAdapter(provider: string, secret?: string | null, config?: Record<string, unknown>): ProviderAdapter {
    const id = normalizeProvider(provider);
    const cfg = parseConfig(config);
    const requireSecret = (label: string): string => {
      if (!secret) throw new ConfigError(`${label} requires an API key`);
      return secret;
    };

    switch (id) {
      case "openai":
        return openai({ apiKey: requireSecret("OpenAI"), baseUrl: cfg.base_url, transport: this.cloud });
      case "anthropic":
        return anthropic({ apiKey: requireSecret("Anthropic"), baseUrl: cfg.base_url, transport: this.cloud });
      case "google":
        return gemini({ apiKey: requireSecret("Gemini"), baseUrl: cfg.base_url, transport: this.cloud });
      case "custom": {
        const apiKey = requireSecret("Custom provider");
        if (!cfg.base_url) throw new ConfigError("Custom provider requires base_url");
        return custom({
          apiKey,
          baseUrl: cfg.base_url,
          modelType: cfg.model_type,
          pricing: toPrice(cfg.pricing),
          transport: this.cloud
        });
      }
      case "ollama":
        return ollama({
          baseUrl: cfg.base_url ?? this.opts.ollamaBaseUrl ?? OLLAMA_BASE_URL,
          pricing: toPrice(cfg.pricing),
          transport: this.local
        });
      default:
        throw new UnsupportedProviderError(provider);
    }
  }

  createAdapterFromCredential(credential: Credential): ProviderAdapter {
    let secret: string | null = null;
    if (credential.secret) {
      if (!this.opts.cipher) throw new ConfigError("No cipher configured to decrypt stored secrets");
      secret = this.opts.cipher.decryptSecret(credential.secret);
    }
    return this.createAdapter(credential.provider, secret, credential.extraConfig);
  }
}

/** One-off construction with default transports. */
export function createAdapter(
  provider: string,
  secret?: string | null,
  config?: Record<string, unknown>
): ProviderAdapter {
  return new AdapterFactory().createAdapter(provider, secret, config);
}
