import { randomBytes } from "node:crypto";
import { Pool } from "pg";
import type { RelayEvent } from "../types.js";
import { ConfigError } from "../errors.js";
import { SecretCipher } from "../credentials/cipher.js";
import { InMemoryCredentialStore } from "../credentials/inMemory.js";
import { PostgresCredentialStore } from "../credentials/postgres.js";
import { CredentialService } from "../credentials/service.js";
import type { CredentialStore } from "../credentials/types.js";
import { InMemoryConversationStore } from "../conversations/inMemory.js";
import { PostgresConversationStore } from "../conversations/postgres.js";
import type { ConversationStore } from "../conversations/types.js";
import { AdapterFactory } from "../providers/factory.js";
import { ProviderRegistry } from "../providers/registry.js";
import type { Transport } from "../providers/transport.js";
import { InMemoryCacheStore } from "./cache.js";
import type { RelayConfig } from "./config.js";
import { ConversationChat } from "./conversations.js";
import { Gateway } from "./gateway.js";
import { RateLimiter } from "./limiter.js";
import { UsageRecorder } from "./usage.js";

export interface RuntimeOverrides {
  credentials?: CredentialStore;
  conversations?: ConversationStore;
  transport?: Transport;
  fetch?: typeof fetch;
  onEvent?: (e: RelayEvent) => void;
}

export interface Runtime {
  config: RelayConfig;
  /** True when the stores live in this process only. */
  ephemeral: boolean;
  cipher: SecretCipher;
  factory: AdapterFactory;
  credentials: CredentialStore;
  conversations: ConversationStore;
  credentialService: CredentialService;
  gateway: Gateway;
  chat: ConversationChat;
  close(): Promise<void>;
}

/** Wires stores, cipher, factory and gateway from a validated configuration. */
export function createRuntime(config: RelayConfig, overrides: RuntimeOverrides = {}): Runtime {
  let pool: Pool | undefined;
  let credentials = overrides.credentials;
  let conversations = overrides.conversations;

  if (config.databaseUrl && (!credentials || !conversations)) {
    if (!config.encryptionKey) {
      throw new ConfigError("RELAY_ENCRYPTION_KEY is required when credentials are stored in a database");
    }
    pool = new Pool({ connectionString: config.databaseUrl });
    credentials ??= new PostgresCredentialStore({ pool });
    conversations ??= new PostgresConversationStore({ pool });
  }
  const ephemeral = pool === undefined && !overrides.credentials;
  credentials ??= new InMemoryCredentialStore();
  conversations ??= new InMemoryConversationStore();

  // Ephemeral stores get a per-process key
  const cipher = new SecretCipher(config.encryptionKey ?? randomBytes(32).toString("hex"));
  const onEvent = overrides.onEvent;

  const factory = new AdapterFactory({
    cipher,
    ollamaBaseUrl: config.ollamaBaseUrl,
    transport: overrides.transport,
    fetch: overrides.fetch,
    timeouts: config.timeouts
  });
  const registry = new ProviderRegistry({
    routes: config.routing.rules,
    fallback: config.routing.fallback,
    policy: config.routing.policy
  });
  const recorder = new UsageRecorder({ credentials, conversations, onEvent });
  const gateway = new Gateway({
    credentials,
    factory,
    recorder,
    registry,
    limiter: new RateLimiter(),
    retry: config.retry,
    modelCache: new InMemoryCacheStore<string[]>(),
    modelCacheTtlSeconds: config.modelCacheTtlSeconds,
    streamCapacity: config.streamCapacity,
    onEvent
  });

  return {
    config,
    ephemeral,
    cipher,
    factory,
    credentials,
    conversations,
    credentialService: new CredentialService({ store: credentials, cipher, factory, onEvent }),
    gateway,
    chat: new ConversationChat({ gateway, credentials, conversations }),
    async close() {
      await pool?.end();
    }
  };
}

export interface SeedResult {
  ownerId: string;
  providers: string[];
  clientToken: string;
}

/**
 * Registers upstream credentials found in the environment for a single
 * local owner, plus one gateway client token (RELAY_CLIENT_TOKEN, or a
 * freshly generated one).
 */
export async function seedFromEnv(
  runtime: Runtime,
  env: NodeJS.ProcessEnv = process.env,
  ownerId = "local"
): Promise<SeedResult> {
  const service = runtime.credentialService;
  const providers: string[] = [];
  const keys: Array<[provider: string, variable: string]> = [
    ["openai", "OPENAI_API_KEY"],
    ["anthropic", "ANTHROPIC_API_KEY"],
    ["google", "GOOGLE_API_KEY"]
  ];
  for (const [provider, variable] of keys) {
    const secret = env[variable];
    if (!secret) continue;
    await service.register({ ownerId, provider, displayName: `${provider} (env)`, secret });
    providers.push(provider);
  }
  if (env.OLLAMA_BASE_URL) {
    await service.register({
      ownerId,
      provider: "ollama",
      displayName: "ollama (env)",
      extraConfig: { base_url: env.OLLAMA_BASE_URL },
      rateLimitRpm: 0
    });
    providers.push("ollama");
  }
  const { token } = await service.issueClientToken(ownerId, "default client", env.RELAY_CLIENT_TOKEN || undefined);
  return { ownerId, providers, clientToken: token };
}
