export * from "./types.js";
export * from "./errors.js";
export { RELAY_VERSION } from "./version.js";

export * from "./providers/base.js";
export * from "./providers/transport.js";
export * from "./providers/pricing.js";
export * from "./providers/openai.js";
export * from "./providers/anthropic.js";
export * from "./providers/gemini.js";
export * from "./providers/custom.js";
export * from "./providers/ollama.js";
export * from "./providers/factory.js";
export * from "./providers/registry.js";

export * from "./credentials/types.js";
export * from "./credentials/cipher.js";
export * from "./credentials/inMemory.js";
export * from "./credentials/postgres.js";
export * from "./credentials/service.js";

export * from "./conversations/types.js";
export * from "./conversations/inMemory.js";
export * from "./conversations/postgres.js";

export * from "./core/cache.js";
export * from "./core/channel.js";
export * from "./core/limiter.js";
export * from "./core/retry.js";
export * from "./core/sequencer.js";
export * from "./core/streaming.js";
export * from "./core/usage.js";
export * from "./core/gateway.js";
export * from "./core/conversations.js";
export * from "./core/config.js";
export * from "./core/bootstrap.js";
export type { PgQueryable, PgStoreOptions } from "./core/pg.js";

export * from "./telemetry/events.js";
export * from "./server/handler.js";
export * from "./server/node.js";
