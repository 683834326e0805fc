import { randomUUID } from "node:crypto";
import type { CallOpts, ChatCompletionResult, ChatRequest, RelayEvent, RetryOpts, StreamOutcome } from "../types.js";
import { NoCapacityError } from "../errors.js";
import { normalizeProvider, providerAliases, type ProviderAdapter, type ProviderId } from "../providers/base.js";
import type { AdapterFactory } from "../providers/factory.js";
import { ProviderRegistry } from "../providers/registry.js";
import { GATEWAY_CLIENT_PROVIDER, type Credential, type CredentialStore } from "../credentials/types.js";
import type { StoredMessage } from "../conversations/types.js";
import { RateLimiter } from "./limiter.js";
import { withRetry } from "./retry.js";
import type { CacheStore } from "./cache.js";
import { UsageRecorder, type ExchangeContext } from "./usage.js";
import { openFragmentStream, type FragmentStream } from "./streaming.js";
import { combineListeners } from "../telemetry/events.js";

export const DEFAULT_MODEL_CACHE_TTL_SECONDS = 300;

export interface GatewayOptions {
  credentials: CredentialStore;
  factory: AdapterFactory;
  recorder: UsageRecorder;
  registry?: ProviderRegistry;
  limiter?: RateLimiter;
  /** Applies to buffered calls only; streams are never retried. */
  retry?: Omit<RetryOpts, "signal" | "onRetry">;
  modelCache?: CacheStore<string[]>;
  modelCacheTtlSeconds?: number;
  streamCapacity?: number;
  onEvent?: (e: RelayEvent) => void;
}

export interface CompletionOptions extends CallOpts {
  /** Overrides model-prefix routing. */
  provider?: string;
  /** Use this credential instead of selecting one; still owner-checked. */
  credential?: Credential;
  conversationId?: string;
  requestId?: string;
}

export interface CompletionResult {
  requestId: string;
  provider: ProviderId;
  credentialId: string;
  result: ChatCompletionResult;
  message?: StoredMessage;
}

export interface OpenedStream {
  requestId: string;
  provider: ProviderId;
  credentialId: string;
  fragments: FragmentStream;
}

export interface ModelListing {
  id: string;
  provider: ProviderId;
  credentialId: string;
}

/**
 * Routes a chat request to a provider, picks one of the owner's credentials
 * for it and executes the call, buffered or streamed. Every exchange that
 * reached the upstream goes through the usage recorder exactly once.
 */
export class Gateway {
  private readonly credentials: CredentialStore;
  private readonly factory: AdapterFactory;
  private readonly recorder: UsageRecorder;
  private readonly registry: ProviderRegistry;
  private readonly limiter: RateLimiter;
  private readonly retry?: GatewayOptions["retry"];
  private readonly modelCache?: CacheStore<string[]>;
  private readonly modelCacheTtlSeconds: number;
  private readonly streamCapacity?: number;
  private readonly onEvent?: (e: RelayEvent) => void;

  constructor(opts: GatewayOptions) {
    this.credentials = opts.credentials;
    this.factory = opts.factory;
    this.recorder = opts.recorder;
    this.registry = opts.registry ?? new ProviderRegistry();
    this.limiter = opts.limiter ?? new RateLimiter();
    this.retry = opts.retry;
    this.modelCache = opts.modelCache;
    this.modelCacheTtlSeconds = opts.modelCacheTtlSeconds ?? DEFAULT_MODEL_CACHE_TTL_SECONDS;
    this.streamCapacity = opts.streamCapacity;
    this.onEvent = opts.onEvent && combineListeners(opts.onEvent);
  }

  resolveProvider(model: string, explicit?: string): ProviderId {
    return explicit ? normalizeProvider(explicit) : this.registry.resolve(model);
  }

  /**
   * Picks an active credential of `ownerId` for `provider`. Credentials
   * whose rate bucket is empty are skipped; if that leaves none the error
   * says so instead of reporting a missing credential.
   */
  async selectCredential(ownerId: string, provider: ProviderId): Promise<Credential> {
    const listed = await this.credentials.listCredentials(ownerId, {
      providers: providerAliases(provider),
      activeOnly: true
    });
    const eligible = listed.filter((c) => c.ownerId === ownerId && c.isActive);
    if (eligible.length === 0) throw new NoCapacityError(provider, "unconfigured");

    for (const c of this.registry.order(`${ownerId}:${provider}`, eligible)) {
      if (this.limiter.tryTake(c.id, c.rateLimitRpm)) return c;
    }
    throw new NoCapacityError(provider, "rate_limited");
  }

  async complete(ownerId: string, req: ChatRequest, opts: CompletionOptions = {}): Promise<CompletionResult> {
    const { provider, credential, adapter, requestId } = await this.prepare(ownerId, req, opts);
    const ctx: ExchangeContext = {
      credentialId: credential.id,
      provider,
      model: req.model,
      conversationId: opts.conversationId
    };

    this.onEvent?.({ type: "call.start", provider, model: req.model, credentialId: credential.id, requestId, stream: false });
    const t0 = Date.now();
    let result: ChatCompletionResult;
    try {
      result = await withRetry(() => adapter.chat(req, { signal: opts.signal }), {
        ...this.retry,
        signal: opts.signal,
        onRetry: ({ attempt, waitMs, error }) =>
          this.onEvent?.({ type: "call.retry", requestId, attempt, waitMs, error })
      });
    } catch (error) {
      this.onEvent?.({ type: "call.error", provider, model: req.model, requestId, durationMs: Date.now() - t0, error });
      throw error;
    }

    this.onEvent?.({
      type: "call.success",
      provider,
      model: req.model,
      requestId,
      durationMs: Date.now() - t0,
      totalTokens: result.usage?.totalTokens,
      costUsd: result.costUsd
    });
    const message = await this.record(ctx, result);
    return { requestId, provider, credentialId: credential.id, result, message };
  }

  /**
   * Opens a stream and waits for its first fragment. Upstream errors before
   * that point are thrown; the returned stream rejects on later ones.
   */
  async openStream(ownerId: string, req: ChatRequest, opts: CompletionOptions = {}): Promise<OpenedStream> {
    const { provider, credential, adapter, requestId } = await this.prepare(ownerId, req, opts);
    const recording = this.recorder.beginStream({
      credentialId: credential.id,
      provider,
      model: req.model,
      conversationId: opts.conversationId
    });

    this.onEvent?.({ type: "call.start", provider, model: req.model, credentialId: credential.id, requestId, stream: true });
    const t0 = Date.now();

    const onEnd = async (outcome: StreamOutcome, fragments: number, error?: unknown) => {
      const durationMs = Date.now() - t0;
      if (outcome === "failed") {
        this.onEvent?.({ type: "call.error", provider, model: req.model, requestId, durationMs, error });
      }
      this.onEvent?.({ type: "stream.end", provider, model: req.model, requestId, outcome, fragments, durationMs });
      try {
        await recording.finish(outcome);
      } catch (persistError) {
        // Fragments may already be delivered, so this surfaces as an event
        this.onEvent?.({
          type: "usage.error",
          credentialId: credential.id,
          conversationId: opts.conversationId,
          error: persistError
        });
      }
    };

    const fragments = await openFragmentStream({
      source: (signal) => adapter.streamChat(req, { signal }),
      signal: opts.signal,
      capacity: this.streamCapacity,
      onFragment: (fragment) => recording.append(fragment),
      onEnd
    });
    return { requestId, provider, credentialId: credential.id, fragments };
  }

  /**
   * Model ids served through each active credential of `ownerId`,
   * optionally narrowed to one provider. Lists are cached per credential.
   */
  async listModels(ownerId: string, opts: CallOpts & { provider?: string } = {}): Promise<ModelListing[]> {
    const provider = opts.provider ? normalizeProvider(opts.provider) : undefined;
    const credentials = await this.credentials.listCredentials(ownerId, {
      providers: provider ? providerAliases(provider) : undefined,
      activeOnly: true
    });

    const out: ModelListing[] = [];
    for (const c of credentials) {
      if (c.provider === GATEWAY_CLIENT_PROVIDER || c.ownerId !== ownerId || !c.isActive) continue;
      const adapter = this.factory.createAdapterFromCredential(c);
      const ids = await this.cachedModels(c, adapter, opts);
      for (const id of ids) out.push({ id, provider: adapter.id, credentialId: c.id });
    }
    return out;
  }

  /** The upstream call already succeeded, so a persistence failure is reported as an event. */
  private async record(ctx: ExchangeContext, result: ChatCompletionResult): Promise<StoredMessage | undefined> {
    try {
      return await this.recorder.recordCompletion(ctx, result);
    } catch (error) {
      this.onEvent?.({ type: "usage.error", credentialId: ctx.credentialId, conversationId: ctx.conversationId, error });
      return undefined;
    }
  }

  async invalidateModels(credentialId: string): Promise<void> {
    await this.modelCache?.delete(modelCacheKey(credentialId));
  }

  private async cachedModels(credential: Credential, adapter: ProviderAdapter, opts: CallOpts): Promise<string[]> {
    const key = modelCacheKey(credential.id);
    if (this.modelCache) {
      const hit = await this.modelCache.get(key);
      this.onEvent?.({ type: "models.cache", key, hit: hit !== undefined });
      if (hit) return hit;
    }
    const ids = await adapter.listModels(opts);
    // Custom and local endpoints answer [] when their listing fails
    if (ids.length > 0) await this.modelCache?.set(key, ids, this.modelCacheTtlSeconds);
    return ids;
  }

  private async prepare(ownerId: string, req: ChatRequest, opts: CompletionOptions) {
    const provider = opts.credential
      ? normalizeProvider(opts.credential.provider)
      : this.resolveProvider(req.model, opts.provider);
    const credential = opts.credential ?? (await this.selectCredential(ownerId, provider));
    if (credential.ownerId !== ownerId || !credential.isActive) {
      // Never send a request with a credential the caller does not own or that is disabled
      throw new NoCapacityError(provider, "unconfigured");
    }
    if (opts.credential && !this.limiter.tryTake(credential.id, credential.rateLimitRpm)) {
      throw new NoCapacityError(provider, "rate_limited");
    }
    const adapter = this.factory.createAdapterFromCredential(credential);
    return { provider, credential, adapter, requestId: opts.requestId ?? randomUUID() };
  }
}

const modelCacheKey = (credentialId: string) => `models:${credentialId}`;
