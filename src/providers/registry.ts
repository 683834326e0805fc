import { normalizeProvider, type ProviderId } from "./base.js";

export interface RouteRule {
  /** Lower-case model-name prefix. */
  prefix: string;
  provider: string;
}

export const DEFAULT_ROUTES: readonly RouteRule[] = [
  { prefix: "gpt", provider: "openai" },
  { prefix: "claude", provider: "anthropic" },
  { prefix: "gemini", provider: "google" }
];

export type SelectionPolicy = "first" | "roundrobin" | "least-recent";

export interface RegistryOpts {
  routes?: readonly RouteRule[];
  /** Provider for models no rule matches. */
  fallback?: string;
  policy?: SelectionPolicy;
}

/** Anything that can be picked between: credentials, in practice. */
export interface Candidate {
  id: string;
  lastUsedAt?: Date | null;
}

/**
 * Maps model names onto providers by prefix (first matching rule wins) and
 * picks between interchangeable credentials according to the configured policy.
 */
export class ProviderRegistry {
  private readonly routes: ReadonlyArray<{ prefix: string; provider: ProviderId }>;
  private readonly fallback: ProviderId;
  private readonly policy: SelectionPolicy;
  private rr = new Map<string, number>();

  constructor(opts: RegistryOpts = {}) {
    // Normalizing here makes bad rules fail at start-up, not on first request
    this.routes = (opts.routes ?? DEFAULT_ROUTES).map((r) => ({
      prefix: r.prefix.toLowerCase(),
      provider: normalizeProvider(r.provider)
    }));
    this.fallback = normalizeProvider(opts.fallback ?? "ollama");
    this.policy = opts.policy ?? "first";
  }

  get rules(): ReadonlyArray<{ prefix: string; provider: ProviderId }> {
    return this.routes;
  }

  resolve(model: string): ProviderId {
    const name = model.trim().toLowerCase();
    for (const r of this.routes) {
      if (name.startsWith(r.prefix)) return r.provider;
    }
    return this.fallback;
  }

  /**
   * Orders candidates by preference. `key` scopes the round-robin cursor,
   * e.g. one per (owner, provider) pair.
   */
  order<T extends Candidate>(key: string, cands: readonly T[]): T[] {
    if (cands.length <= 1 || this.policy === "first") return [...cands];
    if (this.policy === "roundrobin") {
      const start = (this.rr.get(key) ?? 0) % cands.length;
      this.rr.set(key, start + 1);
      return [...cands.slice(start), ...cands.slice(0, start)];
    }
    // least-recent: never-used first, then oldest lastUsedAt; stable otherwise
    const stamp = (c: T) => (c.lastUsedAt ? c.lastUsedAt.getTime() : Number.NEGATIVE_INFINITY);
    return [...cands].sort((a, b) => stamp(a) - stamp(b));
  }
}
