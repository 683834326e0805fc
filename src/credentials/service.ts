import { randomBytes, timingSafeEqual } from "node:crypto";
import { AuthError, NotFoundError, ValidationError } from "../errors.js";
import type { RelayEvent } from "../types.js";
import type { AdapterFactory } from "../providers/factory.js";
import { combineListeners } from "../telemetry/events.js";
import type { SecretCipher } from "./cipher.js";
import {
  GATEWAY_CLIENT_PROVIDER,
  type Credential,
  type CredentialPatch,
  type CredentialStore
} from "./types.js";

export interface RegisterCredentialInput {
  ownerId: string;
  provider: string;
  displayName: string;
  secret?: string | null;
  extraConfig?: Record<string, unknown>;
  rateLimitRpm?: number;
  isActive?: boolean;
}

export interface UpdateCredentialInput {
  displayName?: string;
  /** A new plaintext secret; null clears it. */
  secret?: string | null;
  extraConfig?: Record<string, unknown>;
  rateLimitRpm?: number;
}

export interface CredentialServiceOptions {
  store: CredentialStore;
  cipher: SecretCipher;
  factory: AdapterFactory;
  onEvent?: (e: RelayEvent) => void;
}

const TOKEN_PREFIX = "sk-relay-";

/**
 * Registration lifecycle for credentials plus bearer-token authentication of
 * gateway clients. Plaintext secrets only pass through here on their way to
 * the cipher.
 */
export class CredentialService {
  private readonly store: CredentialStore;
  private readonly cipher: SecretCipher;
  private readonly factory: AdapterFactory;
  private readonly onEvent?: (e: RelayEvent) => void;

  constructor(opts: CredentialServiceOptions) {
    this.store = opts.store;
    this.cipher = opts.cipher;
    this.factory = opts.factory;
    this.onEvent = opts.onEvent && combineListeners(opts.onEvent);
  }

  /** Validates the provider configuration by building an adapter, then stores the encrypted secret. */
  async register(input: RegisterCredentialInput): Promise<Credential> {
    if (input.provider.trim().toLowerCase() === GATEWAY_CLIENT_PROVIDER) {
      throw new ValidationError("Use issueClientToken to create gateway client credentials");
    }
    const adapter = this.factory.createAdapter(input.provider, input.secret, input.extraConfig);
    return this.store.insert({
      ownerId: input.ownerId,
      provider: adapter.id,
      displayName: input.displayName,
      secret: input.secret ? this.cipher.encryptSecret(input.secret) : null,
      extraConfig: input.extraConfig,
      rateLimitRpm: input.rateLimitRpm,
      isActive: input.isActive
    });
  }

  /**
   * Creates a gateway client credential. The returned token is shown once;
   * only its encryption and lookup hash are stored.
   */
  async issueClientToken(
    ownerId: string,
    displayName: string,
    token: string = `${TOKEN_PREFIX}${randomBytes(24).toString("base64url")}`
  ): Promise<{ credential: Credential; token: string }> {
    if (!token) throw new ValidationError("Client token must not be empty");
    const credential = await this.store.insert({
      ownerId,
      provider: GATEWAY_CLIENT_PROVIDER,
      displayName,
      secret: this.cipher.encryptSecret(token),
      lookupHash: this.cipher.lookupHash(token),
      rateLimitRpm: 0
    });
    return { credential, token };
  }

  async update(id: string, ownerId: string, input: UpdateCredentialInput): Promise<Credential> {
    const current = await this.require(id, ownerId);
    const patch: CredentialPatch = {};
    if (input.displayName !== undefined) patch.displayName = input.displayName;
    if (input.rateLimitRpm !== undefined) patch.rateLimitRpm = input.rateLimitRpm;
    if (input.extraConfig !== undefined) patch.extraConfig = input.extraConfig;
    if (input.secret !== undefined) patch.secret = input.secret ? this.cipher.encryptSecret(input.secret) : null;

    if (current.provider !== GATEWAY_CLIENT_PROVIDER && (input.secret !== undefined || input.extraConfig !== undefined)) {
      const secret =
        input.secret !== undefined ? input.secret : current.secret ? this.cipher.decryptSecret(current.secret) : null;
      this.factory.createAdapter(current.provider, secret, input.extraConfig ?? current.extraConfig);
    }
    if (current.provider === GATEWAY_CLIENT_PROVIDER && input.secret !== undefined) {
      patch.lookupHash = input.secret ? this.cipher.lookupHash(input.secret) : null;
    }

    const updated = await this.store.update(id, ownerId, patch);
    if (!updated) throw new NotFoundError("Credential not found");
    return updated;
  }

  async setActive(id: string, ownerId: string, isActive: boolean): Promise<Credential> {
    const updated = await this.store.update(id, ownerId, { isActive });
    if (!updated) throw new NotFoundError("Credential not found");
    return updated;
  }

  async remove(id: string, ownerId: string): Promise<void> {
    if (!(await this.store.remove(id, ownerId))) throw new NotFoundError("Credential not found");
  }

  /**
   * Resolves a bearer token to its active gateway client credential. The
   * lookup hash narrows the search; decrypting the stored copy confirms it.
   */
  async authenticateClient(token: string | undefined): Promise<Credential> {
    if (!token) return this.reject("missing bearer token");

    const candidate = await this.store.findByLookupHash(this.cipher.lookupHash(token));
    if (!candidate || candidate.provider !== GATEWAY_CLIENT_PROVIDER || !candidate.secret) {
      return this.reject("unknown token");
    }
    if (!candidate.isActive) return this.reject("inactive token");

    const stored = Buffer.from(this.cipher.decryptSecret(candidate.secret), "utf8");
    const given = Buffer.from(token, "utf8");
    if (stored.length !== given.length || !timingSafeEqual(stored, given)) {
      return this.reject("token mismatch");
    }
    return candidate;
  }

  private async require(id: string, ownerId: string): Promise<Credential> {
    const credential = await this.store.getCredential(id, ownerId);
    if (!credential) throw new NotFoundError("Credential not found");
    return credential;
  }

  private reject(reason: string): never {
    this.onEvent?.({ type: "auth.rejected", reason });
    throw new AuthError("Invalid API key");
  }
}
