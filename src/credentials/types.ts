/** Credential kind used to authenticate callers of the HTTP gateway itself. */
export const GATEWAY_CLIENT_PROVIDER = "gateway_client";

export const DEFAULT_RATE_LIMIT_RPM = 60;

export interface Credential {
  id: string;
  ownerId: string;
  /** Provider identifier as registered; may be an alias such as `claude`. */
  provider: string;
  displayName: string;
  /** Encrypted blob, or null for providers without a key (local models). */
  secret: string | null;
  /** Provider-specific settings: `base_url`, `model_type`, `pricing`, ... */
  extraConfig: Record<string, unknown>;
  isActive: boolean;
  /** Requests per minute; zero or below disables limiting. */
  rateLimitRpm: number;
  lastUsedAt: Date | null;
  lookupHash: string | null;
  createdAt: Date;
}

export interface NewCredential {
  ownerId: string;
  provider: string;
  displayName: string;
  secret: string | null;
  extraConfig?: Record<string, unknown>;
  isActive?: boolean;
  rateLimitRpm?: number;
  lookupHash?: string | null;
}

export type CredentialPatch = Partial<
  Pick<Credential, "displayName" | "secret" | "extraConfig" | "isActive" | "rateLimitRpm" | "lookupHash">
>;

export interface CredentialFilter {
  /** Lower-case provider spellings to accept. */
  providers?: readonly string[];
  activeOnly?: boolean;
}

/**
 * Persistence boundary for credentials. Reads are always scoped by owner
 * except `findByLookupHash`, which serves bearer-token authentication.
 */
export interface CredentialStore {
  getCredential(id: string, ownerId: string): Promise<Credential | undefined>;
  listCredentials(ownerId: string, filter?: CredentialFilter): Promise<Credential[]>;
  findByLookupHash(lookupHash: string): Promise<Credential | undefined>;
  touch(id: string, at: Date): Promise<void>;
  insert(input: NewCredential): Promise<Credential>;
  update(id: string, ownerId: string, patch: CredentialPatch): Promise<Credential | undefined>;
  remove(id: string, ownerId: string): Promise<boolean>;
}
