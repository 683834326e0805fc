import { randomUUID } from "node:crypto";
import {
  DEFAULT_RATE_LIMIT_RPM,
  type Credential,
  type CredentialFilter,
  type CredentialPatch,
  type CredentialStore,
  type NewCredential
} from "./types.js";

const clone = (c: Credential): Credential => ({ ...c, extraConfig: { ...c.extraConfig } });

function matches(c: Credential, filter?: CredentialFilter): boolean {
  if (filter?.activeOnly && !c.isActive) return false;
  if (filter?.providers && !filter.providers.includes(c.provider.toLowerCase())) return false;
  return true;
}

/** Process-local store, insertion ordered. Returned records are copies. */
export class InMemoryCredentialStore implements CredentialStore {
  private readonly records = new Map<string, Credential>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async getCredential(id: string, ownerId: string): Promise<Credential | undefined> {
    const c = this.records.get(id);
    return c && c.ownerId === ownerId ? clone(c) : undefined;
  }

  async listCredentials(ownerId: string, filter?: CredentialFilter): Promise<Credential[]> {
    return [...this.records.values()]
      .filter((c) => c.ownerId === ownerId && matches(c, filter))
      .map(clone);
  }

  async findByLookupHash(lookupHash: string): Promise<Credential | undefined> {
    for (const c of this.records.values()) {
      if (c.lookupHash === lookupHash) return clone(c);
    }
    return undefined;
  }

  async touch(id: string, at: Date): Promise<void> {
    const c = this.records.get(id);
    if (c) c.lastUsedAt = at;
  }

  async insert(input: NewCredential): Promise<Credential> {
    const record: Credential = {
      id: randomUUID(),
      ownerId: input.ownerId,
      provider: input.provider,
      displayName: input.displayName,
      secret: input.secret,
      extraConfig: { ...input.extraConfig },
      isActive: input.isActive ?? true,
      rateLimitRpm: input.rateLimitRpm ?? DEFAULT_RATE_LIMIT_RPM,
      lastUsedAt: null,
      lookupHash: input.lookupHash ?? null,
      createdAt: this.now()
    };
    this.records.set(record.id, record);
    return clone(record);
  }

  async update(id: string, ownerId: string, patch: CredentialPatch): Promise<Credential | undefined> {
    const c = this.records.get(id);
    if (!c || c.ownerId !== ownerId) return undefined;
    const next: Credential = {
      ...c,
      displayName: patch.displayName ?? c.displayName,
      secret: patch.secret !== undefined ? patch.secret : c.secret,
      extraConfig: { ...(patch.extraConfig ?? c.extraConfig) },
      isActive: patch.isActive ?? c.isActive,
      rateLimitRpm: patch.rateLimitRpm ?? c.rateLimitRpm,
      lookupHash: patch.lookupHash !== undefined ? patch.lookupHash : c.lookupHash
    };
    this.records.set(id, next);
    return clone(next);
  }

  async remove(id: string, ownerId: string): Promise<boolean> {
    const c = this.records.get(id);
    if (!c || c.ownerId !== ownerId) return false;
    return this.records.delete(id);
  }
}
