import { randomUUID } from "node:crypto";
import { z } from "zod";
import { DEFAULT_SCHEMA, resolvePool, type PgQueryable, type PgStoreOptions } from "../core/pg.js";
import {
  DEFAULT_RATE_LIMIT_RPM,
  type Credential,
  type CredentialFilter,
  type CredentialPatch,
  type CredentialStore,
  type NewCredential
} from "./types.js";

const idSchema = z.union([z.string(), z.number()]).transform(String);

const CredentialRowSchema = z.object({
  id: idSchema,
  user_id: idSchema,
  provider: z.string(),
  name: z.string(),
  encrypted_key: z.string().nullable(),
  custom_config: z.record(z.unknown()).nullable(),
  is_active: z.boolean(),
  rpm_limit: z.coerce.number(),
  last_used_at: z.coerce.date().nullable(),
  lookup_hash: z.string().nullable(),
  created_at: z.coerce.date()
});

const COLUMNS =
  "id, user_id, provider, name, encrypted_key, custom_config, is_active, rpm_limit, last_used_at, lookup_hash, created_at";

function toCredential(row: unknown): Credential {
  const r = CredentialRowSchema.parse(row);
  return {
    id: r.id,
    ownerId: r.user_id,
    provider: r.provider,
    displayName: r.name,
    secret: r.encrypted_key,
    extraConfig: r.custom_config ?? {},
    isActive: r.is_active,
    rateLimitRpm: r.rpm_limit,
    lastUsedAt: r.last_used_at,
    lookupHash: r.lookup_hash,
    createdAt: r.created_at
  };
}

/**
 * Credentials in the `api_keys` table. The table is expected to exist; this
 * class never issues DDL.
 */
export class PostgresCredentialStore implements CredentialStore {
  private readonly pool: PgQueryable;
  private readonly table: string;

  constructor(opts: PgStoreOptions = {}) {
    this.pool = resolvePool(opts);
    this.table = `${opts.schema ?? DEFAULT_SCHEMA}.api_keys`;
  }

  async getCredential(id: string, ownerId: string): Promise<Credential | undefined> {
    const res = await this.pool.query(
      `SELECT ${COLUMNS} FROM ${this.table} WHERE id = $1 AND user_id = $2`,
      [id, ownerId]
    );
    return res.rows.length > 0 ? toCredential(res.rows[0]) : undefined;
  }

  async listCredentials(ownerId: string, filter?: CredentialFilter): Promise<Credential[]> {
    const res = await this.pool.query(
      `SELECT ${COLUMNS} FROM ${this.table}
       WHERE user_id = $1
         AND ($2::text[] IS NULL OR lower(provider) = ANY($2))
         AND ($3::boolean = false OR is_active)
       ORDER BY created_at ASC, id ASC`,
      [ownerId, filter?.providers ? [...filter.providers] : null, filter?.activeOnly ?? false]
    );
    return res.rows.map(toCredential);
  }

  async findByLookupHash(lookupHash: string): Promise<Credential | undefined> {
    const res = await this.pool.query(
      `SELECT ${COLUMNS} FROM ${this.table} WHERE lookup_hash = $1 LIMIT 1`,
      [lookupHash]
    );
    return res.rows.length > 0 ? toCredential(res.rows[0]) : undefined;
  }

  async touch(id: string, at: Date): Promise<void> {
    await this.pool.query(`UPDATE ${this.table} SET last_used_at = $2 WHERE id = $1`, [id, at]);
  }

  async insert(input: NewCredential): Promise<Credential> {
    const res = await this.pool.query(
      `INSERT INTO ${this.table} (id, user_id, provider, name, encrypted_key, custom_config, is_active, rpm_limit, lookup_hash, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, NOW())
       RETURNING ${COLUMNS}`,
      [
        randomUUID(),
        input.ownerId,
        input.provider,
        input.displayName,
        input.secret,
        JSON.stringify(input.extraConfig ?? {}),
        input.isActive ?? true,
        input.rateLimitRpm ?? DEFAULT_RATE_LIMIT_RPM,
        input.lookupHash ?? null
      ]
    );
    return toCredential(res.rows[0]);
  }

  async update(id: string, ownerId: string, patch: CredentialPatch): Promise<Credential | undefined> {
    const res = await this.pool.query(
      `UPDATE ${this.table} SET
         name = COALESCE($3, name),
         encrypted_key = CASE WHEN $4::boolean THEN $5 ELSE encrypted_key END,
         custom_config = COALESCE($6, custom_config),
         is_active = COALESCE($7, is_active),
         rpm_limit = COALESCE($8, rpm_limit),
         lookup_hash = CASE WHEN $9::boolean THEN $10 ELSE lookup_hash END,
         updated_at = NOW()
       WHERE id = $1 AND user_id = $2
       RETURNING ${COLUMNS}`,
      [
        id,
        ownerId,
        patch.displayName ?? null,
        patch.secret !== undefined,
        patch.secret ?? null,
        patch.extraConfig ? JSON.stringify(patch.extraConfig) : null,
        patch.isActive ?? null,
        patch.rateLimitRpm ?? null,
        patch.lookupHash !== undefined,
        patch.lookupHash ?? null
      ]
    );
    return res.rows.length > 0 ? toCredential(res.rows[0]) : undefined;
  }

  async remove(id: string, ownerId: string): Promise<boolean> {
    const res = await this.pool.query(`DELETE FROM ${this.table} WHERE id = $1 AND user_id = $2`, [id, ownerId]);
    return (res.rowCount ?? 0) > 0;
  }
}
