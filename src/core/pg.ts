import { Pool, type PoolConfig } from "pg";

/** The slice of `pg.Pool` the stores use; tests pass an in-process fake. */
export interface PgQueryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount?: number | null }>;
}

export interface PgStoreOptions {
  pool?: PgQueryable;
  poolConfig?: PoolConfig;
  schema?: string;
}

export const DEFAULT_SCHEMA = "public";

export function resolvePool(opts: PgStoreOptions): PgQueryable {
  return opts.pool ?? new Pool(opts.poolConfig);
}
