import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { isProviderId } from "../providers/base.js";
import { OLLAMA_BASE_URL } from "../providers/ollama.js";

export const CONFIG_FILENAME = "llm-relay.config.json";

const providerName = z.string().refine(isProviderId, (v) => ({ message: `Unknown provider '${v}'` }));

const TimeoutSchema = z.object({
  connectTimeoutMs: z.number().int().positive().optional(),
  readTimeoutMs: z.number().int().positive().optional()
});

const basePath = z
  .string()
  .transform((p) => p.trim().replace(/\/+$/, ""))
  .transform((p) => (p === "" || p.startsWith("/") ? p : `/${p}`));

export const RelayConfigSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default("127.0.0.1"),
      port: z.coerce.number().int().min(0).max(65535).default(8080),
      basePath: basePath.default("/v1")
    })
    .default({}),
  /** Master secret for credential encryption and token lookup hashes. */
  encryptionKey: z.string().min(1).optional(),
  databaseUrl: z.string().min(1).optional(),
  ollamaBaseUrl: z.string().url().default(OLLAMA_BASE_URL),
  logLevel: z.enum(["silent", "error", "info", "debug"]).default("info"),
  routing: z
    .object({
      rules: z.array(z.object({ prefix: z.string().min(1), provider: providerName })).optional(),
      fallback: providerName.default("ollama"),
      policy: z.enum(["first", "roundrobin", "least-recent"]).default("first")
    })
    .default({}),
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(1),
      baseMs: z.number().int().nonnegative().optional(),
      maxMs: z.number().int().nonnegative().optional()
    })
    .default({}),
  timeouts: z
    .object({
      cloud: TimeoutSchema.default({}),
      local: TimeoutSchema.default({})
    })
    .default({}),
  modelCacheTtlSeconds: z.number().int().nonnegative().default(300),
  streamCapacity: z.number().int().positive().default(32)
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export interface LoadConfigOptions {
  /** Where to start looking for the config file. */
  cwd?: string;
  /** Explicit file; must exist when given. */
  file?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: RelayConfig;
  /** Path of the file that was read, if any. */
  source?: string;
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

export function findConfigFile(startDir: string, filename: string = CONFIG_FILENAME): string | undefined {
  let dir = path.resolve(startDir);
  while (true) {
    const fp = path.join(dir, filename);
    if (fs.existsSync(fp)) return fp;
    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

function readConfigFile(file: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(raw)) throw new ConfigError(`Config file ${file} must contain a JSON object`);
  return raw;
}

/** Environment variables win over file values. */
export function applyEnv(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const server: Record<string, unknown> = isRecord(raw.server) ? { ...raw.server } : {};
  if (env.RELAY_HOST) server.host = env.RELAY_HOST;
  if (env.RELAY_PORT) server.port = env.RELAY_PORT;
  if (env.RELAY_BASE_PATH !== undefined) server.basePath = env.RELAY_BASE_PATH;

  const out: Record<string, unknown> = { ...raw, server };
  if (env.RELAY_ENCRYPTION_KEY) out.encryptionKey = env.RELAY_ENCRYPTION_KEY;
  if (env.DATABASE_URL) out.databaseUrl = env.DATABASE_URL;
  if (env.OLLAMA_BASE_URL) out.ollamaBaseUrl = env.OLLAMA_BASE_URL;
  if (env.RELAY_LOG_LEVEL) out.logLevel = env.RELAY_LOG_LEVEL;
  return out;
}

export function parseConfig(raw: unknown): RelayConfig {
  const parsed = RelayConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export function loadConfig(opts: LoadConfigOptions = {}): LoadedConfig {
  const env = opts.env ?? process.env;
  let source: string | undefined;
  if (opts.file) {
    source = path.resolve(opts.cwd ?? process.cwd(), opts.file);
    if (!fs.existsSync(source)) throw new ConfigError(`Config file not found: ${source}`);
  } else {
    source = findConfigFile(opts.cwd ?? process.cwd());
  }
  const raw = source ? readConfigFile(source) : {};
  return { config: parseConfig(applyEnv(raw, env)), source };
}
