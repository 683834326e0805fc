import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CONFIG_FILENAME, applyEnv, findConfigFile, loadConfig, parseConfig } from "../src/core/config.js";
import { ConfigError } from "../src/errors.js";

describe("parseConfig", () => {
  it("should fill defaults", () => {
    const config = parseConfig({});
    expect(config).toEqual({
      server: { host: "127.0.0.1", port: 8080, basePath: "/v1" },
      ollamaBaseUrl: "http://localhost:11434",
      logLevel: "info",
      routing: { fallback: "ollama", policy: "first" },
      retry: { maxAttempts: 1 },
      timeouts: { cloud: {}, local: {} },
      modelCacheTtlSeconds: 300,
      streamCapacity: 32
    });
  });

  it("should normalize the base path and coerce the port", () => {
    const config = parseConfig({ server: { port: "9090", basePath: "api/v1/" } });
    expect(config.server).toEqual({ host: "127.0.0.1", port: 9090, basePath: "/api/v1" });
  });

  it("should reject unknown providers in routing rules", () => {
    expect(() => parseConfig({ routing: { rules: [{ prefix: "mistral", provider: "mistral" }] } })).toThrow(
      "routing.rules.0.provider: Unknown provider 'mistral'"
    );
  });

  it("should list every issue", () => {
    try {
      parseConfig({ logLevel: "loud", retry: { maxAttempts: 0 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.issues.map((i) => i.split(":")[0]) : []).toEqual([
        "logLevel",
        "retry.maxAttempts"
      ]);
    }
  });
});

describe("applyEnv", () => {
  it("should let environment variables win", () => {
    const raw = applyEnv(
      { server: { host: "0.0.0.0", port: 1 }, logLevel: "error" },
      { RELAY_PORT: "7000", RELAY_LOG_LEVEL: "debug", DATABASE_URL: "postgres://localhost/relay", RELAY_ENCRYPTION_KEY: "test-secret" }
    );
    expect(raw).toEqual({
      server: { host: "0.0.0.0", port: "7000" },
      logLevel: "debug",
      databaseUrl: "postgres://localhost/relay",
      encryptionKey: "test-secret"
    });
  });

  it("should accept an empty base path from the environment", () => {
    expect(parseConfig(applyEnv({}, { RELAY_BASE_PATH: "" })).server.basePath).toBe("");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should find the file in a parent directory", () => {
    const nested = path.join(dir, "a", "b");
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(path.join(dir, CONFIG_FILENAME), JSON.stringify({ server: { port: 3000 } }));

    const loaded = loadConfig({ cwd: nested, env: {} });

    expect(loaded.source).toBe(path.join(dir, CONFIG_FILENAME));
    expect(loaded.config.server.port).toBe(3000);
    expect(findConfigFile(nested)).toBe(loaded.source);
  });

  it("should fall back to defaults without a file", () => {
    const loaded = loadConfig({ cwd: dir, env: { OLLAMA_BASE_URL: "http://gpu:11434" } });
    expect(loaded.config.ollamaBaseUrl).toBe("http://gpu:11434");
  });

  it("should fail for a missing explicit file or malformed JSON", () => {
    expect(() => loadConfig({ cwd: dir, file: "nope.json", env: {} })).toThrow("Config file not found");

    fs.writeFileSync(path.join(dir, "bad.json"), "{ nope");
    expect(() => loadConfig({ cwd: dir, file: "bad.json", env: {} })).toThrow(ConfigError);

    fs.writeFileSync(path.join(dir, "list.json"), "[]");
    expect(() => loadConfig({ cwd: dir, file: "list.json", env: {} })).toThrow("must contain a JSON object");
  });
});
