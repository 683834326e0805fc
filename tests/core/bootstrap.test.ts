import { describe, it, expect } from "vitest";
import { createRuntime, seedFromEnv } from "../../src/core/bootstrap.js";
import { parseConfig } from "../../src/core/config.js";
import { ConfigError } from "../../src/errors.js";
import { createGatewayHandler } from "../../src/server/handler.js";
import { MockTransport } from "../helpers/mock-transport.js";
import { completion } from "../helpers/world.js";

describe("createRuntime", () => {
  it("should build an in-memory runtime without a database", async () => {
    const runtime = createRuntime(parseConfig({}));
    expect(runtime.ephemeral).toBe(true);
    await runtime.close();
  });

  it("should require an encryption key next to a database", () => {
    expect(() => createRuntime(parseConfig({ databaseUrl: "postgres://localhost/relay" }))).toThrow(ConfigError);
  });

  it("should use postgres stores when a database is configured", async () => {
    const runtime = createRuntime(parseConfig({ databaseUrl: "postgres://localhost/relay", encryptionKey: "test-secret" }));
    expect(runtime.ephemeral).toBe(false);
    await runtime.close();
  });
});

describe("seedFromEnv", () => {
  it("should register env keys and serve requests with the client token", async () => {
    const transport = new MockTransport().respondJson(200, completion("seeded"));
    const runtime = createRuntime(parseConfig({}), { transport });

    const seeded = await seedFromEnv(runtime, {
      OPENAI_API_KEY: "test-key",
      OLLAMA_BASE_URL: "http://gpu:11434",
      RELAY_CLIENT_TOKEN: "test-token"
    });

    expect(seeded).toEqual({ ownerId: "local", providers: ["openai", "ollama"], clientToken: "test-token" });

    const handle = createGatewayHandler({ gateway: runtime.gateway, credentials: runtime.credentialService });
    const response = await handle(
      new Request("http://relay.test/v1/chat/completions", {
        method: "POST",
        headers: { authorization: "Bearer test-token", "content-type": "application/json" },
        body: JSON.stringify({ model: "gpt-4o-mini", messages: [{ role: "user", content: "Hi" }] })
      })
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ choices: [{ message: { content: "seeded" } }] });
    expect(transport.calls[0]?.req.headers).toEqual({ authorization: "Bearer test-key" });
  });

  it("should generate a client token when none is given", async () => {
    const runtime = createRuntime(parseConfig({}), { transport: new MockTransport() });
    const seeded = await seedFromEnv(runtime, {}, "someone");

    expect(seeded.providers).toEqual([]);
    expect(seeded.clientToken.startsWith("sk-relay-")).toBe(true);
    await expect(runtime.credentialService.authenticateClient(seeded.clientToken)).resolves.toMatchObject({ ownerId: "someone" });
  });
});
