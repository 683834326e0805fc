import { describe, it, expect } from "vitest";
import { AuthError, ConfigError, NotFoundError, UnsupportedProviderError, ValidationError } from "../../src/errors.js";
import { GATEWAY_CLIENT_PROVIDER } from "../../src/credentials/types.js";
import { createWorld } from "../helpers/world.js";

describe("CredentialService", () => {
  describe("register", () => {
    it("should store the canonical provider and an encrypted secret", async () => {
      const world = createWorld();
      const c = await world.service.register({ ownerId: "u1", provider: "Gemini", displayName: "g", secret: "test-key", rateLimitRpm: 10 });

      expect(c.provider).toBe("google");
      expect(c.rateLimitRpm).toBe(10);
      expect(c.secret).not.toBe("test-key");
      expect(world.cipher.decryptSecret(c.secret ?? "")).toBe("test-key");
    });

    it("should reject configurations the adapter refuses", async () => {
      const world = createWorld();
      await expect(world.service.register({ ownerId: "u1", provider: "openai", displayName: "x" })).rejects.toBeInstanceOf(ConfigError);
      await expect(
        world.service.register({ ownerId: "u1", provider: "custom", displayName: "x", secret: "test-key" })
      ).rejects.toThrow("base_url");
      await expect(world.service.register({ ownerId: "u1", provider: "mistral", displayName: "x", secret: "test-key" })).rejects.toBeInstanceOf(
        UnsupportedProviderError
      );
      expect(await world.credentials.listCredentials("u1")).toEqual([]);
    });

    it("should refuse object prototype names as providers", async () => {
      const world = createWorld();
      await expect(
        world.service.register({ ownerId: "u1", provider: "__proto__", displayName: "x", secret: "test-key" })
      ).rejects.toBeInstanceOf(UnsupportedProviderError);
      await expect(
        world.service.register({ ownerId: "u1", provider: "constructor", displayName: "x", secret: "test-key" })
      ).rejects.toBeInstanceOf(UnsupportedProviderError);
      expect(await world.credentials.listCredentials("u1")).toEqual([]);
    });

    it("should allow a keyless ollama credential", async () => {
      const world = createWorld();
      const c = await world.service.register({ ownerId: "u1", provider: "local", displayName: "gpu", extraConfig: { base_url: "http://gpu:11434" } });
      expect(c).toMatchObject({ provider: "ollama", secret: null, extraConfig: { base_url: "http://gpu:11434" } });
    });

    it("should not register gateway clients", async () => {
      const world = createWorld();
      await expect(
        world.service.register({ ownerId: "u1", provider: GATEWAY_CLIENT_PROVIDER, displayName: "x", secret: "t" })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("update", () => {
    it("should re-validate when the secret changes", async () => {
      const world = createWorld();
      const c = await world.service.register({ ownerId: "u1", provider: "anthropic", displayName: "a", secret: "test-key" });

      await expect(world.service.update(c.id, "u1", { secret: null })).rejects.toBeInstanceOf(ConfigError);
      const renamed = await world.service.update(c.id, "u1", { displayName: "renamed", secret: "test-key-2" });
      expect(renamed.displayName).toBe("renamed");
      expect(world.cipher.decryptSecret(renamed.secret ?? "")).toBe("test-key-2");
    });

    it("should throw NotFoundError for unknown or foreign ids", async () => {
      const world = createWorld();
      const c = await world.service.register({ ownerId: "u1", provider: "openai", displayName: "a", secret: "test-key" });

      await expect(world.service.update(c.id, "u2", { displayName: "x" })).rejects.toBeInstanceOf(NotFoundError);
      await expect(world.service.setActive("missing", "u1", false)).rejects.toBeInstanceOf(NotFoundError);
      await expect(world.service.remove("missing", "u1")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("authenticateClient", () => {
    it("should accept an issued token", async () => {
      const world = createWorld();
      const { credential, token } = await world.service.issueClientToken("u1", "cli", "test-token");

      expect(token).toBe("test-token");
      expect(credential).toMatchObject({ provider: GATEWAY_CLIENT_PROVIDER, rateLimitRpm: 0, lookupHash: world.cipher.lookupHash("test-token") });
      expect((await world.service.authenticateClient("test-token")).id).toBe(credential.id);
    });

    it("should generate prefixed tokens", async () => {
      const world = createWorld();
      const { token } = await world.service.issueClientToken("u1", "cli");
      expect(token.startsWith("sk-relay-")).toBe(true);
      await expect(world.service.authenticateClient(token)).resolves.toMatchObject({ ownerId: "u1" });
    });

    it("should reject missing, unknown and inactive tokens alike", async () => {
      const world = createWorld();
      const { credential } = await world.service.issueClientToken("u1", "cli", "test-token");
      await world.service.setActive(credential.id, "u1", false);

      for (const token of [undefined, "", "wrong-token", "test-token"]) {
        await expect(world.service.authenticateClient(token)).rejects.toThrow(new AuthError("Invalid API key"));
      }
      expect(world.events.map((e) => (e.type === "auth.rejected" ? e.reason : e.type))).toEqual([
        "missing bearer token",
        "missing bearer token",
        "unknown token",
        "inactive token"
      ]);
    });

    it("should not accept a provider credential as a client token", async () => {
      const world = createWorld();
      await world.service.register({ ownerId: "u1", provider: "openai", displayName: "a", secret: "test-key" });
      await expect(world.service.authenticateClient("test-key")).rejects.toBeInstanceOf(AuthError);
    });

    it("should move the lookup hash with a rotated token", async () => {
      const world = createWorld();
      const { credential } = await world.service.issueClientToken("u1", "cli", "test-token");

      await world.service.update(credential.id, "u1", { secret: "test-token-2" });

      await expect(world.service.authenticateClient("test-token")).rejects.toBeInstanceOf(AuthError);
      expect((await world.service.authenticateClient("test-token-2")).id).toBe(credential.id);
    });
  });
});
