import { describe, it, expect } from "vitest";
import { InMemoryCredentialStore } from "../../src/credentials/inMemory.js";

describe("InMemoryCredentialStore", () => {
  it("should apply defaults on insert", async () => {
    const at = new Date("2026-02-01T00:00:00Z");
    const store = new InMemoryCredentialStore(() => at);
    const c = await store.insert({ ownerId: "u1", provider: "openai", displayName: "main", secret: "v1:x" });

    expect(c).toMatchObject({ isActive: true, rateLimitRpm: 60, lastUsedAt: null, lookupHash: null, createdAt: at, extraConfig: {} });
  });

  it("should scope reads by owner", async () => {
    const store = new InMemoryCredentialStore();
    const c = await store.insert({ ownerId: "u1", provider: "openai", displayName: "main", secret: null });

    expect(await store.getCredential(c.id, "u2")).toBeUndefined();
    expect(await store.listCredentials("u2")).toEqual([]);
    expect(await store.update(c.id, "u2", { displayName: "x" })).toBeUndefined();
    expect(await store.remove(c.id, "u2")).toBe(false);
  });

  it("should filter by provider spelling and activity in insertion order", async () => {
    const store = new InMemoryCredentialStore();
    const a = await store.insert({ ownerId: "u1", provider: "Claude", displayName: "a", secret: null });
    await store.insert({ ownerId: "u1", provider: "openai", displayName: "b", secret: null });
    const c = await store.insert({ ownerId: "u1", provider: "anthropic", displayName: "c", secret: null });
    await store.insert({ ownerId: "u1", provider: "anthropic", displayName: "d", secret: null, isActive: false });

    const listed = await store.listCredentials("u1", { providers: ["anthropic", "claude"], activeOnly: true });
    expect(listed.map((x) => x.id)).toEqual([a.id, c.id]);
  });

  it("should return copies", async () => {
    const store = new InMemoryCredentialStore();
    const c = await store.insert({ ownerId: "u1", provider: "custom", displayName: "x", secret: null, extraConfig: { base_url: "http://a" } });
    c.extraConfig.base_url = "http://b";

    expect((await store.getCredential(c.id, "u1"))?.extraConfig).toEqual({ base_url: "http://a" });
  });

  it("should patch only given fields and allow clearing the secret", async () => {
    const store = new InMemoryCredentialStore();
    const c = await store.insert({ ownerId: "u1", provider: "openai", displayName: "main", secret: "v1:x", lookupHash: "h" });

    const updated = await store.update(c.id, "u1", { secret: null, rateLimitRpm: 5 });

    expect(updated).toMatchObject({ displayName: "main", secret: null, rateLimitRpm: 5, lookupHash: "h" });
  });

  it("should find by lookup hash and record use", async () => {
    const store = new InMemoryCredentialStore();
    const c = await store.insert({ ownerId: "u1", provider: "gateway_client", displayName: "cli", secret: "v1:x", lookupHash: "abc" });
    const at = new Date("2026-03-01T00:00:00Z");
    await store.touch(c.id, at);

    expect((await store.findByLookupHash("abc"))?.lastUsedAt).toEqual(at);
    expect(await store.findByLookupHash("zzz")).toBeUndefined();
    expect(await store.remove(c.id, "u1")).toBe(true);
  });
});
