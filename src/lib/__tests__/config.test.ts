import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { ConfigStore, parseConfig } from "@/lib/config.ts";
import { MemoryRegistry } from "@/lib/registry/memory-registry.ts";

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});
    expect(config.tokens.errorBanThreshold).toBe(3);
    expect(config.tokens.accessRefreshMarginSeconds).toBe(3600);
    expect(config.cache.timeoutSeconds).toBe(7200);
    expect(config.generation.maxPollAttempts).toBe(500);
    expect(config.proxy.poolEnabled).toBe(false);
  });

  it("coerces numeric strings", () => {
    expect(parseConfig({ cache: { timeoutSeconds: "60" } }).cache.timeoutSeconds).toBe(60);
  });

  it("rejects out-of-range values", () => {
    expect(() => parseConfig({ tokens: { errorBanThreshold: 0 } })).toThrow(ZodError);
  });
});

describe("ConfigStore", () => {
  it("bumps the version on every write", () => {
    const store = ConfigStore.fromObject({ cache: { timeoutSeconds: 100 } });
    expect(store.getVersion()).toBe(1);
    store.update({ cache: { timeoutSeconds: 200 } });
    expect(store.get().cache.timeoutSeconds).toBe(200);
    expect(store.getVersion()).toBe(2);
  });

  it("keeps untouched values on a partial update", () => {
    const store = ConfigStore.fromObject({ proxy: { enabled: true, url: "http://127.0.0.1:3128" } });
    store.update({ proxy: { poolEnabled: true } });
    expect(store.get().proxy).toEqual({ enabled: true, url: "http://127.0.0.1:3128", poolEnabled: true });
  });

  it("leaves the current config in place when a write is invalid", () => {
    const store = ConfigStore.fromObject();
    expect(() => store.replace({ generation: { pollIntervalMs: -1 } })).toThrow(ZodError);
    expect(store.get().generation.pollIntervalMs).toBe(3000);
    expect(store.getVersion()).toBe(1);
  });

  it("reload re-reads the source and keeps admin overrides on top", () => {
    const source: Record<string, unknown> = { tokens: { errorBanThreshold: 5 }, cache: { timeoutSeconds: 100 } };
    const store = new ConfigStore(() => structuredClone(source));
    store.update({ tokens: { errorBanThreshold: 9 } });
    source.cache = { timeoutSeconds: 300 };
    const reloaded = store.reload();
    expect(reloaded.tokens.errorBanThreshold).toBe(9);
    expect(reloaded.cache.timeoutSeconds).toBe(300);
    expect(store.getVersion()).toBe(3);
  });

  it("clears an optional value with null", () => {
    const store = ConfigStore.fromObject({ proxy: { url: "http://127.0.0.1:3128" } });
    store.update({ proxy: { url: null } });
    expect(store.get().proxy.url).toBeUndefined();
    expect(store.reload().proxy.url).toBeUndefined();
  });

  it("persists applied overrides and restores them in a new store", async () => {
    const registry = new MemoryRegistry();
    const first = ConfigStore.fromObject({ cache: { timeoutSeconds: 100 } });
    await first.attach(registry);
    await first.apply({ proxy: { poolEnabled: true } });
    expect(await registry.getSettings()).toEqual({ proxy: { poolEnabled: true } });

    const second = ConfigStore.fromObject({ cache: { timeoutSeconds: 100 } });
    expect(second.get().proxy.poolEnabled).toBe(false);
    await second.attach(registry);
    expect(second.get().proxy.poolEnabled).toBe(true);
    expect(second.get().cache.timeoutSeconds).toBe(100);
    expect(second.reload().proxy.poolEnabled).toBe(true);
  });

  it("does not persist an invalid patch", async () => {
    const registry = new MemoryRegistry();
    const store = ConfigStore.fromObject();
    await store.attach(registry);
    await expect(store.apply({ tokens: { errorBanThreshold: 0 } })).rejects.toThrow(ZodError);
    expect(await registry.getSettings()).toEqual({});
    expect(store.getOverrides()).toEqual({});
  });

  it("ignores saved overrides that no longer validate", async () => {
    const registry = new MemoryRegistry();
    await registry.saveSettings({ generation: { pollIntervalMs: -5 } });
    const store = ConfigStore.fromObject();
    await store.attach(registry);
    expect(store.get().generation.pollIntervalMs).toBe(3000);
    expect(store.getOverrides()).toEqual({});
  });
});
