import { beforeEach, describe, expect, it, vi } from "vitest";

import EX from "@/api/consts/exceptions.ts";
import { ConfigStore } from "@/lib/config.ts";
import { MemoryRegistry } from "@/lib/registry/memory-registry.ts";
import type { NewToken } from "@/lib/registry/types.ts";
import { TokenManager } from "@/lib/token-manager.ts";
import { FakeUpstream, NOW } from "@/__tests__/fakes.ts";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("TokenManager", () => {
  let registry: MemoryRegistry;
  let upstream: FakeUpstream;
  let config: ConfigStore;
  let now: number;
  let tokens: TokenManager;

  beforeEach(() => {
    registry = new MemoryRegistry();
    upstream = new FakeUpstream();
    config = ConfigStore.fromObject({ tokens: { errorBanThreshold: 3, accessRefreshMarginSeconds: 3600 } });
    now = NOW;
    tokens = new TokenManager({ registry, upstream, config, now: () => now });
  });

  const seed = (overrides: Partial<NewToken> = {}) =>
    registry.addToken({
      sessionCredential: "session-1",
      email: "one@example.com",
      accessCredential: "access-1",
      ...overrides,
    });

  describe("addToken", () => {
    it("exchanges the session, records the balance and binds a project", async () => {
      const token = await tokens.addToken({ sessionCredential: " session-a " });
      expect(token.sessionCredential).toBe("session-a");
      expect(token.accessCredential).toBe("access-for-session-a");
      expect(token.email).toBe("session-a@example.com");
      expect(token.credits).toBe(100);
      expect(token.paygateTier).toBe("PAYGATE_TIER_TWO");
      expect(token.currentProjectId).toBe("project-1");
      expect(await registry.getProjectsByToken(token.id)).toHaveLength(1);
    });

    it("binds a supplied project instead of creating one", async () => {
      const token = await tokens.addToken({ sessionCredential: "session-a", projectId: "existing", projectName: "Mine" });
      expect(token.currentProjectId).toBe("existing");
      expect(token.currentProjectName).toBe("Mine");
      expect(upstream.createProject).not.toHaveBeenCalled();
    });

    it("rejects a duplicate session credential", async () => {
      await tokens.addToken({ sessionCredential: "session-a" });
      await expect(tokens.addToken({ sessionCredential: "session-a" })).rejects.toMatchObject({
        errcode: EX.API_TOKEN_CONFLICT[0],
      });
    });

    it("fails with a credential error when the exchange fails", async () => {
      upstream.exchangeSessionForAccess.mockRejectedValueOnce(new Error("expired"));
      await expect(tokens.addToken({ sessionCredential: "session-a" })).rejects.toMatchObject({
        errcode: EX.API_CREDENTIAL_INVALID[0],
        errmsg: "Session credential exchange failed: expired",
      });
      expect(await registry.listTokens()).toHaveLength(0);
    });
  });

  describe("health accounting", () => {
    it("disables a token once consecutive errors reach the threshold", async () => {
      const { id } = await seed();
      await tokens.recordError(id);
      await tokens.recordError(id);
      expect((await tokens.getToken(id)).isActive).toBe(true);

      const stats = await tokens.recordError(id);
      const token = await tokens.getToken(id);
      expect(stats.consecutiveErrorCount).toBe(3);
      expect(stats.errorCount).toBe(3);
      expect(stats.todayErrorCount).toBe(3);
      expect(stats.todayDate).toBe("2026-01-15");
      expect(token.isActive).toBe(false);
      expect(token.banReason).toBe("error_threshold");
      expect(token.bannedAt).toBe(NOW);
    });

    it("resets only the consecutive count on success", async () => {
      const { id } = await seed();
      await tokens.recordError(id);
      await tokens.recordError(id);
      await tokens.recordSuccess(id);
      const stats = await registry.getTokenStats(id);
      expect(stats?.consecutiveErrorCount).toBe(0);
      expect(stats?.errorCount).toBe(2);
    });

    it("bans for rate limiting without any prior errors", async () => {
      const { id } = await seed();
      await tokens.banForRateLimit(id);
      const token = await tokens.getToken(id);
      expect(token.isActive).toBe(false);
      expect(token.banReason).toBe("429_rate_limit");
      expect((await registry.getTokenStats(id))?.consecutiveErrorCount).toBe(0);
    });

    it("keeps the rate-limit reason when later errors cross the threshold", async () => {
      const { id } = await seed();
      await tokens.banForRateLimit(id);
      for (let i = 0; i < 3; i++) await tokens.recordError(id);
      expect((await tokens.getToken(id)).banReason).toBe("429_rate_limit");
    });

    it("enable clears the ban and the consecutive count", async () => {
      const { id } = await seed();
      for (let i = 0; i < 3; i++) await tokens.recordError(id);
      const token = await tokens.enable(id);
      expect(token.isActive).toBe(true);
      expect(token.banReason).toBeNull();
      expect(token.bannedAt).toBeNull();
      expect((await registry.getTokenStats(id))?.consecutiveErrorCount).toBe(0);
      expect((await registry.getTokenStats(id))?.errorCount).toBe(3);
    });

    it("rolls the daily counters over on a new date", async () => {
      const { id } = await seed();
      await tokens.recordUsage(id, "image");
      let stats = await registry.getTokenStats(id);
      expect(stats?.imageCount).toBe(1);
      expect(stats?.todayImageCount).toBe(1);
      expect((await tokens.getToken(id)).lastUsedAt).toBe(NOW);

      now = NOW + DAY_MS;
      await tokens.recordUsage(id, "video");
      stats = await registry.getTokenStats(id);
      expect(stats?.todayDate).toBe("2026-01-16");
      expect(stats?.todayImageCount).toBe(0);
      expect(stats?.todayVideoCount).toBe(1);
      expect(stats?.imageCount).toBe(1);
      expect(stats?.successCount).toBe(2);
      expect((await tokens.getToken(id)).useCount).toBe(2);
    });
  });

  describe("isAccessCredentialValid", () => {
    it("accepts a credential far from expiry without an exchange", async () => {
      const { id } = await seed({ accessExpiresAt: NOW + 2 * 60 * 60 * 1000 });
      expect(await tokens.isAccessCredentialValid(id)).toBe(true);
      expect(upstream.exchangeSessionForAccess).not.toHaveBeenCalled();
    });

    it("treats a missing expiry as valid", async () => {
      const { id } = await seed({ accessExpiresAt: null });
      expect(await tokens.isAccessCredentialValid(id)).toBe(true);
      expect(upstream.exchangeSessionForAccess).not.toHaveBeenCalled();
    });

    it("refreshes a credential inside the margin", async () => {
      const { id } = await seed({ accessExpiresAt: NOW + 10 * 60 * 1000 });
      expect(await tokens.isAccessCredentialValid(id)).toBe(true);
      expect(upstream.exchangeSessionForAccess).toHaveBeenCalledWith("session-1");
      expect((await tokens.getToken(id)).accessCredential).toBe("access-for-session-1");
    });

    it("reports false when the exchange fails", async () => {
      const { id } = await seed({ accessCredential: null });
      upstream.exchangeSessionForAccess.mockRejectedValueOnce(new Error("revoked"));
      expect(await tokens.isAccessCredentialValid(id)).toBe(false);
    });

    it("recovers through the session renewer when configured", async () => {
      config.update({ tokens: { credentialRecovery: "renewer" } });
      const renewer = { renew: vi.fn(async () => "session-renewed") };
      tokens = new TokenManager({ registry, upstream, config, renewer, now: () => now });
      const { id } = await seed({ accessCredential: null });
      upstream.exchangeSessionForAccess.mockRejectedValueOnce(new Error("revoked"));

      expect(await tokens.isAccessCredentialValid(id)).toBe(true);
      const token = await tokens.getToken(id);
      expect(token.sessionCredential).toBe("session-renewed");
      expect(token.accessCredential).toBe("access-for-session-renewed");
      expect(renewer.renew).toHaveBeenCalledTimes(1);
    });

    it("ignores the renewer while recovery is off", async () => {
      const renewer = { renew: vi.fn(async () => "session-renewed") };
      tokens = new TokenManager({ registry, upstream, config, renewer, now: () => now });
      const { id } = await seed({ accessCredential: null });
      upstream.exchangeSessionForAccess.mockRejectedValueOnce(new Error("revoked"));
      expect(await tokens.isAccessCredentialValid(id)).toBe(false);
      expect(renewer.renew).not.toHaveBeenCalled();
    });
  });

  describe("lifecycle", () => {
    it("re-exchanges when the session credential changes", async () => {
      const { id } = await seed();
      const token = await tokens.updateToken(id, { sessionCredential: "session-2", name: "renamed" });
      expect(token.accessCredential).toBe("access-for-session-2");
      expect(token.name).toBe("renamed");
    });

    it("deletes upstream projects only when asked", async () => {
      const kept = await seed({ sessionCredential: "session-k", email: "k@example.com" });
      await registry.addProject({ projectId: "p-kept", tokenId: kept.id, projectName: "kept" });
      await tokens.deleteToken(kept.id);
      expect(upstream.deleteProject).not.toHaveBeenCalled();

      const token = await seed();
      await registry.addProject({ projectId: "p-1", tokenId: token.id, projectName: "one" });
      await registry.addProject({ projectId: "p-2", tokenId: token.id, projectName: "two" });
      upstream.deleteProject.mockRejectedValueOnce(new Error("gone"));
      await tokens.deleteToken(token.id, { deleteProjects: true });
      expect(upstream.deleteProject.mock.calls).toEqual([
        ["session-1", "p-1"],
        ["session-1", "p-2"],
      ]);
      await expect(tokens.getToken(token.id)).rejects.toMatchObject({ errcode: EX.API_NOT_FOUND[0] });
    });

    it("refreshes credits", async () => {
      const { id } = await seed();
      expect(await tokens.refreshCredits(id)).toBe(100);
      expect((await tokens.getToken(id)).credits).toBe(100);
    });

    it("reports missing tokens", async () => {
      await expect(tokens.deleteToken(42)).rejects.toMatchObject({ errcode: EX.API_NOT_FOUND[0] });
      await expect(tokens.getToken(42)).rejects.toMatchObject({ errmsg: "Token 42 not found" });
    });

    it("reuses the bound project", async () => {
      const { id } = await seed({ currentProjectId: "bound" });
      expect(await tokens.ensureProject(id)).toBe("bound");
      expect(upstream.createProject).not.toHaveBeenCalled();
    });
  });
});
