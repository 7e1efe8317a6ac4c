import os from "os";
import path from "path";

import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import EX from "@/api/consts/exceptions.ts";
import { ConfigStore } from "@/lib/config.ts";
import { DownloadError } from "@/lib/downloaders.ts";
import { FileCache, cacheFilename } from "@/lib/file-cache.ts";
import util from "@/lib/util.ts";
import { FakeDownloader, NOW } from "@/__tests__/fakes.ts";

const URL_A = "https://cdn.example.com/generated/image-1.jpg";

describe("FileCache", () => {
  let dir: string;
  let config: ConfigStore;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "file-cache-"));
    config = ConfigStore.fromObject({
      cache: { enabled: true, dir, timeoutSeconds: 7200, forbiddenRetries: 3, forbiddenBackoffMs: 250 },
    });
    sleep = vi.fn(async (_ms: number) => {});
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  const createCache = (...downloaders: FakeDownloader[]) => new FileCache({ config, downloaders, now: () => NOW, sleep });

  const writeAged = async (filename: string, content: string, ageSeconds: number) => {
    const filePath = path.join(dir, filename);
    await fs.writeFile(filePath, content);
    const mtime = NOW / 1000 - ageSeconds;
    await fs.utimes(filePath, mtime, mtime);
    return filePath;
  };

  it("names files by the md5 of the url", () => {
    expect(cacheFilename(URL_A, "image")).toBe(`${util.md5(URL_A)}.jpg`);
    expect(cacheFilename(URL_A, "video")).toBe(`${util.md5(URL_A)}.mp4`);
  });

  it("serves a copy younger than the timeout without downloading", async () => {
    const downloader = new FakeDownloader("direct", [Buffer.from("new")]);
    const filename = cacheFilename(URL_A, "image");
    const filePath = await writeAged(filename, "old", 7199);

    expect(await createCache(downloader).fetch(URL_A, "image")).toBe(filename);
    expect(downloader.calls).toEqual([]);
    expect(await fs.readFile(filePath, "utf8")).toBe("old");
  });

  it("downloads again once the copy is past the timeout", async () => {
    const downloader = new FakeDownloader("direct", [Buffer.from("new")]);
    const filename = cacheFilename(URL_A, "image");
    const filePath = await writeAged(filename, "old", 7201);

    expect(await createCache(downloader).fetch(URL_A, "image")).toBe(filename);
    expect(downloader.calls).toEqual([URL_A]);
    expect(await fs.readFile(filePath, "utf8")).toBe("new");
    expect(await fs.pathExists(`${filePath}.part`)).toBe(false);
  });

  it("restarts the chain after a forbidden answer", async () => {
    const first = new FakeDownloader("direct", [
      new DownloadError("HTTP 403", true),
      new DownloadError("HTTP 403", true),
      Buffer.from("finally"),
    ]);
    const second = new FakeDownloader("fallback", [Buffer.from("unused")]);
    const filename = await createCache(first, second).fetch(URL_A, "video");

    expect(first.calls).toHaveLength(3);
    expect(second.calls).toEqual([]);
    expect(sleep.mock.calls).toEqual([[250], [250]]);
    expect(await fs.readFile(path.join(dir, filename), "utf8")).toBe("finally");
  });

  it("gives up after the forbidden retry budget", async () => {
    const first = new FakeDownloader("direct", [new DownloadError("HTTP 403", true)]);
    await expect(createCache(first).fetch(URL_A, "image")).rejects.toMatchObject({
      errcode: EX.API_CACHE_DOWNLOAD_FAILED[0],
      errmsg: "Failed to cache file: HTTP 403",
    });
    expect(first.calls).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("moves to the next downloader on an ordinary failure", async () => {
    const first = new FakeDownloader("direct", [new DownloadError("timeout")]);
    const second = new FakeDownloader("fallback", [Buffer.from("via fallback")]);
    const filename = await createCache(first, second).fetch(URL_A, "image");
    expect(await fs.readFile(path.join(dir, filename), "utf8")).toBe("via fallback");
    expect(sleep).not.toHaveBeenCalled();
  });

  it("stops after one pass when every downloader fails without a 403", async () => {
    const first = new FakeDownloader("direct", [new DownloadError("timeout")]);
    const second = new FakeDownloader("fallback", [new Error("connection reset")]);
    await expect(createCache(first, second).fetch(URL_A, "image")).rejects.toMatchObject({
      errmsg: "Failed to cache file: connection reset",
    });
    expect(first.calls).toHaveLength(1);
    expect(second.calls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("resolves only names the cache could have written", () => {
    const cache = createCache();
    const filename = cacheFilename(URL_A, "image");
    expect(cache.resolvePath(filename)).toBe(path.join(dir, filename));
    expect(cache.resolvePath("../secret.jpg")).toBeNull();
    expect(cache.resolvePath(`${util.md5(URL_A)}.png`)).toBeNull();
  });

  it("sweeps expired files and keeps fresh ones", async () => {
    const stale = await writeAged("a".repeat(32) + ".jpg", "stale", 7300);
    const fresh = await writeAged("b".repeat(32) + ".mp4", "fresh", 60);
    expect(await createCache().cleanupExpired()).toBe(1);
    expect(await fs.pathExists(stale)).toBe(false);
    expect(await fs.pathExists(fresh)).toBe(true);
  });

  it("clears everything on demand and persists a new timeout", async () => {
    await writeAged("c".repeat(32) + ".jpg", "x", 0);
    const cache = createCache();
    await cache.setTimeout(60);
    expect(config.get().cache.timeoutSeconds).toBe(60);
    expect(await cache.clearAll()).toBe(1);
  });
});
