import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DownloadError, HttpDownloader, defaultDownloaders } from "@/lib/downloaders.ts";
import { startLoopback, type CannedResponse, type LoopbackServer } from "@/__tests__/loopback.ts";

describe("HttpDownloader", () => {
  let loopback: LoopbackServer;
  let reply: CannedResponse;

  beforeEach(async () => {
    loopback = await startLoopback(() => reply);
  });

  afterEach(async () => {
    await loopback.close();
  });

  const download = () => new HttpDownloader(5000).download(`${loopback.baseUrl}/media/1.jpg`);

  it("returns the payload with browser headers", async () => {
    reply = { body: Buffer.from("jpeg-bytes") };
    expect((await download()).toString()).toBe("jpeg-bytes");
    expect(loopback.requests[0].headers["user-agent"]).toContain("Chrome/120.0.0.0");
  });

  it("flags 403 answers as forbidden", async () => {
    reply = { status: 403, body: Buffer.from("no") };
    const error = await download().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({ message: "HTTP 403 Forbidden", forbidden: true });
  });

  it("reports other statuses and empty bodies as ordinary failures", async () => {
    reply = { status: 404, body: Buffer.from("missing") };
    await expect(download()).rejects.toMatchObject({ message: "HTTP 404", forbidden: false });
    reply = { body: Buffer.alloc(0) };
    await expect(download()).rejects.toMatchObject({ message: "Downloaded file is empty" });
  });
});

describe("defaultDownloaders", () => {
  it("tries http first, then wget and curl", () => {
    expect(defaultDownloaders(1000).map((downloader) => downloader.name)).toEqual(["http", "wget", "curl"]);
  });
});
