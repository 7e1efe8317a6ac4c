import http from "http";
import os from "os";
import path from "path";

import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { MODEL_CONFIG } from "@/api/consts/models.ts";
import routes from "@/api/routes/index.ts";
import { ConfigStore } from "@/lib/config.ts";
import { cacheFilename } from "@/lib/file-cache.ts";
import { MemoryRegistry } from "@/lib/registry/memory-registry.ts";
import { Runtime } from "@/lib/runtime.ts";
import { Server, bearerToken } from "@/lib/server.ts";
import { FakeUpstream, NOW, noSleep } from "@/__tests__/fakes.ts";

const API_KEY = "test-secret";
const IMAGE_URL = "https://cdn.example.com/generated/image-1.jpg";

describe("bearerToken", () => {
  it("reads the token after the scheme", () => {
    expect(bearerToken("Bearer abc")).toBe("abc");
    expect(bearerToken("bearer   abc ")).toBe("abc");
    expect(bearerToken("Basic abc")).toBeNull();
    expect(bearerToken(undefined)).toBeNull();
  });
});

describe("HTTP surface", () => {
  let httpServer: http.Server;
  let baseUrl: string;
  let registry: MemoryRegistry;
  let runtime: Runtime;
  let cacheDir: string;

  beforeEach(async () => {
    cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), "server-"));
    registry = new MemoryRegistry();
    runtime = new Runtime({
      config: ConfigStore.fromObject({
        service: { apiKey: API_KEY },
        cache: { enabled: false, dir: cacheDir },
        log: { fileOutput: false },
      }),
      registry,
      upstream: new FakeUpstream(),
      sleep: noSleep,
      now: () => NOW,
    });
    const server = new Server(runtime.config);
    server.attachRoutes(routes(runtime));
    httpServer = http.createServer(server.callback());
    await new Promise<void>((resolve) => httpServer.listen(0, "127.0.0.1", resolve));
    const address = httpServer.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => httpServer.close((err) => (err ? reject(err) : resolve())));
    await fs.remove(cacheDir);
  });

  const call = (pathname: string, init: RequestInit = {}, apiKey: string | null = API_KEY) => {
    const headers = new Headers(init.headers);
    if (apiKey) headers.set("Authorization", `Bearer ${apiKey}`);
    if (init.body) headers.set("Content-Type", "application/json");
    return fetch(`${baseUrl}${pathname}`, { ...init, headers });
  };

  const post = (pathname: string, body: unknown) => call(pathname, { method: "POST", body: JSON.stringify(body) });

  it("answers ping without a key", async () => {
    const response = await call("/ping", {}, null);
    expect(response.status).toBe(200);
    expect(await response.text()).toBe("pong");
  });

  it("rejects a missing or wrong key", async () => {
    const missing = await call("/v1/models", {}, null);
    expect(missing.status).toBe(401);
    expect(await missing.json()).toEqual({
      error: { message: "Missing API key", type: "authentication_error", code: "invalid_api_key" },
    });
    const wrong = await call("/v1/models", {}, "not-the-key");
    expect((await wrong.json()).error.message).toBe("Invalid API key");
  });

  it("answers preflight requests", async () => {
    const response = await call("/v1/chat/completions", { method: "OPTIONS" }, null);
    expect(response.status).toBe(204);
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("lists every model, images first", async () => {
    const body = await (await call("/v1/models")).json();
    expect(body.object).toBe("list");
    expect(body.data).toHaveLength(Object.keys(MODEL_CONFIG).length);
    expect(body.data[0]).toEqual({
      id: "gemini-2.5-flash-image-landscape",
      object: "model",
      owned_by: "flow-gateway",
      model_type: "image",
      description: "Image generation (GEM_PIX, landscape)",
    });
  });

  it("returns 404 envelopes for unknown routes", async () => {
    const response = await call("/nope");
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: { message: "[Route not found] GET /nope", type: "invalid_request_error", code: "not_found" },
    });
  });

  it("completes a chat request with an image", async () => {
    await registry.addToken({ sessionCredential: "s1", email: "a@example.com", accessCredential: "access-1" });
    const response = await post("/v1/chat/completions", {
      model: "gemini-2.5-flash-image-landscape",
      messages: [{ role: "user", content: "a cat" }],
    });
    expect(response.status).toBe(200);
    const body = await response.json();
    expect(body.object).toBe("chat.completion");
    expect(body.choices[0].message.content).toBe(`![Generated Image](${IMAGE_URL})`);
  });

  it("streams chat completions as server-sent events", async () => {
    await registry.addToken({ sessionCredential: "s1", email: "a@example.com", accessCredential: "access-1" });
    const response = await post("/v1/chat/completions", {
      model: "gemini-2.5-flash-image-landscape",
      messages: [{ role: "user", content: "a cat" }],
      stream: true,
    });
    expect(response.headers.get("content-type")).toContain("text/event-stream");
    const text = await response.text();
    expect(text.endsWith("data: [DONE]\n\n")).toBe(true);
  });

  it("maps generation errors to their status", async () => {
    const response = await post("/v1/chat/completions", {
      model: "gemini-2.5-flash-image-landscape",
      messages: [{ role: "user", content: "a cat" }],
    });
    expect(response.status).toBe(503);
    expect((await response.json()).error.code).toBe("generation_failed");
  });

  it("rejects malformed chat bodies", async () => {
    const response = await post("/v1/chat/completions", { model: "gemini-2.5-flash-image-landscape" });
    expect(response.status).toBe(400);
    expect((await response.json()).error.message).toBe("Params body.messages invalid: Required");
  });

  it("adds tokens with masked credentials", async () => {
    const response = await post("/token", { sessionCredential: "session-abcdefghijkl" });
    const body = await response.json();
    expect(body.success).toBe(true);
    expect(body.data.sessionCredential).toBe("sess...ijkl");
    expect(body.data.accessCredential).toBe("acce...ijkl");
    expect(body.data.currentProjectId).toBe("project-1");

    const list = await (await call("/token")).json();
    expect(list.total).toBe(1);
    expect(list.active).toBe(1);
  });

  it("disables and enables tokens", async () => {
    const token = await registry.addToken({ sessionCredential: "s1", email: "a@example.com" });
    await post(`/token/${token.id}/disable`, {});
    expect((await registry.getToken(token.id))?.isActive).toBe(false);
    const enabled = await (await post(`/token/${token.id}/enable`, {})).json();
    expect(enabled.data.isActive).toBe(true);
  });

  it("rejects non-numeric token ids", async () => {
    const response = await call("/token/abc", { method: "DELETE" });
    expect(response.status).toBe(400);
    expect((await response.json()).error.message).toBe("Params params.id invalid");
  });

  it("looks up generation tasks", async () => {
    await registry.createTask({ taskId: "operations/op-9", tokenId: 1, model: "m", prompt: "p" });
    const found = await call(`/tasks/${encodeURIComponent("operations/op-9")}`);
    expect((await found.json()).status).toBe("processing");
    expect((await call("/tasks/missing")).status).toBe(404);
  });

  it("masks secrets in the config view and validates patches", async () => {
    const view = await (await call("/config")).json();
    expect(view.data.service.apiKey).toBe("test...cret");

    const rejected = await post("/config", { tokens: { errorBanThreshold: 0 } });
    expect(rejected.status).toBe(400);
    expect((await rejected.json()).error.message).toBe(
      "Invalid config tokens.errorBanThreshold: Number must be greater than or equal to 1"
    );

    const accepted = await (await post("/config", { tokens: { errorBanThreshold: 7 } })).json();
    expect(accepted.data.tokens.errorBanThreshold).toBe(7);
    expect(runtime.config.get().tokens.errorBanThreshold).toBe(7);
  });

  it("keeps the stored key when the masked view is posted back", async () => {
    const view = await (await call("/config")).json();
    view.data.cache.timeoutSeconds = 120;
    const response = await post("/config", view.data);
    expect(response.status).toBe(200);
    expect(runtime.config.get().service.apiKey).toBe(API_KEY);
    expect(runtime.config.get().cache.timeoutSeconds).toBe(120);
    expect((await call("/v1/models")).status).toBe(200);
  });

  it("persists admin settings and keeps them over a reload", async () => {
    await runtime.config.attach(registry);
    await post("/proxy/config", { poolEnabled: true });
    const timeout = await (await post("/config/cache/timeout", { timeoutSeconds: 90 })).json();
    expect(timeout).toEqual({ success: true, timeoutSeconds: 90 });

    const reloaded = await (await post("/config/reload", {})).json();
    expect(reloaded.data.proxy.poolEnabled).toBe(true);
    expect(reloaded.data.cache.timeoutSeconds).toBe(90);
    expect(await registry.getSettings()).toEqual({ proxy: { poolEnabled: true }, cache: { timeoutSeconds: 90 } });
  });

  it("manages the proxy pool", async () => {
    await post("/proxy/pool", { proxyUrl: "http://10.0.0.1:8080", name: "edge" });
    const pool = await (await call("/proxy/pool")).json();
    expect(pool.data.map((item: { name: string }) => item.name)).toEqual(["edge"]);
    const rejected = await post("/proxy/pool", { proxyUrl: "ftp://10.0.0.1" });
    expect(rejected.status).toBe(400);
  });

  it("serves cached files without a key", async () => {
    const filename = cacheFilename(IMAGE_URL, "image");
    await fs.writeFile(path.join(cacheDir, filename), "jpeg-bytes");
    const response = await call(`/tmp/${filename}`, {}, null);
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("image/jpeg");
    expect(await response.text()).toBe("jpeg-bytes");
    expect((await call("/tmp/unknown.jpg", {}, null)).status).toBe(404);
  });
});
