import type { Server as HttpServer } from "http";
import { Readable } from "stream";

import Koa from "koa";
import type { Context, Next } from "koa";
import { koaBody } from "koa-body";
import KoaRouter from "koa-router";

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type { ConfigStore } from "@/lib/config.ts";
import logger from "@/lib/logger.ts";
import Request from "@/lib/request/Request.ts";
import { errorEnvelope } from "@/lib/response/FailureBody.ts";
import Response from "@/lib/response/Response.ts";
import util from "@/lib/util.ts";

export type RouteHandler = (request: Request) => unknown;

export type HttpMethod = "get" | "post" | "put" | "delete";

export type RouteModule = { prefix?: string } & Partial<Record<HttpMethod, Record<string, RouteHandler>>>;

const HTTP_METHODS: HttpMethod[] = ["get", "post", "put", "delete"];

/** Paths reachable without the API key. */
const PUBLIC_PATHS = [/^\/ping$/, /^\/tmp\//];

export function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1].trim() : null;
}

export class Server {
  readonly app: Koa;
  readonly router: KoaRouter;
  private httpServer: HttpServer | null = null;

  constructor(private readonly config: ConfigStore) {
    this.app = new Koa();
    this.router = new KoaRouter();
    this.app.use((ctx, next) => this.handleErrors(ctx, next));
    this.app.use((ctx, next) => this.cors(ctx, next));
    this.app.use((ctx, next) => this.authenticate(ctx, next));
    this.app.use(
      koaBody({
        multipart: false,
        jsonLimit: "100mb",
        formLimit: "100mb",
        textLimit: "100mb",
      })
    );
  }

  /** Mounts every route module; handler results become the response body. */
  attachRoutes(routes: RouteModule[]) {
    for (const route of routes) {
      const prefix = route.prefix ?? "";
      for (const method of HTTP_METHODS) {
        const handlers = route[method];
        if (!handlers) continue;
        for (const [uri, handler] of Object.entries(handlers)) {
          this.router[method](`${prefix}${uri}`, async (ctx) => {
            const request = new Request(ctx);
            const result: unknown = await handler(request);
            if (Response.isInstance(result)) result.injectTo(ctx);
            else ctx.body = result;
          });
          logger.debug(`Route ${method.toUpperCase()} ${prefix}${uri} attached`);
        }
      }
    }
    this.app.use(this.router.routes());
    this.app.use(this.router.allowedMethods());
    this.app.use((ctx) => {
      throw new APIException(EX.API_NOT_FOUND, `[Route not found] ${ctx.request.method} ${ctx.request.path}`).setHTTPStatusCode(404);
    });
  }

  listen(): Promise<HttpServer> {
    const { host, port } = this.config.get().service;
    return new Promise((resolve, reject) => {
      const httpServer = this.app.listen(port, host);
      httpServer.once("listening", () => {
        logger.success(`Server listening on ${host}:${port}`);
        resolve(httpServer);
      });
      httpServer.once("error", reject);
      this.httpServer = httpServer;
    });
  }

  close(): Promise<void> {
    const httpServer = this.httpServer;
    if (!httpServer) return Promise.resolve();
    this.httpServer = null;
    return new Promise((resolve, reject) => httpServer.close((err) => (err ? reject(err) : resolve())));
  }

  callback() {
    return this.app.callback();
  }

  private async handleErrors(ctx: Context, next: Next) {
    const startTime = util.timestamp();
    try {
      await next();
      if (ctx.body instanceof Readable) {
        logger.info(`<- ${ctx.request.method} ${ctx.request.url} (stream)`);
      } else {
        logger.info(`<- ${ctx.request.method} ${ctx.request.url} ${ctx.status} ${util.timestamp() - startTime}ms`);
      }
    } catch (err) {
      const { status, body } = errorEnvelope(err);
      if (status >= 500) logger.error(`${ctx.request.method} ${ctx.request.url} failed:`, util.errorMessage(err));
      else logger.warn(`${ctx.request.method} ${ctx.request.url} -> ${status}: ${body.error.message}`);
      ctx.status = status;
      ctx.body = body;
    }
  }

  private async cors(ctx: Context, next: Next) {
    ctx.set("Access-Control-Allow-Origin", "*");
    ctx.set("Access-Control-Allow-Headers", "Authorization, Content-Type");
    ctx.set("Access-Control-Allow-Methods", "GET, POST, PUT, DELETE, OPTIONS");
    if (ctx.request.method === "OPTIONS") {
      ctx.status = 204;
      return;
    }
    await next();
  }

  private async authenticate(ctx: Context, next: Next) {
    const apiKey = this.config.get().service.apiKey;
    if (apiKey && !PUBLIC_PATHS.some((pattern) => pattern.test(ctx.request.path))) {
      const token = bearerToken(ctx.get("Authorization"));
      if (token !== apiKey) {
        throw new APIException(EX.API_UNAUTHORIZED, token ? "Invalid API key" : "Missing API key");
      }
    }
    await next();
  }
}
