import type { OutgoingHttpHeaders } from "http";

import type { Context } from "koa";

export interface ResponseOptions {
  statusCode?: number;
  type?: string;
  headers?: OutgoingHttpHeaders;
}

/**
 * Handler result that needs more than a JSON body: a status, a content
 * type or extra headers. Plain values are sent as JSON with status 200.
 */
export default class Response {
  /** Response body */
  body: unknown;
  /** HTTP status */
  statusCode: number;
  /** Content type */
  type?: string;
  /** Extra headers */
  headers: OutgoingHttpHeaders;

  constructor(body: unknown, options: ResponseOptions = {}) {
    this.body = body;
    this.statusCode = options.statusCode ?? 200;
    this.type = options.type;
    this.headers = options.headers ?? {};
  }

  static isInstance(value: unknown): value is Response {
    return value instanceof Response;
  }

  injectTo(ctx: Context) {
    for (const [name, value] of Object.entries(this.headers)) {
      if (value === undefined) continue;
      ctx.set(name, Array.isArray(value) ? value.join(", ") : String(value));
    }
    if (this.type) ctx.type = this.type;
    ctx.status = this.statusCode;
    ctx.body = this.body;
  }
}
