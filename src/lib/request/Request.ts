import type { Context } from "koa";
import _ from "lodash";
import type { z } from "zod";

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import logger from "@/lib/logger.ts";
import util from "@/lib/util.ts";

/** Koa context as seen by a router middleware. */
export type RoutedContext = Context & { params?: Record<string, string> };

export interface RequestOptions {
  time?: number;
}

export default class Request {
  /** Request method */
  method: string;
  /** Request URL */
  url: string;
  /** Request path */
  path: string;
  /** Request headers */
  headers: Record<string, string | string[] | undefined>;
  /** Query string values */
  query: Record<string, string | string[] | undefined>;
  /** Route params */
  params: Record<string, string>;
  /** Parsed body, unknown until validated */
  body: unknown;
  /** Receive time */
  time: number;

  constructor(ctx: RoutedContext, options: RequestOptions = {}) {
    const { time } = options;
    this.method = ctx.request.method;
    this.url = ctx.request.url;
    this.path = ctx.request.path;
    this.headers = ctx.request.headers;
    this.query = ctx.query;
    this.params = ctx.params ?? {};
    this.body = ctx.request.body ?? {};
    this.time = Number(_.defaultTo(time, util.timestamp()));
  }

  /**
   * Checks the value at `key` (a lodash path such as `params.id`). Without a
   * predicate the value only has to be defined.
   */
  validate(key: string, fn?: (value: unknown) => boolean, message?: string) {
    const value: unknown = _.get(this, key);
    const valid = fn ? fn(value) : !_.isUndefined(value);
    if (!valid) {
      logger.warn(`Params ${key} invalid: ${JSON.stringify(value) ?? "undefined"}`);
      throw new APIException(EX.API_REQUEST_PARAMS_INVALID, message ?? `Params ${key} invalid`);
    }
    return this;
  }

  /** Parses the body against a zod schema. */
  parseBody<T extends z.ZodTypeAny>(schema: T): z.infer<T> {
    const parsed = schema.safeParse(this.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? `body.${issue.path.join(".")}` : "body";
      throw new APIException(EX.API_REQUEST_PARAMS_INVALID, `Params ${where} invalid: ${issue?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  /** Integer route param, rejected when it is not one. */
  intParam(name: string): number {
    const value = Number(this.params[name]);
    if (!Number.isInteger(value)) {
      throw new APIException(EX.API_REQUEST_PARAMS_INVALID, `Params params.${name} invalid`);
    }
    return value;
  }
}
