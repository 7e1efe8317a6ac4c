import axios, { type AxiosProxyConfig, type AxiosResponse } from "axios";
import _ from "lodash";

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type { ConfigStore } from "@/lib/config.ts";
import logger from "@/lib/logger.ts";
import type { ProxyRotator } from "@/lib/proxy-rotator.ts";
import { accountIdentity, identityKey } from "@/lib/user-agent.ts";
import util from "@/lib/util.ts";

/** Session credentials travel as a cookie, access credentials as a bearer token. */
export type UpstreamAuth = { session: string } | { access: string };

export interface UpstreamRequest {
  method: "GET" | "POST";
  url: string;
  auth: UpstreamAuth;
  data?: unknown;
}

const SESSION_COOKIE = "__Secure-next-auth.session-token";

/** Maps a proxy URL onto axios' proxy option. */
export function toAxiosProxy(proxyUrl: string): AxiosProxyConfig {
  const parsed = new URL(proxyUrl);
  const protocol = parsed.protocol.replace(/:$/, "");
  const proxy: AxiosProxyConfig = {
    protocol,
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : protocol === "https" ? 443 : 80,
  };
  if (parsed.username) {
    proxy.auth = {
      username: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
    };
  }
  return proxy;
}

function describeBody(data: unknown): string {
  if (_.isString(data)) return data.slice(0, 500);
  if (Buffer.isBuffer(data)) return data.toString("utf8", 0, 500);
  try {
    return JSON.stringify(data).slice(0, 500);
  } catch {
    return String(data);
  }
}

/**
 * Converts a failed exchange into the gateway's error kinds. A 429 anywhere
 * means the account itself is throttled.
 */
export function classifyUpstreamFailure(error: unknown): APIException {
  if (error instanceof APIException) return error;
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 429) {
      return new APIException(EX.API_UPSTREAM_RATE_LIMITED, `Upstream returned HTTP 429: ${describeBody(error.response?.data)}`).setData({
        status,
      });
    }
    const detail = error.response
      ? `HTTP ${status}: ${describeBody(error.response.data)}`
      : `network error: ${error.message}`;
    return new APIException(EX.API_UPSTREAM_FAILED, `Upstream request failed, ${detail}`).setData({ status: status ?? null });
  }
  return new APIException(EX.API_UPSTREAM_FAILED, `Upstream request failed: ${util.errorMessage(error)}`);
}

/**
 * Single exit point for calls to the generation API: per-account identity,
 * credential headers, proxy rotation and failure classification.
 */
export class UpstreamRequester {
  constructor(
    private readonly config: ConfigStore,
    private readonly proxies: ProxyRotator
  ) {}

  async request(options: UpstreamRequest): Promise<unknown> {
    const credential = "session" in options.auth ? options.auth.session : options.auth.access;
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "User-Agent": accountIdentity(identityKey(credential)),
    };
    if ("session" in options.auth) headers.Cookie = `${SESSION_COOKIE}=${options.auth.session}`;
    else headers.Authorization = `Bearer ${options.auth.access}`;

    const selection = await this.proxies.next();
    const startTime = util.timestamp();
    let response: AxiosResponse<unknown>;
    try {
      response = await axios.request<unknown>({
        method: options.method,
        url: options.url,
        data: options.data,
        headers,
        timeout: this.config.get().upstream.timeoutMs,
        proxy: selection ? toAxiosProxy(selection.url) : false,
      });
    } catch (err) {
      const failure = classifyUpstreamFailure(err);
      logger.warn(`${options.method} ${options.url} failed after ${util.timestamp() - startTime}ms: ${failure.message}`);
      if (selection) await this.proxies.recordResult(selection.id, false);
      throw failure;
    }
    logger.debug(`${options.method} ${options.url} -> ${response.status} (${util.timestamp() - startTime}ms)`);
    if (selection) await this.proxies.recordResult(selection.id, true);
    return response.data;
  }
}
