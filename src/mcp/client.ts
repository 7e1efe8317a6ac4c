import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

import type { McpConfig } from "./config.ts";
import { McpToolError } from "./errors.ts";
import { taskSchema, tokenRowSchema, type TaskView, type TokenRow } from "./pool.ts";
import type { JsonObject } from "./types.ts";

export interface CompletionInput {
  model: string;
  prompt: string;
  /** http(s) or data: URLs */
  images?: string[];
}

export interface CompletionResult {
  model: string;
  content: string;
  /** Media URL pulled out of the Markdown or HTML content. */
  url: string | null;
}

export interface ModelEntry {
  id: string;
  type: "image" | "video";
  description: string;
}

export interface TokenRefresh {
  id: number;
  accessExpiresAt: number | null;
  credits: number;
}

/** What the tools need from the gateway. */
export interface GatewayApi {
  healthCheck(): Promise<unknown>;
  listModels(): Promise<ModelEntry[]>;
  createCompletion(input: CompletionInput): Promise<CompletionResult>;
  listTokens(): Promise<TokenRow[]>;
  setTokenActive(id: number, active: boolean): Promise<TokenRow>;
  refreshToken(id: number): Promise<TokenRefresh>;
  getTask(taskId: string): Promise<TaskView>;
}

const modelListSchema = z.object({
  data: z.array(z.object({ id: z.string(), model_type: z.enum(["image", "video"]), description: z.string().default("") })),
});

const tokenListSchema = z.object({ data: z.array(tokenRowSchema) });

const tokenResultSchema = z.object({ data: tokenRowSchema });

const refreshAtSchema = z.object({ data: z.object({ id: z.number(), accessExpiresAt: z.number().nullable() }) });

const refreshCreditsSchema = z.object({ data: z.object({ credits: z.number() }) });

const completionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string() }) })).min(1),
});

export function extractMediaUrl(content: string): string | null {
  const markdown = /!\[[^\]]*\]\(([^)\s]+)\)/.exec(content);
  if (markdown) return markdown[1];
  const html = /src=['"]([^'"]+)['"]/.exec(content);
  return html ? html[1] : null;
}

function parseGateway<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new McpToolError("UPSTREAM_ERROR", `Gateway returned an unexpected ${what} response`, data);
  return parsed.data;
}

export class GatewayApiClient implements GatewayApi {
  private readonly http: AxiosInstance;

  constructor(config: McpConfig) {
    this.http = axios.create({
      baseURL: config.apiBaseUrl,
      timeout: config.httpTimeoutMs,
      headers: config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {},
    });
  }

  private async request(method: "GET" | "POST", path: string, body?: JsonObject): Promise<unknown> {
    const { data } = method === "GET" ? await this.http.get<unknown>(path) : await this.http.post<unknown>(path, body);
    return data;
  }

  healthCheck(): Promise<unknown> {
    return this.request("GET", "/ping");
  }

  async listModels(): Promise<ModelEntry[]> {
    const { data } = parseGateway(modelListSchema, await this.request("GET", "/v1/models"), "model list");
    return data.map((item) => ({ id: item.id, type: item.model_type, description: item.description }));
  }

  async createCompletion(input: CompletionInput): Promise<CompletionResult> {
    const images = input.images ?? [];
    const content =
      images.length === 0
        ? input.prompt
        : [{ type: "text", text: input.prompt }, ...images.map((url) => ({ type: "image_url", image_url: { url } }))];
    const data = await this.request("POST", "/v1/chat/completions", {
      model: input.model,
      stream: false,
      messages: [{ role: "user", content }],
    });
    const text = parseGateway(completionSchema, data, "completion").choices[0].message.content;
    return { model: input.model, content: text, url: extractMediaUrl(text) };
  }

  async listTokens(): Promise<TokenRow[]> {
    return parseGateway(tokenListSchema, await this.request("GET", "/token"), "token list").data;
  }

  async setTokenActive(id: number, active: boolean): Promise<TokenRow> {
    const data = await this.request("POST", `/token/${id}/${active ? "enable" : "disable"}`);
    return parseGateway(tokenResultSchema, data, "token").data;
  }

  async refreshToken(id: number): Promise<TokenRefresh> {
    const access = parseGateway(refreshAtSchema, await this.request("POST", `/token/${id}/refresh-at`), "refresh");
    const credits = parseGateway(refreshCreditsSchema, await this.request("POST", `/token/${id}/refresh-credits`), "credits");
    return { id, accessExpiresAt: access.data.accessExpiresAt, credits: credits.data.credits };
  }

  async getTask(taskId: string): Promise<TaskView> {
    return parseGateway(taskSchema, await this.request("GET", `/tasks/${encodeURIComponent(taskId)}`), "task");
  }
}
