import path from "node:path";

import fs from "fs-extra";
import _ from "lodash";

export const DEFAULT_BASE_URL = "http://127.0.0.1:8000";

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return _.isPlainObject(value);
}

export function fail(message: string): never {
  throw new Error(message);
}

export function failWithUsage(reason: string, usage: string): never {
  fail(`${reason}\n\n${usage}`);
}

export function getSingleString(args: JsonRecord, key: string): string | undefined {
  const raw = args[key];
  if (typeof raw === "string" && raw.trim().length > 0) return raw.trim();
  if (typeof raw === "number") return String(raw);
  return undefined;
}

export function toStringList(raw: unknown): string[] {
  if (typeof raw === "string") return raw.split(",").map((item) => item.trim()).filter(Boolean);
  if (Array.isArray(raw)) {
    return raw
      .flatMap((item) => (typeof item === "string" ? item.split(",") : []))
      .map((item) => item.trim())
      .filter(Boolean);
  }
  return [];
}

export function getInteger(args: JsonRecord, key: string): number | undefined {
  const raw = getSingleString(args, key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) fail(`--${key} must be an integer, got ${raw}`);
  return value;
}

export function sanitizeBaseUrl(baseUrl: string | undefined): string {
  return (baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, "");
}

export function buildAuthHeaders(apiKey: string | undefined): Record<string, string> {
  if (!apiKey) return {};
  return { Authorization: `Bearer ${apiKey}` };
}

/** `{error: {message}}` bodies become their message, anything else is printed as JSON. */
export function describeFailure(status: number, payload: unknown): string {
  if (isRecord(payload) && isRecord(payload.error) && typeof payload.error.message === "string") {
    return `HTTP ${status}: ${payload.error.message}`;
  }
  return `HTTP ${status}: ${JSON.stringify(payload)}`;
}

const IMAGE_MIME: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".webp": "image/webp",
  ".gif": "image/gif",
};

export function detectImageMime(filePath: string): string {
  return IMAGE_MIME[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

/** URLs pass through, local files are inlined as data URLs. */
export async function toImageRef(input: string): Promise<string> {
  if (/^https?:\/\//i.test(input) || /^data:/i.test(input)) return input;
  if (!(await fs.pathExists(input))) fail(`Image file not found: ${input}`);
  const data = await fs.readFile(input);
  return `data:${detectImageMime(input)};base64,${data.toString("base64")}`;
}

export function buildChatBody(model: string, prompt: string, imageRefs: string[], stream: boolean) {
  const content =
    imageRefs.length === 0
      ? prompt
      : [
          { type: "text", text: prompt },
          ...imageRefs.map((url) => ({ type: "image_url", image_url: { url } })),
        ];
  return { model, stream, messages: [{ role: "user", content }] };
}

export type StreamPiece =
  | { kind: "reasoning"; text: string }
  | { kind: "content"; text: string }
  | { kind: "error"; message: string };

/**
 * Splits a chunk of SSE text into complete `data:` payloads. Returns the
 * parsed pieces and whatever partial line is left over.
 */
export function parseSseBuffer(buffer: string): { pieces: StreamPiece[]; rest: string; done: boolean } {
  const pieces: StreamPiece[] = [];
  const events = buffer.split("\n\n");
  const rest = events.pop() ?? "";
  let done = false;
  for (const event of events) {
    const line = event.trim();
    if (!line.startsWith("data:")) continue;
    const data = line.slice(5).trim();
    if (data === "[DONE]") {
      done = true;
      continue;
    }
    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch {
      continue;
    }
    if (!isRecord(payload)) continue;
    if (isRecord(payload.error) && typeof payload.error.message === "string") {
      pieces.push({ kind: "error", message: payload.error.message });
      continue;
    }
    const choice = Array.isArray(payload.choices) ? payload.choices[0] : undefined;
    if (!isRecord(choice) || !isRecord(choice.delta)) continue;
    if (typeof choice.delta.reasoning_content === "string") {
      pieces.push({ kind: "reasoning", text: choice.delta.reasoning_content });
    }
    if (typeof choice.delta.content === "string") pieces.push({ kind: "content", text: choice.delta.content });
  }
  return { pieces, rest, done };
}

export function formatTime(value: unknown): string {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) return "-";
  return new Date(value).toISOString();
}
