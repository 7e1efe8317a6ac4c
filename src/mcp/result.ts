import { formatToolError } from "./errors.ts";
import type { JsonObject } from "./types.ts";

function isJsonObject(data: unknown): data is JsonObject {
  return data != null && typeof data === "object" && !Array.isArray(data);
}

export function toStructuredContent(data: unknown): JsonObject {
  return isJsonObject(data) ? data : { data };
}

/** The readable summary leads the text block; the JSON follows for clients without structured output. */
export function toToolResult(data: unknown, summary?: string) {
  const json = JSON.stringify(data, null, 2);
  return {
    content: [{ type: "text" as const, text: summary ? `${summary}\n\n${json}` : json }],
    structuredContent: toStructuredContent(data),
  };
}

export async function withToolError<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new Error(formatToolError(error));
  }
}
