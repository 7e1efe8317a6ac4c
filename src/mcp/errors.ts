import axios from "axios";

export type McpToolErrorCode =
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "AUTH_ERROR"
  | "NETWORK_ERROR"
  | "UPSTREAM_ERROR"
  | "INTERNAL_ERROR";

export class McpToolError extends Error {
  code: McpToolErrorCode;
  details?: unknown;

  constructor(code: McpToolErrorCode, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

/** `{error: {message}}` from the gateway, else the transport message. */
function responseMessage(data: unknown, fallback: string): string {
  if (data != null && typeof data === "object" && "error" in data) {
    const error: unknown = data.error;
    if (error != null && typeof error === "object" && "message" in error && typeof error.message === "string") {
      return error.message;
    }
  }
  return fallback;
}

export function normalizeToolError(error: unknown): McpToolError {
  if (error instanceof McpToolError) return error;

  if (axios.isAxiosError(error)) {
    if (!error.response) {
      return new McpToolError("NETWORK_ERROR", "Failed to reach the gateway service", error.message);
    }

    const status = error.response.status;
    const data: unknown = error.response.data;
    const message = responseMessage(data, error.message);

    if (status === 401 || status === 403) return new McpToolError("AUTH_ERROR", message, data);
    if (status >= 400 && status < 500) return new McpToolError("VALIDATION_ERROR", message, data);
    if (status >= 500) return new McpToolError("UPSTREAM_ERROR", message, data);
  }

  if (error instanceof Error) return new McpToolError("INTERNAL_ERROR", error.message);

  return new McpToolError("INTERNAL_ERROR", "Unknown internal error");
}

export function formatToolError(error: unknown): string {
  const normalized = normalizeToolError(error);
  return `[${normalized.code}] ${normalized.message}`;
}
