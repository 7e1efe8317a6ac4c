function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value == null) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value == null) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}

export interface McpConfig {
  apiBaseUrl: string;
  apiKey?: string;
  /** Video generation polls for minutes, so this is generous. */
  httpTimeoutMs: number;
  /** Tools that spend credits or change the pool need a `confirm` word. */
  requireConfirm: boolean;
  /** Registers list_tokens, set_token_status and refresh_token. */
  adminTools: boolean;
}

export function loadMcpConfig(env: NodeJS.ProcessEnv = process.env): McpConfig {
  const apiBaseUrl = (env.GATEWAY_BASE_URL || "http://127.0.0.1:8000").trim().replace(/\/+$/, "");
  const apiKey = env.GATEWAY_API_KEY?.trim();

  return {
    apiBaseUrl,
    apiKey: apiKey || undefined,
    httpTimeoutMs: parseNumber(env.MCP_HTTP_TIMEOUT_MS, 1_800_000),
    requireConfirm: parseBoolean(env.MCP_REQUIRE_CONFIRM, true),
    adminTools: parseBoolean(env.MCP_ADMIN_TOOLS, true),
  };
}
