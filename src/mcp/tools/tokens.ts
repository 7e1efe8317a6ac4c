import { assertConfirmed } from "../guards.ts";
import type { TokenRefresh } from "../client.ts";
import { describeToken, type TokenRow } from "../pool.ts";
import { listTokensInputSchema, refreshTokenInputSchema, setTokenStatusInputSchema } from "../schemas.ts";
import type { ToolDeps } from "../types.ts";
import { registerSafeTool } from "../tool-factory.ts";

export function registerListTokensTool({ server, client }: ToolDeps): void {
  registerSafeTool(
    server,
    "list_tokens",
    {
      title: "List Tokens",
      description: "List pool accounts with their health, ban reason, credits and error counters",
      inputSchema: listTokensInputSchema,
      annotations: { readOnlyHint: true },
      summarize: (tokens: TokenRow[]) => (tokens.length === 0 ? "No tokens" : tokens.map(describeToken).join("\n")),
    },
    async ({ inactiveOnly }) => {
      const tokens = await client.listTokens();
      return inactiveOnly ? tokens.filter((token) => !token.isActive) : tokens;
    }
  );
}

export function registerSetTokenStatusTool({ server, config, client }: ToolDeps): void {
  registerSafeTool(
    server,
    "set_token_status",
    {
      title: "Enable or Disable Token",
      description: "Take an account out of rotation, or put it back and clear its ban and error streak",
      inputSchema: setTokenStatusInputSchema,
      annotations: { destructiveHint: false, idempotentHint: true },
      summarize: describeToken,
    },
    async ({ id, active, confirm }) => {
      assertConfirmed(config, "pool", confirm);
      return client.setTokenActive(id, active);
    }
  );
}

export function registerRefreshTokenTool({ server, client }: ToolDeps): void {
  registerSafeTool(
    server,
    "refresh_token",
    {
      title: "Refresh Token",
      description: "Exchange the session for a fresh access credential and re-read the credit balance",
      inputSchema: refreshTokenInputSchema,
      annotations: { idempotentHint: true },
      summarize: (result: TokenRefresh) => `#${result.id}: credits ${result.credits}`,
    },
    async ({ id }) => client.refreshToken(id)
  );
}
