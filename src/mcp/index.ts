import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadMcpConfig } from "./config.ts";
import { createGatewayMcpServer } from "./server.ts";

async function main() {
  const config = loadMcpConfig();
  const server = createGatewayMcpServer(config);
  const transport = new StdioServerTransport();

  const shutdown = () => {
    server
      .close()
      .catch((error: unknown) => console.error("[flow-gateway-mcp] Close failed:", error))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await server.connect(transport);
  console.error(`[flow-gateway-mcp] Server started on stdio transport, gateway ${config.apiBaseUrl}`);
}

main().catch((error: unknown) => {
  console.error("[flow-gateway-mcp] Failed to start MCP server:", error);
  process.exit(1);
});
