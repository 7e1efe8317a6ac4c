import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import environment from "@/lib/environment.ts";
import type { McpConfig } from "./config.ts";
import { GatewayApiClient, type GatewayApi } from "./client.ts";
import { registerMcpTools } from "./tools/index.ts";

const INSTRUCTIONS = [
  "Tools for a media generation gateway that routes requests over a pool of upstream accounts.",
  "Start with health_check to see how many accounts can serve image and video work.",
  "generate_image and generate_video spend account credits; video tasks can be followed with get_task.",
  "list_tokens shows why an account left rotation; set_token_status brings it back.",
].join(" ");

export function createGatewayMcpServer(config: McpConfig, client: GatewayApi = new GatewayApiClient(config)): McpServer {
  const server = new McpServer(
    { name: "flow-gateway-mcp", version: environment.package.version || "1.0.0" },
    { instructions: INSTRUCTIONS }
  );
  const tools = registerMcpTools({ server, config, client });
  console.error(`[flow-gateway-mcp] Tools: ${tools.join(", ")}`);
  return server;
}
