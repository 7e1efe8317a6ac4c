import type { ToolDeps } from "../types.ts";
import { MCP_TOOL_MANIFEST } from "./manifest.ts";

export function registerMcpTools(deps: ToolDeps): string[] {
  const tools = MCP_TOOL_MANIFEST.filter((item) => deps.config.adminTools || !item.admin);
  for (const item of tools) item.register(deps);
  return tools.map((item) => item.id);
}
