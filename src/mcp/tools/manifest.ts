import type { ToolDeps } from "../types.ts";
import { registerGenerateImageTool } from "./generate-image.ts";
import { registerGenerateVideoTool } from "./generate-video.ts";
import { registerHealthCheckTool } from "./health-check.ts";
import { registerListModelsTool } from "./list-models.ts";
import { registerGetTaskTool } from "./tasks.ts";
import { registerListTokensTool, registerRefreshTokenTool, registerSetTokenStatusTool } from "./tokens.ts";

export interface McpToolManifestItem {
  id: string;
  /** Pool administration goes through the admin routes and can be left out. */
  admin: boolean;
  register: (deps: ToolDeps) => void;
}

export const MCP_TOOL_MANIFEST: McpToolManifestItem[] = [
  { id: "health_check", admin: false, register: registerHealthCheckTool },
  { id: "list_models", admin: false, register: registerListModelsTool },
  { id: "generate_image", admin: false, register: registerGenerateImageTool },
  { id: "generate_video", admin: false, register: registerGenerateVideoTool },
  { id: "get_task", admin: false, register: registerGetTaskTool },
  { id: "list_tokens", admin: true, register: registerListTokensTool },
  { id: "set_token_status", admin: true, register: registerSetTokenStatusTool },
  { id: "refresh_token", admin: true, register: registerRefreshTokenTool },
];
