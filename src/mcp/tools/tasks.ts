import { describeTask } from "../pool.ts";
import { getTaskInputSchema } from "../schemas.ts";
import type { ToolDeps } from "../types.ts";
import { registerSafeTool } from "../tool-factory.ts";

export function registerGetTaskTool({ server, client }: ToolDeps): void {
  registerSafeTool(
    server,
    "get_task",
    {
      title: "Get Video Task",
      description: "Look up a video task's status, progress and result urls",
      inputSchema: getTaskInputSchema,
      annotations: { readOnlyHint: true },
      summarize: describeTask,
    },
    async ({ taskId }) => client.getTask(taskId)
  );
}
