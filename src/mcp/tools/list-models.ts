import type { ModelEntry } from "../client.ts";
import { listModelsInputSchema } from "../schemas.ts";
import type { ToolDeps } from "../types.ts";
import { registerSafeTool } from "../tool-factory.ts";

export function registerListModelsTool({ server, client }: ToolDeps): void {
  registerSafeTool(
    server,
    "list_models",
    {
      title: "List Models",
      description: "List the image and video models the gateway accepts",
      inputSchema: listModelsInputSchema,
      annotations: { readOnlyHint: true },
      summarize: (models: ModelEntry[]) => models.map((model) => `${model.id} (${model.type})`).join("\n"),
    },
    async ({ type }) => {
      const models = await client.listModels();
      return type ? models.filter((model) => model.type === type) : models;
    }
  );
}
