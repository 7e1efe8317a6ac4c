import type { CompletionResult } from "../client.ts";
import { assertConfirmed } from "../guards.ts";
import { DEFAULT_IMAGE_MODEL, generateImageInputSchema } from "../schemas.ts";
import type { ToolDeps } from "../types.ts";
import { registerSafeTool } from "../tool-factory.ts";

export function describeCompletion(result: CompletionResult): string {
  return result.url ? `${result.model}: ${result.url}` : `${result.model}: no media url in the reply`;
}

export function registerGenerateImageTool({ server, config, client }: ToolDeps): void {
  registerSafeTool(
    server,
    "generate_image",
    {
      title: "Generate Image",
      description: "Generate an image from a prompt and optional reference images",
      inputSchema: generateImageInputSchema,
      summarize: describeCompletion,
    },
    async (args) => {
      assertConfirmed(config, "generate", args.confirm);

      return client.createCompletion({
        model: args.model || DEFAULT_IMAGE_MODEL,
        prompt: args.prompt,
        images: args.images,
      });
    }
  );
}
