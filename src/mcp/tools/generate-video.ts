import { assertConfirmed } from "../guards.ts";
import { DEFAULT_VIDEO_MODEL, generateVideoInputSchema } from "../schemas.ts";
import type { ToolDeps } from "../types.ts";
import { registerSafeTool } from "../tool-factory.ts";
import { describeCompletion } from "./generate-image.ts";

export function registerGenerateVideoTool({ server, config, client }: ToolDeps): void {
  registerSafeTool(
    server,
    "generate_video",
    {
      title: "Generate Video",
      description: "Generate a video; image-to-video models take one or two frames, reference models any number",
      inputSchema: generateVideoInputSchema,
      summarize: describeCompletion,
    },
    async (args) => {
      assertConfirmed(config, "generate", args.confirm);

      return client.createCompletion({
        model: args.model || DEFAULT_VIDEO_MODEL,
        prompt: args.prompt,
        images: args.images,
      });
    }
  );
}
