import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ToolAnnotations } from "@modelcontextprotocol/sdk/types.js";
import { z, type ZodRawShape } from "zod";

import { toToolResult, withToolError } from "./result.ts";

interface RegisterToolOptions<Shape extends ZodRawShape, Result> {
  title: string;
  description: string;
  inputSchema: Shape;
  annotations?: ToolAnnotations;
  /** Short text shown ahead of the JSON result. */
  summarize?: (result: Result) => string;
}

/** Registers a tool whose errors come back as `[CODE] message`. */
export function registerSafeTool<Shape extends ZodRawShape, Result>(
  server: McpServer,
  name: string,
  options: RegisterToolOptions<Shape, Result>,
  handler: (args: z.objectOutputType<Shape, z.ZodTypeAny, "strip">) => Promise<Result>
): void {
  const { title, description, inputSchema, annotations, summarize } = options;
  const schema = z.object(inputSchema);
  const shape: ZodRawShape = inputSchema;

  server.registerTool(
    name,
    {
      title,
      description,
      inputSchema: shape,
      ...(annotations ? { annotations } : {}),
    },
    async (args: unknown) =>
      withToolError(async () => {
        const result = await handler(schema.parse(args));
        return toToolResult(result, summarize?.(result));
      })
  );
}
