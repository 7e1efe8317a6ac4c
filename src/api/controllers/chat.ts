import { PassThrough } from "stream";

import axios from "axios";
import { z } from "zod";

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type { GenerationOrchestrator, GenerationRequest } from "@/api/controllers/generation.ts";
import logger from "@/lib/logger.ts";
import type { MediaType } from "@/lib/registry/types.ts";
import { errorEnvelope } from "@/lib/response/FailureBody.ts";
import util from "@/lib/util.ts";

const MAX_IMAGE_BYTES = 20 * 1024 * 1024;

const contentPartSchema = z.union([
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({
    type: z.literal("image_url"),
    image_url: z.union([z.string(), z.object({ url: z.string() })]),
  }),
]);

const messageSchema = z.object({
  role: z.string(),
  content: z.union([z.string(), z.array(contentPartSchema)]).nullish(),
});

export const chatRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(messageSchema).min(1),
  stream: z.boolean().optional().default(false),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export interface ParsedPrompt {
  prompt: string;
  imageRefs: string[];
}

/** The last user message supplies the prompt text and reference images. */
export function extractPrompt(messages: ChatRequest["messages"]): ParsedPrompt {
  const lastUser = [...messages].reverse().find((message) => message.role === "user");
  if (!lastUser || !lastUser.content) {
    throw new APIException(EX.API_REQUEST_PARAMS_INVALID, "messages must contain a user message");
  }
  if (typeof lastUser.content === "string") return { prompt: lastUser.content.trim(), imageRefs: [] };
  const texts: string[] = [];
  const imageRefs: string[] = [];
  for (const part of lastUser.content) {
    if (part.type === "text") texts.push(part.text);
    else imageRefs.push(typeof part.image_url === "string" ? part.image_url : part.image_url.url);
  }
  return { prompt: texts.join("\n").trim(), imageRefs };
}

export async function loadImage(ref: string): Promise<Buffer> {
  if (util.isBase64DataUrl(ref)) {
    const data = Buffer.from(util.extractBase64Data(ref), "base64");
    if (data.length === 0) throw new APIException(EX.API_REQUEST_PARAMS_INVALID, "Empty image data url");
    return data;
  }
  if (util.isHttpUrl(ref)) {
    try {
      const response = await axios.get<ArrayBuffer>(ref, {
        responseType: "arraybuffer",
        timeout: 30_000,
        maxContentLength: MAX_IMAGE_BYTES,
      });
      return Buffer.from(response.data);
    } catch (err) {
      throw new APIException(EX.API_REQUEST_PARAMS_INVALID, `Failed to download image ${ref}: ${util.errorMessage(err)}`);
    }
  }
  throw new APIException(EX.API_REQUEST_PARAMS_INVALID, "image_url must be a data: URL or an http(s) URL");
}

export async function toGenerationRequest(body: ChatRequest): Promise<GenerationRequest> {
  const { prompt, imageRefs } = extractPrompt(body.messages);
  if (!prompt) throw new APIException(EX.API_REQUEST_PARAMS_INVALID, "prompt must not be empty");
  const images: Buffer[] = [];
  for (const ref of imageRefs) images.push(await loadImage(ref));
  return { model: body.model, prompt, images };
}

export function formatResult(url: string, mediaType: MediaType, stream: boolean): string {
  if (mediaType === "image") return `![Generated Image](${url})`;
  return stream
    ? `<video src='${url}' controls style='max-width:100%'></video>`
    : `\`\`\`html\n<video src='${url}' controls></video>\n\`\`\``;
}

export function buildStreamChunk(model: string, text: string, final = false, created = util.unixTimestamp()) {
  return {
    id: `chatcmpl-${created}`,
    object: "chat.completion.chunk",
    created,
    model,
    choices: [
      {
        index: 0,
        delta: final ? { content: text } : { reasoning_content: text },
        finish_reason: final ? "stop" : null,
      },
    ],
  };
}

export function buildCompletion(model: string, content: string, created = util.unixTimestamp()) {
  return {
    id: `chatcmpl-${created}`,
    object: "chat.completion",
    created,
    model,
    choices: [
      {
        index: 0,
        message: { role: "assistant", content },
        finish_reason: "stop",
      },
    ],
  };
}

const sse = (payload: unknown) => `data: ${JSON.stringify(payload)}\n\n`;

/** Runs the whole generation and answers with one completion object. */
export async function createCompletion(orchestrator: GenerationOrchestrator, request: GenerationRequest) {
  for await (const event of orchestrator.generate(request)) {
    if (event.type === "error") throw event.error;
    if (event.type === "result") return buildCompletion(request.model, formatResult(event.url, event.mediaType, false));
  }
  throw new APIException(EX.API_GENERATION_FAILED, "Generation finished without a result");
}

/**
 * Streams progress as reasoning chunks, then the result chunk and `[DONE]`.
 * Errors become a `❌` progress line followed by the error envelope.
 */
export function createCompletionStream(orchestrator: GenerationOrchestrator, request: GenerationRequest): PassThrough {
  const stream = new PassThrough();
  const pump = async () => {
    for await (const event of orchestrator.generate(request)) {
      if (stream.destroyed) return;
      if (event.type === "progress") {
        stream.write(sse(buildStreamChunk(request.model, event.text)));
      } else if (event.type === "result") {
        stream.write(sse(buildStreamChunk(request.model, formatResult(event.url, event.mediaType, true), true)));
      } else {
        stream.write(sse(buildStreamChunk(request.model, `❌ ${event.error.message}\n`)));
        stream.write(sse(errorEnvelope(event.error).body));
      }
    }
  };
  void pump()
    .catch((err: unknown) => {
      logger.error(`Completion stream failed: ${util.errorMessage(err)}`);
      if (!stream.destroyed) {
        stream.write(sse(errorEnvelope(new APIException(EX.API_GENERATION_FAILED, util.errorMessage(err))).body));
      }
    })
    .finally(() => {
      if (!stream.destroyed) stream.end("data: [DONE]\n\n");
    });
  return stream;
}
