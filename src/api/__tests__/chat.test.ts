import { describe, expect, it } from "vitest";

import EX from "@/api/consts/exceptions.ts";
import {
  buildCompletion,
  buildStreamChunk,
  chatRequestSchema,
  createCompletion,
  createCompletionStream,
  extractPrompt,
  formatResult,
  loadImage,
  toGenerationRequest,
} from "@/api/controllers/chat.ts";
import { ConfigStore } from "@/lib/config.ts";
import { MemoryRegistry } from "@/lib/registry/memory-registry.ts";
import { Runtime } from "@/lib/runtime.ts";
import { FakeUpstream, NOW, noSleep } from "@/__tests__/fakes.ts";

const IMAGE_URL = "https://cdn.example.com/generated/image-1.jpg";
const PIXEL = `data:image/png;base64,${Buffer.from("pixel").toString("base64")}`;

function createRuntime() {
  const registry = new MemoryRegistry();
  const upstream = new FakeUpstream();
  const runtime = new Runtime({
    config: ConfigStore.fromObject({ cache: { enabled: false } }),
    registry,
    upstream,
    sleep: noSleep,
    now: () => NOW,
  });
  return { runtime, registry, upstream };
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  let text = "";
  for await (const chunk of stream) text += chunk.toString();
  return text;
}

function dataLines(text: string): string[] {
  return text
    .split("\n\n")
    .filter((event) => event.startsWith("data: "))
    .map((event) => event.slice("data: ".length));
}

describe("extractPrompt", () => {
  it("reads plain string content of the last user message", () => {
    const { messages } = chatRequestSchema.parse({
      model: "m",
      messages: [
        { role: "user", content: "first" },
        { role: "assistant", content: "reply" },
        { role: "user", content: "  second  " },
      ],
    });
    expect(extractPrompt(messages)).toEqual({ prompt: "second", imageRefs: [] });
  });

  it("joins text parts and collects image urls in either shape", () => {
    const { messages } = chatRequestSchema.parse({
      model: "m",
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: "a cat" },
            { type: "image_url", image_url: { url: "https://img.example.com/a.png" } },
            { type: "text", text: "in a hat" },
            { type: "image_url", image_url: PIXEL },
          ],
        },
      ],
    });
    expect(extractPrompt(messages)).toEqual({
      prompt: "a cat\nin a hat",
      imageRefs: ["https://img.example.com/a.png", PIXEL],
    });
  });

  it("needs a user message", () => {
    const { messages } = chatRequestSchema.parse({ model: "m", messages: [{ role: "system", content: "x" }] });
    expect(() => extractPrompt(messages)).toThrow("messages must contain a user message");
  });
});

describe("toGenerationRequest", () => {
  it("decodes data url images", async () => {
    const body = chatRequestSchema.parse({
      model: "veo_2_0_i2v_landscape",
      messages: [{ role: "user", content: [{ type: "text", text: "move" }, { type: "image_url", image_url: PIXEL }] }],
    });
    const request = await toGenerationRequest(body);
    expect(request.prompt).toBe("move");
    expect(request.images.map((image) => image.toString())).toEqual(["pixel"]);
  });

  it("rejects an empty prompt", async () => {
    const body = chatRequestSchema.parse({ model: "m", messages: [{ role: "user", content: "   " }] });
    await expect(toGenerationRequest(body)).rejects.toMatchObject({
      errcode: EX.API_REQUEST_PARAMS_INVALID[0],
      errmsg: "prompt must not be empty",
    });
  });

  it("rejects image references that are not urls", async () => {
    await expect(loadImage("/etc/hosts")).rejects.toMatchObject({
      errmsg: "image_url must be a data: URL or an http(s) URL",
    });
  });
});

describe("response shapes", () => {
  it("renders media as markdown or html", () => {
    expect(formatResult(IMAGE_URL, "image", false)).toBe(`![Generated Image](${IMAGE_URL})`);
    expect(formatResult("https://v.example.com/1.mp4", "video", true)).toBe(
      "<video src='https://v.example.com/1.mp4' controls style='max-width:100%'></video>"
    );
    expect(formatResult("https://v.example.com/1.mp4", "video", false)).toBe(
      "```html\n<video src='https://v.example.com/1.mp4' controls></video>\n```"
    );
  });

  it("puts progress in reasoning_content and the result in content", () => {
    expect(buildStreamChunk("m", "working", false, 100)).toEqual({
      id: "chatcmpl-100",
      object: "chat.completion.chunk",
      created: 100,
      model: "m",
      choices: [{ index: 0, delta: { reasoning_content: "working" }, finish_reason: null }],
    });
    expect(buildStreamChunk("m", "done", true, 100).choices[0]).toEqual({
      index: 0,
      delta: { content: "done" },
      finish_reason: "stop",
    });
  });

  it("builds a non-streaming completion", () => {
    expect(buildCompletion("m", "hello", 7)).toEqual({
      id: "chatcmpl-7",
      object: "chat.completion",
      created: 7,
      model: "m",
      choices: [{ index: 0, message: { role: "assistant", content: "hello" }, finish_reason: "stop" }],
    });
  });
});

describe("completions", () => {
  it("returns the image as one completion", async () => {
    const { runtime, registry } = createRuntime();
    await registry.addToken({ sessionCredential: "s1", email: "a@example.com", accessCredential: "access-1" });
    const completion = await createCompletion(runtime.orchestrator, {
      model: "gemini-2.5-flash-image-landscape",
      prompt: "a cat",
      images: [],
    });
    expect(completion.choices[0].message.content).toBe(`![Generated Image](${IMAGE_URL})`);
  });

  it("throws the generation error", async () => {
    const { runtime } = createRuntime();
    await expect(
      createCompletion(runtime.orchestrator, { model: "gemini-2.5-flash-image-landscape", prompt: "a cat", images: [] })
    ).rejects.toMatchObject({ errcode: EX.API_POOL_EXHAUSTED[0] });
  });

  it("streams progress, the result and the terminator", async () => {
    const { runtime, registry } = createRuntime();
    await registry.addToken({ sessionCredential: "s1", email: "a@example.com", accessCredential: "access-1" });
    const text = await readAll(
      createCompletionStream(runtime.orchestrator, {
        model: "gemini-2.5-flash-image-landscape",
        prompt: "a cat",
        images: [],
      })
    );
    const lines = dataLines(text);
    expect(lines[lines.length - 1]).toBe("[DONE]");
    const chunks = lines.slice(0, -1).map((line) => JSON.parse(line));
    expect(chunks.map((chunk) => chunk.choices[0].delta)).toEqual([
      { reasoning_content: "✨ Image generation started\n" },
      { reasoning_content: "Initialising generation environment...\n" },
      { reasoning_content: "Generating image...\n" },
      { reasoning_content: "Cache disabled, returning the source url...\n" },
      { content: `![Generated Image](${IMAGE_URL})` },
    ]);
    expect(chunks[chunks.length - 1].choices[0].finish_reason).toBe("stop");
  });

  it("streams an error envelope when generation fails", async () => {
    const { runtime } = createRuntime();
    const lines = dataLines(
      await readAll(
        createCompletionStream(runtime.orchestrator, {
          model: "gemini-2.5-flash-image-landscape",
          prompt: "a cat",
          images: [],
        })
      )
    );
    expect(lines).toHaveLength(4);
    expect(JSON.parse(lines[1]).choices[0].delta).toEqual({
      reasoning_content: "❌ No token available for image generation\n",
    });
    expect(JSON.parse(lines[2])).toEqual({
      error: {
        message: "No token available for image generation",
        type: "invalid_request_error",
        code: "generation_failed",
      },
    });
    expect(lines[3]).toBe("[DONE]");
  });
});
