import * as z from "zod";

import { confirmHint } from "./guards.ts";

export const DEFAULT_IMAGE_MODEL = "gemini-2.5-flash-image-landscape";
export const DEFAULT_VIDEO_MODEL = "veo_3_1_t2v_fast_landscape";

const mediaUrl = z.string().refine((value) => /^(https?:\/\/|data:)/i.test(value), "must be an http(s) or data: URL");

const tokenId = z.number().int().positive().describe("Token id as shown by list_tokens");

export const healthCheckInputSchema = {};

export const listModelsInputSchema = {
  type: z.enum(["image", "video"]).optional().describe("Only models of this media type"),
};

export const generateImageInputSchema = {
  prompt: z.string().min(1),
  model: z.string().optional().describe(`Image model id, default ${DEFAULT_IMAGE_MODEL}`),
  images: z.array(mediaUrl).max(10).optional().describe("Reference images"),
  confirm: z.string().optional().describe(confirmHint("generate")),
};

export const generateVideoInputSchema = {
  prompt: z.string().min(1),
  model: z.string().optional().describe(`Video model id, default ${DEFAULT_VIDEO_MODEL}`),
  images: z.array(mediaUrl).max(10).optional().describe("Start/end frames or reference images, depending on the model"),
  confirm: z.string().optional().describe(confirmHint("generate")),
};

export const listTokensInputSchema = {
  inactiveOnly: z.boolean().optional().describe("Only banned or disabled tokens"),
};

export const setTokenStatusInputSchema = {
  id: tokenId,
  active: z.boolean().describe("true re-enables and clears the ban, false disables"),
  confirm: z.string().optional().describe(confirmHint("pool")),
};

export const refreshTokenInputSchema = {
  id: tokenId,
};

export const getTaskInputSchema = {
  taskId: z.string().min(1).describe("Upstream operation name of a video task"),
};
