import { z } from "zod";

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type { ImageAspectRatio, VideoAspectRatio } from "@/api/consts/models.ts";
import { toImageAspectRatio } from "@/api/consts/models.ts";
import type { UpstreamRequester } from "@/api/controllers/core.ts";
import type { ConfigStore } from "@/lib/config.ts";
import type { ProofTokenProvider } from "@/lib/proof-token.ts";
import type { AccessGrant, AccountBalance, AccountUpstream } from "@/lib/token-manager.ts";
import util from "@/lib/util.ts";

export interface ImageSubmission {
  accessCredential: string;
  projectId: string;
  prompt: string;
  modelName: string;
  aspectRatio: ImageAspectRatio;
  /** Uploaded reference media ids. */
  mediaIds: string[];
}

export interface VideoSubmission {
  accessCredential: string;
  projectId: string;
  prompt: string;
  modelKey: string;
  aspectRatio: VideoAspectRatio;
  paygateTier: string;
}

export interface VideoOperation {
  name: string;
  sceneId: string | null;
  status: string | null;
}

export interface VideoStatus {
  name: string;
  status: string;
  videoUrl: string | null;
  error: { code: string | number | null; message: string } | null;
}

/** Everything the orchestrator asks of the generation API. */
export interface MediaUpstream extends AccountUpstream {
  uploadImage(accessCredential: string, image: Buffer, aspectRatio: ImageAspectRatio | VideoAspectRatio): Promise<string>;
  submitImageGeneration(input: ImageSubmission): Promise<string[]>;
  submitVideoText(input: VideoSubmission): Promise<VideoOperation>;
  submitVideoStartEnd(input: VideoSubmission, startMediaId: string, endMediaId: string): Promise<VideoOperation>;
  submitVideoStartOnly(input: VideoSubmission, startMediaId: string): Promise<VideoOperation>;
  submitVideoReferences(input: VideoSubmission, mediaIds: string[]): Promise<VideoOperation>;
  pollVideoStatus(accessCredential: string, operations: VideoOperation[]): Promise<VideoStatus[]>;
}

const sessionSchema = z.object({
  access_token: z.string().min(1),
  expires: z.string().optional(),
  user: z.object({ email: z.string().optional() }).partial().optional(),
});

const createProjectSchema = z.object({
  result: z.object({
    data: z.object({
      json: z.object({ result: z.object({ projectId: z.string().min(1) }) }),
    }),
  }),
});

const creditsSchema = z.object({
  credits: z.coerce.number().default(0),
  userPaygateTier: z.string().optional(),
});

const uploadSchema = z.object({
  mediaGenerationId: z.object({ mediaGenerationId: z.string().min(1) }),
});

const imageResultSchema = z.object({
  media: z
    .array(
      z.object({
        image: z
          .object({ generatedImage: z.object({ fifeUrl: z.string().optional() }).partial().optional() })
          .partial()
          .optional(),
      })
    )
    .default([]),
});

const operationSchema = z.object({
  operation: z
    .object({
      name: z.string(),
      metadata: z.object({ video: z.object({ fifeUrl: z.string().optional() }).partial().optional() }).partial().optional(),
      error: z
        .object({ code: z.union([z.string(), z.number()]).optional(), message: z.string().optional() })
        .partial()
        .optional(),
    })
    .passthrough(),
  sceneId: z.string().optional(),
  status: z.string().optional(),
});

const operationsSchema = z.object({ operations: z.array(operationSchema).default([]) });

function parseUpstream<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new APIException(EX.API_UPSTREAM_FAILED, `Unexpected ${what} response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export function sessionId(now: number = Date.now()): string {
  return `;${now}`;
}

export function randomSeed(): number {
  return util.randomInt(1, 99999);
}

/** Client for the media generation API. */
export class FlowClient implements MediaUpstream {
  constructor(
    private readonly requester: UpstreamRequester,
    private readonly config: ConfigStore,
    private readonly proofTokens: ProofTokenProvider
  ) {}

  private get labsBaseUrl() {
    return this.config.get().upstream.labsBaseUrl;
  }

  private get apiBaseUrl() {
    return this.config.get().upstream.apiBaseUrl;
  }

  async exchangeSessionForAccess(sessionCredential: string): Promise<AccessGrant> {
    const data = await this.requester.request({
      method: "GET",
      url: `${this.labsBaseUrl}/auth/session`,
      auth: { session: sessionCredential },
    });
    const parsed = sessionSchema.safeParse(data);
    if (!parsed.success) {
      throw new APIException(EX.API_CREDENTIAL_INVALID, "Session exchange returned no access credential");
    }
    const expiresAt = parsed.data.expires ? Date.parse(parsed.data.expires) : NaN;
    return {
      accessCredential: parsed.data.access_token,
      expiresAt: Number.isFinite(expiresAt) ? expiresAt : null,
      email: parsed.data.user?.email ?? null,
    };
  }

  async createProject(sessionCredential: string, title: string): Promise<string> {
    const data = await this.requester.request({
      method: "POST",
      url: `${this.labsBaseUrl}/trpc/project.createProject`,
      auth: { session: sessionCredential },
      data: { json: { projectTitle: title, toolName: "PINHOLE" } },
    });
    return parseUpstream(createProjectSchema, data, "createProject").result.data.json.result.projectId;
  }

  async deleteProject(sessionCredential: string, projectId: string): Promise<void> {
    await this.requester.request({
      method: "POST",
      url: `${this.labsBaseUrl}/trpc/project.deleteProject`,
      auth: { session: sessionCredential },
      data: { json: { projectToDeleteId: projectId } },
    });
  }

  async getCredits(accessCredential: string): Promise<AccountBalance> {
    const data = await this.requester.request({
      method: "GET",
      url: `${this.apiBaseUrl}/credits`,
      auth: { access: accessCredential },
    });
    const parsed = parseUpstream(creditsSchema, data, "credits");
    return { credits: parsed.credits, paygateTier: parsed.userPaygateTier ?? null };
  }

  async uploadImage(
    accessCredential: string,
    image: Buffer,
    aspectRatio: ImageAspectRatio | VideoAspectRatio
  ): Promise<string> {
    const data = await this.requester.request({
      method: "POST",
      url: `${this.apiBaseUrl}:uploadUserImage`,
      auth: { access: accessCredential },
      data: {
        imageInput: {
          rawImageBytes: image.toString("base64"),
          mimeType: "image/jpeg",
          isUserUploaded: true,
          aspectRatio: toImageAspectRatio(aspectRatio),
        },
        clientContext: { sessionId: sessionId(), tool: "ASSET_MANAGER" },
      },
    });
    return parseUpstream(uploadSchema, data, "uploadUserImage").mediaGenerationId.mediaGenerationId;
  }

  async submitImageGeneration(input: ImageSubmission): Promise<string[]> {
    const recaptchaToken = (await this.proofTokens.getProofToken(input.projectId)) ?? "";
    const session = sessionId();
    const data = await this.requester.request({
      method: "POST",
      url: `${this.apiBaseUrl}/projects/${input.projectId}/flowMedia:batchGenerateImages`,
      auth: { access: input.accessCredential },
      data: {
        clientContext: { recaptchaToken, sessionId: session },
        requests: [
          {
            clientContext: { recaptchaToken, projectId: input.projectId, sessionId: session, tool: "PINHOLE" },
            seed: randomSeed(),
            imageModelName: input.modelName,
            imageAspectRatio: input.aspectRatio,
            prompt: input.prompt,
            imageInputs: input.mediaIds.map((name) => ({ name, imageInputType: "IMAGE_INPUT_TYPE_REFERENCE" })),
          },
        ],
      },
    });
    return parseUpstream(imageResultSchema, data, "batchGenerateImages")
      .media.map((item) => item.image?.generatedImage?.fifeUrl)
      .filter((url): url is string => typeof url === "string" && url.length > 0);
  }

  submitVideoText(input: VideoSubmission): Promise<VideoOperation> {
    return this.submitVideo("batchAsyncGenerateVideoText", input, {});
  }

  submitVideoStartEnd(input: VideoSubmission, startMediaId: string, endMediaId: string): Promise<VideoOperation> {
    return this.submitVideo("batchAsyncGenerateVideoStartAndEndImage", input, {
      startImage: { mediaId: startMediaId },
      endImage: { mediaId: endMediaId },
    });
  }

  submitVideoStartOnly(input: VideoSubmission, startMediaId: string): Promise<VideoOperation> {
    return this.submitVideo("batchAsyncGenerateVideoStartImage", input, { startImage: { mediaId: startMediaId } });
  }

  submitVideoReferences(input: VideoSubmission, mediaIds: string[]): Promise<VideoOperation> {
    return this.submitVideo("batchAsyncGenerateVideoReferenceImages", input, {
      referenceImages: mediaIds.map((mediaId) => ({ imageUsageType: "IMAGE_USAGE_TYPE_ASSET", mediaId })),
    });
  }

  async pollVideoStatus(accessCredential: string, operations: VideoOperation[]): Promise<VideoStatus[]> {
    const data = await this.requester.request({
      method: "POST",
      url: `${this.apiBaseUrl}/video:batchCheckAsyncVideoGenerationStatus`,
      auth: { access: accessCredential },
      data: {
        operations: operations.map((item) => ({
          operation: { name: item.name },
          sceneId: item.sceneId ?? undefined,
          status: item.status ?? undefined,
        })),
      },
    });
    return parseUpstream(operationsSchema, data, "batchCheckAsyncVideoGenerationStatus").operations.map((item) => ({
      name: item.operation.name,
      status: item.status ?? "",
      videoUrl: item.operation.metadata?.video?.fifeUrl ?? null,
      error: item.operation.error
        ? { code: item.operation.error.code ?? null, message: item.operation.error.message ?? "unknown error" }
        : null,
    }));
  }

  private async submitVideo(
    endpoint: string,
    input: VideoSubmission,
    extra: Record<string, unknown>
  ): Promise<VideoOperation> {
    const recaptchaToken = (await this.proofTokens.getProofToken(input.projectId)) ?? "";
    const data = await this.requester.request({
      method: "POST",
      url: `${this.apiBaseUrl}/video:${endpoint}`,
      auth: { access: input.accessCredential },
      data: {
        clientContext: {
          recaptchaToken,
          sessionId: sessionId(),
          projectId: input.projectId,
          tool: "PINHOLE",
          userPaygateTier: input.paygateTier,
        },
        requests: [
          {
            aspectRatio: input.aspectRatio,
            seed: randomSeed(),
            textInput: { prompt: input.prompt },
            videoModelKey: input.modelKey,
            ...extra,
            metadata: { sceneId: util.uuid() },
          },
        ],
      },
    });
    const first = parseUpstream(operationsSchema, data, endpoint).operations[0];
    if (!first) throw new APIException(EX.API_UPSTREAM_FAILED, `${endpoint} returned no operation`);
    return { name: first.operation.name, sceneId: first.sceneId ?? null, status: first.status ?? null };
  }
}
