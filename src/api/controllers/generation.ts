import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import { getModelConfig, type ImageModelConfig, type VideoModelConfig } from "@/api/consts/models.ts";
import type { MediaUpstream, VideoOperation, VideoStatus, VideoSubmission } from "@/api/controllers/flow.ts";
import type { ConcurrencyController } from "@/lib/concurrency.ts";
import type { ConfigStore } from "@/lib/config.ts";
import type { FileCache } from "@/lib/file-cache.ts";
import { concurrencyLimit, type TokenSelector } from "@/lib/load-balancer.ts";
import logger from "@/lib/logger.ts";
import type { CredentialRegistry } from "@/lib/registry/registry.ts";
import type { MediaType, Token } from "@/lib/registry/types.ts";
import type { TokenManager } from "@/lib/token-manager.ts";
import util from "@/lib/util.ts";

const STATUS_SUCCESSFUL = "MEDIA_GENERATION_STATUS_SUCCESSFUL";
const STATUS_FAILED = "MEDIA_GENERATION_STATUS_FAILED";
const STATUS_ERROR_PREFIX = "MEDIA_GENERATION_STATUS_ERROR";

export type GenerationEvent =
  | { type: "progress"; text: string }
  | { type: "result"; mediaType: MediaType; url: string; upstreamUrl: string }
  | { type: "error"; error: APIException };

export interface GenerationRequest {
  model: string;
  prompt: string;
  images: Buffer[];
}

export interface GenerationDeps {
  config: ConfigStore;
  registry: CredentialRegistry;
  tokens: TokenManager;
  selector: TokenSelector;
  concurrency: ConcurrencyController;
  upstream: MediaUpstream;
  cache: FileCache;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export function toAPIException(error: unknown): APIException {
  if (error instanceof APIException) return error;
  return new APIException(EX.API_GENERATION_FAILED, util.errorMessage(error));
}

const progress = (text: string): GenerationEvent => ({ type: "progress", text });

/** Runs one generation request from model validation to the recorded outcome. */
export class GenerationOrchestrator {
  private readonly deps: GenerationDeps;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(deps: GenerationDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? util.sleep;
    this.now = deps.now ?? Date.now;
  }

  async *generate(request: GenerationRequest): AsyncGenerator<GenerationEvent> {
    const modelConfig = getModelConfig(request.model);
    if (!modelConfig) {
      yield { type: "error", error: new APIException(EX.API_VALIDATION_FAILED, `Unsupported model: ${request.model}`) };
      return;
    }
    let images = request.images;
    if (modelConfig.type === "video") {
      if (modelConfig.videoType === "t2v" && images.length > 0) {
        logger.warn(`Model ${request.model} is text-only, ignoring ${images.length} image(s)`);
        yield progress("⚠️ Text-to-video models do not accept images, generating from the prompt only\n");
        images = [];
      }
      const { minImages, maxImages } = modelConfig;
      if (images.length < minImages || (maxImages !== null && images.length > maxImages)) {
        yield {
          type: "error",
          error: new APIException(
            EX.API_VALIDATION_FAILED,
            `Model ${request.model} needs ${minImages}-${maxImages ?? "any"} images, got ${images.length}`
          ),
        };
        return;
      }
    }

    const mediaType: MediaType = modelConfig.type;
    const startTime = this.now();
    yield progress(`✨ ${mediaType === "video" ? "Video" : "Image"} generation started\n`);

    const selected = await this.deps.selector.select(mediaType, request.model);
    if (!selected) {
      const error = new APIException(EX.API_POOL_EXHAUSTED, `No token available for ${mediaType} generation`);
      await this.logRequest(null, mediaType, request, { error: error.message }, 503, startTime);
      yield { type: "error", error };
      return;
    }
    if (!this.deps.concurrency.acquire(selected.id, mediaType, concurrencyLimit(selected, mediaType))) {
      const error = new APIException(EX.API_ADMISSION_REJECTED, `Token ${selected.id} reached its ${mediaType} concurrency limit`);
      await this.logRequest(selected.id, mediaType, request, { error: error.message }, 429, startTime);
      yield { type: "error", error };
      return;
    }
    logger.info(`Generating ${request.model} with token ${selected.id}`);

    try {
      yield progress("Initialising generation environment...\n");
      if (!(await this.deps.tokens.isAccessCredentialValid(selected.id))) {
        throw new APIException(EX.API_CREDENTIAL_INVALID, `Token ${selected.id} access credential invalid or refresh failed`);
      }
      const token = await this.deps.tokens.getToken(selected.id);
      const projectId = await this.deps.tokens.ensureProject(token.id);

      let result: string;
      if (modelConfig.type === "image") {
        result = yield* this.runImage(token, projectId, modelConfig, request.prompt, images);
      } else {
        result = yield* this.runVideo(token, projectId, modelConfig, request, images);
      }
      const url = yield* this.materialise(result, mediaType);

      await this.deps.tokens.recordUsage(token.id, mediaType);
      await this.deps.tokens.recordSuccess(token.id);
      await this.logRequest(token.id, mediaType, request, { status: "success", url }, 200, startTime);
      logger.success(`Generation ${request.model} finished with token ${token.id}`);
      yield { type: "result", mediaType, url, upstreamUrl: result };
    } catch (err) {
      const error = toAPIException(err);
      logger.error(`Generation ${request.model} failed on token ${selected.id}: ${error.message}`);
      await this.recordFailure(selected.id, error);
      await this.logRequest(selected.id, mediaType, request, { error: error.message }, 500, startTime);
      yield { type: "error", error };
    } finally {
      this.deps.concurrency.release(selected.id, mediaType);
    }
  }

  private async *runImage(
    token: Token,
    projectId: string,
    modelConfig: ImageModelConfig,
    prompt: string,
    images: Buffer[]
  ): AsyncGenerator<GenerationEvent, string> {
    const accessCredential = this.requireAccess(token);
    const mediaIds: string[] = [];
    if (images.length > 0) yield progress(`Uploading ${images.length} reference image(s)...\n`);
    for (const [index, image] of images.entries()) {
      mediaIds.push(await this.deps.upstream.uploadImage(accessCredential, image, modelConfig.aspectRatio));
      yield progress(`Uploaded image ${index + 1}/${images.length}\n`);
    }
    yield progress("Generating image...\n");
    const urls = await this.deps.upstream.submitImageGeneration({
      accessCredential,
      projectId,
      prompt,
      modelName: modelConfig.modelName,
      aspectRatio: modelConfig.aspectRatio,
      mediaIds,
    });
    if (urls.length === 0) throw new APIException(EX.API_UPSTREAM_FAILED, "Upstream returned an empty image result");
    return urls[0];
  }

  private async *runVideo(
    token: Token,
    projectId: string,
    modelConfig: VideoModelConfig,
    request: GenerationRequest,
    images: Buffer[]
  ): AsyncGenerator<GenerationEvent, string> {
    const accessCredential = this.requireAccess(token);
    const submission: VideoSubmission = {
      accessCredential,
      projectId,
      prompt: request.prompt,
      modelKey: modelConfig.modelKey,
      aspectRatio: modelConfig.aspectRatio,
      paygateTier: token.paygateTier || this.deps.config.get().tokens.defaultPaygateTier,
    };
    const upload = (image: Buffer) => this.deps.upstream.uploadImage(accessCredential, image, modelConfig.aspectRatio);

    let operation: VideoOperation;
    if (modelConfig.videoType === "i2v" && images.length === 2) {
      yield progress("Uploading start and end frames...\n");
      const startId = await upload(images[0]);
      const endId = await upload(images[1]);
      yield progress("Submitting video generation task...\n");
      operation = await this.deps.upstream.submitVideoStartEnd(submission, startId, endId);
    } else if (modelConfig.videoType === "i2v") {
      yield progress("Uploading start frame...\n");
      const startId = await upload(images[0]);
      yield progress("Submitting video generation task...\n");
      operation = await this.deps.upstream.submitVideoStartOnly(submission, startId);
    } else if (modelConfig.videoType === "r2v" && images.length > 0) {
      yield progress(`Uploading ${images.length} reference image(s)...\n`);
      const mediaIds: string[] = [];
      for (const image of images) mediaIds.push(await upload(image));
      yield progress("Submitting video generation task...\n");
      operation = await this.deps.upstream.submitVideoReferences(submission, mediaIds);
    } else {
      yield progress("Submitting video generation task...\n");
      operation = await this.deps.upstream.submitVideoText(submission);
    }

    await this.deps.registry.createTask({
      taskId: operation.name,
      tokenId: token.id,
      model: request.model,
      prompt: request.prompt,
      status: "processing",
      sceneId: operation.sceneId,
    });
    yield progress("Video generating...\n");
    return yield* this.pollVideo(accessCredential, operation);
  }

  private async *pollVideo(accessCredential: string, operation: VideoOperation): AsyncGenerator<GenerationEvent, string> {
    const { pollIntervalMs, maxPollAttempts, progressEvery, markTaskFailedOnTimeout } = this.deps.config.get().generation;
    for (let attempt = 0; attempt < maxPollAttempts; attempt++) {
      await this.sleep(pollIntervalMs);
      const current = await this.queryStatus(accessCredential, operation, attempt, maxPollAttempts);
      if (!current) continue;

      if (attempt % progressEvery === 0) {
        yield progress(`Generation progress: ${Math.min(Math.floor((attempt / maxPollAttempts) * 100), 95)}%\n`);
      }

      if (current.status === STATUS_SUCCESSFUL) {
        if (!current.videoUrl) throw new APIException(EX.API_UPSTREAM_FAILED, "Upstream reported success without a video url");
        await this.deps.registry.updateTask(operation.name, {
          status: "completed",
          progress: 100,
          resultUrls: [current.videoUrl],
          completedAt: this.now(),
        });
        return current.videoUrl;
      }
      if (current.status === STATUS_FAILED || current.status.startsWith(STATUS_ERROR_PREFIX)) {
        const message = current.error?.message ?? current.status;
        const code = current.error?.code ?? "unknown";
        await this.deps.registry.updateTask(operation.name, {
          status: "failed",
          errorMessage: `${message} (code: ${code})`,
          completedAt: this.now(),
        });
        throw new APIException(EX.API_GENERATION_FAILED, `Video generation failed: ${message}, please retry`);
      }
    }
    if (markTaskFailedOnTimeout) {
      await this.deps.registry.updateTask(operation.name, {
        status: "failed",
        errorMessage: `timed out after ${maxPollAttempts} polls`,
        completedAt: this.now(),
      });
    }
    throw new APIException(EX.API_POLL_TIMEOUT, `Video generation timed out after ${maxPollAttempts} polls`);
  }

  /** Null when the query failed for a reason worth polling past. */
  private async queryStatus(
    accessCredential: string,
    operation: VideoOperation,
    attempt: number,
    maxPollAttempts: number
  ): Promise<VideoStatus | null> {
    try {
      const statuses = await this.deps.upstream.pollVideoStatus(accessCredential, [operation]);
      return statuses[0] ?? null;
    } catch (err) {
      const error = toAPIException(err);
      if (error.compare(EX.API_UPSTREAM_RATE_LIMITED)) throw error;
      logger.warn(`Poll ${attempt + 1}/${maxPollAttempts} for ${operation.name} failed: ${error.message}`);
      return null;
    }
  }

  /** Swaps the upstream URL for a local cached one when caching is on. */
  private async *materialise(upstreamUrl: string, mediaType: MediaType): AsyncGenerator<GenerationEvent, string> {
    const config = this.deps.config.get();
    const noun = mediaType === "video" ? "video" : "image";
    if (!config.cache.enabled) {
      yield progress("Cache disabled, returning the source url...\n");
      return upstreamUrl;
    }
    try {
      yield progress(`Caching ${noun}...\n`);
      const filename = await this.deps.cache.fetch(upstreamUrl, mediaType);
      yield progress(`✅ ${noun} cached\n`);
      return `${publicBaseUrl(config.service)}/tmp/${filename}`;
    } catch (err) {
      const message = util.errorMessage(err);
      logger.error(`Failed to cache ${noun}: ${message}`);
      yield progress(`⚠️ Cache failed: ${message}, returning the source url...\n`);
      return upstreamUrl;
    }
  }

  private requireAccess(token: Token): string {
    if (!token.accessCredential) {
      throw new APIException(EX.API_CREDENTIAL_INVALID, `Token ${token.id} has no access credential`);
    }
    return token.accessCredential;
  }

  private async recordFailure(tokenId: number, error: APIException) {
    try {
      if (error.compare(EX.API_UPSTREAM_RATE_LIMITED)) await this.deps.tokens.banForRateLimit(tokenId);
      else await this.deps.tokens.recordError(tokenId);
    } catch (err) {
      logger.error(`Failed to record outcome for token ${tokenId}: ${util.errorMessage(err)}`);
    }
  }

  private async logRequest(
    tokenId: number | null,
    mediaType: MediaType,
    request: GenerationRequest,
    response: Record<string, unknown>,
    statusCode: number,
    startTime: number
  ) {
    try {
      await this.deps.registry.addRequestLog({
        tokenId,
        operation: `generate_${mediaType}`,
        requestBody: JSON.stringify({
          model: request.model,
          prompt: request.prompt.slice(0, 100),
          hasImages: request.images.length > 0,
        }),
        responseBody: JSON.stringify(response),
        statusCode,
        durationMs: this.now() - startTime,
      });
    } catch (err) {
      logger.error(`Failed to write request log: ${util.errorMessage(err)}`);
    }
  }
}

export function publicBaseUrl(service: { baseUrl?: string; host: string; port: number }): string {
  if (service.baseUrl) return service.baseUrl.replace(/\/+$/, "");
  return `http://${service.host}:${service.port}`;
}
