export type ImageAspectRatio = "IMAGE_ASPECT_RATIO_LANDSCAPE" | "IMAGE_ASPECT_RATIO_PORTRAIT";
export type VideoAspectRatio = "VIDEO_ASPECT_RATIO_LANDSCAPE" | "VIDEO_ASPECT_RATIO_PORTRAIT";

/** t2v: text only, i2v: start (and end) frame, r2v: any number of reference images */
export type VideoKind = "t2v" | "i2v" | "r2v";

export interface ImageModelConfig {
  type: "image";
  modelName: string;
  aspectRatio: ImageAspectRatio;
}

export interface VideoModelConfig {
  type: "video";
  videoType: VideoKind;
  modelKey: string;
  aspectRatio: VideoAspectRatio;
  minImages: number;
  /** null = unbounded */
  maxImages: number | null;
}

export type ModelConfig = ImageModelConfig | VideoModelConfig;

const image = (modelName: string, aspectRatio: ImageAspectRatio): ImageModelConfig => ({
  type: "image",
  modelName,
  aspectRatio,
});

const IMAGE_LIMITS: Record<VideoKind, Pick<VideoModelConfig, "minImages" | "maxImages">> = {
  t2v: { minImages: 0, maxImages: 0 },
  i2v: { minImages: 1, maxImages: 2 },
  r2v: { minImages: 0, maxImages: null },
};

const video = (videoType: VideoKind, modelKey: string, aspectRatio: VideoAspectRatio): VideoModelConfig => ({
  type: "video",
  videoType,
  modelKey,
  aspectRatio,
  ...IMAGE_LIMITS[videoType],
});

export const MODEL_CONFIG: Record<string, ModelConfig> = {
  "gemini-2.5-flash-image-landscape": image("GEM_PIX", "IMAGE_ASPECT_RATIO_LANDSCAPE"),
  "gemini-2.5-flash-image-portrait": image("GEM_PIX", "IMAGE_ASPECT_RATIO_PORTRAIT"),
  "gemini-3.0-pro-image-landscape": image("GEM_PIX_2", "IMAGE_ASPECT_RATIO_LANDSCAPE"),
  "gemini-3.0-pro-image-portrait": image("GEM_PIX_2", "IMAGE_ASPECT_RATIO_PORTRAIT"),
  "imagen-4.0-generate-preview-landscape": image("IMAGEN_3_5", "IMAGE_ASPECT_RATIO_LANDSCAPE"),
  "imagen-4.0-generate-preview-portrait": image("IMAGEN_3_5", "IMAGE_ASPECT_RATIO_PORTRAIT"),

  veo_3_1_t2v_fast_portrait: video("t2v", "veo_3_1_t2v_fast_portrait", "VIDEO_ASPECT_RATIO_PORTRAIT"),
  veo_3_1_t2v_fast_landscape: video("t2v", "veo_3_1_t2v_fast", "VIDEO_ASPECT_RATIO_LANDSCAPE"),
  veo_2_1_fast_d_15_t2v_portrait: video("t2v", "veo_2_1_fast_d_15_t2v", "VIDEO_ASPECT_RATIO_PORTRAIT"),
  veo_2_1_fast_d_15_t2v_landscape: video("t2v", "veo_2_1_fast_d_15_t2v", "VIDEO_ASPECT_RATIO_LANDSCAPE"),
  veo_2_0_t2v_portrait: video("t2v", "veo_2_0_t2v", "VIDEO_ASPECT_RATIO_PORTRAIT"),
  veo_2_0_t2v_landscape: video("t2v", "veo_2_0_t2v", "VIDEO_ASPECT_RATIO_LANDSCAPE"),

  veo_3_1_i2v_s_fast_fl_portrait: video(
    "i2v",
    "veo_3_1_i2v_s_fast_portrait_fl_ultra_relaxed",
    "VIDEO_ASPECT_RATIO_PORTRAIT"
  ),
  veo_3_1_i2v_s_fast_fl_landscape: video(
    "i2v",
    "veo_3_1_i2v_s_fast_landscape_fl_ultra_relaxed",
    "VIDEO_ASPECT_RATIO_LANDSCAPE"
  ),
  veo_2_1_fast_d_15_i2v_portrait: video("i2v", "veo_2_1_fast_d_15_i2v", "VIDEO_ASPECT_RATIO_PORTRAIT"),
  veo_2_1_fast_d_15_i2v_landscape: video("i2v", "veo_2_1_fast_d_15_i2v", "VIDEO_ASPECT_RATIO_LANDSCAPE"),
  veo_2_0_i2v_portrait: video("i2v", "veo_2_0_i2v", "VIDEO_ASPECT_RATIO_PORTRAIT"),
  veo_2_0_i2v_landscape: video("i2v", "veo_2_0_i2v", "VIDEO_ASPECT_RATIO_LANDSCAPE"),

  veo_3_0_r2v_fast_portrait: video("r2v", "veo_3_0_r2v_fast", "VIDEO_ASPECT_RATIO_PORTRAIT"),
  veo_3_0_r2v_fast_landscape: video("r2v", "veo_3_0_r2v_fast", "VIDEO_ASPECT_RATIO_LANDSCAPE"),
};

export function getModelConfig(model: string): ModelConfig | null {
  return Object.prototype.hasOwnProperty.call(MODEL_CONFIG, model) ? MODEL_CONFIG[model] : null;
}

/** Uploads only accept image aspect ratios. */
export function toImageAspectRatio(aspectRatio: ImageAspectRatio | VideoAspectRatio): ImageAspectRatio {
  return aspectRatio === "VIDEO_ASPECT_RATIO_PORTRAIT" || aspectRatio === "IMAGE_ASPECT_RATIO_PORTRAIT"
    ? "IMAGE_ASPECT_RATIO_PORTRAIT"
    : "IMAGE_ASPECT_RATIO_LANDSCAPE";
}
