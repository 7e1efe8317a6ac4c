import { MODEL_CONFIG, type ModelConfig } from "@/api/consts/models.ts";

export type ModelItem = {
  id: string;
  object: "model";
  owned_by: "flow-gateway";
  model_type: "image" | "video";
  description: string;
  /** Reference images the model accepts, as "min-max" (max may be "any"). */
  images?: string;
};

const VIDEO_KIND_LABEL = {
  t2v: "text to video",
  i2v: "start/end frame to video",
  r2v: "reference images to video",
} as const;

function orientation(aspectRatio: string): string {
  return aspectRatio.endsWith("PORTRAIT") ? "portrait" : "landscape";
}

function describe(config: ModelConfig): string {
  if (config.type === "image") return `Image generation (${config.modelName}, ${orientation(config.aspectRatio)})`;
  return `Video generation, ${VIDEO_KIND_LABEL[config.videoType]} (${config.modelKey}, ${orientation(config.aspectRatio)})`;
}

export function toModelItem(id: string, config: ModelConfig): ModelItem {
  const item: ModelItem = {
    id,
    object: "model",
    owned_by: "flow-gateway",
    model_type: config.type,
    description: describe(config),
  };
  if (config.type === "video") item.images = `${config.minImages}-${config.maxImages ?? "any"}`;
  return item;
}

/** Every model id the gateway accepts, images first. */
export function listModels(): ModelItem[] {
  const items = Object.entries(MODEL_CONFIG).map(([id, config]) => toModelItem(id, config));
  return [...items.filter((item) => item.model_type === "image"), ...items.filter((item) => item.model_type === "video")];
}
