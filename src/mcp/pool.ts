import _ from "lodash";
import { z } from "zod";

const statsSchema = z.object({
  errorCount: z.number(),
  consecutiveErrorCount: z.number(),
  todayImageCount: z.number(),
  todayVideoCount: z.number(),
  todayErrorCount: z.number(),
});

/** A token as `/token` returns it, credentials already masked by the gateway. */
export const tokenRowSchema = z.object({
  id: z.number().int(),
  email: z.string(),
  name: z.string().default(""),
  isActive: z.boolean(),
  banReason: z.enum(["429_rate_limit", "error_threshold"]).nullable().default(null),
  imageEnabled: z.boolean(),
  videoEnabled: z.boolean(),
  credits: z.number().default(0),
  useCount: z.number().default(0),
  lastUsedAt: z.number().nullable().default(null),
  stats: statsSchema.nullable().default(null),
});

export type TokenRow = z.infer<typeof tokenRowSchema>;

export const taskSchema = z.object({
  taskId: z.string(),
  tokenId: z.number().int(),
  model: z.string(),
  status: z.enum(["processing", "completed", "failed"]),
  progress: z.number(),
  resultUrls: z.array(z.string()).nullable(),
  errorMessage: z.string().nullable(),
  createdAt: z.number(),
  completedAt: z.number().nullable(),
});

export type TaskView = z.infer<typeof taskSchema>;

export interface PoolSummary {
  total: number;
  active: number;
  /** Inactive tokens by cause; `manual` has no ban reason. */
  inactive: { rateLimited: number; errorThreshold: number; manual: number };
  imageReady: number;
  videoReady: number;
  activeCredits: number;
}

export function summarizePool(tokens: TokenRow[]): PoolSummary {
  const [active, inactive] = _.partition(tokens, (token) => token.isActive);
  return {
    total: tokens.length,
    active: active.length,
    inactive: {
      rateLimited: inactive.filter((token) => token.banReason === "429_rate_limit").length,
      errorThreshold: inactive.filter((token) => token.banReason === "error_threshold").length,
      manual: inactive.filter((token) => token.banReason === null).length,
    },
    imageReady: active.filter((token) => token.imageEnabled).length,
    videoReady: active.filter((token) => token.videoEnabled).length,
    activeCredits: _.sumBy(active, (token) => token.credits),
  };
}

export function describeToken(token: TokenRow): string {
  const state = token.isActive ? "active" : token.banReason ? `banned (${token.banReason})` : "disabled";
  const errors = token.stats
    ? `, errors ${token.stats.consecutiveErrorCount} in a row / ${token.stats.errorCount} total`
    : "";
  return `#${token.id} ${token.email}: ${state}, credits ${token.credits}, used ${token.useCount}x${errors}`;
}

export function describeTask(task: TaskView): string {
  switch (task.status) {
    case "completed":
      return `${task.taskId} completed: ${(task.resultUrls ?? []).join(", ")}`;
    case "failed":
      return `${task.taskId} failed: ${task.errorMessage ?? "no details"}`;
    default:
      return `${task.taskId} processing (${task.progress}%)`;
  }
}
