import path from "path";

import fs from "fs-extra";
import { z } from "zod";

import logger from "@/lib/logger.ts";
import util from "@/lib/util.ts";
import { MemoryRegistry, type RegistrySnapshot } from "./memory-registry.ts";

const nullableNumber = z.number().nullable().default(null);
const nullableString = z.string().nullable().default(null);

const tokenSchema = z.object({
  id: z.number().int(),
  sessionCredential: z.string().min(1),
  accessCredential: nullableString,
  accessExpiresAt: nullableNumber,
  email: z.string(),
  name: z.string().default(""),
  remark: nullableString,
  isActive: z.boolean().default(true),
  imageEnabled: z.boolean().default(true),
  videoEnabled: z.boolean().default(true),
  imageConcurrency: z.number().int().default(-1),
  videoConcurrency: z.number().int().default(-1),
  currentProjectId: nullableString,
  currentProjectName: nullableString,
  credits: z.number().default(0),
  paygateTier: nullableString,
  banReason: z.enum(["429_rate_limit", "error_threshold"]).nullable().default(null),
  bannedAt: nullableNumber,
  useCount: z.number().int().default(0),
  lastUsedAt: nullableNumber,
  createdAt: z.number(),
});

const statsSchema = z.object({
  tokenId: z.number().int(),
  imageCount: z.number().int().default(0),
  videoCount: z.number().int().default(0),
  successCount: z.number().int().default(0),
  errorCount: z.number().int().default(0),
  lastSuccessAt: nullableNumber,
  lastErrorAt: nullableNumber,
  todayImageCount: z.number().int().default(0),
  todayVideoCount: z.number().int().default(0),
  todayErrorCount: z.number().int().default(0),
  todayDate: nullableString,
  consecutiveErrorCount: z.number().int().default(0),
});

const projectSchema = z.object({
  id: z.number().int(),
  projectId: z.string(),
  tokenId: z.number().int(),
  projectName: z.string(),
  toolName: z.string().default("PINHOLE"),
  isActive: z.boolean().default(true),
  createdAt: z.number(),
});

const taskSchema = z.object({
  id: z.number().int(),
  taskId: z.string(),
  tokenId: z.number().int(),
  model: z.string(),
  prompt: z.string(),
  status: z.enum(["processing", "completed", "failed"]),
  progress: z.number().default(0),
  resultUrls: z.array(z.string()).nullable().default(null),
  errorMessage: nullableString,
  sceneId: nullableString,
  createdAt: z.number(),
  completedAt: nullableNumber,
});

const proxySchema = z.object({
  id: z.number().int(),
  proxyUrl: z.string(),
  name: nullableString,
  enabled: z.boolean().default(true),
  successCount: z.number().int().default(0),
  failCount: z.number().int().default(0),
  lastUsedAt: nullableNumber,
  createdAt: z.number(),
});

const logSchema = z.object({
  id: z.number().int(),
  tokenId: z.number().int().nullable(),
  operation: z.string(),
  requestBody: nullableString,
  responseBody: nullableString,
  statusCode: z.number().int(),
  durationMs: z.number(),
  createdAt: z.number(),
});

const snapshotSchema = z.object({
  updatedAt: z.number().optional(),
  sequences: z
    .object({
      token: z.number().int().default(0),
      project: z.number().int().default(0),
      task: z.number().int().default(0),
      proxy: z.number().int().default(0),
      log: z.number().int().default(0),
    })
    .default({}),
  tokens: z.array(tokenSchema).default([]),
  stats: z.array(statsSchema).default([]),
  projects: z.array(projectSchema).default([]),
  tasks: z.array(taskSchema).default([]),
  proxies: z.array(proxySchema).default([]),
  logs: z.array(logSchema).default([]),
  settings: z.record(z.unknown()).default({}),
});

/**
 * Memory registry mirrored to a JSON file. Writes are chained so the file
 * always holds the state after the latest completed mutation.
 */
export class FileRegistry extends MemoryRegistry {
  private readonly filePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    super();
    this.filePath = path.resolve(filePath);
  }

  getFilePath() {
    return this.filePath;
  }

  async load(): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    if (!(await fs.pathExists(this.filePath))) {
      await this.persistToDisk();
      return;
    }
    let raw: unknown;
    try {
      raw = await fs.readJson(this.filePath);
    } catch (err) {
      await this.quarantine(`parse failed: ${util.errorMessage(err)}`);
      return;
    }
    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      await this.quarantine(`malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      return;
    }
    const { updatedAt: _updatedAt, ...snapshot } = parsed.data;
    this.restore(snapshot);
    logger.info(`Registry loaded: tokens=${snapshot.tokens.length}, proxies=${snapshot.proxies.length}, file=${this.filePath}`);
  }

  /** Moves an unreadable file aside so the first write cannot replace it. */
  private async quarantine(reason: string): Promise<void> {
    const target = `${this.filePath}.corrupt-${Date.now()}`;
    await fs.move(this.filePath, target);
    logger.error(`Registry file ${this.filePath} ${reason}; moved to ${target}, starting empty`);
  }

  /** Resolves once every queued write has reached the disk. */
  flush(): Promise<void> {
    return this.writeChain;
  }

  protected override afterMutation(): Promise<void> {
    return this.persistToDisk();
  }

  private persistToDisk(): Promise<void> {
    const payload: RegistrySnapshot & { updatedAt: number } = { updatedAt: Date.now(), ...this.snapshot() };
    const serialized = JSON.stringify(payload, null, 2);
    this.writeChain = this.writeChain
      .catch((err: unknown) => logger.error(`Registry write failed: ${util.errorMessage(err)}`))
      .then(async () => {
        await fs.ensureDir(path.dirname(this.filePath));
        await fs.writeFile(this.filePath, serialized);
      });
    return this.writeChain;
  }
}
