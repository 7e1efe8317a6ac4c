import path from "path";

import fs from "fs-extra";

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type { ConfigStore } from "@/lib/config.ts";
import { DownloadError, defaultDownloaders, type Downloader } from "@/lib/downloaders.ts";
import logger from "@/lib/logger.ts";
import type { MediaType } from "@/lib/registry/types.ts";
import util from "@/lib/util.ts";

const CACHE_FILENAME = /^[a-f0-9]{32}\.(jpg|mp4)$/;

export function cacheFilename(url: string, mediaType: MediaType): string {
  return `${util.md5(url)}${mediaType === "video" ? ".mp4" : ".jpg"}`;
}

export interface FileCacheOptions {
  config: ConfigStore;
  downloaders?: Downloader[];
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Content-addressed store of generated media. The file mtime is the insert
 * time; anything older than the configured timeout is stale.
 */
export class FileCache {
  private readonly config: ConfigStore;
  private readonly downloaders: Downloader[];
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: FileCacheOptions) {
    this.config = options.config;
    this.downloaders = options.downloaders ?? defaultDownloaders(options.config.get().cache.downloadTimeoutMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? util.sleep;
  }

  get dir(): string {
    return path.resolve(this.config.get().cache.dir);
  }

  getTimeout(): number {
    return this.config.get().cache.timeoutSeconds;
  }

  async setTimeout(seconds: number): Promise<void> {
    await this.config.apply({ cache: { timeoutSeconds: seconds } });
    logger.info(`Cache timeout set to ${seconds}s`);
  }

  /** Local filename for `url`, downloading it unless a fresh copy exists. */
  async fetch(url: string, mediaType: MediaType): Promise<string> {
    const filename = cacheFilename(url, mediaType);
    const filePath = path.join(this.dir, filename);
    if (await this.isFresh(filePath)) {
      logger.debug(`Cache hit: ${filename}`);
      return filename;
    }
    const data = await this.runChain(url);
    await fs.ensureDir(this.dir);
    const partial = `${filePath}.part`;
    await fs.writeFile(partial, data);
    await fs.move(partial, filePath, { overwrite: true });
    logger.info(`File cached: ${filename} (${data.length} bytes)`);
    return filename;
  }

  /** Absolute path of a cached file, or null when `filename` is not one. */
  resolvePath(filename: string): string | null {
    if (!CACHE_FILENAME.test(filename)) return null;
    return path.join(this.dir, filename);
  }

  async cleanupExpired(): Promise<number> {
    if (!(await fs.pathExists(this.dir))) return 0;
    let removed = 0;
    for (const name of await fs.readdir(this.dir)) {
      const filePath = path.join(this.dir, name);
      try {
        const stat = await fs.stat(filePath);
        if (!stat.isFile()) continue;
        if (this.ageSeconds(stat.mtimeMs) > this.getTimeout()) {
          await fs.remove(filePath);
          removed++;
        }
      } catch (err) {
        logger.warn(`Cache cleanup skipped ${name}: ${util.errorMessage(err)}`);
      }
    }
    if (removed > 0) logger.info(`Cache cleanup removed ${removed} expired files`);
    return removed;
  }

  async clearAll(): Promise<number> {
    if (!(await fs.pathExists(this.dir))) return 0;
    let removed = 0;
    for (const name of await fs.readdir(this.dir)) {
      const filePath = path.join(this.dir, name);
      if ((await fs.stat(filePath)).isFile()) {
        await fs.remove(filePath);
        removed++;
      }
    }
    logger.info(`Cache cleared: ${removed} files`);
    return removed;
  }

  startCleanupTask() {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.cleanupExpired().catch((err: unknown) => logger.error(`Cache cleanup failed: ${util.errorMessage(err)}`));
    }, this.config.get().cache.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stopCleanupTask() {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  private ageSeconds(mtimeMs: number): number {
    return (this.now() - mtimeMs) / 1000;
  }

  private async isFresh(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile() && this.ageSeconds(stat.mtimeMs) < this.getTimeout();
    } catch {
      return false;
    }
  }

  /**
   * Tries each downloader in order. A 403 restarts the whole chain after a
   * pause, bounded by forbiddenRetries; other failures move to the next one.
   */
  private async runChain(url: string): Promise<Buffer> {
    const { forbiddenRetries, forbiddenBackoffMs } = this.config.get().cache;
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= forbiddenRetries; attempt++) {
      let forbidden = false;
      for (const downloader of this.downloaders) {
        try {
          return await downloader.download(url);
        } catch (err) {
          lastError = err;
          if (err instanceof DownloadError && err.forbidden) {
            forbidden = true;
            logger.warn(`Download forbidden via ${downloader.name} (attempt ${attempt}/${forbiddenRetries})`);
            break;
          }
          logger.warn(`Download via ${downloader.name} failed: ${util.errorMessage(err)}`);
        }
      }
      if (!forbidden) break;
      if (attempt < forbiddenRetries) await this.sleep(forbiddenBackoffMs);
    }
    throw new APIException(
      EX.API_CACHE_DOWNLOAD_FAILED,
      `Failed to cache file: ${lastError === null ? "no downloader available" : util.errorMessage(lastError)}`
    );
  }
}
