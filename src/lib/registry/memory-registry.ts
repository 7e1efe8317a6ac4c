import _ from "lodash";

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type { CredentialRegistry } from "./registry.ts";
import type {
  GenerationTask,
  GenerationTaskPatch,
  MediaType,
  NewGenerationTask,
  NewProject,
  NewRequestLog,
  NewToken,
  Project,
  ProxyPoolItem,
  ProxyPoolItemPatch,
  RequestLog,
  Token,
  TokenPatch,
  TokenStats,
} from "./types.ts";

const MAX_REQUEST_LOGS = 1000;

export interface RegistrySnapshot {
  sequences: Record<"token" | "project" | "task" | "proxy" | "log", number>;
  tokens: Token[];
  stats: TokenStats[];
  projects: Project[];
  tasks: GenerationTask[];
  proxies: ProxyPoolItem[];
  logs: RequestLog[];
  settings: Record<string, unknown>;
}

export function emptyStats(tokenId: number): TokenStats {
  return {
    tokenId,
    imageCount: 0,
    videoCount: 0,
    successCount: 0,
    errorCount: 0,
    lastSuccessAt: null,
    lastErrorAt: null,
    todayImageCount: 0,
    todayVideoCount: 0,
    todayErrorCount: 0,
    todayDate: null,
    consecutiveErrorCount: 0,
  };
}

/**
 * Registry held in process memory. Every method body runs without an await
 * between its read and its write, so each call is atomic for the event loop.
 */
export class MemoryRegistry implements CredentialRegistry {
  protected sequences: RegistrySnapshot["sequences"] = { token: 0, project: 0, task: 0, proxy: 0, log: 0 };
  protected readonly tokens = new Map<number, Token>();
  protected readonly stats = new Map<number, TokenStats>();
  protected readonly projects = new Map<number, Project>();
  protected readonly tasks = new Map<string, GenerationTask>();
  protected readonly proxies = new Map<number, ProxyPoolItem>();
  protected logs: RequestLog[] = [];
  protected settings: Record<string, unknown> = {};

  /** Called after every mutation. */
  protected async afterMutation(): Promise<void> {}

  async addToken(input: NewToken): Promise<Token> {
    if (this.findToken((item) => item.sessionCredential === input.sessionCredential)) {
      throw new APIException(EX.API_TOKEN_CONFLICT, "A token with this session credential already exists");
    }
    if (input.email && this.findToken((item) => item.email === input.email)) {
      throw new APIException(EX.API_TOKEN_CONFLICT, `A token for ${input.email} already exists`);
    }
    const token: Token = {
      id: ++this.sequences.token,
      sessionCredential: input.sessionCredential,
      accessCredential: input.accessCredential ?? null,
      accessExpiresAt: input.accessExpiresAt ?? null,
      email: input.email,
      name: input.name ?? "",
      remark: input.remark ?? null,
      isActive: input.isActive ?? true,
      imageEnabled: input.imageEnabled ?? true,
      videoEnabled: input.videoEnabled ?? true,
      imageConcurrency: input.imageConcurrency ?? -1,
      videoConcurrency: input.videoConcurrency ?? -1,
      currentProjectId: input.currentProjectId ?? null,
      currentProjectName: input.currentProjectName ?? null,
      credits: input.credits ?? 0,
      paygateTier: input.paygateTier ?? null,
      banReason: input.banReason ?? null,
      bannedAt: input.bannedAt ?? null,
      useCount: input.useCount ?? 0,
      lastUsedAt: input.lastUsedAt ?? null,
      createdAt: Date.now(),
    };
    this.tokens.set(token.id, token);
    this.stats.set(token.id, emptyStats(token.id));
    await this.afterMutation();
    return { ...token };
  }

  async getToken(id: number): Promise<Token | null> {
    const token = this.tokens.get(id);
    return token ? { ...token } : null;
  }

  async getTokenBySessionCredential(sessionCredential: string): Promise<Token | null> {
    const token = this.findToken((item) => item.sessionCredential === sessionCredential);
    return token ? { ...token } : null;
  }

  async getTokenByEmail(email: string): Promise<Token | null> {
    const token = this.findToken((item) => item.email === email);
    return token ? { ...token } : null;
  }

  async listTokens(): Promise<Token[]> {
    return Array.from(this.tokens.values()).map((item) => ({ ...item }));
  }

  async listActiveTokens(): Promise<Token[]> {
    return Array.from(this.tokens.values())
      .filter((item) => item.isActive)
      .map((item) => ({ ...item }));
  }

  async updateToken(id: number, patch: TokenPatch): Promise<Token | null> {
    const token = this.tokens.get(id);
    if (!token) return null;
    const defined = _.omitBy(patch, _.isUndefined);
    Object.assign(token, defined);
    await this.afterMutation();
    return { ...token };
  }

  async deleteToken(id: number): Promise<boolean> {
    if (!this.tokens.delete(id)) return false;
    this.stats.delete(id);
    for (const [key, project] of this.projects.entries()) {
      if (project.tokenId === id) this.projects.delete(key);
    }
    await this.afterMutation();
    return true;
  }

  async getTokenStats(tokenId: number): Promise<TokenStats | null> {
    const stats = this.stats.get(tokenId);
    return stats ? { ...stats } : null;
  }

  async incrementUsageCount(tokenId: number, mediaType: MediaType, today: string, at: number): Promise<TokenStats> {
    const stats = this.requireStats(tokenId);
    const rolledOver = stats.todayDate !== today;
    if (rolledOver) this.resetToday(stats, today);
    if (mediaType === "image") {
      stats.imageCount++;
      stats.todayImageCount++;
    } else {
      stats.videoCount++;
      stats.todayVideoCount++;
    }
    stats.successCount++;
    stats.lastSuccessAt = at;
    await this.afterMutation();
    return { ...stats };
  }

  async incrementErrorCount(tokenId: number, today: string, at: number): Promise<TokenStats> {
    const stats = this.requireStats(tokenId);
    if (stats.todayDate !== today) this.resetToday(stats, today);
    stats.errorCount++;
    stats.consecutiveErrorCount++;
    stats.todayErrorCount++;
    stats.lastErrorAt = at;
    await this.afterMutation();
    return { ...stats };
  }

  async resetConsecutiveErrors(tokenId: number): Promise<TokenStats> {
    const stats = this.requireStats(tokenId);
    stats.consecutiveErrorCount = 0;
    await this.afterMutation();
    return { ...stats };
  }

  async addProject(input: NewProject): Promise<Project> {
    const project: Project = {
      id: ++this.sequences.project,
      projectId: input.projectId,
      tokenId: input.tokenId,
      projectName: input.projectName,
      toolName: input.toolName ?? "PINHOLE",
      isActive: input.isActive ?? true,
      createdAt: Date.now(),
    };
    this.projects.set(project.id, project);
    await this.afterMutation();
    return { ...project };
  }

  async getProjectsByToken(tokenId: number): Promise<Project[]> {
    return Array.from(this.projects.values())
      .filter((item) => item.tokenId === tokenId)
      .map((item) => ({ ...item }));
  }

  async deleteProject(projectId: string): Promise<boolean> {
    let removed = false;
    for (const [key, project] of this.projects.entries()) {
      if (project.projectId === projectId) {
        this.projects.delete(key);
        removed = true;
      }
    }
    if (removed) await this.afterMutation();
    return removed;
  }

  async createTask(input: NewGenerationTask): Promise<GenerationTask> {
    const task: GenerationTask = {
      id: ++this.sequences.task,
      taskId: input.taskId,
      tokenId: input.tokenId,
      model: input.model,
      prompt: input.prompt,
      status: input.status ?? "processing",
      progress: input.progress ?? 0,
      resultUrls: null,
      errorMessage: null,
      sceneId: input.sceneId ?? null,
      createdAt: Date.now(),
      completedAt: null,
    };
    this.tasks.set(task.taskId, task);
    await this.afterMutation();
    return { ...task };
  }

  async getTask(taskId: string): Promise<GenerationTask | null> {
    const task = this.tasks.get(taskId);
    return task ? { ...task, resultUrls: task.resultUrls ? [...task.resultUrls] : null } : null;
  }

  async updateTask(taskId: string, patch: GenerationTaskPatch): Promise<GenerationTask | null> {
    const task = this.tasks.get(taskId);
    if (!task) return null;
    Object.assign(task, _.omitBy(patch, _.isUndefined));
    await this.afterMutation();
    return { ...task };
  }

  async addProxy(proxyUrl: string, name: string | null = null): Promise<ProxyPoolItem> {
    const item: ProxyPoolItem = {
      id: ++this.sequences.proxy,
      proxyUrl,
      name,
      enabled: true,
      successCount: 0,
      failCount: 0,
      lastUsedAt: null,
      createdAt: Date.now(),
    };
    this.proxies.set(item.id, item);
    await this.afterMutation();
    return { ...item };
  }

  async listProxies(): Promise<ProxyPoolItem[]> {
    return _.sortBy(Array.from(this.proxies.values()), "id").map((item) => ({ ...item }));
  }

  async listEnabledProxies(): Promise<ProxyPoolItem[]> {
    return (await this.listProxies()).filter((item) => item.enabled);
  }

  async updateProxy(id: number, patch: ProxyPoolItemPatch): Promise<ProxyPoolItem | null> {
    const item = this.proxies.get(id);
    if (!item) return null;
    Object.assign(item, _.omitBy(patch, _.isUndefined));
    await this.afterMutation();
    return { ...item };
  }

  async deleteProxy(id: number): Promise<boolean> {
    if (!this.proxies.delete(id)) return false;
    await this.afterMutation();
    return true;
  }

  async recordProxyUsage(id: number, success: boolean, at: number): Promise<void> {
    const item = this.proxies.get(id);
    if (!item) return;
    if (success) item.successCount++;
    else item.failCount++;
    item.lastUsedAt = at;
    await this.afterMutation();
  }

  async addRequestLog(input: NewRequestLog): Promise<RequestLog> {
    const log: RequestLog = { ...input, id: ++this.sequences.log, createdAt: Date.now() };
    this.logs.push(log);
    if (this.logs.length > MAX_REQUEST_LOGS) this.logs = this.logs.slice(-MAX_REQUEST_LOGS);
    await this.afterMutation();
    return { ...log };
  }

  async listRequestLogs(limit = 100, tokenId?: number): Promise<RequestLog[]> {
    const items = _.isUndefined(tokenId) ? this.logs : this.logs.filter((item) => item.tokenId === tokenId);
    return items.slice(-limit).reverse().map((item) => ({ ...item }));
  }

  async getSettings(): Promise<Record<string, unknown>> {
    return _.cloneDeep(this.settings);
  }

  async saveSettings(settings: Record<string, unknown>): Promise<void> {
    this.settings = _.cloneDeep(settings);
    await this.afterMutation();
  }

  protected snapshot(): RegistrySnapshot {
    return {
      sequences: { ...this.sequences },
      tokens: Array.from(this.tokens.values()),
      stats: Array.from(this.stats.values()),
      projects: Array.from(this.projects.values()),
      tasks: Array.from(this.tasks.values()),
      proxies: Array.from(this.proxies.values()),
      logs: this.logs,
      settings: this.settings,
    };
  }

  protected restore(snapshot: RegistrySnapshot) {
    this.sequences = { ...snapshot.sequences };
    this.tokens.clear();
    this.stats.clear();
    this.projects.clear();
    this.tasks.clear();
    this.proxies.clear();
    for (const item of snapshot.tokens) this.tokens.set(item.id, item);
    for (const item of snapshot.stats) this.stats.set(item.tokenId, item);
    for (const item of snapshot.projects) this.projects.set(item.id, item);
    for (const item of snapshot.tasks) this.tasks.set(item.taskId, item);
    for (const item of snapshot.proxies) this.proxies.set(item.id, item);
    this.logs = [...snapshot.logs];
    this.settings = _.cloneDeep(snapshot.settings);
    for (const token of this.tokens.values()) {
      if (!this.stats.has(token.id)) this.stats.set(token.id, emptyStats(token.id));
    }
  }

  private findToken(predicate: (token: Token) => boolean): Token | undefined {
    for (const token of this.tokens.values()) {
      if (predicate(token)) return token;
    }
    return undefined;
  }

  private requireStats(tokenId: number): TokenStats {
    let stats = this.stats.get(tokenId);
    if (!stats) {
      if (!this.tokens.has(tokenId)) {
        throw new APIException(EX.API_NOT_FOUND, `Token ${tokenId} not found`);
      }
      stats = emptyStats(tokenId);
      this.stats.set(tokenId, stats);
    }
    return stats;
  }

  private resetToday(stats: TokenStats, today: string) {
    stats.todayDate = today;
    stats.todayImageCount = 0;
    stats.todayVideoCount = 0;
    stats.todayErrorCount = 0;
  }
}
