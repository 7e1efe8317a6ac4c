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

/**
 * Durable store for the gateway's records. Implementations own the rows; the
 * returned objects are copies, callers re-read after a mutation.
 */
export interface CredentialRegistry {
  addToken(input: NewToken): Promise<Token>;
  getToken(id: number): Promise<Token | null>;
  getTokenBySessionCredential(sessionCredential: string): Promise<Token | null>;
  getTokenByEmail(email: string): Promise<Token | null>;
  listTokens(): Promise<Token[]>;
  listActiveTokens(): Promise<Token[]>;
  updateToken(id: number, patch: TokenPatch): Promise<Token | null>;
  deleteToken(id: number): Promise<boolean>;

  getTokenStats(tokenId: number): Promise<TokenStats | null>;
  /**
   * Lifetime + today counters for one successful generation. Today counters
   * restart at 1 when `today` differs from the stored date.
   */
  incrementUsageCount(tokenId: number, mediaType: MediaType, today: string, at: number): Promise<TokenStats>;
  /** Lifetime, consecutive and today error counters, with the same rollover rule. */
  incrementErrorCount(tokenId: number, today: string, at: number): Promise<TokenStats>;
  resetConsecutiveErrors(tokenId: number): Promise<TokenStats>;

  addProject(input: NewProject): Promise<Project>;
  getProjectsByToken(tokenId: number): Promise<Project[]>;
  deleteProject(projectId: string): Promise<boolean>;

  createTask(input: NewGenerationTask): Promise<GenerationTask>;
  getTask(taskId: string): Promise<GenerationTask | null>;
  updateTask(taskId: string, patch: GenerationTaskPatch): Promise<GenerationTask | null>;

  addProxy(proxyUrl: string, name?: string | null): Promise<ProxyPoolItem>;
  listProxies(): Promise<ProxyPoolItem[]>;
  listEnabledProxies(): Promise<ProxyPoolItem[]>;
  updateProxy(id: number, patch: ProxyPoolItemPatch): Promise<ProxyPoolItem | null>;
  deleteProxy(id: number): Promise<boolean>;
  recordProxyUsage(id: number, success: boolean, at: number): Promise<void>;

  addRequestLog(input: NewRequestLog): Promise<RequestLog>;
  listRequestLogs(limit?: number, tokenId?: number): Promise<RequestLog[]>;

  /** Admin config overrides, layered over the file and environment config. */
  getSettings(): Promise<Record<string, unknown>>;
  saveSettings(settings: Record<string, unknown>): Promise<void>;
}
