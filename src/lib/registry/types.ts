export type MediaType = "image" | "video";

export type TaskStatus = "processing" | "completed" | "failed";

export type BanReason = "429_rate_limit" | "error_threshold";

export interface Token {
  id: number;
  /** Long-lived session credential the access credential is exchanged from. */
  sessionCredential: string;
  accessCredential: string | null;
  /** Epoch millis. */
  accessExpiresAt: number | null;
  email: string;
  name: string;
  remark: string | null;
  isActive: boolean;
  imageEnabled: boolean;
  videoEnabled: boolean;
  /** -1 = unlimited */
  imageConcurrency: number;
  /** -1 = unlimited */
  videoConcurrency: number;
  currentProjectId: string | null;
  currentProjectName: string | null;
  credits: number;
  paygateTier: string | null;
  banReason: BanReason | null;
  bannedAt: number | null;
  useCount: number;
  lastUsedAt: number | null;
  createdAt: number;
}

export type NewToken = Pick<Token, "sessionCredential" | "email"> &
  Partial<Omit<Token, "id" | "sessionCredential" | "email" | "createdAt">>;

export type TokenPatch = Partial<Omit<Token, "id" | "createdAt">>;

export interface TokenStats {
  tokenId: number;
  imageCount: number;
  videoCount: number;
  successCount: number;
  /** Lifetime, never reset. */
  errorCount: number;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  todayImageCount: number;
  todayVideoCount: number;
  todayErrorCount: number;
  /** yyyy-MM-dd */
  todayDate: string | null;
  consecutiveErrorCount: number;
}

export interface Project {
  id: number;
  projectId: string;
  tokenId: number;
  projectName: string;
  toolName: string;
  isActive: boolean;
  createdAt: number;
}

export type NewProject = Pick<Project, "projectId" | "tokenId" | "projectName"> &
  Partial<Pick<Project, "toolName" | "isActive">>;

export interface GenerationTask {
  id: number;
  /** Upstream operation name. */
  taskId: string;
  tokenId: number;
  model: string;
  prompt: string;
  status: TaskStatus;
  progress: number;
  resultUrls: string[] | null;
  errorMessage: string | null;
  sceneId: string | null;
  createdAt: number;
  completedAt: number | null;
}

export type NewGenerationTask = Pick<GenerationTask, "taskId" | "tokenId" | "model" | "prompt"> &
  Partial<Pick<GenerationTask, "status" | "sceneId" | "progress">>;

export type GenerationTaskPatch = Partial<
  Pick<GenerationTask, "status" | "progress" | "resultUrls" | "errorMessage" | "completedAt">
>;

export interface ProxyPoolItem {
  id: number;
  proxyUrl: string;
  name: string | null;
  enabled: boolean;
  successCount: number;
  failCount: number;
  lastUsedAt: number | null;
  createdAt: number;
}

export type ProxyPoolItemPatch = Partial<Pick<ProxyPoolItem, "proxyUrl" | "name" | "enabled">>;

export interface RequestLog {
  id: number;
  tokenId: number | null;
  operation: string;
  requestBody: string | null;
  responseBody: string | null;
  statusCode: number;
  durationMs: number;
  createdAt: number;
}

export type NewRequestLog = Omit<RequestLog, "id" | "createdAt">;
