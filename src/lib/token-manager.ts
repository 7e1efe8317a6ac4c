import { format as dateFormat } from "date-fns";

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type { ConfigStore } from "@/lib/config.ts";
import logger from "@/lib/logger.ts";
import util from "@/lib/util.ts";
import type { CredentialRegistry } from "@/lib/registry/registry.ts";
import type { MediaType, Token, TokenPatch, TokenStats } from "@/lib/registry/types.ts";

export interface AccessGrant {
  accessCredential: string;
  /** Epoch millis, null when the upstream gave no expiry. */
  expiresAt: number | null;
  email: string | null;
}

export interface AccountBalance {
  credits: number;
  paygateTier: string | null;
}

/** The part of the upstream client the token lifecycle needs. */
export interface AccountUpstream {
  exchangeSessionForAccess(sessionCredential: string): Promise<AccessGrant>;
  createProject(sessionCredential: string, title: string): Promise<string>;
  deleteProject(sessionCredential: string, projectId: string): Promise<void>;
  getCredits(accessCredential: string): Promise<AccountBalance>;
}

/** Obtains a fresh session credential for an account whose session stopped working. */
export interface SessionRenewer {
  renew(token: Token): Promise<string | null>;
}

export interface TokenManagerOptions {
  registry: CredentialRegistry;
  upstream: AccountUpstream;
  config: ConfigStore;
  renewer?: SessionRenewer | null;
  now?: () => number;
}

export interface AddTokenInput {
  sessionCredential: string;
  name?: string;
  remark?: string | null;
  projectId?: string | null;
  projectName?: string | null;
  imageEnabled?: boolean;
  videoEnabled?: boolean;
  imageConcurrency?: number;
  videoConcurrency?: number;
}

export type UpdateTokenInput = Partial<
  Pick<
    Token,
    | "sessionCredential"
    | "name"
    | "remark"
    | "imageEnabled"
    | "videoEnabled"
    | "imageConcurrency"
    | "videoConcurrency"
    | "currentProjectId"
    | "currentProjectName"
  >
>;

export interface TokenWithStats extends Token {
  stats: TokenStats | null;
}

export class TokenManager {
  private readonly registry: CredentialRegistry;
  private readonly upstream: AccountUpstream;
  private readonly config: ConfigStore;
  private readonly renewer: SessionRenewer | null;
  private readonly now: () => number;

  constructor(options: TokenManagerOptions) {
    this.registry = options.registry;
    this.upstream = options.upstream;
    this.config = options.config;
    this.renewer = options.renewer ?? null;
    this.now = options.now ?? Date.now;
  }

  today(): string {
    return dateFormat(new Date(this.now()), "yyyy-MM-dd");
  }

  async getToken(tokenId: number): Promise<Token> {
    const token = await this.registry.getToken(tokenId);
    if (!token) throw new APIException(EX.API_NOT_FOUND, `Token ${tokenId} not found`);
    return token;
  }

  async listTokens(): Promise<TokenWithStats[]> {
    const tokens = await this.registry.listTokens();
    return Promise.all(
      tokens.map(async (token) => ({ ...token, stats: await this.registry.getTokenStats(token.id) }))
    );
  }

  async listActiveTokens(): Promise<Token[]> {
    return this.registry.listActiveTokens();
  }

  /**
   * True when the token holds a usable access credential, exchanging the
   * session credential first when it is missing or about to expire.
   */
  async isAccessCredentialValid(tokenId: number): Promise<boolean> {
    const token = await this.registry.getToken(tokenId);
    if (!token) return false;
    if (token.accessCredential && !this.isNearExpiry(token)) return true;
    return this.refreshAccessInternal(token);
  }

  async refreshAccess(tokenId: number): Promise<Token> {
    const token = await this.getToken(tokenId);
    const refreshed = await this.refreshAccessInternal(token);
    if (!refreshed) throw new APIException(EX.API_CREDENTIAL_INVALID, `Token ${tokenId} access refresh failed`);
    return this.getToken(tokenId);
  }

  async recordSuccess(tokenId: number): Promise<void> {
    await this.registry.resetConsecutiveErrors(tokenId);
  }

  async recordError(tokenId: number): Promise<TokenStats> {
    const stats = await this.registry.incrementErrorCount(tokenId, this.today(), this.now());
    const threshold = this.config.get().tokens.errorBanThreshold;
    const token = await this.registry.getToken(tokenId);
    if (token?.isActive && stats.consecutiveErrorCount >= threshold) {
      await this.registry.updateToken(tokenId, { isActive: false, banReason: "error_threshold", bannedAt: this.now() });
      logger.warn(`Token ${tokenId} disabled after ${stats.consecutiveErrorCount} consecutive errors`);
    }
    return stats;
  }

  async banForRateLimit(tokenId: number): Promise<void> {
    await this.registry.updateToken(tokenId, { isActive: false, banReason: "429_rate_limit", bannedAt: this.now() });
    logger.warn(`Token ${tokenId} banned: upstream rate limit`);
  }

  async enable(tokenId: number): Promise<Token> {
    await this.getToken(tokenId);
    await this.registry.resetConsecutiveErrors(tokenId);
    await this.registry.updateToken(tokenId, { isActive: true, banReason: null, bannedAt: null });
    return this.getToken(tokenId);
  }

  async disable(tokenId: number): Promise<Token> {
    await this.getToken(tokenId);
    await this.registry.updateToken(tokenId, { isActive: false });
    return this.getToken(tokenId);
  }

  async recordUsage(tokenId: number, mediaType: MediaType): Promise<void> {
    const token = await this.getToken(tokenId);
    const at = this.now();
    await this.registry.updateToken(tokenId, { useCount: token.useCount + 1, lastUsedAt: at });
    await this.registry.incrementUsageCount(tokenId, mediaType, this.today(), at);
  }

  /** Current project binding of the token, created upstream on first use. */
  async ensureProject(tokenId: number): Promise<string> {
    const token = await this.getToken(tokenId);
    if (token.currentProjectId) return token.currentProjectId;
    const projectName = this.buildProjectName(token);
    const projectId = await this.upstream.createProject(token.sessionCredential, projectName);
    await this.registry.addProject({ projectId, tokenId, projectName });
    await this.registry.updateToken(tokenId, { currentProjectId: projectId, currentProjectName: projectName });
    logger.info(`Token ${tokenId} bound to new project ${projectId}`);
    return projectId;
  }

  async addToken(input: AddTokenInput): Promise<Token> {
    const sessionCredential = input.sessionCredential.trim();
    if (!sessionCredential) throw new APIException(EX.API_REQUEST_PARAMS_INVALID, "sessionCredential is required");
    if (await this.registry.getTokenBySessionCredential(sessionCredential)) {
      throw new APIException(EX.API_TOKEN_CONFLICT, "A token with this session credential already exists");
    }
    const grant = await this.exchangeOrThrow(sessionCredential);
    const email = grant.email ?? "";
    if (email && (await this.registry.getTokenByEmail(email))) {
      throw new APIException(EX.API_TOKEN_CONFLICT, `A token for ${email} already exists`);
    }
    const balance = await this.fetchBalance(grant.accessCredential);
    const token = await this.registry.addToken({
      sessionCredential,
      accessCredential: grant.accessCredential,
      accessExpiresAt: grant.expiresAt,
      email,
      name: input.name ?? "",
      remark: input.remark ?? null,
      imageEnabled: input.imageEnabled,
      videoEnabled: input.videoEnabled,
      imageConcurrency: input.imageConcurrency,
      videoConcurrency: input.videoConcurrency,
      credits: balance?.credits ?? 0,
      paygateTier: balance?.paygateTier ?? null,
    });
    if (input.projectId) {
      const projectName = input.projectName || this.buildProjectName(token);
      await this.registry.addProject({ projectId: input.projectId, tokenId: token.id, projectName });
      await this.registry.updateToken(token.id, { currentProjectId: input.projectId, currentProjectName: projectName });
    } else {
      await this.ensureProject(token.id);
    }
    logger.success(`Token ${token.id} added (${email || "unknown email"})`);
    return this.getToken(token.id);
  }

  async updateToken(tokenId: number, input: UpdateTokenInput): Promise<Token> {
    const token = await this.getToken(tokenId);
    const patch: TokenPatch = { ...input };
    if (input.sessionCredential && input.sessionCredential !== token.sessionCredential) {
      const grant = await this.exchangeOrThrow(input.sessionCredential);
      patch.accessCredential = grant.accessCredential;
      patch.accessExpiresAt = grant.expiresAt;
      if (grant.email) patch.email = grant.email;
    }
    await this.registry.updateToken(tokenId, patch);
    return this.getToken(tokenId);
  }

  /** With `deleteProjects` the token's projects are removed upstream first; failures there are logged. */
  async deleteToken(tokenId: number, options: { deleteProjects?: boolean } = {}): Promise<void> {
    const token = await this.getToken(tokenId);
    if (options.deleteProjects) {
      for (const project of await this.registry.getProjectsByToken(tokenId)) {
        try {
          await this.upstream.deleteProject(token.sessionCredential, project.projectId);
          await this.registry.deleteProject(project.projectId);
        } catch (err) {
          logger.warn(`Project ${project.projectId} of token ${tokenId} not deleted: ${util.errorMessage(err)}`);
        }
      }
    }
    if (!(await this.registry.deleteToken(tokenId))) {
      throw new APIException(EX.API_NOT_FOUND, `Token ${tokenId} not found`);
    }
    logger.info(`Token ${tokenId} deleted`);
  }

  async refreshCredits(tokenId: number): Promise<number> {
    if (!(await this.isAccessCredentialValid(tokenId))) {
      throw new APIException(EX.API_CREDENTIAL_INVALID, `Token ${tokenId} has no valid access credential`);
    }
    const token = await this.getToken(tokenId);
    if (!token.accessCredential) throw new APIException(EX.API_CREDENTIAL_INVALID);
    const balance = await this.upstream.getCredits(token.accessCredential);
    await this.registry.updateToken(tokenId, { credits: balance.credits, paygateTier: balance.paygateTier });
    return balance.credits;
  }

  private isNearExpiry(token: Token): boolean {
    if (token.accessExpiresAt === null) return false;
    const marginMs = this.config.get().tokens.accessRefreshMarginSeconds * 1000;
    return token.accessExpiresAt - this.now() <= marginMs;
  }

  private async refreshAccessInternal(token: Token): Promise<boolean> {
    if (await this.tryExchange(token.id, token.sessionCredential, token.email)) return true;
    if (this.config.get().tokens.credentialRecovery !== "renewer" || !this.renewer) return false;
    let renewed: string | null;
    try {
      renewed = await this.renewer.renew(token);
    } catch (err) {
      logger.warn(`Token ${token.id} session renewal failed: ${util.errorMessage(err)}`);
      return false;
    }
    if (!renewed) return false;
    await this.registry.updateToken(token.id, { sessionCredential: renewed });
    logger.info(`Token ${token.id} session credential renewed`);
    return this.tryExchange(token.id, renewed, token.email);
  }

  private async tryExchange(tokenId: number, sessionCredential: string, currentEmail: string): Promise<boolean> {
    try {
      const grant = await this.upstream.exchangeSessionForAccess(sessionCredential);
      const patch: TokenPatch = { accessCredential: grant.accessCredential, accessExpiresAt: grant.expiresAt };
      if (!currentEmail && grant.email) patch.email = grant.email;
      await this.registry.updateToken(tokenId, patch);
      logger.info(`Token ${tokenId} access credential refreshed`);
      return true;
    } catch (err) {
      logger.warn(`Token ${tokenId} access refresh failed: ${util.errorMessage(err)}`);
      return false;
    }
  }

  private async exchangeOrThrow(sessionCredential: string): Promise<AccessGrant> {
    try {
      return await this.upstream.exchangeSessionForAccess(sessionCredential);
    } catch (err) {
      throw new APIException(EX.API_CREDENTIAL_INVALID, `Session credential exchange failed: ${util.errorMessage(err)}`);
    }
  }

  private async fetchBalance(accessCredential: string): Promise<AccountBalance | null> {
    try {
      return await this.upstream.getCredits(accessCredential);
    } catch (err) {
      logger.warn(`Credit lookup failed: ${util.errorMessage(err)}`);
      return null;
    }
  }

  private buildProjectName(token: Token): string {
    const label = token.name || token.email || `token-${token.id}`;
    return `${label} ${dateFormat(new Date(this.now()), "yyyy-MM-dd HH:mm")}`;
  }
}
