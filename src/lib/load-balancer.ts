import _ from "lodash";

import type { ConcurrencyController } from "@/lib/concurrency.ts";
import logger from "@/lib/logger.ts";
import type { MediaType, Token } from "@/lib/registry/types.ts";
import type { TokenManager } from "@/lib/token-manager.ts";

export function concurrencyLimit(token: Token, mediaType: MediaType): number {
  return mediaType === "image" ? token.imageConcurrency : token.videoConcurrency;
}

function isFeatureEnabled(token: Token, mediaType: MediaType): boolean {
  return mediaType === "image" ? token.imageEnabled : token.videoEnabled;
}

/** Picks the longest-idle healthy token with a free slot for the media type. */
export class TokenSelector {
  constructor(
    private readonly tokens: TokenManager,
    private readonly concurrency: ConcurrencyController
  ) {}

  async select(mediaType: MediaType, model?: string): Promise<Token | null> {
    const active = await this.tokens.listActiveTokens();
    const candidates = _.sortBy(
      active.filter(
        (token) =>
          token.isActive &&
          isFeatureEnabled(token, mediaType) &&
          this.concurrency.hasCapacity(token.id, mediaType, concurrencyLimit(token, mediaType))
      ),
      [(token) => token.lastUsedAt ?? -Infinity, "id"]
    );
    for (const candidate of candidates) {
      if (await this.tokens.isAccessCredentialValid(candidate.id)) {
        logger.debug(`Selected token ${candidate.id} for ${mediaType}${model ? ` (${model})` : ""}`);
        return this.tokens.getToken(candidate.id);
      }
    }
    logger.warn(`No ${mediaType} token available: active=${active.length}, eligible=${candidates.length}`);
    return null;
  }
}
