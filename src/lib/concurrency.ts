import type { MediaType } from "@/lib/registry/types.ts";

export interface ConcurrencySnapshot {
  tokenId: number;
  image: number;
  video: number;
}

/**
 * In-flight job counts per token and media type. Each method runs to
 * completion without awaiting, so check-and-increment cannot interleave.
 */
export class ConcurrencyController {
  private readonly inflight = new Map<number, Record<MediaType, number>>();

  /** `limit` of -1 means unlimited; the count is still kept for reporting. */
  acquire(tokenId: number, mediaType: MediaType, limit: number): boolean {
    const counts = this.countsFor(tokenId);
    if (limit >= 0 && counts[mediaType] >= limit) return false;
    counts[mediaType]++;
    return true;
  }

  release(tokenId: number, mediaType: MediaType) {
    const counts = this.inflight.get(tokenId);
    if (!counts) return;
    counts[mediaType] = Math.max(0, counts[mediaType] - 1);
    if (counts.image === 0 && counts.video === 0) this.inflight.delete(tokenId);
  }

  hasCapacity(tokenId: number, mediaType: MediaType, limit: number): boolean {
    if (limit < 0) return true;
    return this.count(tokenId, mediaType) < limit;
  }

  count(tokenId: number, mediaType: MediaType): number {
    return this.inflight.get(tokenId)?.[mediaType] ?? 0;
  }

  snapshot(): ConcurrencySnapshot[] {
    return Array.from(this.inflight.entries())
      .map(([tokenId, counts]) => ({ tokenId, image: counts.image, video: counts.video }))
      .sort((a, b) => a.tokenId - b.tokenId);
  }

  private countsFor(tokenId: number): Record<MediaType, number> {
    let counts = this.inflight.get(tokenId);
    if (!counts) {
      counts = { image: 0, video: 0 };
      this.inflight.set(tokenId, counts);
    }
    return counts;
  }
}
