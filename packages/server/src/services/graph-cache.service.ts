/**
 * In-memory street graph cache.
 *
 * Keeps the most recently used graphs keyed by bbox (rounded to ~1m).
 * Concurrent requests for the same bbox share one build; a failed build is
 * not cached.
 */

import type { BoundingBox } from "@calm-routes/types";
import { fmtBbox, type StreetGraph } from "@calm-routes/engine";

import type { CacheStats } from "../models/responses.js";

export function graphCacheKey(bbox: BoundingBox): string {
  return [bbox.minLat, bbox.minLng, bbox.maxLat, bbox.maxLng].map((v) => v.toFixed(5)).join(",");
}

export class GraphCacheService {
  // Map iteration order doubles as recency order: oldest first
  private readonly entries = new Map<string, Promise<StreetGraph>>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxEntries = 16) {}

  /**
   * The cached graph for `bbox`, or the result of `build()` (cached on success).
   */
  async getOrBuild(
    bbox: BoundingBox,
    build: () => Promise<StreetGraph>,
  ): Promise<{ graph: StreetGraph; cached: boolean }> {
    const key = graphCacheKey(bbox);
    const existing = this.entries.get(key);
    if (existing) {
      this.hits++;
      this.entries.delete(key);
      this.entries.set(key, existing);
      console.log(`[cache] HIT ${fmtBbox(bbox)}`);
      return { graph: await existing, cached: true };
    }

    this.misses++;
    console.log(`[cache] MISS ${fmtBbox(bbox)}`);
    const pending = build();
    this.entries.set(key, pending);
    this.evict();

    try {
      return { graph: await pending, cached: false };
    } catch (err) {
      if (this.entries.get(key) === pending) this.entries.delete(key);
      throw err;
    }
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    if (count > 0) console.log(`[cache] Cleared ${count} graph(s)`);
    return count;
  }

  getStats(): CacheStats {
    return {
      entries: this.entries.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
    };
  }

  private evict(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
