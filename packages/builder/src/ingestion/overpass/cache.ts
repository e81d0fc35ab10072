/**
 * Disk cache for Overpass API responses.
 *
 * Responses are keyed by the requested bbox (rounded to ~1m) and the query
 * timeout, so repeated route requests over the same area skip the network.
 *
 * Cache lives at ~/.calm-routes/overpass-cache/ unless overridden.
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { BoundingBox } from "@calm-routes/types";
import type { OverpassJson } from "overpass-ts";

/** Default cache directory */
export function defaultCacheDir(): string {
  return join(homedir(), ".calm-routes", "overpass-cache");
}

/**
 * Deterministic cache key for a bbox + timeout.
 *
 * Coordinates are rounded to 5 decimals so float noise in callers does not
 * miss the cache. The key is a 16-char hex hash, filesystem-safe.
 */
export function bboxCacheKey(bbox: BoundingBox, timeout: number): string {
  const round = (v: number) => v.toFixed(5);
  const input = `${round(bbox.minLat)}|${round(bbox.minLng)}|${round(bbox.maxLat)}|${round(bbox.maxLng)}|${timeout}`;
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

/**
 * Get the cache file path for a bbox.
 */
export function getCachePath(bbox: BoundingBox, timeout: number, cacheDir?: string): string {
  return join(cacheDir ?? defaultCacheDir(), `${bboxCacheKey(bbox, timeout)}.json`);
}

/**
 * Read a cached Overpass response from disk.
 *
 * @returns Parsed OverpassJson on hit, or null on miss/corruption.
 */
export function readCachedResponse(
  bbox: BoundingBox,
  timeout: number,
  cacheDir?: string,
): OverpassJson | null {
  const filepath = getCachePath(bbox, timeout, cacheDir);
  if (!existsSync(filepath)) return null;

  try {
    if (statSync(filepath).size === 0) return null;
    return JSON.parse(readFileSync(filepath, "utf-8")) as OverpassJson;
  } catch (err) {
    console.warn(`[overpass] Ignoring unreadable cache entry ${filepath}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Write an Overpass response to the disk cache.
 */
export function writeCachedResponse(
  bbox: BoundingBox,
  timeout: number,
  response: OverpassJson,
  cacheDir?: string,
): void {
  const dir = cacheDir ?? defaultCacheDir();
  mkdirSync(dir, { recursive: true });
  writeFileSync(getCachePath(bbox, timeout, dir), JSON.stringify(response));
}
