/**
 * Overpass API query construction and execution.
 *
 * Generates Overpass QL queries for walkable streets and fetches results
 * via the overpass-ts client.
 */

import type { BoundingBox } from "@calm-routes/types";
import { overpassJson } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";
import { WALKABLE_HIGHWAYS } from "../highways.js";
import { readCachedResponse, writeCachedResponse } from "./cache.js";

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Overpass API endpoint URL (for self-hosted instances) */
  endpoint?: string;
  /** Query timeout in seconds (default: 90) */
  timeout?: number;
  /** User-agent string */
  userAgent?: string;
  /** Bypass cache read (still writes to cache) */
  force?: boolean;
  /** Override the cache directory (default: ~/.calm-routes/overpass-cache/) */
  cacheDir?: string;
  /** Disable caching entirely (no read or write) */
  noCache?: boolean;
}

export const DEFAULT_OVERPASS_ENDPOINT = "https://overpass-api.de/api/interpreter";
const DEFAULT_TIMEOUT = 90;

/**
 * Build an Overpass QL query for walkable ways within a bbox.
 *
 * Uses `out body geom;` to get inline geometry on ways, avoiding
 * a two-pass approach.
 *
 * @param timeout - Query timeout in seconds
 */
export function buildOverpassQuery(bbox: BoundingBox, timeout: number = DEFAULT_TIMEOUT): string {
  // Overpass bbox format: (south, west, north, east)
  const bboxStr = `${bbox.minLat},${bbox.minLng},${bbox.maxLat},${bbox.maxLng}`;
  const highwayRegex = `^(${WALKABLE_HIGHWAYS.join("|")})$`;

  return `[out:json][timeout:${timeout}];
(
  way["highway"~"${highwayRegex}"](${bboxStr});
);
out body geom;`;
}

/**
 * Fetch walkable ways from the Overpass API for a bounding box.
 *
 * Cached on disk by bbox and timeout.
 */
export async function fetchOverpassData(
  bbox: BoundingBox,
  options?: OverpassOptions,
): Promise<OverpassJson> {
  const timeout = options?.timeout ?? DEFAULT_TIMEOUT;
  const useCache = !options?.noCache;

  if (useCache && !options?.force) {
    const cached = readCachedResponse(bbox, timeout, options?.cacheDir);
    if (cached) {
      console.log(`[overpass] Cache hit (${cached.elements.length} elements)`);
      return cached;
    }
  }

  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: options?.endpoint ?? DEFAULT_OVERPASS_ENDPOINT,
  };
  if (options?.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  const start = performance.now();
  const data = await overpassJson(buildOverpassQuery(bbox, timeout), overpassOpts);
  console.log(
    `[overpass] Fetched ${data.elements.length} elements in ${(performance.now() - start).toFixed(0)}ms`,
  );

  if (useCache) {
    writeCachedResponse(bbox, timeout, data, options?.cacheDir);
  }

  return data;
}
