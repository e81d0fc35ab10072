/**
 * Server configuration from environment variables.
 */

import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_OVERPASS_ENDPOINT, DEFAULT_ROUTE_BUFFER_KM } from "@calm-routes/builder";

export interface ServerConfig {
  port: number;
  overpassEndpoint: string;
  /** Overpass response cache directory (default: ~/.calm-routes/overpass-cache) */
  overpassCacheDir?: string;
  polygonDataDir: string;
  /** Places catalogue for the light layer; unset disables it */
  placesApiUrl?: string;
  placesApiKey?: string;
  /** Fill layers without file data with synthetic polygons */
  syntheticLayers: boolean;
  routeBboxBufferKm: number;
  /** Street graphs kept in memory */
  graphCacheSize: number;
}

type Env = Record<string, string | undefined>;

function positiveNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${key} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Nearest `data/polygons` above this module, else the one under the working directory */
export function defaultPolygonDataDir(): string {
  let dir = __dirname;
  for (;;) {
    const candidate = join(dir, "data", "polygons");
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return resolve("data/polygons");
    dir = parent;
  }
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: Math.trunc(positiveNumber(env, "PORT", 3000)),
    overpassEndpoint: nonEmpty(env["OVERPASS_ENDPOINT"]) ?? DEFAULT_OVERPASS_ENDPOINT,
    overpassCacheDir: nonEmpty(env["OVERPASS_CACHE_DIR"]),
    polygonDataDir: resolve(nonEmpty(env["POLYGON_DATA_DIR"]) ?? defaultPolygonDataDir()),
    placesApiUrl: nonEmpty(env["PLACES_API_URL"]),
    placesApiKey: nonEmpty(env["PLACES_API_KEY"]),
    syntheticLayers: env["SYNTHETIC_LAYERS"] === "true",
    routeBboxBufferKm: positiveNumber(env, "ROUTE_BBOX_BUFFER_KM", DEFAULT_ROUTE_BUFFER_KM),
    graphCacheSize: Math.trunc(positiveNumber(env, "GRAPH_CACHE_SIZE", 16)),
  };
}
