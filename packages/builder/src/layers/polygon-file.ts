/**
 * Layer polygons from JSON files on disk.
 *
 * One file per layer, `polygons_<layer>.json`:
 *
 * ```json
 * { "polygons": [
 *   { "id": "noise_001",
 *     "coordinates": [[37.61, 55.75], [37.62, 55.75], [37.62, 55.76]],
 *     "metrics": { "noise_db": 72.5, "crowd_level": 3, "light_lux": 120, "puddles": false },
 *     "street_name": "Tverskaya" } ] }
 * ```
 *
 * Coordinates are `[lng, lat]` pairs. A repeated closing point is dropped.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { BoundingBox, Coordinate, LayerMetrics, LayerPolygon, LayerType } from "@calm-routes/types";
import { LAYER_TYPES } from "@calm-routes/types";
import { LayerStore, LayerStoreRef, isValidCoordinate, type LayerSource } from "@calm-routes/engine";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function parseRing(value: unknown): Coordinate[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const ring: Coordinate[] = [];
  for (const pair of value) {
    if (!Array.isArray(pair) || pair.length < 2) return undefined;
    const lng: unknown = pair[0];
    const lat: unknown = pair[1];
    if (typeof lng !== "number" || typeof lat !== "number") return undefined;
    const coord = { lat, lng };
    if (!isValidCoordinate(coord)) return undefined;
    ring.push(coord);
  }
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (ring.length > 1 && first && last && first.lat === last.lat && first.lng === last.lng) {
    ring.pop();
  }
  return ring.length >= 3 ? ring : undefined;
}

function parseMetrics(value: unknown): LayerMetrics {
  if (!isRecord(value)) return {};
  const metrics: LayerMetrics = {};
  const noiseDb = optionalNumber(value["noise_db"]);
  const crowdLevel = optionalNumber(value["crowd_level"]);
  const lightLux = optionalNumber(value["light_lux"]);
  if (noiseDb !== undefined) metrics.noiseDb = noiseDb;
  if (crowdLevel !== undefined) metrics.crowdLevel = crowdLevel;
  if (lightLux !== undefined) metrics.lightLux = lightLux;
  const puddles = value["puddles"];
  if (typeof puddles === "boolean") metrics.puddles = puddles;
  return metrics;
}

/**
 * Parse the contents of a polygon file. Malformed entries are skipped.
 */
export function parsePolygonFile(json: unknown, layerType: LayerType): { polygons: LayerPolygon[]; skipped: number } {
  const entries = isRecord(json) && Array.isArray(json["polygons"]) ? json["polygons"] : [];
  const polygons: LayerPolygon[] = [];
  let skipped = 0;

  entries.forEach((entry: unknown, i: number) => {
    const ring = isRecord(entry) ? parseRing(entry["coordinates"]) : undefined;
    if (!isRecord(entry) || !ring) {
      skipped++;
      return;
    }

    const rawId = entry["id"];
    const polygon: LayerPolygon = {
      id: typeof rawId === "string" || typeof rawId === "number" ? String(rawId) : `${layerType}_${String(i).padStart(3, "0")}`,
      layerType,
      ring,
      metrics: parseMetrics(entry["metrics"]),
    };
    const streetName = entry["street_name"];
    if (typeof streetName === "string" && streetName) polygon.streetName = streetName;
    const confidence = optionalNumber(entry["confidence"]);
    if (confidence !== undefined) polygon.confidence = confidence;
    const lastUpdated = entry["last_updated"];
    if (typeof lastUpdated === "string") {
      const updatedAt = new Date(lastUpdated);
      if (!Number.isNaN(updatedAt.getTime())) polygon.updatedAt = updatedAt;
    }
    polygons.push(polygon);
  });

  return { polygons, skipped };
}

/**
 * Load one layer's polygon file.
 *
 * A missing file gives an empty list with a warning; unreadable JSON throws.
 */
export function loadPolygonFile(path: string, layerType: LayerType): LayerPolygon[] {
  if (!existsSync(path)) {
    console.warn(`[layers] No ${layerType} polygons: ${path} not found`);
    return [];
  }
  const { polygons, skipped } = parsePolygonFile(JSON.parse(readFileSync(path, "utf-8")), layerType);
  console.log(
    `[layers] Loaded ${polygons.length} ${layerType} polygons from ${path}${skipped > 0 ? ` (${skipped} malformed skipped)` : ""}`,
  );
  return polygons;
}

export function polygonFilePath(dir: string, layerType: LayerType): string {
  return join(dir, `polygons_${layerType}.json`);
}

/**
 * Serves every layer from `polygons_<layer>.json` files in a directory.
 *
 * Files are read once at construction and again on `reload()`, which swaps
 * the whole store at once; queries running meanwhile see the old store.
 */
export class FileLayerSource implements LayerSource {
  readonly name = "file";
  private readonly ref: LayerStoreRef;

  constructor(
    private readonly dir: string,
    private readonly layerTypes: readonly LayerType[] = LAYER_TYPES,
  ) {
    this.ref = new LayerStoreRef(this.readAll());
  }

  /** Re-read all files and swap the store in. Returns the new store. */
  reload(): LayerStore {
    const next = this.readAll();
    this.ref.replace(next);
    return next;
  }

  /** The store currently served */
  get store(): LayerStore {
    return this.ref.current();
  }

  async query(layerType: LayerType, bbox: BoundingBox): Promise<LayerPolygon[]> {
    return [...this.ref.query(layerType, bbox)];
  }

  private readAll(): LayerStore {
    return new LayerStore(this.layerTypes.flatMap((t) => loadPolygonFile(polygonFilePath(this.dir, t), t)));
  }
}
