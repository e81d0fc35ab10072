/**
 * Layer sources: where layer polygons come from.
 *
 * A source answers `query(layerType, bbox)` asynchronously. Whether it reads
 * a file, calls a places API or generates synthetic data is an
 * implementation detail; sources are composed (fallback, store-backed) rather
 * than branched on at runtime.
 */

import type { BoundingBox, LayerPolygon, LayerType } from "@calm-routes/types";
import { fmtBbox } from "../geometry/index.js";
import { LayerStore, type LayerQuery } from "./layer-store.js";

export interface LayerSource {
  /** Human-readable name (for logs) */
  readonly name: string;
  query(layerType: LayerType, bbox: BoundingBox): Promise<LayerPolygon[]>;
}

/** Serves polygons from an in-memory store (or a swappable store ref) */
export class StoreLayerSource implements LayerSource {
  readonly name: string;

  constructor(
    private readonly store: LayerQuery,
    name = "store",
  ) {
    this.name = name;
  }

  async query(layerType: LayerType, bbox: BoundingBox): Promise<LayerPolygon[]> {
    return [...this.store.query(layerType, bbox)];
  }
}

/**
 * Try the primary source; if it throws or returns nothing, use the fallback.
 */
export class FallbackLayerSource implements LayerSource {
  readonly name: string;

  constructor(
    private readonly primary: LayerSource,
    private readonly fallback: LayerSource,
  ) {
    this.name = `${primary.name}→${fallback.name}`;
  }

  async query(layerType: LayerType, bbox: BoundingBox): Promise<LayerPolygon[]> {
    let reason: string;
    try {
      const polygons = await this.primary.query(layerType, bbox);
      if (polygons.length > 0) return polygons;
      reason = "no polygons";
    } catch (err) {
      reason = err instanceof Error ? err.message : String(err);
    }
    console.warn(
      `[layers] ${this.primary.name} gave nothing for ${layerType} (${reason}), using ${this.fallback.name}`,
    );
    return this.fallback.query(layerType, bbox);
  }
}

/**
 * Route each layer type to its own source; unrouted layers go to `fallback`
 * (or yield nothing).
 */
export class LayerRouter implements LayerSource {
  readonly name = "router";

  constructor(
    private readonly routes: Partial<Record<LayerType, LayerSource>>,
    private readonly fallback?: LayerSource,
  ) {}

  async query(layerType: LayerType, bbox: BoundingBox): Promise<LayerPolygon[]> {
    const source = this.routes[layerType] ?? this.fallback;
    return source ? source.query(layerType, bbox) : [];
  }
}

/**
 * Query a source for each layer (concurrently) and collect the results in a
 * request-scoped store.
 */
export async function loadLayerStore(
  source: LayerSource,
  bbox: BoundingBox,
  layerTypes: readonly LayerType[],
): Promise<LayerStore> {
  const start = performance.now();
  const results = await Promise.all(layerTypes.map((layerType) => source.query(layerType, bbox)));
  const store = new LayerStore(results.flat());
  console.log(
    `[layers] Loaded ${store.size} polygons (${layerTypes.map((t) => `${t}=${store.count(t)}`).join(", ")}) for ${fmtBbox(bbox)} in ${(performance.now() - start).toFixed(0)}ms`,
  );
  return store;
}
