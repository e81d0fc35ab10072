/**
 * Environmental overlay layers.
 *
 * Each layer is a set of polygons tagged with a metric value. Layers are
 * loaded (or generated) per bbox query and never mutated afterwards.
 */

import type { Polygon } from "./geo.js";

/** All layer types the engine knows about */
export const LAYER_TYPES = ["noise", "crowd", "light", "puddles"] as const;

/** One environmental dimension */
export type LayerType = (typeof LAYER_TYPES)[number];

/** Check if a string names a known layer */
export function isLayerType(value: string): value is LayerType {
  return (LAYER_TYPES as readonly string[]).includes(value);
}

/**
 * Metric values attached to a layer polygon.
 *
 * Only the field matching the polygon's layer type is authoritative;
 * the others are informational.
 */
export interface LayerMetrics {
  /** Sound level in dB */
  noiseDb?: number;
  /** Crowd density, 0 (empty) to 5 (packed) */
  crowdLevel?: number;
  /** Illuminance in lux */
  lightLux?: number;
  /** Standing water reported */
  puddles?: boolean;
}

/** A polygon of one layer with its metrics */
export interface LayerPolygon {
  id: string;
  layerType: LayerType;
  ring: Polygon;
  metrics: LayerMetrics;
  /** Street or venue name, when the source has one */
  streetName?: string;
  /** Source confidence (0-1) */
  confidence?: number;
  updatedAt?: Date;
}
