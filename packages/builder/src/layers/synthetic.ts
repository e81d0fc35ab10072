/**
 * Synthetic layer polygons.
 *
 * Fills areas with no real data with plausible, deterministic polygons:
 * the same seed, layer and bbox always give the same polygons. Streets
 * near the centre of the bbox come out louder and busier.
 */

import type { BoundingBox, LayerMetrics, LayerPolygon, LayerType } from "@calm-routes/types";
import { fmtBbox, haversineDistance, type LayerSource } from "@calm-routes/engine";

export type Rng = {
  next: () => number;
};

const hashString = (value: string): number => {
  let hash = 2166136261;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
};

/** Deterministic [0, 1) generator seeded from a string */
export const seededRng = (seed: string): Rng => {
  let state = hashString(seed) || 1;
  return {
    next: () => {
      state += 0x6d2b79f5;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
};

const uniform = (rng: Rng, min: number, max: number): number => min + rng.next() * (max - min);
const randomInt = (rng: Rng, min: number, max: number): number => Math.floor(uniform(rng, min, max + 1));

export interface SyntheticLayerOptions {
  seed?: string;
  /** Polygons per layer and bbox (default: 30) */
  count?: number;
}

/**
 * Metrics for a spot `distanceKm` from the centre of the area.
 *
 * Within 1km: 70-85 dB, crowd 3-5; within 2km: 60-75 dB, crowd 2-4;
 * further out: 50-65 dB, crowd 1-3. Light 50-200 lux, 30% puddles.
 */
export function syntheticMetrics(rng: Rng, distanceKm: number): Required<LayerMetrics> {
  let noiseDb: number;
  let crowdLevel: number;
  if (distanceKm < 1) {
    noiseDb = uniform(rng, 70, 85);
    crowdLevel = randomInt(rng, 3, 5);
  } else if (distanceKm < 2) {
    noiseDb = uniform(rng, 60, 75);
    crowdLevel = randomInt(rng, 2, 4);
  } else {
    noiseDb = uniform(rng, 50, 65);
    crowdLevel = randomInt(rng, 1, 3);
  }
  return {
    noiseDb: Math.round(noiseDb * 10) / 10,
    crowdLevel,
    lightLux: randomInt(rng, 50, 200),
    puddles: rng.next() > 0.7,
  };
}

export class SyntheticLayerSource implements LayerSource {
  readonly name = "synthetic";
  private readonly seed: string;
  private readonly count: number;

  constructor(options?: SyntheticLayerOptions) {
    this.seed = options?.seed ?? "calm-routes";
    this.count = options?.count ?? 30;
  }

  async query(layerType: LayerType, bbox: BoundingBox): Promise<LayerPolygon[]> {
    const rng = seededRng(`${this.seed}|${layerType}|${fmtBbox(bbox)}`);
    const center = { lat: (bbox.minLat + bbox.maxLat) / 2, lng: (bbox.minLng + bbox.maxLng) / 2 };
    const polygons: LayerPolygon[] = [];

    for (let i = 0; i < this.count; i++) {
      const lat = uniform(rng, bbox.minLat, bbox.maxLat);
      const lng = uniform(rng, bbox.minLng, bbox.maxLng);
      // Half-width in degrees, ~90-130m
      const size = uniform(rng, 0.0008, 0.0012);
      const distanceKm = haversineDistance(center, { lat, lng }) / 1000;

      polygons.push({
        id: `synthetic_${layerType}_${String(i).padStart(3, "0")}`,
        layerType,
        ring: [
          { lat: lat - size, lng: lng - size },
          { lat: lat - size, lng: lng + size },
          { lat: lat + size, lng: lng + size },
          { lat: lat + size, lng: lng - size },
        ],
        metrics: syntheticMetrics(rng, distanceKm),
        confidence: uniform(rng, 0.7, 0.95),
      });
    }

    return polygons;
  }
}
