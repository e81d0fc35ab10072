/**
 * Route area helpers: the bbox a route's street and layer data is loaded
 * for.
 */

import type { BoundingBox, Coordinate } from "@calm-routes/types";
import { bboxOf } from "@calm-routes/engine";

export const DEFAULT_ROUTE_BUFFER_KM = 0.5;

/**
 * The bbox spanned by start and end, expanded by a buffer so that detours
 * around the straight line stay inside it.
 */
export function bboxForRoute(start: Coordinate, end: Coordinate, bufferKm: number): BoundingBox {
  return expandBbox(bboxOf([start, end]), bufferKm);
}

/**
 * Expand a bounding box by a buffer distance in kilometers.
 */
export function expandBbox(bbox: BoundingBox, bufferKm: number): BoundingBox {
  const latBuffer = bufferKm / 111.32;

  // Use the center latitude for longitude scaling
  const centerLat = (bbox.minLat + bbox.maxLat) / 2;
  const lngBuffer = bufferKm / (111.32 * Math.cos((centerLat * Math.PI) / 180));

  return {
    minLat: bbox.minLat - latBuffer,
    maxLat: bbox.maxLat + latBuffer,
    minLng: bbox.minLng - lngBuffer,
    maxLng: bbox.maxLng + lngBuffer,
  };
}
