/**
 * Bounding box helpers. All boxes are closed: touching boxes intersect.
 */

import type { BoundingBox, Coordinate } from "@calm-routes/types";
import { haversineDistance } from "./distance.js";

export function isValidCoordinate(coord: Coordinate): boolean {
  return (
    Number.isFinite(coord.lat) &&
    Number.isFinite(coord.lng) &&
    coord.lat >= -90 &&
    coord.lat <= 90 &&
    coord.lng >= -180 &&
    coord.lng <= 180
  );
}

export function isValidBbox(bbox: BoundingBox): boolean {
  return (
    isValidCoordinate({ lat: bbox.minLat, lng: bbox.minLng }) &&
    isValidCoordinate({ lat: bbox.maxLat, lng: bbox.maxLng }) &&
    bbox.minLat <= bbox.maxLat &&
    bbox.minLng <= bbox.maxLng
  );
}

export function bboxIntersects(a: BoundingBox, b: BoundingBox): boolean {
  return !(
    a.maxLat < b.minLat ||
    a.minLat > b.maxLat ||
    a.maxLng < b.minLng ||
    a.minLng > b.maxLng
  );
}

export function bboxContains(bbox: BoundingBox, coord: Coordinate): boolean {
  return (
    coord.lat >= bbox.minLat &&
    coord.lat <= bbox.maxLat &&
    coord.lng >= bbox.minLng &&
    coord.lng <= bbox.maxLng
  );
}

/** Smallest bbox containing all the given coordinates */
export function bboxOf(coords: readonly Coordinate[]): BoundingBox {
  let minLat = Infinity;
  let maxLat = -Infinity;
  let minLng = Infinity;
  let maxLng = -Infinity;
  for (const c of coords) {
    if (c.lat < minLat) minLat = c.lat;
    if (c.lat > maxLat) maxLat = c.lat;
    if (c.lng < minLng) minLng = c.lng;
    if (c.lng > maxLng) maxLng = c.lng;
  }
  return { minLat, maxLat, minLng, maxLng };
}

export function segmentBbox(a: Coordinate, b: Coordinate): BoundingBox {
  return bboxOf([a, b]);
}

/**
 * Distance in meters from a point to the nearest point of a bbox.
 * Zero when the point is inside.
 */
export function distanceOutsideBbox(coord: Coordinate, bbox: BoundingBox): number {
  const clamped: Coordinate = {
    lat: Math.min(Math.max(coord.lat, bbox.minLat), bbox.maxLat),
    lng: Math.min(Math.max(coord.lng, bbox.minLng), bbox.maxLng),
  };
  if (clamped.lat === coord.lat && clamped.lng === coord.lng) return 0;
  return haversineDistance(coord, clamped);
}

export function fmtBbox(bbox: BoundingBox): string {
  return `[${bbox.minLat.toFixed(4)},${bbox.minLng.toFixed(4)} → ${bbox.maxLat.toFixed(4)},${bbox.maxLng.toFixed(4)}]`;
}
