/**
 * Distance utilities.
 */

import type { Coordinate } from "@calm-routes/types";

export const EARTH_RADIUS_METERS = 6_371_000;

/** Meters per degree of latitude (roughly constant) */
export const METERS_PER_DEG_LAT = 111_320;

/**
 * Haversine distance between two coordinates in meters.
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const toRad = Math.PI / 180;
  const dLat = (b.lat - a.lat) * toRad;
  const dLng = (b.lng - a.lng) * toRad;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(a.lat * toRad) * Math.cos(b.lat * toRad) * sinHalfLng * sinHalfLng;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(h));
}

/** Meters per degree of longitude at a given latitude */
export function metersPerDegLng(lat: number): number {
  return METERS_PER_DEG_LAT * Math.cos((lat * Math.PI) / 180);
}
