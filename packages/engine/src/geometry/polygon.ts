/**
 * Planar polygon tests on lat/lng rings.
 *
 * Coordinates are treated as plane points (x = lng, y = lat), which is
 * accurate enough at street scale.
 */

import type { BoundingBox, Coordinate, Polygon } from "@calm-routes/types";
import { bboxOf } from "./bbox.js";
import { METERS_PER_DEG_LAT, metersPerDegLng } from "./distance.js";

/** Tolerance (degrees, ~1mm) for on-boundary checks */
const BOUNDARY_EPSILON = 1e-8;

export function polygonBbox(ring: Polygon): BoundingBox {
  return bboxOf(ring);
}

/** Twice the signed area of triangle (a, b, c); sign gives orientation */
function cross(a: Coordinate, b: Coordinate, c: Coordinate): number {
  return (b.lng - a.lng) * (c.lat - a.lat) - (b.lat - a.lat) * (c.lng - a.lng);
}

function onSegment(p: Coordinate, a: Coordinate, b: Coordinate): boolean {
  return (
    p.lng >= Math.min(a.lng, b.lng) - BOUNDARY_EPSILON &&
    p.lng <= Math.max(a.lng, b.lng) + BOUNDARY_EPSILON &&
    p.lat >= Math.min(a.lat, b.lat) - BOUNDARY_EPSILON &&
    p.lat <= Math.max(a.lat, b.lat) + BOUNDARY_EPSILON
  );
}

function isOnEdge(p: Coordinate, a: Coordinate, b: Coordinate): boolean {
  const lenSq = (b.lng - a.lng) ** 2 + (b.lat - a.lat) ** 2;
  const len = Math.sqrt(lenSq);
  if (len === 0) {
    return Math.abs(p.lng - a.lng) <= BOUNDARY_EPSILON && Math.abs(p.lat - a.lat) <= BOUNDARY_EPSILON;
  }
  // perpendicular distance = |cross| / |ab|
  return Math.abs(cross(a, b, p)) / len <= BOUNDARY_EPSILON && onSegment(p, a, b);
}

/**
 * Ray-casting point-in-polygon test. Points on the boundary count as inside.
 */
export function pointInPolygon(point: Coordinate, ring: Polygon): boolean {
  const n = ring.length;
  if (n < 3) return false;

  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const a = ring[i]!;
    const b = ring[j]!;
    if (isOnEdge(point, a, b)) return true;
    if (
      a.lat > point.lat !== b.lat > point.lat &&
      point.lng < ((b.lng - a.lng) * (point.lat - a.lat)) / (b.lat - a.lat) + a.lng
    ) {
      inside = !inside;
    }
  }
  return inside;
}

/** Is the point on one of the ring's edges (within ~1mm)? */
export function pointOnBoundary(point: Coordinate, ring: Polygon): boolean {
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    if (isOnEdge(point, ring[i]!, ring[j]!)) return true;
  }
  return false;
}

/** Inside the ring and not on its boundary */
export function pointInInterior(point: Coordinate, ring: Polygon): boolean {
  return pointInPolygon(point, ring) && !pointOnBoundary(point, ring);
}

/** Do closed segments p1–p2 and q1–q2 share at least one point? */
export function segmentsIntersect(
  p1: Coordinate,
  p2: Coordinate,
  q1: Coordinate,
  q2: Coordinate,
): boolean {
  const d1 = cross(q1, q2, p1);
  const d2 = cross(q1, q2, p2);
  const d3 = cross(p1, p2, q1);
  const d4 = cross(p1, p2, q2);

  if (((d1 > 0 && d2 < 0) || (d1 < 0 && d2 > 0)) && ((d3 > 0 && d4 < 0) || (d3 < 0 && d4 > 0))) {
    return true;
  }

  // Collinear / touching cases
  if (d1 === 0 && onSegment(p1, q1, q2)) return true;
  if (d2 === 0 && onSegment(p2, q1, q2)) return true;
  if (d3 === 0 && onSegment(q1, p1, p2)) return true;
  if (d4 === 0 && onSegment(q2, p1, p2)) return true;
  return false;
}

/**
 * Does segment a–b touch the polygon at all: an endpoint inside, or the
 * segment crossing or touching one of the ring's edges.
 */
export function segmentIntersectsPolygon(a: Coordinate, b: Coordinate, ring: Polygon): boolean {
  if (ring.length < 3) return false;
  if (pointInPolygon(a, ring) || pointInPolygon(b, ring)) return true;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    if (segmentsIntersect(a, b, ring[j]!, ring[i]!)) return true;
  }
  return false;
}

/**
 * Regular `numPoints`-gon approximating a circle around `center`.
 *
 * Uses an equirectangular meters-to-degrees conversion: fine for radii up
 * to a few hundred meters, not valid near the poles.
 */
export function circleApprox(center: Coordinate, radiusMeters: number, numPoints: number): Polygon {
  if (!Number.isInteger(numPoints) || numPoints < 3) {
    throw new RangeError(`circleApprox needs at least 3 points, got ${numPoints}`);
  }
  if (!(radiusMeters > 0)) {
    throw new RangeError(`circleApprox needs a positive radius, got ${radiusMeters}`);
  }

  const radiusLat = radiusMeters / METERS_PER_DEG_LAT;
  const radiusLng = radiusMeters / metersPerDegLng(center.lat);

  const ring: Polygon = [];
  for (let i = 0; i < numPoints; i++) {
    const angle = (2 * Math.PI * i) / numPoints;
    ring.push({
      lat: center.lat + radiusLat * Math.sin(angle),
      lng: center.lng + radiusLng * Math.cos(angle),
    });
  }
  return ring;
}
