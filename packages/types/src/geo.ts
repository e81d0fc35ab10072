/**
 * Geographic primitive types.
 */

/** Geographic coordinate (WGS84 degrees) */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

/**
 * A closed polygon ring.
 *
 * The first point is NOT repeated at the end; the ring closes implicitly
 * from the last point back to the first.
 */
export type Polygon = Coordinate[];
