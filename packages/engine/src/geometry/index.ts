/**
 * Geometry kernel: pure point, segment, polygon and bbox functions.
 */

export {
  EARTH_RADIUS_METERS,
  METERS_PER_DEG_LAT,
  haversineDistance,
  metersPerDegLng,
} from "./distance.js";
export {
  isValidCoordinate,
  isValidBbox,
  bboxIntersects,
  bboxContains,
  bboxOf,
  segmentBbox,
  distanceOutsideBbox,
  fmtBbox,
} from "./bbox.js";
export {
  polygonBbox,
  pointInPolygon,
  pointOnBoundary,
  pointInInterior,
  segmentsIntersect,
  segmentIntersectsPolygon,
  circleApprox,
} from "./polygon.js";
