import type { BoundingBox, Coordinate, RouteWeights } from "@calm-routes/types";

export interface CalmRouteApiRequest {
  start: Coordinate;
  end: Coordinate;
  /** Area to route in; defaults to the start/end bbox plus a buffer */
  bbox?: BoundingBox;
  /** Per-layer weights (take precedence over the profile's) */
  weights?: RouteWeights;
  /** Named weight profile */
  profile?: string;
  /** ISO 8601 departure time; enables the rush-hour crowd boost */
  departureTime?: string;
}
