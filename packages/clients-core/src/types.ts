/**
 * API request/response types for the Calm Routes server.
 *
 * These mirror the server's models so the client carries no server
 * dependencies.
 */

// ---------------------------------------------------------------------------
// Geo
// ---------------------------------------------------------------------------

export interface Coordinate {
  lat: number;
  lng: number;
}

export interface BoundingBox {
  minLat: number;
  minLng: number;
  maxLat: number;
  maxLng: number;
}

export type LayerType = "noise" | "crowd" | "light" | "puddles";

export type RouteWeights = Partial<Record<LayerType, number>>;

// ---------------------------------------------------------------------------
// Calm route
// ---------------------------------------------------------------------------

export interface CalmRouteRequest {
  start: Coordinate;
  end: Coordinate;
  /** Area to route in; defaults to the start/end bbox plus a buffer */
  bbox?: BoundingBox;
  /** Per-layer weights (take precedence over the profile's) */
  weights?: RouteWeights;
  /** Named weight profile */
  profile?: string;
  /** ISO 8601 departure time */
  departureTime?: string;
}

export interface RouteWarning {
  layerType: LayerType;
  coordinate: Coordinate;
  message: string;
}

export interface CalmRoute {
  path: Coordinate[];
  nodeIds: number[];
  edgeIds: number[];
  totalDistanceMeters: number;
  durationMinutes: number;
  layerAverages: Partial<Record<LayerType, number>>;
  cost: number;
  snapDistances: { start: number; end: number };
  warnings: RouteWarning[];
}

export interface CalmRouteResponse {
  route: CalmRoute;
  meta: {
    searchTimeMs: number;
    bbox: BoundingBox;
    weights: Record<LayerType, number>;
    profile?: string;
    graphCached: boolean;
  };
}

// ---------------------------------------------------------------------------
// Layers
// ---------------------------------------------------------------------------

export type LayerLevel =
  | "low"
  | "medium"
  | "high"
  | "extreme"
  | "dark"
  | "dim"
  | "bright"
  | "has_puddles"
  | "no_puddles";

export interface LayerMetrics {
  noiseDb?: number;
  crowdLevel?: number;
  lightLux?: number;
  puddles?: boolean;
}

export interface LayerFeature {
  id: string;
  /** Ring as [lng, lat] pairs */
  coordinates: [number, number][];
  value: number;
  level: LayerLevel;
  metrics: LayerMetrics;
  streetName?: string;
}

export interface LayersResponse {
  bbox: BoundingBox;
  updatedAt: string;
  layers: Partial<Record<LayerType, LayerFeature[]>>;
}

// ---------------------------------------------------------------------------
// Config / Profiles
// ---------------------------------------------------------------------------

export interface ProfileInfo {
  name: string;
  description: string;
}

export interface WeightsResponse {
  weights: Record<LayerType, number>;
  profile?: ProfileInfo;
}

export interface ProfilesResponse {
  profiles: ProfileInfo[];
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface CacheStats {
  entries: number;
  maxEntries: number;
  hits: number;
  misses: number;
}

export interface HealthResponse {
  status: "ok";
  uptime: number;
  cache: CacheStats;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  /** Engine error code, e.g. NO_ROUTE_FOUND */
  code?: string;
  /** Field errors on 422 validation failures */
  details?: Record<string, { message: string; value?: unknown }>;
}
