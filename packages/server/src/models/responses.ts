import type {
  BoundingBox,
  LayerMetrics,
  LayerType,
  RouteResult,
  RouteWeights,
} from "@calm-routes/types";
import type { LayerLevel, ProfileInfo } from "@calm-routes/engine";

export interface CalmRouteResponse {
  route: RouteResult;
  meta: {
    searchTimeMs: number;
    bbox: BoundingBox;
    weights: Required<RouteWeights>;
    profile?: string;
    /** Whether the street graph came from the in-memory cache */
    graphCached: boolean;
  };
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

export interface WeightsResponse {
  weights: Required<RouteWeights>;
  profile?: ProfileInfo;
}

export interface ProfilesResponse {
  profiles: ProfileInfo[];
}

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

export interface ErrorResponse {
  message: string;
  code?: string;
}
