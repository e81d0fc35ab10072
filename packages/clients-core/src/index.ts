// Base
export {
  ApiError,
  BaseClient,
  toApiError,
  type ClientConfig,
  type RequestParams,
} from "./baseClient.js";

// Domain clients
export { RouteClient } from "./routeClient.js";
export { LayerClient } from "./layerClient.js";
export { ConfigClient } from "./configClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Geo
  Coordinate,
  BoundingBox,
  LayerType,
  RouteWeights,
  // Calm route
  CalmRouteRequest,
  CalmRoute,
  CalmRouteResponse,
  RouteWarning,
  // Layers
  LayerLevel,
  LayerMetrics,
  LayerFeature,
  LayersResponse,
  // Config
  ProfileInfo,
  WeightsResponse,
  ProfilesResponse,
  // Health
  CacheStats,
  HealthResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
