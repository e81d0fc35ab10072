/**
 * @calm-routes/engine
 *
 * Calm walking route engine.
 *
 * Key concepts:
 * - Layer: polygons tagged with noise, crowd, light or puddle metrics
 * - StreetGraph: walkable street network built for one bbox
 * - Overlay: per-edge penalties derived from the layers
 *
 * Pipeline:
 * 1. Street segments -> StreetGraph
 * 2. StreetGraph + LayerStore -> OverlayResult
 * 3. Weighted Dijkstra over the overlay -> RouteResult
 */

export * from "./errors.js";
export * from "./geometry/index.js";
export * from "./layers/index.js";
export * from "./graph/index.js";
export * from "./overlay/index.js";
export * from "./search/index.js";
export * from "./config/index.js";
export {
  computeCalmRoute,
  validateRouteRequest,
  layersToAggregate,
  type CalmRouteInputs,
  type CalmRouteOptions,
  type RoutePhase,
} from "./engine.js";
