/**
 * Calm route computation: the engine's single entry point.
 *
 * A request moves through fixed phases:
 *
 *   init → graph-ready → aggregated → searched → succeeded | failed
 *
 * Aggregation always completes before the search starts. Everything here is
 * synchronous and CPU-bound; fetching segments and layer polygons is the
 * caller's job (see LayerSource / loadLayerStore).
 */

import {
  LAYER_TYPES,
  type CalmRouteRequest,
  type LayerType,
  type RouteResult,
  type RouteWeights,
  type StreetSegment,
} from "@calm-routes/types";
import { isValidBbox, isValidCoordinate } from "./geometry/index.js";
import { buildStreetGraph, type StreetGraph, type StreetGraphOptions } from "./graph/index.js";
import type { LayerQuery } from "./layers/index.js";
import { aggregateOverlays, type OverlayOptions } from "./overlay/index.js";
import { buildRouteResult, findCalmPath } from "./search/index.js";
import { InvalidRequestError, isEngineError } from "./errors.js";

export type RoutePhase =
  | "init"
  | "graph-ready"
  | "aggregated"
  | "searched"
  | "succeeded"
  | "failed";

/** Raw segments to build a graph from, or a graph built earlier for the same bbox */
export type CalmRouteInputs =
  | { segments: readonly StreetSegment[]; layers: LayerQuery }
  | { graph: StreetGraph; layers: LayerQuery };

export interface CalmRouteOptions {
  /** Aborting cancels the search with CancelledError */
  signal?: AbortSignal;
  /** Called on entering each phase */
  onPhase?: (phase: RoutePhase) => void;
  /** Layers to report averages for, whether weighted or not (default: all) */
  reportLayers?: readonly LayerType[];
  /** Lower bound on an edge's cost multiplier (default 0.01) */
  epsilon?: number;
  overlay?: OverlayOptions;
  graph?: StreetGraphOptions;
}

/**
 * Check a request against the data model.
 *
 * @throws InvalidRequestError
 */
export function validateRouteRequest(request: CalmRouteRequest): void {
  if (!isValidCoordinate(request.start)) {
    throw new InvalidRequestError(`Invalid start coordinate ${JSON.stringify(request.start)}`);
  }
  if (!isValidCoordinate(request.end)) {
    throw new InvalidRequestError(`Invalid end coordinate ${JSON.stringify(request.end)}`);
  }
  if (!isValidBbox(request.bbox)) {
    throw new InvalidRequestError(`Invalid bbox ${JSON.stringify(request.bbox)}`);
  }
  for (const layerType of LAYER_TYPES) {
    const weight = request.weights[layerType];
    if (weight === undefined) continue;
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidRequestError(`Weight for ${layerType} must be a non-negative number, got ${weight}`);
    }
  }
}

/** Layers with a non-zero weight, plus the reported ones, in canonical order */
export function layersToAggregate(
  weights: RouteWeights,
  reportLayers: readonly LayerType[] = LAYER_TYPES,
): LayerType[] {
  return LAYER_TYPES.filter((t) => (weights[t] ?? 0) > 0 || reportLayers.includes(t));
}

/**
 * Compute the calmest walking route between two points.
 *
 * @throws InvalidRequestError, NoGraphDataError, PointOutOfRangeError,
 *   NoRouteFoundError or CancelledError; never a partial route
 */
export function computeCalmRoute(
  request: CalmRouteRequest,
  inputs: CalmRouteInputs,
  options?: CalmRouteOptions,
): RouteResult {
  const startTime = performance.now();
  let phase: RoutePhase = "init";
  const enter = (next: RoutePhase): void => {
    phase = next;
    options?.onPhase?.(next);
  };

  enter("init");
  try {
    validateRouteRequest(request);

    const graph =
      "graph" in inputs ? inputs.graph : buildStreetGraph(inputs.segments, request.bbox, options?.graph);
    const start = graph.nodeNearest(request.start, "start");
    const end = graph.nodeNearest(request.end, "end");
    enter("graph-ready");

    const layerTypes = layersToAggregate(request.weights, options?.reportLayers);
    const overlay = aggregateOverlays(graph, inputs.layers, layerTypes, options?.overlay);
    enter("aggregated");

    const path = findCalmPath(graph, overlay, request.weights, start.nodeId, end.nodeId, {
      epsilon: options?.epsilon,
      signal: options?.signal,
    });
    enter("searched");

    const route = buildRouteResult({
      graph,
      overlay,
      path,
      layerTypes: options?.reportLayers ?? LAYER_TYPES,
      start,
      end,
    });
    enter("succeeded");

    console.log(
      `[calm-route] ${(route.totalDistanceMeters / 1000).toFixed(2)}km, ${route.durationMinutes}min, cost ${route.cost.toFixed(1)} in ${(performance.now() - startTime).toFixed(0)}ms`,
    );
    return route;
  } catch (err) {
    const failedIn = phase;
    enter("failed");
    const reason = isEngineError(err) ? err.code : err instanceof Error ? err.message : String(err);
    console.warn(`[calm-route] Failed after ${failedIn}: ${reason}`);
    throw err;
  }
}
