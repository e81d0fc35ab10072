/**
 * Turn a found path into a RouteResult with geometry and per-layer stats.
 */

import type {
  Coordinate,
  LayerType,
  LayerValues,
  RouteResult,
  RouteWarning,
} from "@calm-routes/types";
import type { SnapResult, StreetGraph } from "../graph/index.js";
import type { OverlayResult } from "../overlay/index.js";
import type { CalmPath } from "./calm-router.js";

/** Average walking speed used for duration estimates (m/s) */
export const WALKING_SPEED_MPS = 1.4;

/** Most puddle warnings reported per route */
export const MAX_WARNINGS = 5;

export interface RouteBuildInput {
  graph: StreetGraph;
  overlay: OverlayResult;
  path: CalmPath;
  /** Layers to report averages for */
  layerTypes: readonly LayerType[];
  start: SnapResult;
  end: SnapResult;
}

/**
 * Build the immutable route result.
 *
 * Layer averages are `Σ exposure × length / total length` over the path's
 * edges, and 0 for a zero-length path.
 */
export function buildRouteResult(input: RouteBuildInput): RouteResult {
  const { graph, overlay, path, layerTypes } = input;

  const coordinates: Coordinate[] = [];
  for (const nodeId of path.nodeIds) {
    const node = graph.node(nodeId);
    if (node) coordinates.push(node.coordinate);
  }

  let totalDistanceMeters = 0;
  const weightedSums = new Map<LayerType, number>(layerTypes.map((t) => [t, 0]));
  const warnings: RouteWarning[] = [];

  path.edgeIds.forEach((edgeId, i) => {
    const edge = graph.edge(edgeId);
    if (!edge) return;
    totalDistanceMeters += edge.lengthMeters;

    const exposure = overlay.get(edgeId)?.exposure;
    if (!exposure) return;
    for (const layerType of layerTypes) {
      weightedSums.set(
        layerType,
        (weightedSums.get(layerType) ?? 0) + (exposure[layerType] ?? 0) * edge.lengthMeters,
      );
    }

    if ((exposure.puddles ?? 0) > 0 && warnings.length < MAX_WARNINGS) {
      const entry = coordinates[i];
      if (entry) warnings.push({ layerType: "puddles", coordinate: entry, message: "Possible puddles" });
    }
  });

  const layerAverages: LayerValues = {};
  for (const [layerType, sum] of weightedSums) {
    layerAverages[layerType] = totalDistanceMeters > 0 ? sum / totalDistanceMeters : 0;
  }

  return Object.freeze({
    path: Object.freeze(coordinates),
    nodeIds: Object.freeze([...path.nodeIds]),
    edgeIds: Object.freeze([...path.edgeIds]),
    totalDistanceMeters,
    durationMinutes: Math.ceil(totalDistanceMeters / WALKING_SPEED_MPS / 60),
    layerAverages: Object.freeze(layerAverages),
    cost: path.cost,
    snapDistances: Object.freeze({ start: input.start.snapDistance, end: input.end.snapDistance }),
    warnings: Object.freeze(warnings),
  });
}
