/**
 * Route requests and results.
 */

import type { BoundingBox, Coordinate } from "./geo.js";
import type { LayerType } from "./layer.js";

/**
 * Non-negative weight per layer. A missing or zero weight means the layer
 * is ignored when costing edges.
 */
export type RouteWeights = Partial<Record<LayerType, number>>;

/** Per-layer numeric values (penalties, averages, ...) */
export type LayerValues = Partial<Record<LayerType, number>>;

/** Input to a calm route computation */
export interface CalmRouteRequest {
  start: Coordinate;
  end: Coordinate;
  bbox: BoundingBox;
  weights: RouteWeights;
}

/** A notable condition somewhere along a route */
export interface RouteWarning {
  layerType: LayerType;
  coordinate: Coordinate;
  message: string;
}

/** The result of a calm route computation. Never mutated once produced. */
export interface RouteResult {
  /** Ordered path from the start node to the end node */
  readonly path: readonly Coordinate[];
  readonly nodeIds: readonly number[];
  readonly edgeIds: readonly number[];
  readonly totalDistanceMeters: number;
  /** Estimated walking time, rounded up to whole minutes */
  readonly durationMinutes: number;
  /**
   * Length-weighted average of each layer's raw metric along the path
   * (dB for noise, level for crowd, lux for light, share for puddles).
   */
  readonly layerAverages: Readonly<LayerValues>;
  /** Scalar cost the route was ranked by */
  readonly cost: number;
  /** Distance from the requested start/end to the snapped nodes (meters) */
  readonly snapDistances: { readonly start: number; readonly end: number };
  readonly warnings: readonly RouteWarning[];
}
