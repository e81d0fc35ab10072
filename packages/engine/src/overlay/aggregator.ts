/**
 * Overlay aggregation.
 *
 * Joins street graph edges against layer polygons and produces, per edge,
 * a normalized penalty and a raw exposure for every requested layer.
 * Penalties drive edge costs in the search; exposures feed the per-layer
 * averages reported with a route.
 *
 * Each edge is handled on its own with no cross-edge state. The graph is
 * left untouched: results live in the returned OverlayResult, so a cached
 * graph can be shared between requests with different layers and weights.
 */

import type {
  BoundingBox,
  LayerPolygon,
  LayerType,
  LayerValues,
  StreetEdge,
} from "@calm-routes/types";
import {
  pointInInterior,
  pointInPolygon,
  pointOnBoundary,
  segmentBbox,
  segmentIntersectsPolygon,
} from "../geometry/index.js";
import type { StreetGraph } from "../graph/index.js";
import { layerValue, type LayerQuery } from "../layers/index.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Share of an edge assumed to lie inside a polygon, by how they meet */
export interface OverlapFractions {
  /** Both endpoints inside, midpoint in the interior */
  full: number;
  /** Exactly one endpoint strictly inside */
  partial: number;
  /** The edge passes through or only touches the boundary */
  crossing: number;
}

/** Reference values that map raw metrics onto a roughly [0, 1] scale */
export interface NormalizationCeilings {
  noiseDb: number;
  crowdLevel: number;
  lightLux: number;
}

export interface OverlayOptions {
  overlap?: Partial<OverlapFractions>;
  ceilings?: Partial<NormalizationCeilings>;
  /**
   * Wall-clock hour of travel where the route is (0-23); crowd levels go up
   * one step during rush hours. See `travelHour`.
   */
  hour?: number;
}

export const DEFAULT_OVERLAP_FRACTIONS: OverlapFractions = {
  full: 1.0,
  partial: 0.5,
  crossing: 0.25,
};

export const DEFAULT_CEILINGS: NormalizationCeilings = {
  noiseDb: 100,
  crowdLevel: 5,
  lightLux: 200,
};

/** Wall-clock hours in which crowd levels are raised by one */
export const RUSH_HOURS: readonly number[] = [8, 9, 17, 18, 19];

const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}(?:[T ](\d{2}):\d{2})?/;

/**
 * Hour written in an ISO 8601 timestamp, in the timestamp's own offset:
 * `"2024-01-15T08:30:00+03:00"` is hour 8 on any host. A bare date is hour
 * 0. Undefined for anything that is not an ISO 8601 date or date-time.
 */
export function travelHour(iso: string): number | undefined {
  const match = ISO_DATE_TIME.exec(iso);
  if (!match || Number.isNaN(Date.parse(iso))) return undefined;
  const hour = match[1] === undefined ? 0 : Number(match[1]);
  return hour <= 23 ? hour : undefined;
}

const MAX_CROWD_LEVEL = 5;

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export interface EdgeOverlay {
  /** Normalized, overlap-weighted penalty per layer (light is negative) */
  penalties: LayerValues;
  /** Overlap-weighted raw metric per layer (dB, level, lux, puddle share) */
  exposure: LayerValues;
}

/** Overlay per edge id. Every edge of the graph has an entry. */
export type OverlayResult = ReadonlyMap<number, EdgeOverlay>;

// ---------------------------------------------------------------------------
// Building blocks
// ---------------------------------------------------------------------------

/**
 * Estimated share of edge A–B inside a polygon ring.
 *
 * Not a geometric intersection length: the edge is classified by how many
 * endpoints lie inside, falling back to a crossing test. Contact that never
 * reaches the interior (an edge along the ring, an endpoint on it) counts
 * as crossing.
 */
export function overlapFraction(
  edge: Pick<StreetEdge, "fromNodeId" | "toNodeId">,
  graph: StreetGraph,
  ring: LayerPolygon["ring"],
  fractions: OverlapFractions = DEFAULT_OVERLAP_FRACTIONS,
): number {
  const a = graph.node(edge.fromNodeId)?.coordinate;
  const b = graph.node(edge.toNodeId)?.coordinate;
  if (!a || !b) return 0;

  const aInside = pointInPolygon(a, ring);
  const bInside = pointInPolygon(b, ring);
  if (aInside && bInside) {
    // Both endpoints on the ring can still mean the edge runs along it
    const mid = { lat: (a.lat + b.lat) / 2, lng: (a.lng + b.lng) / 2 };
    return pointInInterior(mid, ring) ? fractions.full : fractions.crossing;
  }
  if (aInside || bInside) {
    // An endpoint resting on the boundary only touches the polygon
    const inner = aInside ? a : b;
    return pointOnBoundary(inner, ring) ? fractions.crossing : fractions.partial;
  }
  return segmentIntersectsPolygon(a, b, ring) ? fractions.crossing : 0;
}

/**
 * Raw metric of a polygon for its layer, adjusted for the time of travel.
 * Missing metrics give 0.
 */
export function effectiveLayerValue(polygon: LayerPolygon, hour?: number): number {
  const value = layerValue(polygon.layerType, polygon.metrics);
  if (
    polygon.layerType === "crowd" &&
    hour !== undefined &&
    polygon.metrics.crowdLevel !== undefined &&
    RUSH_HOURS.includes(hour)
  ) {
    return Math.min(MAX_CROWD_LEVEL, value + 1);
  }
  return value;
}

/**
 * Map a raw metric onto the penalty scale. Light is a bonus, so its
 * penalty is negative.
 */
export function normalizeMetric(
  layerType: LayerType,
  value: number,
  ceilings: NormalizationCeilings = DEFAULT_CEILINGS,
): number {
  switch (layerType) {
    case "noise":
      return value / ceilings.noiseDb;
    case "crowd":
      return value / ceilings.crowdLevel;
    case "light":
      return -(value / ceilings.lightLux);
    case "puddles":
      return value > 0 ? 1 : 0;
  }
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/**
 * Compute penalties and exposures for every edge of a graph.
 *
 * Only polygons whose bbox intersects an edge's bbox are considered; the
 * layer store does that filtering.
 */
export function aggregateOverlays(
  graph: StreetGraph,
  layers: LayerQuery,
  layerTypes: readonly LayerType[],
  options?: OverlayOptions,
): OverlayResult {
  const startTime = performance.now();
  const fractions: OverlapFractions = { ...DEFAULT_OVERLAP_FRACTIONS, ...options?.overlap };
  const ceilings: NormalizationCeilings = { ...DEFAULT_CEILINGS, ...options?.ceilings };
  const hour = options?.hour;

  const result = new Map<number, EdgeOverlay>();
  let hits = 0;
  let edgesTouched = 0;

  for (const edge of graph.edges) {
    const penalties: LayerValues = {};
    const exposure: LayerValues = {};
    let touched = false;

    const a = graph.node(edge.fromNodeId)?.coordinate;
    const b = graph.node(edge.toNodeId)?.coordinate;
    const edgeBbox: BoundingBox | undefined = a && b ? segmentBbox(a, b) : undefined;

    for (const layerType of layerTypes) {
      let penalty = 0;
      let raw = 0;
      if (edgeBbox) {
        for (const polygon of layers.query(layerType, edgeBbox)) {
          const fraction = overlapFraction(edge, graph, polygon.ring, fractions);
          if (fraction === 0) continue;
          const value = effectiveLayerValue(polygon, hour);
          penalty += fraction * normalizeMetric(layerType, value, ceilings);
          raw += fraction * value;
          hits++;
          touched = true;
        }
      }
      penalties[layerType] = penalty;
      exposure[layerType] = raw;
    }

    if (touched) edgesTouched++;
    result.set(edge.id, { penalties, exposure });
  }

  console.log(
    `[overlay] ${layerTypes.join(",") || "no layers"} over ${graph.edges.length} edges: ${hits} polygon hits on ${edgesTouched} edges in ${(performance.now() - startTime).toFixed(0)}ms`,
  );

  return result;
}
