/**
 * Street network types.
 *
 * A StreetGraph is built once per requested bbox from raw street segments.
 * Nodes sit at segment vertices; edges are straight walkable pieces
 * between two nodes.
 */

import type { Coordinate } from "./geo.js";

/** A raw street polyline as delivered by a street source */
export interface StreetSegment {
  id: string;
  /** Ordered vertices, at least two */
  geometry: Coordinate[];
  /** Street name, if known */
  name?: string;
}

/** An intersection or segment vertex */
export interface StreetNode {
  id: number;
  coordinate: Coordinate;
}

/**
 * A walkable edge between two nodes.
 *
 * Stored with a canonical direction (fromNodeId < toNodeId) but traversable
 * both ways.
 */
export interface StreetEdge {
  id: number;
  fromNodeId: number;
  toNodeId: number;
  /** Geodesic length in meters */
  lengthMeters: number;
  /** ID of the segment this edge was cut from */
  segmentId: string;
  name?: string;
}
