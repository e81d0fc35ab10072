/**
 * Street graph for one requested bbox.
 *
 * Built from raw street segments: each pair of consecutive vertices becomes
 * a straight, undirected edge. Vertices that coincide (to COORD_PRECISION)
 * are merged into one node, which is how segments meeting at an
 * intersection become connected.
 *
 * Construction is deterministic: the same segments in the same order give
 * the same nodes, edges and ids. The graph is never mutated afterwards, so
 * it can be cached and shared between requests.
 */

import type {
  BoundingBox,
  Coordinate,
  StreetEdge,
  StreetNode,
  StreetSegment,
} from "@calm-routes/types";
import {
  bboxIntersects,
  bboxOf,
  distanceOutsideBbox,
  fmtBbox,
  haversineDistance,
} from "../geometry/index.js";
import { NoGraphDataError, PointOutOfRangeError } from "../errors.js";

/** Vertices closer than this (degrees, ~1cm) are the same node */
const COORD_PRECISION = 1e-7;

/** Default distance a point may lie outside the graph bbox and still snap */
export const DEFAULT_OUT_OF_RANGE_TOLERANCE_METERS = 100;

/** A traversable neighbour of a node */
export interface Neighbor {
  edgeId: number;
  /** Node at the other end of the edge */
  nodeId: number;
  lengthMeters: number;
}

export interface StreetGraphOptions {
  /** How far (meters) a start/end point may lie outside the bbox (default 100) */
  outOfRangeToleranceMeters?: number;
}

export interface StreetGraphStats {
  nodesCount: number;
  edgesCount: number;
  segmentsUsed: number;
  segmentsSkipped: number;
  duplicateEdges: number;
  totalLengthMeters: number;
  buildTimeMs: number;
}

/** Result of snapping a coordinate to the graph */
export interface SnapResult {
  nodeId: number;
  snapDistance: number;
  coordinate: Coordinate;
}

export class StreetGraph {
  private readonly nodeList: readonly StreetNode[];
  private readonly edgeList: readonly StreetEdge[];
  private readonly adjacency: readonly (readonly Neighbor[])[];

  constructor(
    nodes: StreetNode[],
    edges: StreetEdge[],
    /** The bbox the graph was built for */
    readonly bbox: BoundingBox,
    readonly stats: StreetGraphStats,
    private readonly toleranceMeters: number = DEFAULT_OUT_OF_RANGE_TOLERANCE_METERS,
  ) {
    const adjacency: Neighbor[][] = nodes.map(() => []);
    for (const edge of edges) {
      adjacency[edge.fromNodeId]!.push({
        edgeId: edge.id,
        nodeId: edge.toNodeId,
        lengthMeters: edge.lengthMeters,
      });
      adjacency[edge.toNodeId]!.push({
        edgeId: edge.id,
        nodeId: edge.fromNodeId,
        lengthMeters: edge.lengthMeters,
      });
    }
    for (const list of adjacency) list.sort((a, b) => a.nodeId - b.nodeId);

    this.nodeList = nodes;
    this.edgeList = edges;
    this.adjacency = adjacency;
  }

  get nodes(): readonly StreetNode[] {
    return this.nodeList;
  }

  get edges(): readonly StreetEdge[] {
    return this.edgeList;
  }

  node(nodeId: number): StreetNode | undefined {
    return this.nodeList[nodeId];
  }

  edge(edgeId: number): StreetEdge | undefined {
    return this.edgeList[edgeId];
  }

  /** Edges leaving a node (in both stored directions), sorted by neighbour id */
  neighbors(nodeId: number): readonly Neighbor[] {
    return this.adjacency[nodeId] ?? [];
  }

  /**
   * Nearest node to a coordinate (haversine), ties broken by lowest id.
   *
   * @throws PointOutOfRangeError if the coordinate lies further outside the
   *   graph bbox than the configured tolerance
   */
  nodeNearest(coord: Coordinate, which: "start" | "end" | "point" = "point"): SnapResult {
    const outside = distanceOutsideBbox(coord, this.bbox);
    if (outside > this.toleranceMeters) {
      throw new PointOutOfRangeError(which, outside);
    }

    let best: StreetNode | undefined;
    let bestDist = Infinity;
    for (const node of this.nodeList) {
      const dist = haversineDistance(coord, node.coordinate);
      // strict < keeps the lowest id on ties (nodes are in id order)
      if (dist < bestDist) {
        bestDist = dist;
        best = node;
      }
    }
    if (!best) throw new NoGraphDataError();

    return { nodeId: best.id, snapDistance: bestDist, coordinate: best.coordinate };
  }
}

/**
 * Build a street graph for a bbox.
 *
 * Segments whose bbox misses the request bbox are skipped. A node pair
 * joined by several segments gets a single edge.
 *
 * @throws NoGraphDataError if no edge remains
 */
export function buildStreetGraph(
  segments: readonly StreetSegment[],
  bbox: BoundingBox,
  options?: StreetGraphOptions,
): StreetGraph {
  const startTime = performance.now();

  const nodes: StreetNode[] = [];
  const nodeIndex = new Map<string, number>();
  const edges: StreetEdge[] = [];
  const seenPairs = new Set<string>();

  let segmentsUsed = 0;
  let segmentsSkipped = 0;
  let duplicateEdges = 0;

  function nodeFor(coord: Coordinate): number {
    const key = `${Math.round(coord.lat / COORD_PRECISION)},${Math.round(coord.lng / COORD_PRECISION)}`;
    let id = nodeIndex.get(key);
    if (id === undefined) {
      id = nodes.length;
      nodes.push({ id, coordinate: { lat: coord.lat, lng: coord.lng } });
      nodeIndex.set(key, id);
    }
    return id;
  }

  for (const segment of segments) {
    if (segment.geometry.length < 2 || !bboxIntersects(bboxOf(segment.geometry), bbox)) {
      segmentsSkipped++;
      continue;
    }
    segmentsUsed++;

    for (let i = 0; i < segment.geometry.length - 1; i++) {
      const a = nodeFor(segment.geometry[i]!);
      const b = nodeFor(segment.geometry[i + 1]!);
      if (a === b) continue;

      const fromNodeId = Math.min(a, b);
      const toNodeId = Math.max(a, b);
      const lengthMeters = haversineDistance(
        nodes[fromNodeId]!.coordinate,
        nodes[toNodeId]!.coordinate,
      );

      const pairKey = `${fromNodeId}-${toNodeId}`;
      if (seenPairs.has(pairKey)) {
        duplicateEdges++;
        continue;
      }

      const edge: StreetEdge = {
        id: edges.length,
        fromNodeId,
        toNodeId,
        lengthMeters,
        segmentId: segment.id,
      };
      if (segment.name) edge.name = segment.name;
      seenPairs.add(pairKey);
      edges.push(edge);
    }
  }

  if (edges.length === 0) {
    console.warn(`[street-graph] No walkable edges in ${fmtBbox(bbox)} (${segments.length} segments supplied)`);
    throw new NoGraphDataError();
  }

  let totalLengthMeters = 0;
  for (const edge of edges) totalLengthMeters += edge.lengthMeters;

  const stats: StreetGraphStats = {
    nodesCount: nodes.length,
    edgesCount: edges.length,
    segmentsUsed,
    segmentsSkipped,
    duplicateEdges,
    totalLengthMeters,
    buildTimeMs: performance.now() - startTime,
  };

  console.log(
    `[street-graph] ${stats.nodesCount} nodes, ${stats.edgesCount} edges, ${(totalLengthMeters / 1000).toFixed(1)}km from ${segmentsUsed} segments (${segmentsSkipped} skipped, ${duplicateEdges} duplicate edges) in ${stats.buildTimeMs.toFixed(0)}ms`,
  );

  return new StreetGraph(
    nodes,
    edges,
    bbox,
    stats,
    options?.outOfRangeToleranceMeters ?? DEFAULT_OUT_OF_RANGE_TOLERANCE_METERS,
  );
}
