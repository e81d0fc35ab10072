/**
 * Calm path search.
 *
 * Dijkstra over the street graph where each edge costs its length scaled by
 * the weighted layer penalties on it. All edge costs are computed up front
 * from the finished overlay, so the search only ever sees stable costs.
 *
 * Ties are resolved deterministically: among paths of equal cost (within a
 * relative tolerance) the one with fewer edges wins, then the one whose
 * node-id sequence is lexicographically smaller.
 */

import { LAYER_TYPES, type LayerValues, type RouteWeights } from "@calm-routes/types";
import type { StreetGraph } from "../graph/index.js";
import type { OverlayResult } from "../overlay/index.js";
import { CancelledError, NoRouteFoundError } from "../errors.js";
import { PriorityQueue } from "./priority-queue.js";

/** Lower bound on an edge's cost multiplier */
export const DEFAULT_EPSILON = 0.01;

/** Costs this close (relative) are treated as equal */
const COST_TOLERANCE = 1e-9;

export interface CalmSearchOptions {
  /** Lower bound on an edge's cost multiplier (default 0.01) */
  epsilon?: number;
  /** Checked at every pop; aborting stops the search with CancelledError */
  signal?: AbortSignal;
}

export interface CalmPath {
  /** Node ids from start to end */
  nodeIds: number[];
  /** Edge ids between consecutive nodes */
  edgeIds: number[];
  cost: number;
  /** Nodes settled before the end node was reached */
  settledNodes: number;
}

/**
 * Cost of traversing an edge: `length × max(epsilon, 1 + Σ weight × penalty)`.
 *
 * Zero and missing weights drop their layer entirely. The result is never
 * below `length × epsilon`, even when light bonuses outweigh every penalty.
 */
export function edgeCost(
  lengthMeters: number,
  penalties: LayerValues | undefined,
  weights: RouteWeights,
  epsilon: number = DEFAULT_EPSILON,
): number {
  let factor = 1;
  if (penalties) {
    for (const layerType of LAYER_TYPES) {
      const weight = weights[layerType];
      if (!weight) continue;
      factor += weight * (penalties[layerType] ?? 0);
    }
  }
  return lengthMeters * Math.max(epsilon, factor);
}

function nearlyEqual(a: number, b: number): boolean {
  return Math.abs(a - b) <= COST_TOLERANCE * Math.max(Math.abs(a), Math.abs(b));
}

interface Label {
  cost: number;
  hops: number;
  /** -1 for the start node */
  prevNodeId: number;
  prevEdgeId: number;
}

interface QueueEntry {
  nodeId: number;
  cost: number;
  hops: number;
}

function compareEntries(a: QueueEntry, b: QueueEntry): number {
  return a.cost - b.cost || a.hops - b.hops || a.nodeId - b.nodeId;
}

/**
 * Find the cheapest path between two nodes.
 *
 * @throws NoRouteFoundError when the end node is unreachable from the start
 * @throws CancelledError when the signal is aborted mid-search
 */
export function findCalmPath(
  graph: StreetGraph,
  overlay: OverlayResult,
  weights: RouteWeights,
  startNodeId: number,
  endNodeId: number,
  options?: CalmSearchOptions,
): CalmPath {
  const startTime = performance.now();
  const epsilon = options?.epsilon ?? DEFAULT_EPSILON;
  const signal = options?.signal;

  const costs = graph.edges.map((edge) =>
    edgeCost(edge.lengthMeters, overlay.get(edge.id)?.penalties, weights, epsilon),
  );

  const labels: (Label | undefined)[] = new Array(graph.nodes.length);
  const settled = new Uint8Array(graph.nodes.length);
  let settledNodes = 0;

  /** Node ids from the start to `nodeId`, following settled/current labels */
  function nodeSequence(nodeId: number): number[] {
    const sequence: number[] = [];
    for (let id = nodeId; id !== -1; id = labels[id]?.prevNodeId ?? -1) {
      sequence.push(id);
    }
    return sequence.reverse();
  }

  function precedes(a: number[], b: number[]): boolean {
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      if (a[i] !== b[i]) return a[i]! < b[i]!;
    }
    return a.length < b.length;
  }

  function improves(candidate: Label, current: Label | undefined): boolean {
    if (!current) return true;
    if (!nearlyEqual(candidate.cost, current.cost)) return candidate.cost < current.cost;
    if (candidate.hops !== current.hops) return candidate.hops < current.hops;
    if (candidate.prevNodeId === current.prevNodeId) return false;
    // Same final node on both, so comparing the predecessor paths decides
    return precedes(nodeSequence(candidate.prevNodeId), nodeSequence(current.prevNodeId));
  }

  labels[startNodeId] = { cost: 0, hops: 0, prevNodeId: -1, prevEdgeId: -1 };
  const queue = new PriorityQueue<QueueEntry>(compareEntries);
  queue.enqueue({ nodeId: startNodeId, cost: 0, hops: 0 });

  while (!queue.isEmpty()) {
    if (signal?.aborted) {
      console.warn(`[calm-router] Cancelled after settling ${settledNodes} nodes`);
      throw new CancelledError();
    }

    const entry = queue.dequeue()!;
    if (settled[entry.nodeId]) continue;
    const label = labels[entry.nodeId];
    // Stale entry: the label improved after this was queued
    if (!label || label.cost !== entry.cost || label.hops !== entry.hops) continue;

    settled[entry.nodeId] = 1;
    settledNodes++;

    if (entry.nodeId === endNodeId) {
      const nodeIds = nodeSequence(endNodeId);
      const edgeIds: number[] = [];
      for (let i = 1; i < nodeIds.length; i++) {
        edgeIds.push(labels[nodeIds[i]!]!.prevEdgeId);
      }
      console.log(
        `[calm-router] ${edgeIds.length} edges, cost ${label.cost.toFixed(1)}, ${settledNodes} nodes settled in ${(performance.now() - startTime).toFixed(1)}ms`,
      );
      return { nodeIds, edgeIds, cost: label.cost, settledNodes };
    }

    for (const neighbor of graph.neighbors(entry.nodeId)) {
      if (settled[neighbor.nodeId]) continue;
      const candidate: Label = {
        cost: label.cost + costs[neighbor.edgeId]!,
        hops: label.hops + 1,
        prevNodeId: entry.nodeId,
        prevEdgeId: neighbor.edgeId,
      };
      if (improves(candidate, labels[neighbor.nodeId])) {
        labels[neighbor.nodeId] = candidate;
        queue.enqueue({ nodeId: neighbor.nodeId, cost: candidate.cost, hops: candidate.hops });
      }
    }
  }

  console.warn(
    `[calm-router] Node ${endNodeId} unreachable from ${startNodeId} (${settledNodes} nodes settled)`,
  );
  throw new NoRouteFoundError();
}
