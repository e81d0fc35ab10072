/**
 * Calm route search: edge costing, Dijkstra and result assembly.
 */

export { PriorityQueue } from "./priority-queue.js";
export {
  edgeCost,
  findCalmPath,
  DEFAULT_EPSILON,
  type CalmPath,
  type CalmSearchOptions,
} from "./calm-router.js";
export {
  buildRouteResult,
  WALKING_SPEED_MPS,
  MAX_WARNINGS,
  type RouteBuildInput,
} from "./route-builder.js";
