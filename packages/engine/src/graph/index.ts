export {
  StreetGraph,
  buildStreetGraph,
  DEFAULT_OUT_OF_RANGE_TOLERANCE_METERS,
  type Neighbor,
  type SnapResult,
  type StreetGraphOptions,
  type StreetGraphStats,
} from "./street-graph.js";
export type { StreetSegmentSource } from "./source.js";
