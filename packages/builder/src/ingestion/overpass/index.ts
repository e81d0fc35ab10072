/**
 * Overpass API ingestion module.
 *
 * Queries the Overpass API for walkable streets within a bounding box.
 */

export {
  buildOverpassQuery,
  fetchOverpassData,
  DEFAULT_OVERPASS_ENDPOINT,
  type OverpassOptions,
} from "./query.js";
export { parseOverpassResponse } from "./parser.js";
export {
  defaultCacheDir,
  bboxCacheKey,
  readCachedResponse,
  writeCachedResponse,
  getCachePath,
} from "./cache.js";
