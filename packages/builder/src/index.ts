/**
 * @calm-routes/builder
 *
 * Data provisioning for the calm route engine.
 *
 * Pipeline:
 * 1. Query Overpass for walkable streets (cached on disk) -> StreetSegment[]
 * 2. Load layer polygons from files, a places catalogue or synthetic fill
 * 3. Hand both to @calm-routes/engine for graph building and routing
 */

// Ingestion
export { ingestFromOverpass, OverpassStreetSource } from "./ingestion/index.js";
export {
  WALKABLE_HIGHWAYS,
  isWalkable,
  extractName,
  type OsmTags,
  type WalkableHighway,
} from "./ingestion/highways.js";

// Overpass API
export {
  buildOverpassQuery,
  fetchOverpassData,
  parseOverpassResponse,
  defaultCacheDir,
  bboxCacheKey,
  getCachePath,
  readCachedResponse,
  writeCachedResponse,
  DEFAULT_OVERPASS_ENDPOINT,
  type OverpassOptions,
} from "./ingestion/overpass/index.js";

// Layer sources
export {
  loadPolygonFile,
  parsePolygonFile,
  polygonFilePath,
  FileLayerSource,
  PlacesClient,
  PlacesLightSource,
  SyntheticLayerSource,
  seededRng,
  syntheticMetrics,
  type Place,
  type PlacesClientConfig,
  type PlacesLightOptions,
  type Rng,
  type SyntheticLayerOptions,
} from "./layers/index.js";

// Route area
export { bboxForRoute, expandBbox, DEFAULT_ROUTE_BUFFER_KM } from "./location/index.js";
