/**
 * Layer sources: polygon files, places lookups and synthetic fill.
 */

export {
  loadPolygonFile,
  parsePolygonFile,
  polygonFilePath,
  FileLayerSource,
} from "./polygon-file.js";
export {
  PlacesClient,
  PlacesLightSource,
  type Place,
  type PlacesClientConfig,
  type PlacesLightOptions,
} from "./places.js";
export {
  SyntheticLayerSource,
  seededRng,
  syntheticMetrics,
  type Rng,
  type SyntheticLayerOptions,
} from "./synthetic.js";
