import { LAYER_TYPES } from "@calm-routes/types";
import { FallbackLayerSource, LayerRouter, type LayerSource } from "@calm-routes/engine";
import {
  FileLayerSource,
  OverpassStreetSource,
  PlacesClient,
  PlacesLightSource,
  SyntheticLayerSource,
} from "@calm-routes/builder";
import { createApp } from "./app.js";
import { loadServerConfig, type ServerConfig } from "./config.js";
import { CalmRouteService } from "./services/calm-route.service.js";
import { GraphCacheService } from "./services/graph-cache.service.js";
import { LayerService } from "./services/layer.service.js";

/**
 * Layer polygons from files; light from the places catalogue when one is
 * configured; synthetic fill for whatever is still empty when enabled.
 */
function buildLayerSource(config: ServerConfig): LayerSource {
  let source: LayerSource = new FileLayerSource(config.polygonDataDir, LAYER_TYPES);

  if (config.placesApiUrl) {
    const places = new PlacesLightSource(
      new PlacesClient({ baseUrl: config.placesApiUrl, apiKey: config.placesApiKey }),
    );
    source = new LayerRouter({ light: new FallbackLayerSource(places, source) }, source);
  }

  if (config.syntheticLayers) {
    source = new FallbackLayerSource(source, new SyntheticLayerSource());
  }

  return source;
}

const config = loadServerConfig();
const graphCache = new GraphCacheService(config.graphCacheSize);
const layers = buildLayerSource(config);
const streets = new OverpassStreetSource({
  endpoint: config.overpassEndpoint,
  cacheDir: config.overpassCacheDir,
});

const app = createApp({
  routes: new CalmRouteService({ streets, layers, graphCache, bufferKm: config.routeBboxBufferKm }),
  layers: new LayerService(layers),
  graphCache,
});

app.listen(config.port, () => {
  console.log(`\nCalm Routes API server running at http://localhost:${config.port}`);
  console.log(`Layer source: ${layers.name}\n`);
});
