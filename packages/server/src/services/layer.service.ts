/**
 * Layer service: layer polygons for a bbox as map-ready features.
 */

import type { BoundingBox, LayerPolygon, LayerType } from "@calm-routes/types";
import {
  classifyLayerValue,
  effectiveLayerValue,
  loadLayerStore,
  type LayerSource,
} from "@calm-routes/engine";

import type { LayerFeature, LayersResponse } from "../models/responses.js";

/** Map feature for a polygon; `hour` applies the rush hour crowd bump */
export function toLayerFeature(polygon: LayerPolygon, hour?: number): LayerFeature {
  const value = effectiveLayerValue(polygon, hour);
  const feature: LayerFeature = {
    id: polygon.id,
    coordinates: polygon.ring.map((c): [number, number] => [c.lng, c.lat]),
    value,
    level: classifyLayerValue(polygon.layerType, value),
    metrics: polygon.metrics,
  };
  if (polygon.streetName) feature.streetName = polygon.streetName;
  return feature;
}

export class LayerService {
  constructor(private readonly source: LayerSource) {}

  async getLayers(bbox: BoundingBox, layerTypes: readonly LayerType[], hour?: number): Promise<LayersResponse> {
    const store = await loadLayerStore(this.source, bbox, layerTypes);
    const layers: LayersResponse["layers"] = {};
    for (const layerType of layerTypes) {
      layers[layerType] = store.query(layerType, bbox).map((polygon) => toLayerFeature(polygon, hour));
    }
    return { bbox, updatedAt: new Date().toISOString(), layers };
  }
}
