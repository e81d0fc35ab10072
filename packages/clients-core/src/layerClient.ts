import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { BoundingBox, LayerType, LayersResponse } from "./types.js";

export class LayerClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/layers", config);
  }

  /**
   * Layer polygons inside a bbox; all layers unless `layers` is given.
   * `time` (ISO 8601) shows crowd levels as they are at that hour.
   */
  public async getLayers(
    bbox: BoundingBox,
    layers?: LayerType[],
    time?: string,
  ): Promise<LayersResponse> {
    const query: Record<string, unknown> = {
      bbox: [bbox.minLat, bbox.minLng, bbox.maxLat, bbox.maxLng].join(","),
    };
    if (layers && layers.length > 0) query["layers"] = layers.join(",");
    if (time) query["time"] = time;
    return this.client.get<LayersResponse>({ query });
  }
}
