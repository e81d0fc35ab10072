import { Controller } from "@tsoa/runtime";
import type { BoundingBox, LayerType } from "@calm-routes/types";
import type { LayersResponse } from "../models/responses.js";
import type { LayerService } from "../services/layer.service.js";

/** GET /api/layers?bbox=minLat,minLng,maxLat,maxLng&layers=noise,crowd&time=<ISO 8601> */
export class LayerController extends Controller {
  constructor(private readonly service: LayerService) {
    super();
  }

  /**
   * Layer polygons inside a bbox, with level labels.
   * @param hour wall-clock hour of `time`; crowd values include the rush hour bump
   */
  public async getLayers(
    bbox: BoundingBox,
    layers: LayerType[],
    hour?: number,
  ): Promise<LayersResponse> {
    return this.service.getLayers(bbox, layers, hour);
  }
}
