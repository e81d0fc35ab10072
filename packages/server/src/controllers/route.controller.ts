import { Controller } from "@tsoa/runtime";
import type { CalmRouteApiRequest } from "../models/requests.js";
import type { CalmRouteResponse } from "../models/responses.js";
import type { CalmRouteService } from "../services/calm-route.service.js";

/** POST /api/routes/calm */
export class RouteController extends Controller {
  constructor(private readonly service: CalmRouteService) {
    super();
  }

  /**
   * Compute the calmest walking route between two points.
   * Answers 404 without map data or a connecting route, 422 for an invalid
   * request or a point outside the covered area.
   */
  public async computeCalmRoute(
    body: CalmRouteApiRequest,
    signal?: AbortSignal,
  ): Promise<CalmRouteResponse> {
    return this.service.compute(body, signal);
  }
}
