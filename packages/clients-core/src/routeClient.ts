import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { CalmRouteRequest, CalmRouteResponse } from "./types.js";

export class RouteClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/routes", config);
  }

  /** Compute the calmest walking route between two points */
  public async computeCalmRoute(
    request: CalmRouteRequest,
    signal?: AbortSignal,
  ): Promise<CalmRouteResponse> {
    return this.client.post<CalmRouteResponse>({
      path: "calm",
      body: request,
      signal,
    });
  }
}
