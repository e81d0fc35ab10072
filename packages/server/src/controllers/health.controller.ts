import { Controller } from "@tsoa/runtime";
import type { HealthResponse } from "../models/responses.js";
import type { GraphCacheService } from "../services/graph-cache.service.js";

/** GET /health */
export class HealthController extends Controller {
  constructor(private readonly cache: GraphCacheService) {
    super();
  }

  /** Health check with graph cache statistics */
  public async getHealth(): Promise<HealthResponse> {
    return {
      status: "ok",
      uptime: process.uptime(),
      cache: this.cache.getStats(),
    };
  }
}
