/**
 * Calm route service: weights + street graph + layers → route.
 *
 * Resolves the request's weights, fetches (or reuses) the street graph and
 * loads the layer polygons for the route bbox concurrently, then runs the
 * engine.
 */

import { LAYER_TYPES, type BoundingBox } from "@calm-routes/types";
import {
  buildStreetGraph,
  computeCalmRoute,
  fmtBbox,
  InvalidRequestError,
  loadLayerStore,
  resolveWeights,
  travelHour,
  type LayerSource,
  type StreetSegmentSource,
} from "@calm-routes/engine";
import { bboxForRoute, DEFAULT_ROUTE_BUFFER_KM } from "@calm-routes/builder";

import type { CalmRouteApiRequest } from "../models/requests.js";
import type { CalmRouteResponse } from "../models/responses.js";
import type { GraphCacheService } from "./graph-cache.service.js";

export interface CalmRouteServiceDeps {
  streets: StreetSegmentSource;
  layers: LayerSource;
  graphCache: GraphCacheService;
  /** Buffer around start/end when the request has no bbox (default 0.5km) */
  bufferKm?: number;
  /** Weight config directory (default: the repo's configs/weights) */
  configsRoot?: string;
}

/** Wall-clock hour of the departure time, as written by the caller */
function departureHour(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const hour = travelHour(value);
  if (hour === undefined) {
    throw new InvalidRequestError(`Invalid departureTime "${value}"`);
  }
  return hour;
}

export class CalmRouteService {
  private readonly bufferKm: number;

  constructor(private readonly deps: CalmRouteServiceDeps) {
    this.bufferKm = deps.bufferKm ?? DEFAULT_ROUTE_BUFFER_KM;
  }

  /** The bbox a request routes in */
  routeBbox(req: CalmRouteApiRequest): BoundingBox {
    return req.bbox ?? bboxForRoute(req.start, req.end, this.bufferKm);
  }

  async compute(req: CalmRouteApiRequest, signal?: AbortSignal): Promise<CalmRouteResponse> {
    const start = performance.now();
    const hour = departureHour(req.departureTime);
    const { weights, profile } = resolveWeights(
      { weights: req.weights, profile: req.profile },
      this.deps.configsRoot,
    );
    const bbox = this.routeBbox(req);

    console.log(
      `[route-api] ${fmtBbox(bbox)}${profile ? ` profile=${profile.name}` : ""} weights=${JSON.stringify(weights)}`,
    );

    const [{ graph, cached }, layers] = await Promise.all([
      this.deps.graphCache.getOrBuild(bbox, async () =>
        buildStreetGraph(await this.deps.streets.fetchSegments(bbox), bbox),
      ),
      loadLayerStore(this.deps.layers, bbox, LAYER_TYPES),
    ]);

    const route = computeCalmRoute(
      { start: req.start, end: req.end, bbox, weights },
      { graph, layers },
      { signal, overlay: { hour } },
    );

    const searchTimeMs = Math.round((performance.now() - start) * 100) / 100;
    console.log(`[route-api] Done in ${searchTimeMs}ms (graph ${cached ? "cached" : "built"})`);

    return {
      route,
      meta: {
        searchTimeMs,
        bbox,
        weights,
        ...(profile ? { profile: profile.name } : {}),
        graphCached: cached,
      },
    };
  }
}
