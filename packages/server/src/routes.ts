/**
 * Express routes for the controllers.
 *
 * Each request gets a fresh controller; inputs are validated before the
 * controller runs and the controller's status (default 200) is sent with
 * its result. Routing is registered here by hand, so controllers carry no
 * route metadata of their own.
 */

import type { Controller } from "@tsoa/runtime";
import type { Express, NextFunction, Request, Response } from "express";

import { ConfigController } from "./controllers/config.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { LayerController } from "./controllers/layer.controller.js";
import { RouteController } from "./controllers/route.controller.js";
import {
  parseBboxQuery,
  parseCalmRouteRequest,
  parseLayersQuery,
  parseOptionalString,
  parseTimeQuery,
} from "./middleware/validation.js";
import type { CalmRouteService } from "./services/calm-route.service.js";
import type { GraphCacheService } from "./services/graph-cache.service.js";
import type { LayerService } from "./services/layer.service.js";

export interface AppServices {
  routes: CalmRouteService;
  layers: LayerService;
  graphCache: GraphCacheService;
  /** Weight config directory (default: the repo's configs/weights) */
  configsRoot?: string;
}

/** The part of an express Response that `requestSignal` watches */
export interface ClosableResponse {
  readonly writableEnded: boolean;
  once(event: "close", listener: () => void): unknown;
}

function handle<C extends Controller, T>(
  makeController: () => C,
  run: (controller: C, req: Request, res: Response) => Promise<T>,
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    const controller = makeController();
    Promise.resolve()
      .then(() => run(controller, req, res))
      .then((result) => {
        if (res.headersSent) return;
        res.status(controller.getStatus() ?? 200).json(result);
      })
      .catch(next);
  };
}

/**
 * AbortSignal that fires when the client goes away before the response is
 * sent.
 */
export function requestSignal(res: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  res.once("close", () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export function registerRoutes(app: Express, services: AppServices): void {
  app.post(
    "/api/routes/calm",
    handle(
      () => new RouteController(services.routes),
      (controller, req, res) =>
        controller.computeCalmRoute(parseCalmRouteRequest(req.body), requestSignal(res)),
    ),
  );

  app.get(
    "/api/layers",
    handle(
      () => new LayerController(services.layers),
      (controller, req) =>
        controller.getLayers(
          parseBboxQuery(req.query["bbox"]),
          parseLayersQuery(req.query["layers"]),
          parseTimeQuery(req.query["time"]),
        ),
    ),
  );

  app.get(
    "/api/config/weights",
    handle(
      () => new ConfigController(services.configsRoot),
      (controller, req) => controller.getWeights(parseOptionalString(req.query["profile"], "profile")),
    ),
  );

  app.get(
    "/api/config/profiles",
    handle(
      () => new ConfigController(services.configsRoot),
      (controller) => controller.getProfiles(),
    ),
  );

  app.get(
    "/health",
    handle(
      () => new HealthController(services.graphCache),
      (controller) => controller.getHealth(),
    ),
  );
}
