/**
 * Engine error taxonomy.
 *
 * Every failure of a route request is terminal; the engine never retries
 * and never returns a partial route. Each error carries a stable `code`
 * and the HTTP status the API layer reports it with.
 */

export type EngineErrorCode =
  | "NO_GRAPH_DATA"
  | "POINT_OUT_OF_RANGE"
  | "NO_ROUTE_FOUND"
  | "CANCELLED"
  | "INVALID_REQUEST";

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;
  abstract readonly status: number;
}

/** The bbox yields no street edges */
export class NoGraphDataError extends EngineError {
  readonly code = "NO_GRAPH_DATA";
  readonly status = 404;

  constructor(message = "No map data for area") {
    super(message);
    this.name = "NoGraphDataError";
  }
}

/** A start or end point lies outside the graph's coverage */
export class PointOutOfRangeError extends EngineError {
  readonly code = "POINT_OUT_OF_RANGE";
  readonly status = 422;

  constructor(
    readonly which: "start" | "end" | "point",
    readonly distanceOutsideMeters: number,
  ) {
    super(
      `The ${which === "point" ? "point" : `${which} point`} is ${Math.round(distanceOutsideMeters)}m outside the covered area`,
    );
    this.name = "PointOutOfRangeError";
  }
}

/** Start and end are not in the same connected component */
export class NoRouteFoundError extends EngineError {
  readonly code = "NO_ROUTE_FOUND";
  readonly status = 404;

  constructor(message = "No route") {
    super(message);
    this.name = "NoRouteFoundError";
  }
}

/** The caller aborted the request */
export class CancelledError extends EngineError {
  readonly code = "CANCELLED";
  readonly status = 499;

  constructor(message = "Route computation cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

/** The request breaks a data-model invariant (coordinate range, bbox order, weights) */
export class InvalidRequestError extends EngineError {
  readonly code = "INVALID_REQUEST";
  readonly status = 422;

  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
