/**
 * Request validation for the express routes.
 *
 * Collects every problem into tsoa's FieldErrors shape and throws a single
 * ValidateError, which the error handler reports as 422.
 */

import { ValidateError, type FieldErrors } from "@tsoa/runtime";
import {
  LAYER_TYPES,
  isLayerType,
  type BoundingBox,
  type Coordinate,
  type LayerType,
  type RouteWeights,
} from "@calm-routes/types";
import { isValidBbox, travelHour } from "@calm-routes/engine";

import type { CalmRouteApiRequest } from "../models/requests.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function fail(fields: FieldErrors): never {
  throw new ValidateError(fields, "Validation failed");
}

function checkCoordinate(value: unknown, field: string, errors: FieldErrors): Coordinate | undefined {
  const lat = isRecord(value) ? value["lat"] : undefined;
  const lng = isRecord(value) ? value["lng"] : undefined;
  if (!isFiniteNumber(lat) || !isFiniteNumber(lng)) {
    errors[field] = { message: "expected { lat: number, lng: number }", value };
    return undefined;
  }
  if (lat < -90 || lat > 90 || lng < -180 || lng > 180) {
    errors[field] = { message: "lat must be within [-90, 90] and lng within [-180, 180]", value };
    return undefined;
  }
  return { lat, lng };
}

function checkBbox(value: unknown, field: string, errors: FieldErrors): BoundingBox | undefined {
  const prop = (key: string): unknown => (isRecord(value) ? value[key] : undefined);
  const minLat = prop("minLat");
  const minLng = prop("minLng");
  const maxLat = prop("maxLat");
  const maxLng = prop("maxLng");
  if (!isFiniteNumber(minLat) || !isFiniteNumber(minLng) || !isFiniteNumber(maxLat) || !isFiniteNumber(maxLng)) {
    errors[field] = { message: "expected { minLat, minLng, maxLat, maxLng } numbers", value };
    return undefined;
  }
  const bbox = { minLat, minLng, maxLat, maxLng };
  if (!isValidBbox(bbox)) {
    errors[field] = { message: "bbox must be within coordinate range with min <= max", value };
    return undefined;
  }
  return bbox;
}

function checkWeights(value: unknown, field: string, errors: FieldErrors): RouteWeights | undefined {
  if (!isRecord(value)) {
    errors[field] = { message: "expected an object of layer weights", value };
    return undefined;
  }
  const weights: RouteWeights = {};
  for (const [key, weight] of Object.entries(value)) {
    if (!isLayerType(key)) {
      errors[`${field}.${key}`] = { message: `unknown layer; expected one of ${LAYER_TYPES.join(", ")}`, value: weight };
    } else if (!isFiniteNumber(weight) || weight < 0) {
      errors[`${field}.${key}`] = { message: "must be a non-negative number", value: weight };
    } else {
      weights[key] = weight;
    }
  }
  return weights;
}

/** Validate a POST /api/routes/calm body */
export function parseCalmRouteRequest(body: unknown): CalmRouteApiRequest {
  if (!isRecord(body)) fail({ body: { message: "expected a JSON object", value: body } });

  const errors: FieldErrors = {};
  const start = checkCoordinate(body["start"], "body.start", errors);
  const end = checkCoordinate(body["end"], "body.end", errors);
  const bbox = body["bbox"] === undefined ? undefined : checkBbox(body["bbox"], "body.bbox", errors);
  const weights = body["weights"] === undefined ? undefined : checkWeights(body["weights"], "body.weights", errors);

  const profile = body["profile"];
  if (profile !== undefined && (typeof profile !== "string" || profile.length === 0)) {
    errors["body.profile"] = { message: "expected a non-empty string", value: profile };
  }

  const departureTime = body["departureTime"];
  if (departureTime !== undefined && (typeof departureTime !== "string" || travelHour(departureTime) === undefined)) {
    errors["body.departureTime"] = { message: "expected an ISO 8601 date-time", value: departureTime };
  }

  if (!start || !end || Object.keys(errors).length > 0) fail(errors);

  const request: CalmRouteApiRequest = { start, end };
  if (bbox) request.bbox = bbox;
  if (weights) request.weights = weights;
  if (typeof profile === "string") request.profile = profile;
  if (typeof departureTime === "string") request.departureTime = departureTime;
  return request;
}

/** Parse `minLat,minLng,maxLat,maxLng` */
export function parseBboxQuery(value: unknown): BoundingBox {
  if (typeof value !== "string") fail({ bbox: { message: "required: minLat,minLng,maxLat,maxLng", value } });

  const parts = value.split(",").map((part) => (part.trim() === "" ? NaN : Number(part)));
  if (parts.length !== 4) {
    fail({ bbox: { message: "expected four comma-separated numbers: minLat,minLng,maxLat,maxLng", value } });
  }
  const [minLat, minLng, maxLat, maxLng] = parts;

  const errors: FieldErrors = {};
  const bbox = checkBbox({ minLat, minLng, maxLat, maxLng }, "bbox", errors);
  if (!bbox) fail(errors);
  return bbox;
}

/** Parse a comma-separated layer list; missing means all layers */
export function parseLayersQuery(value: unknown): LayerType[] {
  if (value === undefined || value === "") return [...LAYER_TYPES];
  if (typeof value !== "string") fail({ layers: { message: "expected a comma-separated list", value } });

  const requested = value.split(",").map((part) => part.trim());
  const unknown = requested.filter((name) => !isLayerType(name));
  if (unknown.length > 0) {
    fail({ layers: { message: `unknown layer(s) ${unknown.join(", ")}; expected ${LAYER_TYPES.join(", ")}`, value } });
  }
  return LAYER_TYPES.filter((t) => requested.includes(t));
}

/** Optional ISO 8601 `time` query parameter, as its wall-clock hour */
export function parseTimeQuery(value: unknown): number | undefined {
  const time = parseOptionalString(value, "time");
  if (time === undefined) return undefined;
  const hour = travelHour(time);
  if (hour === undefined) fail({ time: { message: "expected an ISO 8601 date-time", value } });
  return hour;
}

/** Optional string query parameter */
export function parseOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === "") return undefined;
  if (typeof value !== "string") fail({ [field]: { message: "expected a single string", value } });
  return value;
}
