/**
 * Overpass JSON response parser.
 *
 * Converts walkable ways into street segments. With `out body geom;`,
 * every way carries its own inline geometry, so no node lookup is needed.
 */

import type { Coordinate, StreetSegment } from "@calm-routes/types";
import type { OverpassJson, OverpassWay } from "overpass-ts";
import { extractName, isWalkable } from "../highways.js";

/**
 * Parse an Overpass JSON response into street segments.
 *
 * Non-walkable ways and ways with fewer than two usable points are skipped.
 */
export function parseOverpassResponse(response: OverpassJson): StreetSegment[] {
  const segments: StreetSegment[] = [];
  let skipped = 0;

  for (const element of response.elements) {
    if (element.type !== "way") continue;
    const way = element as OverpassWay;

    if (!isWalkable(way.tags)) {
      skipped++;
      continue;
    }

    const geometry: Coordinate[] = [];
    for (const point of way.geometry ?? []) {
      // Points can be null where a way leaves the query area
      if (point) geometry.push({ lat: point.lat, lng: point.lon });
    }
    if (geometry.length < 2) {
      skipped++;
      continue;
    }

    const segment: StreetSegment = { id: `way/${way.id}`, geometry };
    const name = extractName(way.tags);
    if (name) segment.name = name;
    segments.push(segment);
  }

  if (skipped > 0) {
    console.log(`[overpass] Parsed ${segments.length} walkable ways (${skipped} skipped)`);
  }
  return segments;
}
