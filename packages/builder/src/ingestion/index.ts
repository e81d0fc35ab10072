/**
 * Street data ingestion.
 *
 * Pipeline:
 * Overpass API (cached on disk) -> walkable ways -> StreetSegment[]
 */

import type { BoundingBox, StreetSegment } from "@calm-routes/types";
import type { StreetSegmentSource } from "@calm-routes/engine";
import { fetchOverpassData, parseOverpassResponse, type OverpassOptions } from "./overpass/index.js";

/**
 * Fetch walkable street segments for a bbox from Overpass.
 */
export async function ingestFromOverpass(
  bbox: BoundingBox,
  options?: OverpassOptions,
): Promise<StreetSegment[]> {
  const data = await fetchOverpassData(bbox, options);
  return parseOverpassResponse(data);
}

/** Street segments from the Overpass API */
export class OverpassStreetSource implements StreetSegmentSource {
  readonly name = "overpass";

  constructor(private readonly options?: OverpassOptions) {}

  fetchSegments(bbox: BoundingBox): Promise<StreetSegment[]> {
    return ingestFromOverpass(bbox, this.options);
  }
}
