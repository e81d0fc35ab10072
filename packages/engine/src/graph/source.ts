import type { BoundingBox, StreetSegment } from "@calm-routes/types";

/** Supplies raw street geometry for a bbox (OSM, a file, a fixture...) */
export interface StreetSegmentSource {
  readonly name: string;
  fetchSegments(bbox: BoundingBox): Promise<StreetSegment[]>;
}
