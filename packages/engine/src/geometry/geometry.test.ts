import { describe, it, expect } from "vitest";
import type { Coordinate, Polygon } from "@calm-routes/types";
import {
  bboxIntersects,
  bboxContains,
  circleApprox,
  distanceOutsideBbox,
  haversineDistance,
  isValidBbox,
  isValidCoordinate,
  pointInInterior,
  pointInPolygon,
  pointOnBoundary,
  polygonBbox,
  segmentBbox,
  segmentIntersectsPolygon,
  segmentsIntersect,
} from "./index.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function pt(lat: number, lng: number): Coordinate {
  return { lat, lng };
}

/** Unit square with corners (0,0) and (1,1) */
const SQUARE: Polygon = [pt(0, 0), pt(0, 1), pt(1, 1), pt(1, 0)];

/** L-shaped (concave) ring: unit square with the top-right quarter cut away */
const L_SHAPE: Polygon = [
  pt(0, 0),
  pt(0, 1),
  pt(0.5, 1),
  pt(0.5, 0.5),
  pt(1, 0.5),
  pt(1, 0),
];

const BASE_LAT = 55.75;
const BASE_LNG = 37.61;

// ─── pointInPolygon ─────────────────────────────────────────────────────────

describe("pointInPolygon", () => {
  it("finds an interior point", () => {
    expect(pointInPolygon(pt(0.5, 0.5), SQUARE)).toBe(true);
  });

  it("rejects an exterior point", () => {
    expect(pointInPolygon(pt(1.5, 0.5), SQUARE)).toBe(false);
    expect(pointInPolygon(pt(-0.1, -0.1), SQUARE)).toBe(false);
  });

  it("treats points on an edge as inside", () => {
    expect(pointInPolygon(pt(0, 0.5), SQUARE)).toBe(true);
    expect(pointInPolygon(pt(0.5, 1), SQUARE)).toBe(true);
  });

  it("treats vertices as inside", () => {
    expect(pointInPolygon(pt(1, 1), SQUARE)).toBe(true);
  });

  it("handles concave rings", () => {
    expect(pointInPolygon(pt(0.25, 0.75), L_SHAPE)).toBe(true);
    expect(pointInPolygon(pt(0.75, 0.25), L_SHAPE)).toBe(true);
    expect(pointInPolygon(pt(0.75, 0.75), L_SHAPE)).toBe(false);
  });

  it("returns false for degenerate rings", () => {
    expect(pointInPolygon(pt(0, 0), [pt(0, 0), pt(1, 1)])).toBe(false);
  });
});

describe("pointOnBoundary / pointInInterior", () => {
  it("finds points on the ring's edges and corners", () => {
    expect(pointOnBoundary(pt(0, 0.5), SQUARE)).toBe(true);
    expect(pointOnBoundary(pt(1, 1), SQUARE)).toBe(true);
    expect(pointOnBoundary(pt(0.5, 0.5), SQUARE)).toBe(false);
    expect(pointOnBoundary(pt(2, 0.5), SQUARE)).toBe(false);
  });

  it("excludes the boundary from the interior", () => {
    expect(pointInInterior(pt(0.5, 0.5), SQUARE)).toBe(true);
    expect(pointInInterior(pt(0, 0.5), SQUARE)).toBe(false);
    expect(pointInInterior(pt(1.5, 0.5), SQUARE)).toBe(false);
  });
});

// ─── Segments ───────────────────────────────────────────────────────────────

describe("segmentsIntersect", () => {
  it("detects a proper crossing", () => {
    expect(segmentsIntersect(pt(0, 0), pt(1, 1), pt(0, 1), pt(1, 0))).toBe(true);
  });

  it("detects touching endpoints", () => {
    expect(segmentsIntersect(pt(0, 0), pt(1, 1), pt(1, 1), pt(2, 0))).toBe(true);
  });

  it("rejects parallel disjoint segments", () => {
    expect(segmentsIntersect(pt(0, 0), pt(0, 1), pt(1, 0), pt(1, 1))).toBe(false);
  });

  it("rejects collinear but disjoint segments", () => {
    expect(segmentsIntersect(pt(0, 0), pt(0, 1), pt(0, 2), pt(0, 3))).toBe(false);
  });
});

describe("segmentIntersectsPolygon", () => {
  it("is true for a segment crossing the polygon with both endpoints outside", () => {
    expect(segmentIntersectsPolygon(pt(0.5, -0.5), pt(0.5, 1.5), SQUARE)).toBe(true);
  });

  it("is true when one endpoint is inside", () => {
    expect(segmentIntersectsPolygon(pt(0.5, 0.5), pt(0.5, 3), SQUARE)).toBe(true);
  });

  it("is true for a segment fully inside", () => {
    expect(segmentIntersectsPolygon(pt(0.2, 0.2), pt(0.8, 0.8), SQUARE)).toBe(true);
  });

  it("is true for a segment touching a corner", () => {
    expect(segmentIntersectsPolygon(pt(1, 1), pt(2, 2), SQUARE)).toBe(true);
  });

  it("is false for a segment entirely outside", () => {
    expect(segmentIntersectsPolygon(pt(2, 2), pt(3, 3), SQUARE)).toBe(false);
  });

  it("is false for a segment passing the notch of a concave ring", () => {
    expect(segmentIntersectsPolygon(pt(0.75, 0.6), pt(0.9, 0.9), L_SHAPE)).toBe(false);
  });
});

// ─── Bounding boxes ─────────────────────────────────────────────────────────

describe("bbox helpers", () => {
  const box = { minLat: 0, maxLat: 1, minLng: 0, maxLng: 1 };

  it("intersects overlapping and touching boxes", () => {
    expect(bboxIntersects(box, { minLat: 0.5, maxLat: 2, minLng: 0.5, maxLng: 2 })).toBe(true);
    expect(bboxIntersects(box, { minLat: 1, maxLat: 2, minLng: 1, maxLng: 2 })).toBe(true);
  });

  it("does not intersect disjoint boxes", () => {
    expect(bboxIntersects(box, { minLat: 1.1, maxLat: 2, minLng: 0, maxLng: 1 })).toBe(false);
    expect(bboxIntersects(box, { minLat: 0, maxLat: 1, minLng: -2, maxLng: -0.1 })).toBe(false);
  });

  it("computes segment and polygon bboxes", () => {
    expect(segmentBbox(pt(1, 0), pt(0, 2))).toEqual({ minLat: 0, maxLat: 1, minLng: 0, maxLng: 2 });
    expect(polygonBbox(L_SHAPE)).toEqual(box);
  });

  it("checks containment inclusively", () => {
    expect(bboxContains(box, pt(1, 0))).toBe(true);
    expect(bboxContains(box, pt(1.01, 0))).toBe(false);
  });

  it("validates boxes and coordinates", () => {
    expect(isValidBbox(box)).toBe(true);
    expect(isValidBbox({ minLat: 1, maxLat: 0, minLng: 0, maxLng: 1 })).toBe(false);
    expect(isValidCoordinate(pt(91, 0))).toBe(false);
    expect(isValidCoordinate(pt(0, Number.NaN))).toBe(false);
  });
});

// ─── Distances ──────────────────────────────────────────────────────────────

describe("distances", () => {
  it("measures one degree of latitude", () => {
    expect(haversineDistance(pt(0, 0), pt(1, 0))).toBeCloseTo(111_195, -1);
  });

  it("is zero inside a bbox", () => {
    const box = { minLat: BASE_LAT, maxLat: BASE_LAT + 0.01, minLng: BASE_LNG, maxLng: BASE_LNG + 0.01 };
    expect(distanceOutsideBbox(pt(BASE_LAT + 0.005, BASE_LNG + 0.005), box)).toBe(0);
  });

  it("measures the gap to the nearest bbox side", () => {
    const box = { minLat: BASE_LAT, maxLat: BASE_LAT + 0.01, minLng: BASE_LNG, maxLng: BASE_LNG + 0.01 };
    // 0.01° north of the box, inside its longitude span
    const d = distanceOutsideBbox(pt(BASE_LAT + 0.02, BASE_LNG + 0.005), box);
    expect(d).toBeCloseTo(1112, -1);
  });
});

// ─── circleApprox ───────────────────────────────────────────────────────────

describe("circleApprox", () => {
  const center = pt(BASE_LAT, BASE_LNG);

  it("produces the requested number of vertices", () => {
    expect(circleApprox(center, 100, 16)).toHaveLength(16);
  });

  it("places every vertex about radius meters from the center", () => {
    for (const vertex of circleApprox(center, 100, 16)) {
      const d = haversineDistance(center, vertex);
      expect(d).toBeGreaterThan(99);
      expect(d).toBeLessThan(101);
    }
  });

  it("starts due east of the center", () => {
    const [first] = circleApprox(center, 100, 4);
    expect(first!.lat).toBeCloseTo(BASE_LAT, 10);
    expect(first!.lng).toBeGreaterThan(BASE_LNG);
  });

  it("contains its center", () => {
    expect(pointInPolygon(center, circleApprox(center, 50, 8))).toBe(true);
  });

  it("rejects fewer than three points", () => {
    expect(() => circleApprox(center, 100, 2)).toThrow(RangeError);
  });

  it("rejects a non-positive radius", () => {
    expect(() => circleApprox(center, 0, 8)).toThrow(RangeError);
  });
});
