import { describe, it, expect, vi } from "vitest";
import type {
  BoundingBox,
  Coordinate,
  LayerMetrics,
  LayerPolygon,
  LayerType,
  StreetSegment,
} from "@calm-routes/types";
import { buildStreetGraph } from "../graph/index.js";
import { LayerStore, type LayerQuery } from "../layers/index.js";
import { segmentBbox } from "../geometry/index.js";
import {
  aggregateOverlays,
  effectiveLayerValue,
  normalizeMetric,
  travelHour,
  type OverlayOptions,
} from "./aggregator.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const BASE_LAT = 55.75;
const BASE_LNG = 37.61;
const DEG_PER_M = 180 / (Math.PI * 6_371_000);

function at(northMeters: number, dLng = 0): Coordinate {
  return { lat: BASE_LAT + northMeters * DEG_PER_M, lng: BASE_LNG + dLng };
}

const BBOX: BoundingBox = {
  minLat: BASE_LAT - 0.01,
  maxLat: BASE_LAT + 0.01,
  minLng: BASE_LNG - 0.01,
  maxLng: BASE_LNG + 0.01,
};

/** A 200m street running north from the base point */
const street: StreetSegment = { id: "street", geometry: [at(0), at(200)] };
const graph = buildStreetGraph([street], BBOX);

/** Rectangle spanning [south, north] meters and 0.001° either side of the street */
function rect(
  id: string,
  layerType: LayerType,
  south: number,
  north: number,
  metrics: LayerMetrics,
): LayerPolygon {
  return {
    id,
    layerType,
    ring: [at(south, -0.001), at(south, 0.001), at(north, 0.001), at(north, -0.001)],
    metrics,
  };
}

function penaltyOf(polygons: LayerPolygon[], layerType: LayerType, options: OverlayOptions = {}): number {
  const overlay = aggregateOverlays(graph, new LayerStore(polygons), [layerType], options);
  return overlay.get(0)?.penalties[layerType] ?? NaN;
}

// ─── normalizeMetric ────────────────────────────────────────────────────────

describe("normalizeMetric", () => {
  it("divides by the default ceilings", () => {
    expect(normalizeMetric("noise", 90)).toBeCloseTo(0.9);
    expect(normalizeMetric("crowd", 4)).toBeCloseTo(0.8);
  });

  it("turns light into a bonus", () => {
    expect(normalizeMetric("light", 100)).toBeCloseTo(-0.5);
  });

  it("treats any puddle value as a full penalty", () => {
    expect(normalizeMetric("puddles", 1)).toBe(1);
    expect(normalizeMetric("puddles", 0)).toBe(0);
  });

  it("accepts custom ceilings", () => {
    expect(normalizeMetric("noise", 90, { noiseDb: 90, crowdLevel: 5, lightLux: 200 })).toBe(1);
  });
});

// ─── travelHour ─────────────────────────────────────────────────────────────

describe("travelHour", () => {
  it("reads the hour in the timestamp's own offset", () => {
    expect(travelHour("2024-01-15T08:30:00+03:00")).toBe(8);
    expect(travelHour("2024-01-15T17:05:00-05:00")).toBe(17);
    expect(travelHour("2024-01-15T23:59:59Z")).toBe(23);
  });

  it("reads local timestamps without an offset", () => {
    expect(travelHour("2024-01-15T09:00")).toBe(9);
  });

  it("treats a bare date as midnight", () => {
    expect(travelHour("2024-01-15")).toBe(0);
  });

  it("rejects anything that is not ISO 8601", () => {
    expect(travelHour("soon")).toBeUndefined();
    expect(travelHour("January 15, 2024 08:30")).toBeUndefined();
  });

  it("feeds the rush hour bump regardless of the host timezone", () => {
    const crowd: LayerPolygon = rect("c", "crowd", 0, 10, { crowdLevel: 3 });
    expect(effectiveLayerValue(crowd, travelHour("2024-01-15T08:30:00+03:00"))).toBe(4);
  });
});

// ─── effectiveLayerValue ────────────────────────────────────────────────────

describe("effectiveLayerValue", () => {
  const crowd = rect("c", "crowd", 0, 10, { crowdLevel: 3 });

  it("raises crowd by one level during rush hour", () => {
    expect(effectiveLayerValue(crowd, 8)).toBe(4);
    expect(effectiveLayerValue(crowd, 18)).toBe(4);
  });

  it("leaves crowd alone outside rush hour", () => {
    expect(effectiveLayerValue(crowd, 13)).toBe(3);
    expect(effectiveLayerValue(crowd)).toBe(3);
  });

  it("caps the rush hour crowd level at 5", () => {
    const packed = rect("p", "crowd", 0, 10, { crowdLevel: 5 });
    expect(effectiveLayerValue(packed, 9)).toBe(5);
  });

  it("does not invent a crowd level for polygons without one", () => {
    const empty = rect("e", "crowd", 0, 10, {});
    expect(effectiveLayerValue(empty, 9)).toBe(0);
  });

  it("only adjusts the crowd layer", () => {
    const noise = rect("n", "noise", 0, 10, { noiseDb: 70, crowdLevel: 3 });
    expect(effectiveLayerValue(noise, 8)).toBe(70);
  });
});

// ─── aggregateOverlays ──────────────────────────────────────────────────────

describe("aggregateOverlays", () => {
  it("applies the full fraction when both endpoints are inside", () => {
    expect(penaltyOf([rect("n", "noise", -10, 210, { noiseDb: 90 })], "noise")).toBeCloseTo(0.9);
  });

  it("applies the partial fraction when one endpoint is inside", () => {
    expect(penaltyOf([rect("n", "noise", -10, 100, { noiseDb: 90 })], "noise")).toBeCloseTo(0.45);
  });

  it("applies the crossing fraction when the edge only passes through", () => {
    expect(penaltyOf([rect("n", "noise", 50, 150, { noiseDb: 90 })], "noise")).toBeCloseTo(0.225);
  });

  it("scores a fully covered edge above one that only touches the boundary", () => {
    const full = penaltyOf([rect("n", "noise", -10, 210, { noiseDb: 90 })], "noise");
    const touching = penaltyOf([rect("n", "noise", 200, 300, { noiseDb: 90 })], "noise");
    expect(touching).toBeGreaterThan(0);
    expect(full).toBeGreaterThan(touching);
  });

  it("scores a street inside a polygon above one lying along its side", () => {
    const around = rect("around", "noise", -10, 210, { noiseDb: 90 });
    const alongside: LayerPolygon = {
      id: "alongside",
      layerType: "noise",
      ring: [at(-10), at(-10, 0.001), at(210, 0.001), at(210)],
      metrics: { noiseDb: 90 },
    };

    expect(penaltyOf([around], "noise")).toBeCloseTo(0.9);
    expect(penaltyOf([alongside], "noise")).toBeCloseTo(0.225);
  });

  it("treats an edge between two boundary points across the interior as inside", () => {
    expect(penaltyOf([rect("n", "noise", 0, 200, { noiseDb: 90 })], "noise")).toBeCloseTo(0.9);
  });

  it("treats an endpoint resting on the boundary as touching", () => {
    expect(penaltyOf([rect("n", "noise", 200, 300, { noiseDb: 90 })], "noise")).toBeCloseTo(0.225);
  });

  it("ignores polygons beside the edge", () => {
    const beside: LayerPolygon = {
      id: "beside",
      layerType: "noise",
      ring: [at(0, 0.0005), at(0, 0.001), at(200, 0.001), at(200, 0.0005)],
      metrics: { noiseDb: 90 },
    };
    expect(penaltyOf([beside], "noise")).toBe(0);
  });

  it("sums overlapping polygons", () => {
    const polygons = [
      rect("a", "noise", -10, 210, { noiseDb: 60 }),
      rect("b", "noise", -10, 100, { noiseDb: 80 }),
    ];
    expect(penaltyOf(polygons, "noise")).toBeCloseTo(0.6 + 0.4);
  });

  it("gives light a negative penalty", () => {
    expect(penaltyOf([rect("l", "light", -10, 210, { lightLux: 100 })], "light")).toBeCloseTo(-0.5);
  });

  it("counts missing metrics as zero", () => {
    expect(penaltyOf([rect("n", "noise", -10, 210, {})], "noise")).toBe(0);
  });

  it("raises crowd penalties at rush hour", () => {
    const polygons = [rect("c", "crowd", -10, 210, { crowdLevel: 3 })];
    expect(penaltyOf(polygons, "crowd")).toBeCloseTo(0.6);
    expect(penaltyOf(polygons, "crowd", { hour: 17 })).toBeCloseTo(0.8);
  });

  it("honours tuned overlap fractions", () => {
    const polygons = [rect("n", "noise", -10, 100, { noiseDb: 90 })];
    expect(penaltyOf(polygons, "noise", { overlap: { partial: 0.7 } })).toBeCloseTo(0.63);
  });

  it("records raw exposure next to the penalty", () => {
    const overlay = aggregateOverlays(
      graph,
      new LayerStore([
        rect("n", "noise", -10, 100, { noiseDb: 90 }),
        rect("p", "puddles", -10, 210, { puddles: true }),
      ]),
      ["noise", "puddles"],
    );
    expect(overlay.get(0)?.exposure.noise).toBeCloseTo(45);
    expect(overlay.get(0)?.exposure.puddles).toBe(1);
    expect(overlay.get(0)?.penalties.puddles).toBe(1);
  });

  it("gives every edge an entry, zero where nothing overlaps", () => {
    const overlay = aggregateOverlays(graph, LayerStore.empty(), ["noise", "light"]);
    expect(overlay.size).toBe(graph.edges.length);
    expect(overlay.get(0)).toEqual({
      penalties: { noise: 0, light: 0 },
      exposure: { noise: 0, light: 0 },
    });
  });

  it("only aggregates the requested layers", () => {
    const overlay = aggregateOverlays(
      graph,
      new LayerStore([rect("n", "noise", -10, 210, { noiseDb: 90 })]),
      ["crowd"],
    );
    expect(overlay.get(0)?.penalties).toEqual({ crowd: 0 });
  });

  it("queries the layer store with each edge's own bbox", () => {
    const layers: LayerQuery = { query: vi.fn(() => []) };
    aggregateOverlays(graph, layers, ["noise"]);

    expect(layers.query).toHaveBeenCalledTimes(1);
    expect(layers.query).toHaveBeenCalledWith("noise", segmentBbox(at(0), at(200)));
  });

  it("leaves the graph untouched", () => {
    const before = JSON.stringify(graph.edges);
    aggregateOverlays(graph, new LayerStore([rect("n", "noise", -10, 210, { noiseDb: 90 })]), ["noise"]);
    expect(JSON.stringify(graph.edges)).toBe(before);
  });
});
