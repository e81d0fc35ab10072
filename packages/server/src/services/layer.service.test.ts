import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { LayerPolygon } from "@calm-routes/types";
import { LayerStore, StoreLayerSource } from "@calm-routes/engine";

import { LayerService, toLayerFeature } from "./layer.service.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const BBOX = { minLat: 55.74, minLng: 37.6, maxLat: 55.76, maxLng: 37.63 };

function square(lat: number, lng: number) {
  return [
    { lat, lng },
    { lat, lng: lng + 0.001 },
    { lat: lat + 0.001, lng: lng + 0.001 },
    { lat: lat + 0.001, lng },
  ];
}

const noisy: LayerPolygon = {
  id: "noise_001",
  layerType: "noise",
  ring: square(55.75, 37.61),
  metrics: { noiseDb: 82, crowdLevel: 3 },
  streetName: "Tverskaya Street",
};
const dark: LayerPolygon = {
  id: "light_001",
  layerType: "light",
  ring: square(55.75, 37.62),
  metrics: { lightLux: 30 },
};
const busy: LayerPolygon = {
  id: "crowd_001",
  layerType: "crowd",
  ring: square(55.75, 37.6),
  metrics: { crowdLevel: 3 },
};
const farAway: LayerPolygon = {
  id: "noise_999",
  layerType: "noise",
  ring: square(59.93, 30.31),
  metrics: { noiseDb: 50 },
};

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("toLayerFeature", () => {
  it("converts the ring to [lng, lat] pairs and labels the level", () => {
    expect(toLayerFeature(noisy)).toEqual({
      id: "noise_001",
      coordinates: [
        [37.61, 55.75],
        [37.611, 55.75],
        [37.611, 55.751],
        [37.61, 55.751],
      ],
      value: 82,
      level: "extreme",
      metrics: { noiseDb: 82, crowdLevel: 3 },
      streetName: "Tverskaya Street",
    });
  });

  it("leaves streetName out when the polygon has none", () => {
    const feature = toLayerFeature(dark);
    expect(feature.level).toBe("dark");
    expect(feature).not.toHaveProperty("streetName");
  });

  it("raises the crowd level by one in a rush hour", () => {
    expect(toLayerFeature(busy, 17)).toMatchObject({ value: 4, level: "high", metrics: { crowdLevel: 3 } });
    expect(toLayerFeature(busy, 13)).toMatchObject({ value: 3, level: "medium" });
    expect(toLayerFeature(busy)).toMatchObject({ value: 3, level: "medium" });
  });
});

describe("LayerService", () => {
  const service = new LayerService(new StoreLayerSource(new LayerStore([noisy, dark, busy, farAway])));

  it("returns features of the requested layers inside the bbox", async () => {
    const response = await service.getLayers(BBOX, ["noise", "light"]);

    expect(response.bbox).toBe(BBOX);
    expect(Object.keys(response.layers)).toEqual(["noise", "light"]);
    expect(response.layers.noise?.map((f) => f.id)).toEqual(["noise_001"]);
    expect(response.layers.light?.map((f) => f.level)).toEqual(["dark"]);
    expect(Number.isNaN(Date.parse(response.updatedAt))).toBe(false);
  });

  it("shows crowd levels as they are at the requested hour", async () => {
    const rush = await service.getLayers(BBOX, ["crowd"], 8);
    const quiet = await service.getLayers(BBOX, ["crowd"], 11);

    expect(rush.layers.crowd?.map((f) => f.value)).toEqual([4]);
    expect(quiet.layers.crowd?.map((f) => f.value)).toEqual([3]);
  });

  it("gives an empty list for a layer without polygons", async () => {
    const response = await service.getLayers(BBOX, ["puddles"]);
    expect(response.layers).toEqual({ puddles: [] });
  });
});
