import { describe, it, expect } from "vitest";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { DEFAULT_OVERPASS_ENDPOINT } from "@calm-routes/builder";

import { defaultPolygonDataDir, loadServerConfig } from "./config.js";

describe("loadServerConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadServerConfig({})).toEqual({
      port: 3000,
      overpassEndpoint: DEFAULT_OVERPASS_ENDPOINT,
      overpassCacheDir: undefined,
      polygonDataDir: defaultPolygonDataDir(),
      placesApiUrl: undefined,
      placesApiKey: undefined,
      syntheticLayers: false,
      routeBboxBufferKm: 0.5,
      graphCacheSize: 16,
    });
  });

  it("reads every variable", () => {
    const config = loadServerConfig({
      PORT: "8080",
      OVERPASS_ENDPOINT: "http://overpass.test/api/interpreter",
      OVERPASS_CACHE_DIR: "/tmp/overpass",
      POLYGON_DATA_DIR: "/srv/polygons",
      PLACES_API_URL: "http://places.test/3.0",
      PLACES_API_KEY: "test-key",
      SYNTHETIC_LAYERS: "true",
      ROUTE_BBOX_BUFFER_KM: "1.5",
      GRAPH_CACHE_SIZE: "4",
    });
    expect(config).toEqual({
      port: 8080,
      overpassEndpoint: "http://overpass.test/api/interpreter",
      overpassCacheDir: "/tmp/overpass",
      polygonDataDir: "/srv/polygons",
      placesApiUrl: "http://places.test/3.0",
      placesApiKey: "test-key",
      syntheticLayers: true,
      routeBboxBufferKm: 1.5,
      graphCacheSize: 4,
    });
  });

  it("finds the repo's polygon data from any working directory", () => {
    const dir = defaultPolygonDataDir();
    expect(dir.endsWith(join("data", "polygons"))).toBe(true);
    expect(existsSync(join(dir, "polygons_noise.json"))).toBe(true);
  });

  it("only enables synthetic layers for the exact string true", () => {
    expect(loadServerConfig({ SYNTHETIC_LAYERS: "1" }).syntheticLayers).toBe(false);
  });

  it("treats empty values as unset", () => {
    const config = loadServerConfig({ PLACES_API_URL: "", PORT: "" });
    expect(config.placesApiUrl).toBeUndefined();
    expect(config.port).toBe(3000);
  });

  it("rejects malformed numbers", () => {
    expect(() => loadServerConfig({ ROUTE_BBOX_BUFFER_KM: "lots" })).toThrow(
      'ROUTE_BBOX_BUFFER_KM must be a non-negative number, got "lots"',
    );
  });
});
