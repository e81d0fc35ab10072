import { describe, it, expect, vi, afterEach } from "vitest";
import axios, { AxiosHeaders, type AxiosResponse } from "axios";
import { RouteClient } from "./routeClient.js";
import type { CalmRouteResponse } from "./types.js";

function okResponse<T>(data: T): AxiosResponse<T> {
  return { data, status: 200, statusText: "OK", headers: {}, config: { headers: new AxiosHeaders() } };
}

const response: CalmRouteResponse = {
  route: {
    path: [
      { lat: 55.75, lng: 37.61 },
      { lat: 55.75, lng: 37.615 },
    ],
    nodeIds: [0, 1],
    edgeIds: [0],
    totalDistanceMeters: 313.6,
    durationMinutes: 4,
    layerAverages: { noise: 75 },
    cost: 313.6,
    snapDistances: { start: 0, end: 0 },
    warnings: [],
  },
  meta: {
    searchTimeMs: 3,
    bbox: { minLat: 55.745, minLng: 37.602, maxLat: 55.755, maxLng: 37.623 },
    weights: { noise: 0.5, crowd: 0.4, light: 0.2, puddles: 0.3 },
    graphCached: false,
  },
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("RouteClient", () => {
  it("posts the request to /api/routes/calm", async () => {
    const post = vi.spyOn(axios, "post").mockResolvedValue(okResponse(response));
    const client = new RouteClient({ baseUrl: "http://localhost:3000" });
    const request = { start: { lat: 55.75, lng: 37.61 }, end: { lat: 55.75, lng: 37.615 }, profile: "quiet" };

    const result = await client.computeCalmRoute(request);

    expect(result).toEqual(response);
    expect(post).toHaveBeenCalledOnce();
    const [path, body, config] = post.mock.calls[0]!;
    expect(path).toBe("/api/routes/calm");
    expect(body).toEqual(request);
    expect(config).toMatchObject({ baseURL: "http://localhost:3000", timeout: 30000 });
  });

  it("forwards the abort signal", async () => {
    const post = vi.spyOn(axios, "post").mockResolvedValue(okResponse(response));
    const client = new RouteClient({ baseUrl: "http://localhost:3000" });
    const controller = new AbortController();

    await client.computeCalmRoute({ start: { lat: 55.75, lng: 37.61 }, end: { lat: 55.75, lng: 37.615 } }, controller.signal);

    expect(post.mock.calls[0]![2]).toMatchObject({ signal: controller.signal });
  });
});
