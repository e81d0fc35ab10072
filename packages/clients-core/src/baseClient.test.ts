import { describe, it, expect, vi, afterEach } from "vitest";
import axios, { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";
import { ApiError, BaseClient, toApiError } from "./baseClient.js";

// Expose protected methods for testing via a thin subclass
class TestClient extends BaseClient {
  constructor(resource: string, config: { baseUrl: string; timeout?: number; token?: string }) {
    super(resource, config);
  }
  public exposedBuildPath(params: { path?: string }) {
    return this.buildPath(params);
  }
  public exposedBuildConfig(params: { path?: string; query?: Record<string, unknown>; signal?: AbortSignal }) {
    return this.buildConfig(params);
  }
}

function httpError(status: number, data: unknown): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response: AxiosResponse = { data, status, statusText: "", headers: {}, config };
  return new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_REQUEST", config, {}, response);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("BaseClient", () => {
  describe("buildPath", () => {
    it("returns resource root when no sub-path", () => {
      const client = new TestClient("api/layers", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildPath({})).toBe("/api/layers");
    });

    it("appends sub-path to resource", () => {
      const client = new TestClient("api/routes", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildPath({ path: "calm" })).toBe("/api/routes/calm");
    });
  });

  describe("buildConfig", () => {
    it("sets baseURL and default timeout", () => {
      const client = new TestClient("api/routes", { baseUrl: "http://localhost:3000" });
      const config = client.exposedBuildConfig({});
      expect(config.baseURL).toBe("http://localhost:3000");
      expect(config.timeout).toBe(30000);
    });

    it("uses custom timeout when provided", () => {
      const client = new TestClient("api/routes", { baseUrl: "http://localhost:3000", timeout: 5000 });
      expect(client.exposedBuildConfig({}).timeout).toBe(5000);
    });

    it("sets JSON content headers", () => {
      const client = new TestClient("api/routes", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildConfig({}).headers).toMatchObject({
        "Content-Type": "application/json",
        Accept: "application/json",
      });
    });

    it("includes Authorization header when token is set", () => {
      const client = new TestClient("api/routes", { baseUrl: "http://localhost:3000", token: "test-token" });
      expect(client.exposedBuildConfig({}).headers).toMatchObject({ Authorization: "Bearer test-token" });
    });

    it("omits Authorization header when no token", () => {
      const client = new TestClient("api/routes", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildConfig({}).headers).not.toHaveProperty("Authorization");
    });

    it("passes query params through", () => {
      const client = new TestClient("api/config", { baseUrl: "http://localhost:3000" });
      const config = client.exposedBuildConfig({ query: { profile: "quiet" } });
      expect(config.params).toEqual({ profile: "quiet" });
    });

    it("passes the abort signal through", () => {
      const client = new TestClient("api/routes", { baseUrl: "http://localhost:3000" });
      const controller = new AbortController();
      expect(client.exposedBuildConfig({ signal: controller.signal }).signal).toBe(controller.signal);
      expect(client.exposedBuildConfig({})).not.toHaveProperty("signal");
    });
  });

  describe("setToken", () => {
    it("updates the token used in subsequent requests", () => {
      const client = new TestClient("api/routes", { baseUrl: "http://localhost:3000" });
      expect(client.exposedBuildConfig({}).headers).not.toHaveProperty("Authorization");

      client.setToken("new-token");
      expect(client.exposedBuildConfig({}).headers).toMatchObject({ Authorization: "Bearer new-token" });
    });

    it("clears the token when set to undefined", () => {
      const client = new TestClient("api/routes", { baseUrl: "http://localhost:3000", token: "initial" });
      client.setToken(undefined);
      expect(client.exposedBuildConfig({}).headers).not.toHaveProperty("Authorization");
    });
  });

  describe("errors", () => {
    it("turns an error body into an ApiError", async () => {
      vi.spyOn(axios, "post").mockRejectedValue(httpError(404, { message: "No route", code: "NO_ROUTE_FOUND" }));
      const client = new BaseClient("api/routes", { baseUrl: "http://localhost:3000" });

      const err = await client.post({ path: "calm", body: {} }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ApiError);
      expect(err).toMatchObject({ status: 404, message: "No route", code: "NO_ROUTE_FOUND" });
    });

    it("keeps validation details", () => {
      const details = { "body.end": { message: "expected { lat: number, lng: number }" } };
      const err = toApiError(httpError(422, { message: "Validation failed", details }));
      expect(err).toMatchObject({ status: 422, message: "Validation failed", details });
    });

    it("falls back to the axios message for a body without one", () => {
      const err = toApiError(httpError(502, "<html>Bad Gateway</html>"));
      expect(err).toBeInstanceOf(ApiError);
      expect(err).toMatchObject({ status: 502, message: "Request failed with status code 502" });
    });

    it("rethrows errors without a response unchanged", async () => {
      const network = new Error("connect ECONNREFUSED");
      vi.spyOn(axios, "get").mockRejectedValue(network);
      const client = new BaseClient("health", { baseUrl: "http://localhost:3000" });

      await expect(client.get()).rejects.toBe(network);
    });
  });
});
