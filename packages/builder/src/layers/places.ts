/**
 * Light layer from a places catalogue.
 *
 * Large lit venues (shopping malls by default) are looked up inside the
 * bbox and each one becomes a bright circle of light. The catalogue API
 * takes a text query and a viewport given by its north-west and
 * south-east corners.
 */

import axios from "axios";
import type { BoundingBox, LayerPolygon, LayerType } from "@calm-routes/types";
import { circleApprox, type LayerSource } from "@calm-routes/engine";

/** A venue found in the catalogue */
export interface Place {
  id: string;
  name: string;
  lat: number;
  lng: number;
}

export interface PlacesClientConfig {
  /** Catalogue API base URL */
  baseUrl: string;
  apiKey?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number;
}

/** Catalogue response shape (only the fields we ask for) */
interface PlacesResponse {
  result?: {
    items?: {
      id?: string | number;
      name?: string;
      point?: { lat?: number; lon?: number };
    }[];
  };
}

export class PlacesClient {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeout: number;

  constructor(config: PlacesClientConfig) {
    this.baseUrl = config.baseUrl;
    this.apiKey = config.apiKey;
    this.timeout = config.timeout ?? 10000;
  }

  /**
   * Search venues matching `query` inside a bbox. Items without a point
   * are dropped. HTTP and network errors propagate.
   */
  async search(query: string, bbox: BoundingBox, limit = 50): Promise<Place[]> {
    const params: Record<string, string | number> = {
      q: query,
      viewpoint1: `${bbox.minLng},${bbox.maxLat}`,
      viewpoint2: `${bbox.maxLng},${bbox.minLat}`,
      type: "branch",
      fields: "items.point",
      page_size: limit,
    };
    if (this.apiKey) params["key"] = this.apiKey;

    const response = await axios.get<PlacesResponse>("/items", {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      params,
      headers: { Accept: "application/json" },
    });

    const places: Place[] = [];
    for (const item of response.data.result?.items ?? []) {
      const lat = item.point?.lat;
      const lng = item.point?.lon;
      if (item.id === undefined || lat === undefined || lng === undefined) continue;
      places.push({ id: String(item.id), name: item.name ?? "", lat, lng });
    }
    return places;
  }
}

export interface PlacesLightOptions {
  /** Catalogue query (default: "shopping mall") */
  query?: string;
  /** Radius of the lit area around each venue (default: 100m) */
  radiusMeters?: number;
  /** Vertices of the circle approximation (default: 16) */
  numPoints?: number;
  /** Illuminance assigned to each lit area (default: 180 lux) */
  lightLux?: number;
  /** Most venues per lookup (default: 50) */
  limit?: number;
}

/**
 * Answers only the `light` layer; every other layer is empty.
 *
 * Venues are busy and moderately loud, so their polygons also carry
 * informational noise and crowd values.
 */
export class PlacesLightSource implements LayerSource {
  readonly name = "places";
  private readonly searchTerm: string;
  private readonly radiusMeters: number;
  private readonly numPoints: number;
  private readonly lightLux: number;
  private readonly limit: number;

  constructor(
    private readonly client: PlacesClient,
    options?: PlacesLightOptions,
  ) {
    this.searchTerm = options?.query ?? "shopping mall";
    this.radiusMeters = options?.radiusMeters ?? 100;
    this.numPoints = options?.numPoints ?? 16;
    this.lightLux = options?.lightLux ?? 180;
    this.limit = options?.limit ?? 50;
  }

  async query(layerType: LayerType, bbox: BoundingBox): Promise<LayerPolygon[]> {
    if (layerType !== "light") return [];

    const start = performance.now();
    const places = await this.client.search(this.searchTerm, bbox, this.limit);
    const polygons = places.map(
      (place): LayerPolygon => ({
        id: `light_${place.id}`,
        layerType: "light",
        ring: circleApprox({ lat: place.lat, lng: place.lng }, this.radiusMeters, this.numPoints),
        metrics: { lightLux: this.lightLux, noiseDb: 65, crowdLevel: 4, puddles: false },
        streetName: place.name,
      }),
    );
    console.log(
      `[places] ${polygons.length} lit venues for "${this.searchTerm}" in ${(performance.now() - start).toFixed(0)}ms`,
    );
    return polygons;
  }
}
