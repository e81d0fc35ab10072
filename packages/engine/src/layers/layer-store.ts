/**
 * In-memory layer polygon store.
 *
 * Indexes polygons by layer type into ~100m grid cells by their bounding
 * boxes and answers bbox range queries from the cells the query covers. A
 * store is immutable once built, so any number of in-flight requests can
 * query it concurrently; refreshing data means building a new store and
 * swapping it in through a LayerStoreRef.
 */

import type { BoundingBox, LayerPolygon, LayerType } from "@calm-routes/types";
import { bboxIntersects, polygonBbox } from "../geometry/index.js";

/** Default grid cell size in meters */
const DEFAULT_CELL_SIZE = 100;

/** Meters per degree of latitude (roughly constant) */
const METERS_PER_DEG_LAT = 111_320;

/** Polygons covering more cells than this skip the grid and are always candidates */
const MAX_CELLS_PER_POLYGON = 10_000;

/** Synchronous read side of a layer store (what the aggregator needs) */
export interface LayerQuery {
  query(layerType: LayerType, bbox: BoundingBox): readonly LayerPolygon[];
}

export interface LayerStoreOptions {
  /** Grid cell size in meters (default 100) */
  cellSizeMeters?: number;
}

interface IndexedPolygon {
  polygon: LayerPolygon;
  bbox: BoundingBox;
}

interface LayerIndex {
  entries: readonly IndexedPolygon[];
  /** cell key -> positions in `entries` */
  grid: Map<string, number[]>;
  /** positions of polygons too large for the grid */
  wide: number[];
}

interface CellRange {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export class LayerStore implements LayerQuery {
  private readonly byLayer = new Map<LayerType, LayerIndex>();
  private readonly cellSize: number;
  private readonly metersPerDegLng: number;
  readonly size: number;

  constructor(polygons: Iterable<LayerPolygon>, options: LayerStoreOptions = {}) {
    this.cellSize = options.cellSizeMeters ?? DEFAULT_CELL_SIZE;

    const grouped = new Map<LayerType, IndexedPolygon[]>();
    let size = 0;
    let sumLat = 0;
    for (const polygon of polygons) {
      if (polygon.ring.length < 3) continue;
      let list = grouped.get(polygon.layerType);
      if (!list) {
        list = [];
        grouped.set(polygon.layerType, list);
      }
      const bbox = polygonBbox(polygon.ring);
      list.push({ polygon, bbox });
      sumLat += (bbox.minLat + bbox.maxLat) / 2;
      size++;
    }
    this.size = size;

    const midLat = size > 0 ? sumLat / size : 0;
    this.metersPerDegLng = METERS_PER_DEG_LAT * Math.cos((midLat * Math.PI) / 180);

    for (const [layerType, list] of grouped) {
      const grid = new Map<string, number[]>();
      const wide: number[] = [];
      list.forEach((entry, position) => {
        const range = this.cellRange(entry.bbox);
        if (cellCount(range) > MAX_CELLS_PER_POLYGON) {
          wide.push(position);
          return;
        }
        for (let x = range.minX; x <= range.maxX; x++) {
          for (let y = range.minY; y <= range.maxY; y++) {
            const key = `${x},${y}`;
            let cell = grid.get(key);
            if (!cell) {
              cell = [];
              grid.set(key, cell);
            }
            cell.push(position);
          }
        }
      });
      this.byLayer.set(layerType, { entries: Object.freeze(list), grid, wide });
    }
  }

  static empty(): LayerStore {
    return new LayerStore([]);
  }

  /**
   * All polygons of a layer whose bbox intersects the query bbox, in the
   * order they were added. Empty when nothing intersects.
   */
  query(layerType: LayerType, bbox: BoundingBox): readonly LayerPolygon[] {
    const result: LayerPolygon[] = [];
    for (const entry of this.candidates(layerType, bbox)) {
      if (bboxIntersects(entry.bbox, bbox)) result.push(entry.polygon);
    }
    return result;
  }

  /** Number of polygons a query examines before the exact bbox test */
  candidateCount(layerType: LayerType, bbox: BoundingBox): number {
    return this.candidates(layerType, bbox).length;
  }

  /** Number of polygons held for a layer */
  count(layerType: LayerType): number {
    return this.byLayer.get(layerType)?.entries.length ?? 0;
  }

  layerTypes(): LayerType[] {
    return [...this.byLayer.keys()];
  }

  private candidates(layerType: LayerType, bbox: BoundingBox): readonly IndexedPolygon[] {
    const index = this.byLayer.get(layerType);
    if (!index) return [];

    const range = this.cellRange(bbox);
    // Covering more cells than there are polygons: a scan is cheaper
    if (cellCount(range) > index.entries.length) return index.entries;

    const positions = new Set<number>(index.wide);
    for (let x = range.minX; x <= range.maxX; x++) {
      for (let y = range.minY; y <= range.maxY; y++) {
        const cell = index.grid.get(`${x},${y}`);
        if (!cell) continue;
        for (const position of cell) positions.add(position);
      }
    }
    return [...positions].sort((a, b) => a - b).map((position) => index.entries[position]!);
  }

  private cellRange(bbox: BoundingBox): CellRange {
    return {
      minX: Math.floor((bbox.minLng * this.metersPerDegLng) / this.cellSize),
      maxX: Math.floor((bbox.maxLng * this.metersPerDegLng) / this.cellSize),
      minY: Math.floor((bbox.minLat * METERS_PER_DEG_LAT) / this.cellSize),
      maxY: Math.floor((bbox.maxLat * METERS_PER_DEG_LAT) / this.cellSize),
    };
  }
}

function cellCount(range: CellRange): number {
  return (range.maxX - range.minX + 1) * (range.maxY - range.minY + 1);
}

/**
 * Holder for a shared store. Readers take `current()` once per request;
 * `replace()` swaps the whole store, so a reader never sees a half-updated
 * one.
 */
export class LayerStoreRef implements LayerQuery {
  private store: LayerStore;

  constructor(initial: LayerStore = LayerStore.empty()) {
    this.store = initial;
  }

  current(): LayerStore {
    return this.store;
  }

  replace(next: LayerStore): LayerStore {
    const previous = this.store;
    this.store = next;
    return previous;
  }

  query(layerType: LayerType, bbox: BoundingBox): readonly LayerPolygon[] {
    return this.store.query(layerType, bbox);
  }
}
