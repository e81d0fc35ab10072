/**
 * Human-facing level labels for layer values.
 */

import type { LayerMetrics, LayerType } from "@calm-routes/types";

export type NoiseLevel = "low" | "medium" | "high" | "extreme";
export type CrowdLevel = "low" | "medium" | "high" | "extreme";
export type LightLevel = "dark" | "dim" | "bright";
export type PuddlesLevel = "has_puddles" | "no_puddles";
export type LayerLevel = NoiseLevel | CrowdLevel | LightLevel | PuddlesLevel;

/** The authoritative raw value of a polygon for its layer (0 when missing) */
export function layerValue(layerType: LayerType, metrics: LayerMetrics): number {
  switch (layerType) {
    case "noise":
      return metrics.noiseDb ?? 0;
    case "crowd":
      return metrics.crowdLevel ?? 0;
    case "light":
      return metrics.lightLux ?? 0;
    case "puddles":
      return metrics.puddles ? 1 : 0;
  }
}

export function classifyLayerValue(layerType: LayerType, value: number): LayerLevel {
  switch (layerType) {
    case "noise":
      if (value < 60) return "low";
      if (value < 70) return "medium";
      if (value < 80) return "high";
      return "extreme";
    case "crowd":
      if (value <= 2) return "low";
      if (value <= 3) return "medium";
      if (value <= 4) return "high";
      return "extreme";
    case "light":
      if (value < 50) return "dark";
      if (value < 150) return "dim";
      return "bright";
    case "puddles":
      return value > 0.5 ? "has_puddles" : "no_puddles";
  }
}
