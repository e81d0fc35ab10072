export {
  aggregateOverlays,
  overlapFraction,
  effectiveLayerValue,
  travelHour,
  normalizeMetric,
  DEFAULT_OVERLAP_FRACTIONS,
  DEFAULT_CEILINGS,
  RUSH_HOURS,
  type OverlapFractions,
  type NormalizationCeilings,
  type OverlayOptions,
  type EdgeOverlay,
  type OverlayResult,
} from "./aggregator.js";
