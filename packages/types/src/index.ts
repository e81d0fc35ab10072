/**
 * @calm-routes/types
 *
 * Shared domain types for the calm walking route engine.
 *
 * - Geo: coordinates, bounding boxes, polygon rings
 * - Layer: environmental overlays (noise, crowd, light, puddles)
 * - Graph: street segments, nodes and edges
 * - Route: what the user asks for and what they get back
 */

export * from "./geo.js";
export * from "./layer.js";
export * from "./graph.js";
export * from "./route.js";
