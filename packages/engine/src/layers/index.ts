/**
 * Layer storage, sources and level labels.
 */

export { LayerStore, LayerStoreRef, type LayerQuery, type LayerStoreOptions } from "./layer-store.js";
export {
  StoreLayerSource,
  FallbackLayerSource,
  LayerRouter,
  loadLayerStore,
  type LayerSource,
} from "./source.js";
export {
  layerValue,
  classifyLayerValue,
  type LayerLevel,
  type NoiseLevel,
  type CrowdLevel,
  type LightLevel,
  type PuddlesLevel,
} from "./levels.js";
