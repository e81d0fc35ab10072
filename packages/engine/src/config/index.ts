export {
  loadBaseWeights,
  loadWeightProfile,
  listWeightProfiles,
  resolveWeights,
  parseWeights,
  findConfigsRoot,
  UnknownProfileError,
  DEFAULT_WEIGHTS,
  type WeightProfile,
  type ProfileInfo,
  type ResolvedWeights,
} from "./weights-config.js";
