import { Controller } from "@tsoa/runtime";
import { listWeightProfiles, loadBaseWeights, loadWeightProfile } from "@calm-routes/engine";
import type { ProfilesResponse, WeightsResponse } from "../models/responses.js";

/** GET /api/config/weights, GET /api/config/profiles */
export class ConfigController extends Controller {
  constructor(private readonly configsRoot?: string) {
    super();
  }

  /** Base weights, or a named profile merged on top of them */
  public async getWeights(profile?: string): Promise<WeightsResponse> {
    if (profile) {
      return loadWeightProfile(profile, this.configsRoot);
    }
    return { weights: loadBaseWeights(this.configsRoot) };
  }

  /** List all available weight profiles */
  public async getProfiles(): Promise<ProfilesResponse> {
    return { profiles: listWeightProfiles(this.configsRoot) };
  }
}
