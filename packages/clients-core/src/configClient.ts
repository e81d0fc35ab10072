import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { ProfileInfo, ProfilesResponse, WeightsResponse } from "./types.js";

export class ConfigClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/config", config);
  }

  /** Base weights, or a named profile merged on top of them */
  public async getWeights(profile?: string): Promise<WeightsResponse> {
    return this.client.get<WeightsResponse>({
      path: "weights",
      query: profile ? { profile } : undefined,
    });
  }

  /** List all available weight profiles */
  public async listProfiles(): Promise<ProfileInfo[]> {
    const response = await this.client.get<ProfilesResponse>({ path: "profiles" });
    return response.profiles;
  }
}
