/**
 * Layered JSON config for route weights.
 *
 * `configs/weights/base.json` holds the full default weights; each file in
 * `configs/weights/profiles/` is a named preset whose overrides are merged
 * on top of the base. Explicit request weights beat profile weights, which
 * beat the base.
 */

import { existsSync, readFileSync, readdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { LAYER_TYPES, isLayerType, type RouteWeights } from "@calm-routes/types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WeightProfile {
  name: string;
  description: string;
  overrides: RouteWeights;
}

export interface ProfileInfo {
  name: string;
  description: string;
}

/** Weights resolved for a request, with where they came from */
export interface ResolvedWeights {
  weights: Required<RouteWeights>;
  profile?: ProfileInfo;
}

export class UnknownProfileError extends Error {
  readonly status = 404;

  constructor(readonly profileName: string) {
    super(`Unknown weight profile "${profileName}"`);
    this.name = "UnknownProfileError";
  }
}

/** Used when base.json is missing or unreadable */
export const DEFAULT_WEIGHTS: Readonly<Required<RouteWeights>> = Object.freeze({
  noise: 0.5,
  crowd: 0.4,
  light: 0.2,
  puddles: 0.3,
});

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a weights object: known layers only, finite and non-negative.
 *
 * @throws Error naming the offending key and `source`
 */
export function parseWeights(value: unknown, source: string): RouteWeights {
  if (!isRecord(value)) throw new Error(`${source}: weights must be an object`);
  const weights: RouteWeights = {};
  for (const [key, weight] of Object.entries(value)) {
    if (!isLayerType(key)) throw new Error(`${source}: unknown layer "${key}"`);
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight < 0) {
      throw new Error(`${source}: weight for ${key} must be a non-negative number`);
    }
    weights[key] = weight;
  }
  return weights;
}

function parseProfile(value: unknown, source: string): WeightProfile {
  if (!isRecord(value)) throw new Error(`${source}: profile must be an object`);
  const { name, description, overrides } = value;
  if (typeof name !== "string" || name.length === 0) throw new Error(`${source}: missing name`);
  return {
    name,
    description: typeof description === "string" ? description : "",
    overrides: parseWeights(overrides ?? {}, source),
  };
}

function withDefaults(partial: RouteWeights, defaults: Readonly<Required<RouteWeights>>): Required<RouteWeights> {
  const full: Required<RouteWeights> = { ...defaults };
  for (const layerType of LAYER_TYPES) {
    const weight = partial[layerType];
    if (weight !== undefined) full[layerType] = weight;
  }
  return full;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/weights/`.
 * Works from both source (packages/engine/src/) and compiled (dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "weights");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // packages/engine/src/config -> repo root
  return join(resolve(__dirname, "..", "..", "..", ".."), "configs", "weights");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Load base weights. Falls back to DEFAULT_WEIGHTS when the file is missing or invalid. */
export function loadBaseWeights(configsRoot: string = findConfigsRoot()): Required<RouteWeights> {
  const filePath = join(configsRoot, "base.json");
  if (!existsSync(filePath)) return { ...DEFAULT_WEIGHTS };

  try {
    const parsed = parseWeights(JSON.parse(readFileSync(filePath, "utf-8")), filePath);
    return withDefaults(parsed, DEFAULT_WEIGHTS);
  } catch (err) {
    console.warn(`[config] Ignoring ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return { ...DEFAULT_WEIGHTS };
  }
}

/**
 * Load a profile and merge its overrides on top of the base.
 *
 * @throws UnknownProfileError if no such profile file exists
 */
export function loadWeightProfile(
  profileName: string,
  configsRoot: string = findConfigsRoot(),
): ResolvedWeights & { profile: ProfileInfo } {
  // Profile names are file stems; anything else cannot name a file in the directory
  if (!/^[a-z0-9-]+$/i.test(profileName)) throw new UnknownProfileError(profileName);

  const filePath = join(configsRoot, "profiles", `${profileName}.json`);
  if (!existsSync(filePath)) throw new UnknownProfileError(profileName);

  const profile = parseProfile(JSON.parse(readFileSync(filePath, "utf-8")), filePath);
  const base = loadBaseWeights(configsRoot);

  return {
    weights: withDefaults(profile.overrides, base),
    profile: { name: profile.name, description: profile.description },
  };
}

/** List all available profiles, sorted by name. Malformed files are skipped with a warning. */
export function listWeightProfiles(configsRoot: string = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const files = readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort();
  const profiles: ProfileInfo[] = [];

  for (const file of files) {
    const filePath = join(profilesDir, file);
    try {
      const parsed = parseProfile(JSON.parse(readFileSync(filePath, "utf-8")), filePath);
      profiles.push({ name: parsed.name, description: parsed.description });
    } catch (err) {
      console.warn(`[config] Skipping ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return profiles;
}

/**
 * Weights for a request: explicit weights override the profile's, which
 * override the base.
 */
export function resolveWeights(
  input: { weights?: RouteWeights; profile?: string },
  configsRoot: string = findConfigsRoot(),
): ResolvedWeights {
  const fromProfile = input.profile ? loadWeightProfile(input.profile, configsRoot) : undefined;
  const base = fromProfile?.weights ?? loadBaseWeights(configsRoot);
  const weights = withDefaults(input.weights ?? {}, base);
  return fromProfile ? { weights, profile: fromProfile.profile } : { weights };
}
