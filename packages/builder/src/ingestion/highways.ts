/**
 * Which OSM ways count as walkable streets.
 */

/** OSM tags as key-value pairs */
export type OsmTags = Record<string, string>;

/**
 * Highway tag values a pedestrian can use.
 *
 * Motorways and trunk roads are left out; everything else with a sidewalk
 * or a path is in.
 */
export const WALKABLE_HIGHWAYS = [
  // Pedestrian infrastructure
  "footway",
  "pedestrian",
  "path",
  "steps",
  "living_street",
  // Local streets
  "residential",
  "service",
  "unclassified",
  "track",
  "cycleway",
  // Larger roads (sidewalks assumed)
  "tertiary",
  "tertiary_link",
  "secondary",
  "secondary_link",
  "primary",
  "primary_link",
] as const;

export type WalkableHighway = (typeof WALKABLE_HIGHWAYS)[number];

const WALKABLE_SET: ReadonlySet<string> = new Set(WALKABLE_HIGHWAYS);

/** Access values that close a way to pedestrians */
const NO_ACCESS = new Set(["no", "private"]);

/**
 * Check whether a way with these tags is open to walking.
 */
export function isWalkable(tags: OsmTags | undefined): boolean {
  if (!tags) return false;
  const highway = tags["highway"];
  if (!highway || !WALKABLE_SET.has(highway)) return false;
  const foot = tags["foot"];
  if (foot !== undefined) return !NO_ACCESS.has(foot);
  const access = tags["access"];
  return access === undefined || !NO_ACCESS.has(access);
}

/**
 * Street name from OSM tags: `name`, then `ref`, then `official_name`.
 */
export function extractName(tags: OsmTags | undefined): string | undefined {
  if (!tags) return undefined;
  return tags["name"] ?? tags["ref"] ?? tags["official_name"];
}
