import type { Hole, HoleMatch, RankedHole } from '../types/Telemetry';
import { distance3D, greatCircleDistance } from '../utils/geoMath';

/**
 * Nearest-hole search over a hole snapshot
 * Holes without both coordinates are never considered
 */

export interface MatchPosition {
  latitude: number;
  longitude: number;
  elevation?: number | null;
}

export interface MatchOptions {
  /** Include elevation difference when both sides carry one (default: false) */
  use3d?: boolean;
}

export interface RankOptions extends MatchOptions {
  /** Drop holes farther than this many meters */
  maxDistance?: number;
  /** Keep only the closest N holes */
  limit?: number;
}

export const DEFAULT_MAX_DISTANCE_M = 10;

type LocatedHole = Hole & { latitude: number; longitude: number };

function isLocated(hole: Hole): hole is LocatedHole {
  return hole.latitude !== null && hole.longitude !== null;
}

function distanceTo(hole: LocatedHole, position: MatchPosition, use3d: boolean): number {
  if (use3d) {
    return distance3D(
      position.latitude, position.longitude, position.elevation,
      hole.latitude, hole.longitude, hole.elevation
    );
  }
  return greatCircleDistance(position.latitude, position.longitude, hole.latitude, hole.longitude);
}

/**
 * Closest hole to the position. Exact ties keep the hole seen first.
 */
export function findNearest(
  holes: readonly Hole[],
  position: MatchPosition,
  options: MatchOptions = {}
): HoleMatch {
  const use3d = options.use3d ?? false;
  let nearest: Hole | null = null;
  let minDistance = Number.POSITIVE_INFINITY;

  for (const hole of holes) {
    if (!isLocated(hole)) continue;

    const distance = distanceTo(hole, position, use3d);
    if (distance < minDistance) {
      minDistance = distance;
      nearest = hole;
    }
  }

  return { hole: nearest, distance: minDistance };
}

/**
 * Distance gate: a match is usable only when a hole was found within maxDistance meters
 */
export function isWithinGate(
  match: HoleMatch,
  maxDistance: number = DEFAULT_MAX_DISTANCE_M
): match is { hole: Hole; distance: number } {
  return match.hole !== null && match.distance <= maxDistance;
}

/**
 * All located holes ordered by distance, closest first
 */
export function sortHolesByDistance(
  holes: readonly Hole[],
  position: MatchPosition,
  options: RankOptions = {}
): RankedHole[] {
  const use3d = options.use3d ?? false;
  const ranked: RankedHole[] = [];

  for (const hole of holes) {
    if (!isLocated(hole)) continue;

    const distance = distanceTo(hole, position, use3d);
    if (options.maxDistance !== undefined && distance > options.maxDistance) continue;

    ranked.push({ hole, distance });
  }

  // Array.prototype.sort is stable, equal distances keep listing order
  ranked.sort((a, b) => a.distance - b.distance);

  if (options.limit !== undefined && options.limit >= 0) {
    return ranked.slice(0, options.limit);
  }
  return ranked;
}
