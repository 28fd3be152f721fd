/**
 * Distance helpers for GNSS coordinates
 */

/** Mean Earth radius in meters */
export const EARTH_RADIUS_M = 6_371_000;

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Great-circle distance between two coordinates (haversine), in meters
 */
export function greatCircleDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const phi1 = toRadians(lat1);
  const phi2 = toRadians(lat2);
  const deltaPhi = toRadians(lat2 - lat1);
  const deltaLambda = toRadians(lon2 - lon1);

  const a =
    Math.sin(deltaPhi / 2) ** 2 +
    Math.cos(phi1) * Math.cos(phi2) * Math.sin(deltaLambda / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_M * c;
}

/**
 * Approximate 3D distance in meters.
 *
 * Treats the elevation difference as orthogonal to the great-circle distance,
 * which only holds at short range (a few kilometers). Falls back to the
 * horizontal distance when either elevation is unknown.
 */
export function distance3D(
  lat1: number,
  lon1: number,
  elev1: number | null | undefined,
  lat2: number,
  lon2: number,
  elev2: number | null | undefined
): number {
  const horizontal = greatCircleDistance(lat1, lon1, lat2, lon2);

  if (elev1 === null || elev1 === undefined || elev2 === null || elev2 === undefined) {
    return horizontal;
  }

  const vertical = Math.abs(elev1 - elev2);
  return Math.sqrt(horizontal ** 2 + vertical ** 2);
}

/**
 * Human readable distance: "15.3m" below a kilometer, "1.20km" above
 */
export function formatDistance(meters: number): string {
  if (meters < 1000) {
    return `${meters.toFixed(1)}m`;
  }
  return `${(meters / 1000).toFixed(2)}km`;
}
