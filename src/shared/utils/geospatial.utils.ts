/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Haversine Distance Calculations
 * =============================================================================
 *
 * Pure functions, O(1), no I/O. Single source of truth for distances used by
 * candidate filtering and route sequencing.
 *
 * Inputs are not range-checked: any pair of finite coordinates yields a
 * distance, and identical points yield exactly 0.
 * =============================================================================
 */

/**
 * Earth's mean radius
 */
export const EARTH_RADIUS = {
  KM: 6371,
};

/**
 * Great-circle distance between two GPS coordinates (haversine formula)
 *
 * @param lat1 Origin latitude
 * @param lng1 Origin longitude
 * @param lat2 Destination latitude
 * @param lng2 Destination longitude
 * @returns Distance in kilometers
 */
export function haversineDistanceKm(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLng = toRadians(lng2 - lng1);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) *
      Math.cos(toRadians(lat2)) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);

  const c = 2 * Math.asin(Math.sqrt(Math.min(1, a)));

  return EARTH_RADIUS.KM * c;
}

/**
 * Convert degrees to radians
 */
function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}
