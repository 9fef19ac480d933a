/**
 * Geographic Utility Functions
 *
 * Distance and search-area helpers used to find transit stops near an
 * address. Uses the Haversine formula for distances on the Earth's surface.
 */

/** Earth radius in meters */
export const EARTH_RADIUS_METERS = 6371e3;

/** Feet in one meter */
export const FEET_PER_METER = 3.28084;

/** Approximate feet per degree of latitude */
const FEET_PER_DEGREE = 364000;

/** Degrees to radians conversion factor */
const DEG_TO_RAD = Math.PI / 180;

/**
 * Latitude/longitude pair in degrees
 */
export interface GeoCoordinate {
  latitude: number;
  longitude: number;
}

/**
 * Axis-aligned search area
 */
export interface BoundingBox {
  /** South-west corner */
  sw: GeoCoordinate;
  /** North-east corner */
  ne: GeoCoordinate;
}

/**
 * Convert degrees to radians.
 */
export function degreesToRadians(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

/**
 * Calculate distance between two coordinates using the Haversine formula.
 *
 * @returns Distance in meters
 *
 * @example
 * ```typescript
 * // Ferry Building to Civic Center, San Francisco
 * haversineDistance(37.7955, -122.3937, 37.7793, -122.4193);
 * // Returns approximately 2900 meters
 * ```
 */
export function haversineDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
): number {
  const φ1 = lat1 * DEG_TO_RAD;
  const φ2 = lat2 * DEG_TO_RAD;
  const Δφ = (lat2 - lat1) * DEG_TO_RAD;
  const Δλ = (lon2 - lon1) * DEG_TO_RAD;

  const a =
    Math.sin(Δφ / 2) * Math.sin(Δφ / 2) +
    Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) * Math.sin(Δλ / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_METERS * c;
}

/**
 * Distance between two coordinates in feet
 */
export function distanceInFeet(a: GeoCoordinate, b: GeoCoordinate): number {
  return (
    haversineDistance(a.latitude, a.longitude, b.latitude, b.longitude) *
    FEET_PER_METER
  );
}

/**
 * Square search area centred on a point.
 * The longitude span widens with latitude so the box stays square on the ground.
 *
 * @param radiusFeet Half the side of the box
 */
export function boundingBox(
  center: GeoCoordinate,
  radiusFeet: number,
): BoundingBox {
  const latOffset = radiusFeet / FEET_PER_DEGREE;
  const lonOffset =
    radiusFeet / (FEET_PER_DEGREE * Math.cos(degreesToRadians(center.latitude)));

  return {
    sw: {
      latitude: center.latitude - latOffset,
      longitude: center.longitude - lonOffset,
    },
    ne: {
      latitude: center.latitude + latOffset,
      longitude: center.longitude + lonOffset,
    },
  };
}

/**
 * Whether a point lies inside a bounding box (edges included)
 */
export function isInBoundingBox(
  point: GeoCoordinate,
  box: BoundingBox,
): boolean {
  return (
    point.latitude >= box.sw.latitude &&
    point.latitude <= box.ne.latitude &&
    point.longitude >= box.sw.longitude &&
    point.longitude <= box.ne.longitude
  );
}
