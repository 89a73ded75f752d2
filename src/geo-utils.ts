/**
 * Geographic Utility Functions
 *
 * Great-circle distance and bearing on a spherical Earth, plus the coordinate
 * checks shared by the parser and the analysis layer.
 */

/** Mean Earth radius in kilometers. */
export const EARTH_RADIUS_KM = 6371.0;

/**
 * Anything carrying decimal-degree coordinates.
 */
export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

const toRad = (deg: number): number => deg * Math.PI / 180;
const toDeg = (rad: number): number => rad * 180 / Math.PI;

/**
 * Calculate the distance between two coordinates in kilometers.
 * Uses the Haversine formula for great-circle distance on a sphere.
 *
 * Swapping `a` and `b` yields the identical value. Non-finite input
 * propagates as NaN.
 *
 * @param radiusKm - Sphere radius, defaults to {@link EARTH_RADIUS_KM}
 */
export function greatCircleDistance(
  a: Coordinate,
  b: Coordinate,
  radiusKm: number = EARTH_RADIUS_KM
): number {
  const lat1 = toRad(a.latitude);
  const lat2 = toRad(b.latitude);
  const dLat = lat2 - lat1;
  const dLon = toRad(b.longitude) - toRad(a.longitude);

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;

  return 2 * radiusKm * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Initial bearing (forward azimuth) from `a` towards `b`.
 *
 * @returns Compass degrees in [0, 360), 0 = north
 */
export function initialBearing(a: Coordinate, b: Coordinate): number {
  const lat1 = toRad(a.latitude);
  const lat2 = toRad(b.latitude);
  const dLon = toRad(b.longitude) - toRad(a.longitude);

  const x = Math.sin(dLon) * Math.cos(lat2);
  const y =
    Math.cos(lat1) * Math.sin(lat2) -
    Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon);

  return (toDeg(Math.atan2(x, y)) + 360) % 360;
}

/**
 * Validate decimal-degree coordinates.
 *
 * @returns True if both values are finite and within range
 */
export function isValidCoordinate(lat: number, lon: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lon) &&
    lat >= -90 &&
    lat <= 90 &&
    lon >= -180 &&
    lon <= 180
  );
}

/**
 * Check whether a coordinate lies inside a bounding box (edges included).
 */
export function isWithinBounds(point: Coordinate, box: BoundingBox): boolean {
  return (
    point.latitude >= box.minLat &&
    point.latitude <= box.maxLat &&
    point.longitude >= box.minLon &&
    point.longitude <= box.maxLon
  );
}
