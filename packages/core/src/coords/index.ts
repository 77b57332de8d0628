/**
 * Geographic coordinates and spherical-Earth geodesy
 *
 * All formulas treat the Earth as a sphere of radius EARTH_RADIUS_EQUATORIAL.
 * Angles are degrees at the API boundary and radians internally.
 */

import { EARTH_RADIUS_EQUATORIAL, clamp, normalizeDegrees } from '@sectormap/shared';

export { EARTH_RADIUS_EQUATORIAL } from '@sectormap/shared';

// ============================================================================
// Coordinate Types
// ============================================================================

/** Latitude/Longitude coordinates (degrees) */
export interface LatLon {
  lat: number;
  lon: number;
}

/** Bounding box in geographic coordinates */
export interface GeoBoundingBox {
  south: number;
  west: number;
  north: number;
  east: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Degrees to radians conversion factor */
export const DEG_TO_RAD = Math.PI / 180;

/** Radians to degrees conversion factor */
export const RAD_TO_DEG = 180 / Math.PI;

// ============================================================================
// Range Checks
// ============================================================================

/** Latitude is finite and within [-90, 90] */
export function isValidLatitude(latDeg: number): boolean {
  return Number.isFinite(latDeg) && latDeg >= -90 && latDeg <= 90;
}

/** Longitude is finite and within [-180, 180] */
export function isValidLongitude(lonDeg: number): boolean {
  return Number.isFinite(lonDeg) && lonDeg >= -180 && lonDeg <= 180;
}

// ============================================================================
// Forward & Inverse Problems
// ============================================================================

/**
 * Destination point given a start, an initial bearing (clockwise from north)
 * and a great-circle distance.
 *
 * φ2 = asin(sin φ1 · cos δ + cos φ1 · sin δ · cos θ)
 * λ2 = λ1 + atan2(sin θ · sin δ · cos φ1, cos δ − sin φ1 · sin φ2)
 *
 * The returned longitude is not wrapped; near the antimeridian it can leave
 * [-180, 180].
 *
 * From a pole the atan2 denominator rounds to exactly 0, so every bearing
 * lands on longitude ±90 (or the start longitude) and a sector drawn there
 * degenerates to a line. Latitudes stay finite.
 */
export function destinationPoint(
  start: LatLon,
  bearingDeg: number,
  distanceM: number,
  radius = EARTH_RADIUS_EQUATORIAL
): LatLon {
  const delta = distanceM / radius;
  const theta = bearingDeg * DEG_TO_RAD;
  const phi1 = start.lat * DEG_TO_RAD;
  const lambda1 = start.lon * DEG_TO_RAD;

  const sinPhi1 = Math.sin(phi1);
  const cosPhi1 = Math.cos(phi1);
  const sinDelta = Math.sin(delta);
  const cosDelta = Math.cos(delta);

  // Rounding can push the sine a hair past ±1 at the poles
  const sinPhi2 = clamp(sinPhi1 * cosDelta + cosPhi1 * sinDelta * Math.cos(theta), -1, 1);
  const phi2 = Math.asin(sinPhi2);
  const lambda2 =
    lambda1 + Math.atan2(Math.sin(theta) * sinDelta * cosPhi1, cosDelta - sinPhi1 * sinPhi2);

  return { lat: phi2 * RAD_TO_DEG, lon: lambda2 * RAD_TO_DEG };
}

/**
 * Haversine distance between two lat/lon points (in meters)
 */
export function haversineDistance(
  p1: LatLon,
  p2: LatLon,
  radius = EARTH_RADIUS_EQUATORIAL
): number {
  const lat1 = p1.lat * DEG_TO_RAD;
  const lat2 = p2.lat * DEG_TO_RAD;
  const dLat = (p2.lat - p1.lat) * DEG_TO_RAD;
  const dLon = (p2.lon - p1.lon) * DEG_TO_RAD;

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) * Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return radius * c;
}

/**
 * Initial great-circle bearing from p1 to p2, in [0, 360)
 */
export function initialBearing(p1: LatLon, p2: LatLon): number {
  const lat1 = p1.lat * DEG_TO_RAD;
  const lat2 = p2.lat * DEG_TO_RAD;
  const dLon = (p2.lon - p1.lon) * DEG_TO_RAD;

  const y = Math.sin(dLon) * Math.cos(lat2);
  const x = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon);

  return normalizeDegrees(Math.atan2(y, x) * RAD_TO_DEG);
}

/**
 * Check if two lat/lon points are approximately equal
 */
export function latLonEqual(p1: LatLon, p2: LatLon, epsilonDeg = 1e-9): boolean {
  return Math.abs(p1.lat - p2.lat) < epsilonDeg && Math.abs(p1.lon - p2.lon) < epsilonDeg;
}

// ============================================================================
// Bounding Box Functions
// ============================================================================

/**
 * Create a geographic bounding box from a set of points
 */
export function geoBoundingBoxFromPoints(points: readonly LatLon[]): GeoBoundingBox | null {
  if (points.length === 0) return null;

  let south = Infinity;
  let west = Infinity;
  let north = -Infinity;
  let east = -Infinity;

  for (const p of points) {
    if (p.lat < south) south = p.lat;
    if (p.lon < west) west = p.lon;
    if (p.lat > north) north = p.lat;
    if (p.lon > east) east = p.lon;
  }

  return { south, west, north, east };
}
