/**
 * Geographic ring operations
 */

import { geoBoundingBoxFromPoints, latLonEqual, type GeoBoundingBox, type LatLon } from '@sectormap/core';

/** GeoJSON position order: [longitude, latitude] */
export type LonLat = [number, number];

// ============================================================================
// Ring Predicates
// ============================================================================

/** Check if a ring starts and ends on the same point */
export function isClosedRing(ring: readonly LatLon[], epsilonDeg = 0): boolean {
  if (ring.length < 2) return false;
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (epsilonDeg === 0) {
    return first.lat === last.lat && first.lon === last.lon;
  }
  return latLonEqual(first, last, epsilonDeg);
}

// ============================================================================
// Ring Accessors
// ============================================================================

/** Get bounding box of a ring */
export function ringBounds(ring: readonly LatLon[]): GeoBoundingBox | null {
  return geoBoundingBoxFromPoints(ring);
}

// ============================================================================
// Conversions
// ============================================================================

/** Convert a ring to GeoJSON [lon, lat] positions */
export function ringToLonLat(ring: readonly LatLon[]): LonLat[] {
  return ring.map((p) => [p.lon, p.lat]);
}

/**
 * Signed area of a ring in squared degrees on the plate carrée plane.
 * Positive for counter-clockwise rings (east = +x, north = +y).
 */
export function planarSignedArea(ring: readonly LatLon[]): number {
  const n = ring.length;
  if (n < 3) return 0;

  let area = 0;
  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    area += ring[i].lon * ring[j].lat - ring[j].lon * ring[i].lat;
  }
  return area / 2;
}

/** Check if ring winds clockwise when drawn east-right, north-up */
export function isClockwiseRing(ring: readonly LatLon[]): boolean {
  return planarSignedArea(ring) < 0;
}
