/**
 * Sector geometry engine
 *
 * Turns an antenna location, azimuth, beamwidth and radius into a closed
 * "pie slice" ring: center, arc points from start to end bearing, center.
 * Pure and stateless; every call allocates its own output.
 */

import {
  destinationPoint,
  isValidLatitude,
  isValidLongitude,
  type AntennaRecord,
  type LatLon,
  type SectorParameters,
} from '@sectormap/core';
import {
  FULL_CIRCLE_DEG,
  InvalidGeometryError,
  MIN_ARC_POINTS,
  NARROW_BEAM_ARC_POINTS,
  NARROW_BEAM_THRESHOLD_DEG,
  err,
  linspace,
  normalizeDegrees,
  ok,
  type Result,
} from '@sectormap/shared';

// ============================================================================
// Types
// ============================================================================

/**
 * Closed ring of geographic points. The first and last entries are both the
 * antenna location.
 */
export type GeoPolygon = LatLon[];

/** Bearings bounding a sector, in degrees clockwise from north */
export interface SectorBearings {
  start: number;
  end: number;
  /** Sampled bearings from start to end, both included */
  samples: number[];
}

// ============================================================================
// Sampling
// ============================================================================

/**
 * Number of arc points for a beamwidth: about one per degree for wide beams,
 * a fixed count for narrow ones, never fewer than MIN_ARC_POINTS.
 */
export function arcPointCount(beamwidth: number): number {
  const count =
    beamwidth > NARROW_BEAM_THRESHOLD_DEG
      ? Math.round(Math.min(beamwidth, FULL_CIRCLE_DEG))
      : NARROW_BEAM_ARC_POINTS;
  return Math.max(MIN_ARC_POINTS, count);
}

/**
 * Start/end bearings and the evenly spaced samples between them.
 * Azimuth is taken modulo 360; beamwidths above a full turn are capped at 360.
 */
export function sectorBearings(azimuth: number, beamwidth: number): SectorBearings {
  const center = normalizeDegrees(azimuth);
  const half = Math.min(beamwidth, FULL_CIRCLE_DEG) / 2;
  const start = center - half;
  const end = center + half;

  return { start, end, samples: linspace(start, end, arcPointCount(beamwidth)) };
}

// ============================================================================
// Validation
// ============================================================================

function assertSectorInputs(
  latitude: number,
  longitude: number,
  azimuth: number,
  beamwidth: number,
  radiusMeters: number
): void {
  if (!isValidLatitude(latitude)) {
    throw new InvalidGeometryError(`Latitude ${latitude} is outside [-90, 90]`, { latitude });
  }
  if (!isValidLongitude(longitude)) {
    throw new InvalidGeometryError(`Longitude ${longitude} is outside [-180, 180]`, { longitude });
  }
  if (!Number.isFinite(azimuth)) {
    throw new InvalidGeometryError(`Azimuth ${azimuth} is not a finite angle`, { azimuth });
  }
  if (!(beamwidth > 0) || !Number.isFinite(beamwidth)) {
    throw new InvalidGeometryError(`Beamwidth must be positive, got ${beamwidth}`, { beamwidth });
  }
  if (!(radiusMeters > 0) || !Number.isFinite(radiusMeters)) {
    throw new InvalidGeometryError(`Radius must be positive, got ${radiusMeters}`, {
      radiusMeters,
    });
  }
}

// ============================================================================
// Polygon Construction
// ============================================================================

/**
 * Compute the sector polygon for one antenna.
 *
 * Arc points come from the spherical direct problem (R = 6378137 m). Their
 * longitudes are not wrapped, so a sector straddling the antimeridian keeps a
 * continuous ring with values beyond ±180.
 *
 * @throws InvalidGeometryError for out-of-range latitude/longitude, a
 * non-positive or non-finite beamwidth or radius, or a non-finite azimuth
 */
export function computeSectorPolygon(
  latitude: number,
  longitude: number,
  azimuth: number,
  beamwidth: number,
  radiusMeters: number
): GeoPolygon {
  assertSectorInputs(latitude, longitude, azimuth, beamwidth, radiusMeters);

  const center: LatLon = { lat: latitude, lon: longitude };
  const { samples } = sectorBearings(azimuth, beamwidth);

  const polygon: GeoPolygon = [{ ...center }];
  for (const bearing of samples) {
    polygon.push(destinationPoint(center, bearing, radiusMeters));
  }
  polygon.push({ ...center });

  return polygon;
}

/**
 * Same as computeSectorPolygon but returns the failure instead of throwing
 */
export function trySectorPolygon(
  latitude: number,
  longitude: number,
  azimuth: number,
  beamwidth: number,
  radiusMeters: number
): Result<GeoPolygon, InvalidGeometryError> {
  try {
    return ok(computeSectorPolygon(latitude, longitude, azimuth, beamwidth, radiusMeters));
  } catch (error) {
    if (error instanceof InvalidGeometryError) {
      return err(error);
    }
    throw error;
  }
}

/**
 * Sector polygon for a validated antenna record
 */
export function sectorPolygonForRecord(
  record: AntennaRecord,
  params: SectorParameters
): Result<GeoPolygon, InvalidGeometryError> {
  return trySectorPolygon(
    record.latitude,
    record.longitude,
    record.azimuth,
    record.beamwidth,
    params.radiusMeters
  );
}
