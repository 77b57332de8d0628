/**
 * Map viewport utilities
 * Bounds merging and initial view computation for rendered sectors
 */

import {
  geoBoundingBoxFromPoints,
  type GeoBoundingBox,
  type LatLon,
} from '@sectormap/core';
import { DEFAULT_MAP_ZOOM, mean } from '@sectormap/shared';

// ============================================================================
// Types
// ============================================================================

/** Initial map view */
export interface Viewport {
  center: LatLon;
  zoom: number;
  bounds: GeoBoundingBox;
}

// ============================================================================
// Bounds Utilities
// ============================================================================

/**
 * Smallest box containing every given box
 */
export function boundsUnion(boxes: readonly GeoBoundingBox[]): GeoBoundingBox | null {
  if (boxes.length === 0) return null;

  return boxes.reduce((acc, box) => ({
    south: Math.min(acc.south, box.south),
    west: Math.min(acc.west, box.west),
    north: Math.max(acc.north, box.north),
    east: Math.max(acc.east, box.east),
  }));
}

// ============================================================================
// Viewport
// ============================================================================

/**
 * Initial view for a set of antenna locations: centered on the mean latitude
 * and longitude of all locations, at a fixed zoom.
 *
 * Returns null when there are no locations.
 */
export function computeViewport(
  locations: readonly LatLon[],
  zoom = DEFAULT_MAP_ZOOM
): Viewport | null {
  const bounds = geoBoundingBoxFromPoints(locations);
  if (!bounds) return null;

  return {
    center: {
      lat: mean(locations.map((p) => p.lat)),
      lon: mean(locations.map((p) => p.lon)),
    },
    zoom,
    bounds,
  };
}
