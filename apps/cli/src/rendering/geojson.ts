/**
 * GeoJSON Rendering
 *
 * Converts a plotted batch into a FeatureCollection of sector polygons with
 * styling properties in the simplestyle convention.
 */

import type { Feature, FeatureCollection, Polygon, Position } from 'geojson';
import type { SectorStyle } from '@sectormap/core';
import type { PlottedSector, SectorBatch } from '@sectormap/engine';
import {
  boundsUnion,
  isClockwiseRing,
  isClosedRing,
  ringBounds,
  ringToLonLat,
  type GeoPolygon,
} from '@sectormap/geo';

/**
 * Properties attached to each sector feature
 */
export type SectorFeatureProperties = {
  row: number;
  enodebId: string;
  cellId: string;
  azimuth: number;
  beamwidth: number;
  tooltip: string;
  stroke: string;
  'stroke-width': number;
  fill: string;
  'fill-opacity': number;
};

export type SectorFeature = Feature<Polygon, SectorFeatureProperties>;
export type SectorFeatureCollection = FeatureCollection<Polygon, SectorFeatureProperties>;

/**
 * GeoJSON exterior ring: closed, [lon, lat] positions, counter-clockwise
 *
 * @param polygon - Sector ring as produced by the engine (clockwise)
 */
export function toExteriorRing(polygon: GeoPolygon): Position[] {
  const closed = polygon.length > 0 && !isClosedRing(polygon) ? [...polygon, polygon[0]] : polygon;
  const ring = isClockwiseRing(closed) ? [...closed].reverse() : closed;
  return ringToLonLat(ring);
}

/**
 * Build one polygon feature for a plotted sector
 *
 * @param sector - Plotted sector
 * @param style - Fill and border styling
 */
export function toSectorFeature(sector: PlottedSector, style: SectorStyle): SectorFeature {
  const { record } = sector;
  return {
    type: 'Feature',
    id: `${record.enodebId}-${record.cellId}-${sector.row}`,
    geometry: {
      type: 'Polygon',
      coordinates: [toExteriorRing(sector.polygon)],
    },
    properties: {
      row: sector.row,
      enodebId: record.enodebId,
      cellId: record.cellId,
      azimuth: record.azimuth,
      beamwidth: record.beamwidth,
      tooltip: sector.tooltip,
      stroke: style.borderColor,
      'stroke-width': style.borderWeight,
      fill: style.fillColor,
      'fill-opacity': style.fillOpacity,
    },
  };
}

/**
 * Convert a batch to a FeatureCollection; bbox covers every sector
 *
 * @param batch - Batch result from the plotter
 * @param style - Fill and border styling applied to every feature
 */
export function toFeatureCollection(batch: SectorBatch, style: SectorStyle): SectorFeatureCollection {
  const features = batch.sectors.map((sector) => toSectorFeature(sector, style));
  const collection: SectorFeatureCollection = { type: 'FeatureCollection', features };

  const bounds = boundsUnion(
    batch.sectors.flatMap((sector) => {
      const box = ringBounds(sector.polygon);
      return box ? [box] : [];
    })
  );
  if (bounds) {
    collection.bbox = [bounds.west, bounds.south, bounds.east, bounds.north];
  }

  return collection;
}
