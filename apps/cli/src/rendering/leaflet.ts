/**
 * Leaflet HTML Rendering
 *
 * Produces a standalone HTML page that draws sector polygons over
 * OpenStreetMap tiles, with a tooltip per sector.
 */

import type { Viewport } from '@sectormap/geo';
import { escapeHtml } from '@sectormap/shared';
import type { SectorFeatureCollection } from './geojson.js';

export const LEAFLET_VERSION = '1.9.4';

/**
 * HTML page options
 */
export type LeafletPageOptions = {
  /** Page title */
  title?: string;
  /** Map height (CSS length) */
  height?: string;
};

/**
 * Serialize data for an inline <script>; "<" is escaped so a value can never
 * close the script element
 *
 * @param data - JSON-serializable value
 */
export function inlineJson(data: unknown): string {
  return JSON.stringify(data).replace(/</g, '\\u003c');
}

/**
 * Render a standalone Leaflet page for a sector collection
 *
 * @param collection - Sector features (styled via their properties)
 * @param viewport - Initial center and zoom
 * @param options - Page options
 * @returns Complete HTML document
 */
export function renderLeafletHtml(
  collection: SectorFeatureCollection,
  viewport: Viewport,
  options: LeafletPageOptions = {}
): string {
  const { title = 'Telecom Sector Visualizer', height = '100vh' } = options;
  const leafletBase = `https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist`;
  const view = inlineJson({ center: [viewport.center.lat, viewport.center.lon], zoom: viewport.zoom });

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)}</title>
<link rel="stylesheet" href="${leafletBase}/leaflet.css">
<script src="${leafletBase}/leaflet.js"></script>
<style>html, body { margin: 0; } #map { width: 100%; height: ${escapeHtml(height)}; }</style>
</head>
<body>
<div id="map"></div>
<script>
const view = ${view};
const sectors = ${inlineJson(collection)};
const map = L.map('map').setView(view.center, view.zoom);
L.tileLayer('https://tile.openstreetmap.org/{z}/{x}/{y}.png', {
  maxZoom: 19,
  attribution: '&copy; OpenStreetMap contributors'
}).addTo(map);
L.geoJSON(sectors, {
  style: (feature) => ({
    color: feature.properties.stroke,
    weight: feature.properties['stroke-width'],
    fill: true,
    fillColor: feature.properties.fill,
    fillOpacity: feature.properties['fill-opacity']
  }),
  onEachFeature: (feature, layer) => layer.bindTooltip(feature.properties.tooltip)
}).addTo(map);
</script>
</body>
</html>
`;
}
