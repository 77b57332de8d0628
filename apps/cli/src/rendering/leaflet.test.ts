import { describe, it, expect } from 'vitest';
import type { Viewport } from '@sectormap/geo';
import type { SectorFeatureCollection } from './geojson.js';
import { LEAFLET_VERSION, inlineJson, renderLeafletHtml } from './leaflet.js';

const viewport: Viewport = {
  center: { lat: 45, lon: 10 },
  zoom: 14,
  bounds: { south: 44, west: 9, north: 46, east: 11 },
};

const empty: SectorFeatureCollection = { type: 'FeatureCollection', features: [] };

describe('inlineJson', () => {
  it('escapes "<" so data cannot close the script element', () => {
    expect(inlineJson({ tooltip: '</script>' })).toBe('{"tooltip":"\\u003c/script>"}');
  });
});

describe('renderLeafletHtml', () => {
  it('renders a complete page centered on the viewport', () => {
    const html = renderLeafletHtml(empty, viewport);
    const lines = html.split('\n');
    expect(lines[0]).toBe('<!DOCTYPE html>');
    expect(lines).toContain('<title>Telecom Sector Visualizer</title>');
    expect(lines).toContain(
      `<link rel="stylesheet" href="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.css">`
    );
    expect(lines).toContain('const view = {"center":[45,10],"zoom":14};');
    expect(lines).toContain('const sectors = {"type":"FeatureCollection","features":[]};');
  });

  it('escapes the title and applies the height', () => {
    const html = renderLeafletHtml(empty, viewport, { title: 'Cells & <Sites>', height: '600px' });
    const lines = html.split('\n');
    expect(lines).toContain('<title>Cells &amp; &lt;Sites&gt;</title>');
    expect(lines).toContain(
      '<style>html, body { margin: 0; } #map { width: 100%; height: 600px; }</style>'
    );
  });
});
