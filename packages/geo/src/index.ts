/**
 * @sectormap/geo
 * Sector geometry engine, geographic rings, and map viewport utilities
 */

export * from './sector/index.js';
export * from './geom/index.js';
export * from './map/index.js';
