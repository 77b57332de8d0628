/**
 * @sectormap/core
 * Coordinates, spherical geodesy, and record/config schemas for SectorMap
 */

export * from './schema/index.js';
export * from './coords/index.js';
