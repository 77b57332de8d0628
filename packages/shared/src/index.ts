/**
 * @sectormap/shared
 * Shared types, constants, errors, and utilities for SectorMap
 */

export * from './types/index.js';
export * from './constants/index.js';
export * from './utils/index.js';
export * from './errors/index.js';
