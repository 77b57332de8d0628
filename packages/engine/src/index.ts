/**
 * @sectormap/engine
 * Batch sector plotting: one engine call per record, failures kept per record
 */

export * from './api/index.js';
export * from './batch/index.js';
