/**
 * Batch API - request/response shapes for plotting many sectors at once
 */

import type { AntennaRecord, SectorParameters } from '@sectormap/core';
import type { GeoPolygon } from '@sectormap/geo';
import type { InvalidGeometryError, RecordWarning, Result } from '@sectormap/shared';

// ============================================================================
// Request Types
// ============================================================================

/** A record together with its position in the source (0-based data row) */
export interface SourcedRecord {
  row: number;
  record: AntennaRecord;
}

/** Batch options */
export interface PlotOptions {
  /** Records beyond this count are not computed (default MAX_RENDERED_SECTORS) */
  maxSectors?: number;
}

/** Everything needed to plot a batch */
export interface PlotRequest {
  records: readonly SourcedRecord[];
  params: SectorParameters;
  options?: PlotOptions;
}

// ============================================================================
// Response Types
// ============================================================================

/** Outcome of one engine call */
export interface SectorResult {
  row: number;
  record: AntennaRecord;
  result: Result<GeoPolygon, InvalidGeometryError>;
}

/** A successfully computed sector, ready for a renderer */
export interface PlottedSector {
  row: number;
  record: AntennaRecord;
  polygon: GeoPolygon;
  /** HTML tooltip built from the record identifiers */
  tooltip: string;
}

/** A record the engine rejected */
export interface SectorFailure {
  row: number;
  record: AntennaRecord;
  error: InvalidGeometryError;
  warning: RecordWarning;
}

/** Partitioned batch outcome */
export interface SectorBatch {
  sectors: PlottedSector[];
  failures: SectorFailure[];
  /** Records skipped because of the batch cap */
  truncated: number;
}

/** Counts for reporting */
export interface BatchSummary {
  total: number;
  attempted: number;
  plotted: number;
  failed: number;
  truncated: number;
}
