/**
 * Batch plotting
 *
 * Records are plotted in source order, one engine call each. Calls share no
 * state, so a failure on one record never affects another: each becomes a
 * Result and the batch is partitioned afterwards.
 */

import type { AntennaRecord, SectorParameters } from '@sectormap/core';
import { sectorPolygonForRecord } from '@sectormap/geo';
import { MAX_RENDERED_SECTORS, escapeHtml, formatNumber, toWarning } from '@sectormap/shared';
import type {
  BatchSummary,
  PlotOptions,
  PlotRequest,
  PlottedSector,
  SectorBatch,
  SectorFailure,
  SectorResult,
  SourcedRecord,
} from '../api/index.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Tooltip shown on hover: identifiers (escaped), azimuth and beamwidth
 */
export function sectorTooltip(record: AntennaRecord): string {
  return [
    `<b>ENodeB:</b> ${escapeHtml(record.enodebId)}`,
    `<b>Cell ID:</b> ${escapeHtml(record.cellId)}`,
    `<b>Azimuth:</b> ${formatNumber(record.azimuth)}`,
    `<b>Beamwidth:</b> ${formatNumber(record.beamwidth)}`,
  ].join('<br>');
}

// ============================================================================
// Mapping & Partitioning
// ============================================================================

/**
 * Run the engine over every record, keeping one result per record
 */
export function mapSectorResults(
  records: readonly SourcedRecord[],
  params: SectorParameters
): SectorResult[] {
  return records.map(({ row, record }) => ({
    row,
    record,
    result: sectorPolygonForRecord(record, params),
  }));
}

/**
 * Split results into plotted sectors and failures, preserving order
 */
export function partitionResults(results: readonly SectorResult[]): {
  sectors: PlottedSector[];
  failures: SectorFailure[];
} {
  const sectors: PlottedSector[] = [];
  const failures: SectorFailure[] = [];

  for (const { row, record, result } of results) {
    if (result.success) {
      sectors.push({ row, record, polygon: result.data, tooltip: sectorTooltip(record) });
    } else {
      failures.push({ row, record, error: result.error, warning: toWarning(result.error, row) });
    }
  }

  return { sectors, failures };
}

// ============================================================================
// Batch Entry Points
// ============================================================================

/**
 * Plot up to `maxSectors` records; the rest are counted as truncated
 */
export function plotSectors(
  records: readonly SourcedRecord[],
  params: SectorParameters,
  options: PlotOptions = {}
): SectorBatch {
  const { maxSectors = MAX_RENDERED_SECTORS } = options;
  const limit = Math.max(0, Math.floor(maxSectors));
  const attempted = records.slice(0, limit);

  const { sectors, failures } = partitionResults(mapSectorResults(attempted, params));

  return {
    sectors,
    failures,
    truncated: records.length - attempted.length,
  };
}

/**
 * Request-object form of plotSectors
 */
export function runPlotRequest(request: PlotRequest): SectorBatch {
  return plotSectors(request.records, request.params, request.options);
}

/**
 * Counts for a finished batch
 */
export function summarizeBatch(batch: SectorBatch): BatchSummary {
  const attempted = batch.sectors.length + batch.failures.length;
  return {
    total: attempted + batch.truncated,
    attempted,
    plotted: batch.sectors.length,
    failed: batch.failures.length,
    truncated: batch.truncated,
  };
}
