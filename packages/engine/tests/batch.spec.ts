import { describe, it, expect } from 'vitest';
import type { AntennaRecord } from '@sectormap/core';
import { computeSectorPolygon } from '@sectormap/geo';
import { InvalidGeometryError } from '@sectormap/shared';
import {
  mapSectorResults,
  partitionResults,
  plotSectors,
  runPlotRequest,
  sectorTooltip,
  summarizeBatch,
  type SourcedRecord,
} from '../src/index.js';

function makeRecord(overrides: Partial<AntennaRecord> = {}): AntennaRecord {
  return {
    enodebId: '1001',
    cellId: '1',
    latitude: 51.5,
    longitude: -0.12,
    azimuth: 90,
    beamwidth: 65,
    ...overrides,
  };
}

/** Number records from zero, as the CSV source does for data rows */
function indexRecords(records: readonly AntennaRecord[]): SourcedRecord[] {
  return records.map((record, row) => ({ row, record }));
}

describe('sectorTooltip', () => {
  it('lists identifiers, azimuth and beamwidth', () => {
    expect(sectorTooltip(makeRecord({ azimuth: 120, beamwidth: 32.5 }))).toBe(
      '<b>ENodeB:</b> 1001<br><b>Cell ID:</b> 1<br><b>Azimuth:</b> 120<br><b>Beamwidth:</b> 32.5'
    );
  });

  it('escapes identifiers', () => {
    expect(sectorTooltip(makeRecord({ enodebId: '<script>' }))).toContain(
      '<b>ENodeB:</b> &lt;script&gt;<br>'
    );
  });
});

describe('mapSectorResults', () => {
  it('keeps one result per record', () => {
    const results = mapSectorResults(
      indexRecords([makeRecord(), makeRecord({ beamwidth: 0 })]),
      { radiusMeters: 300 }
    );
    expect(results).toHaveLength(2);
    expect(results[0].result.success).toBe(true);
    expect(results[1].result.success).toBe(false);
  });
});

describe('partitionResults', () => {
  it('separates sectors from failures in order', () => {
    const results = mapSectorResults(
      [
        { row: 4, record: makeRecord({ latitude: 95 }) },
        { row: 5, record: makeRecord({ cellId: '2' }) },
        { row: 7, record: makeRecord({ cellId: '3' }) },
      ],
      { radiusMeters: 300 }
    );
    const { sectors, failures } = partitionResults(results);

    expect(sectors.map((s) => s.row)).toEqual([5, 7]);
    expect(failures).toHaveLength(1);
    expect(failures[0].row).toBe(4);
    expect(failures[0].error).toBeInstanceOf(InvalidGeometryError);
    expect(failures[0].warning).toEqual({
      code: 'INVALID_GEOMETRY',
      message: 'Latitude 95 is outside [-90, 90]',
      severity: 'warning',
      row: 4,
      context: { latitude: 95 },
    });
  });
});

describe('plotSectors', () => {
  it('computes the engine polygon for each record', () => {
    const batch = plotSectors(indexRecords([makeRecord()]), { radiusMeters: 300 });
    expect(batch.sectors).toHaveLength(1);
    expect(batch.sectors[0].polygon).toStrictEqual(computeSectorPolygon(51.5, -0.12, 90, 65, 300));
    expect(batch.sectors[0].tooltip).toBe(sectorTooltip(makeRecord()));
  });

  it('continues past invalid records', () => {
    const batch = plotSectors(
      indexRecords([makeRecord({ beamwidth: -5 }), makeRecord(), makeRecord({ longitude: 200 })]),
      { radiusMeters: 300 }
    );
    expect(batch.sectors.map((s) => s.row)).toEqual([1]);
    expect(batch.failures.map((f) => f.row)).toEqual([0, 2]);
    expect(batch.truncated).toBe(0);
  });

  it('caps the batch at 100 records by default', () => {
    const records = indexRecords(Array.from({ length: 130 }, (_, i) => makeRecord({ cellId: String(i) })));
    const batch = plotSectors(records, { radiusMeters: 300 });
    expect(batch.sectors).toHaveLength(100);
    expect(batch.sectors[99].record.cellId).toBe('99');
    expect(batch.truncated).toBe(30);
  });

  it('honours a custom cap', () => {
    const records = indexRecords([makeRecord(), makeRecord(), makeRecord()]);
    expect(plotSectors(records, { radiusMeters: 300 }, { maxSectors: 2 }).truncated).toBe(1);
    expect(plotSectors(records, { radiusMeters: 300 }, { maxSectors: 0 }).sectors).toHaveLength(0);
  });

  it('counts capped-out failures as truncated, not failed', () => {
    const records = indexRecords([makeRecord(), makeRecord({ latitude: 100 })]);
    const batch = plotSectors(records, { radiusMeters: 300 }, { maxSectors: 1 });
    expect(batch.failures).toHaveLength(0);
    expect(batch.truncated).toBe(1);
  });

  it('fails every record for a non-positive radius', () => {
    const batch = plotSectors(indexRecords([makeRecord(), makeRecord()]), { radiusMeters: 0 });
    expect(batch.sectors).toHaveLength(0);
    expect(batch.failures).toHaveLength(2);
  });
});

describe('runPlotRequest', () => {
  it('matches plotSectors', () => {
    const records = indexRecords([makeRecord(), makeRecord({ azimuth: 200 })]);
    const params = { radiusMeters: 500 };
    expect(runPlotRequest({ records, params, options: { maxSectors: 1 } })).toStrictEqual(
      plotSectors(records, params, { maxSectors: 1 })
    );
  });
});

describe('summarizeBatch', () => {
  it('counts outcomes', () => {
    const records = indexRecords([
      makeRecord(),
      makeRecord({ beamwidth: 0 }),
      makeRecord(),
      makeRecord(),
    ]);
    const batch = plotSectors(records, { radiusMeters: 300 }, { maxSectors: 3 });
    expect(summarizeBatch(batch)).toEqual({
      total: 4,
      attempted: 3,
      plotted: 2,
      failed: 1,
      truncated: 1,
    });
  });
});
