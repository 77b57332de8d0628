/**
 * Antenna Record Source
 *
 * Turns CSV text into antenna records for the batch plotter. Missing columns
 * abort the load; rows with missing or malformed values are skipped with a
 * warning and the rest of the file is still loaded.
 */

import { AntennaRowSchema, formatIssues } from '@sectormap/core';
import type { SourcedRecord } from '@sectormap/engine';
import {
  MISSING_VALUE_TOKENS,
  MalformedRecordError,
  MissingColumnsError,
  REQUIRED_COLUMNS,
  toWarning,
  type RecordWarning,
  type RequiredColumn,
} from '@sectormap/shared';
import { parseCsv } from './csv.js';

/**
 * Result of loading records from a CSV source
 */
export type RecordLoadResult = {
  /** Usable records with their 0-based data row */
  records: SourcedRecord[];
  /** One entry per skipped row */
  warnings: RecordWarning[];
  /** Data rows in the file */
  totalRows: number;
  /** Rows dropped for missing required values */
  droppedMissing: number;
  /** Rows dropped for values that are not numbers */
  malformed: number;
};

/**
 * Check whether a cell counts as missing
 */
export function isMissingValue(cell: string | undefined): boolean {
  return cell === undefined || MISSING_VALUE_TOKENS.has(cell.trim());
}

/**
 * Position of a required column in the header
 */
export type ColumnIndex = {
  name: RequiredColumn;
  index: number;
};

/**
 * Locate required columns in a header
 *
 * @param header - Header cells
 * @returns Required columns with their first position in the header
 * @throws MissingColumnsError listing every absent column
 */
export function resolveColumns(header: readonly string[]): ColumnIndex[] {
  const missing = REQUIRED_COLUMNS.filter((name) => !header.includes(name));
  if (missing.length > 0) {
    throw new MissingColumnsError(missing);
  }

  return REQUIRED_COLUMNS.map((name) => ({ name, index: header.indexOf(name) }));
}

/**
 * Load antenna records from CSV text
 *
 * @param text - Raw CSV text
 * @returns Records plus per-row warnings
 * @throws UnreadableInputError for empty or unparsable input
 * @throws MissingColumnsError when required columns are absent
 */
export function loadAntennaRecords(text: string): RecordLoadResult {
  const { header, rows } = parseCsv(text);
  const columns = resolveColumns(header);

  const records: SourcedRecord[] = [];
  const warnings: RecordWarning[] = [];
  let droppedMissing = 0;
  let malformed = 0;

  rows.forEach((cells, row) => {
    const values: Record<string, string> = {};
    const empty: RequiredColumn[] = [];

    for (const { name, index } of columns) {
      const cell: string | undefined = cells[index];
      if (cell === undefined || isMissingValue(cell)) {
        empty.push(name);
      } else {
        values[name] = cell;
      }
    }

    if (empty.length > 0) {
      droppedMissing++;
      warnings.push({
        code: 'MISSING_VALUES',
        message: `Row ${row}: missing ${empty.join(', ')}`,
        severity: 'info',
        row,
        context: { columns: empty },
      });
      return;
    }

    const parsed = AntennaRowSchema.safeParse(values);
    if (!parsed.success) {
      malformed++;
      const issues = formatIssues(parsed.error);
      const error = new MalformedRecordError(`Row ${row}: ${issues.join('; ')}`, row, { issues });
      warnings.push(toWarning(error, row));
      return;
    }

    records.push({ row, record: parsed.data });
  });

  return { records, warnings, totalRows: rows.length, droppedMissing, malformed };
}
