/**
 * CSV Reading
 *
 * Minimal RFC 4180 reader: comma separated, double-quote quoting with ""
 * escapes, LF or CRLF line endings, first row is the header.
 */

import { UnreadableInputError } from '@sectormap/shared';

/**
 * Parsed CSV table
 */
export type CsvTable = {
  /** Header cells, trimmed */
  header: string[];
  /** Data rows (blank lines removed); cells are untrimmed */
  rows: string[][];
};

/**
 * Split CSV text into records of cells
 *
 * @param text - Raw CSV text
 * @returns Every record, including blank ones as a single empty cell
 */
export function splitCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = '';
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        cell += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && cell.length === 0) {
      inQuotes = true;
    } else if (ch === ',') {
      record.push(cell);
      cell = '';
    } else if (ch === '\n' || ch === '\r') {
      record.push(cell);
      records.push(record);
      record = [];
      cell = '';
      if (ch === '\r' && text[i + 1] === '\n') i++;
    } else {
      cell += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new UnreadableInputError('Unterminated quoted field in CSV input');
  }

  // Last line without a trailing newline
  if (cell.length > 0 || record.length > 0) {
    record.push(cell);
    records.push(record);
  }

  return records;
}

/**
 * Parse CSV text into a header and data rows
 *
 * @param text - Raw CSV text (a leading byte order mark is ignored)
 * @returns Parsed table
 * @throws UnreadableInputError when there is no header row
 */
export function parseCsv(text: string): CsvTable {
  const source = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const records = splitCsvRecords(source).filter(
    (record) => !(record.length === 1 && record[0].trim() === '')
  );

  if (records.length === 0) {
    throw new UnreadableInputError('CSV input is empty');
  }

  const [header, ...rows] = records;
  return { header: header.map((name) => name.trim()), rows };
}
