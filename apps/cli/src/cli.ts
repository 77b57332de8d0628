/**
 * Command-line Runner
 *
 * Reads an antenna CSV, plots every usable record as a sector and writes
 * GeoJSON or a Leaflet page. Bad rows are reported and skipped; missing
 * columns, unreadable input and invalid flags stop the run.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { runPlotRequest, summarizeBatch } from '@sectormap/engine';
import { computeViewport } from '@sectormap/geo';
import { SectorMapError, UnreadableInputError, errorMessage } from '@sectormap/shared';
import { HELP_TEXT, parseCliArgs, type CliOptions } from './config.js';
import { loadAntennaRecords } from './io/records.js';
import { toFeatureCollection } from './rendering/geojson.js';
import { renderLeafletHtml } from './rendering/leaflet.js';

/**
 * File and stream access used by the runner
 */
export type CliIo = {
  readText: (path: string) => Promise<string>;
  writeText: (path: string, text: string) => Promise<void>;
  writeStdout: (text: string) => void;
};

export const nodeIo: CliIo = {
  readText: (path) => readFile(path, 'utf8'),
  writeText: (path, text) => writeFile(path, text, 'utf8'),
  writeStdout: (text) => {
    process.stdout.write(text);
  },
};

/**
 * Read the input file, wrapping any failure as unreadable input
 */
async function readInput(io: CliIo, path: string): Promise<string> {
  try {
    return await io.readText(path);
  } catch (error) {
    throw new UnreadableInputError(`Error reading file: ${errorMessage(error)}`, { path });
  }
}

/**
 * Produce the output document for a run
 *
 * @param text - CSV text
 * @param options - Resolved CLI options
 * @returns Document text, or null when nothing could be plotted
 */
export function renderDocument(text: string, options: CliOptions): string | null {
  const { config } = options;
  // Status goes to stderr when the document itself goes to stdout
  const info = (message: string) =>
    options.output === undefined ? console.error(message) : console.info(message);

  const loaded = loadAntennaRecords(text);
  for (const warning of loaded.warnings) {
    console.warn(`[records] ${warning.message}`);
  }

  // Rows that survive the missing-value drop, including ones that fail to parse later
  const remaining = loaded.totalRows - loaded.droppedMissing;
  if (remaining === 0) {
    console.warn('No sectors left after removing rows with missing values.');
    return null;
  }
  info(`Loaded ${remaining} sectors successfully.`);

  const viewport = computeViewport(
    loaded.records.map(({ record }) => ({ lat: record.latitude, lon: record.longitude })),
    config.zoom
  );
  if (!viewport) {
    console.warn('No sectors could be plotted.');
    return null;
  }

  const batch = runPlotRequest({
    records: loaded.records,
    params: { radiusMeters: config.radiusMeters },
    options: { maxSectors: config.maxSectors },
  });

  for (const failure of batch.failures) {
    console.warn(`Error plotting row ${failure.row}: ${failure.error.message}`);
  }

  const summary = summarizeBatch(batch);
  if (summary.truncated > 0) {
    console.warn(
      `Only the first ${summary.attempted} sectors were plotted; ${summary.truncated} more were skipped.`
    );
  }

  const collection = toFeatureCollection(batch, config.style);
  return options.format === 'html'
    ? renderLeafletHtml(collection, viewport)
    : `${JSON.stringify(collection, null, 2)}\n`;
}

/**
 * Run the CLI
 *
 * @param argv - Arguments after the script name
 * @param io - File and stream access
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], io: CliIo = nodeIo): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help || options.input === undefined) {
      console.log(HELP_TEXT);
      return 0;
    }

    const text = await readInput(io, options.input);
    const document = renderDocument(text, options);
    if (document === null) return 0;

    if (options.output === undefined) {
      io.writeStdout(document);
    } else {
      await io.writeText(options.output, document);
      console.info(`Wrote ${options.format} to ${options.output}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof SectorMapError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }
}
