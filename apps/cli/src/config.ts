/**
 * Command-line Configuration
 *
 * Flags are collected by hand and validated with Zod; render settings go
 * through the shared RenderConfig schema.
 */

import { z } from 'zod';
import { formatIssues, parseRenderConfig, type RenderConfig } from '@sectormap/core';
import { ConfigError } from '@sectormap/shared';

export const OutputFormatSchema = z.enum(['geojson', 'html']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * Resolved CLI options
 */
export type CliOptions = {
  help: boolean;
  /** CSV file to read */
  input?: string;
  /** Output file; stdout when absent */
  output?: string;
  format: OutputFormat;
  config: RenderConfig;
};

/** Flags that take a value, with their long name */
const VALUE_FLAGS = new Map<string, string>([
  ['-i', 'input'],
  ['--input', 'input'],
  ['-o', 'output'],
  ['--output', 'output'],
  ['-f', 'format'],
  ['--format', 'format'],
  ['-r', 'radius'],
  ['--radius', 'radius'],
  ['--opacity', 'opacity'],
  ['--color', 'color'],
  ['--max-sectors', 'max-sectors'],
  ['--zoom', 'zoom'],
]);

/**
 * Infer an output format from a file name
 *
 * @param output - Output path, if any
 */
export function formatFromPath(output: string | undefined): OutputFormat {
  return output !== undefined && /\.html?$/i.test(output) ? 'html' : 'geojson';
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * Parse command-line arguments
 *
 * @param argv - Arguments after the script name
 * @returns Resolved options
 * @throws ConfigError for unknown flags, missing values, or invalid settings
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const values = new Map<string, string>();
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }

    const name = VALUE_FLAGS.get(arg);
    if (name === undefined) {
      if (!arg.startsWith('-') && !values.has('input')) {
        values.set('input', arg);
        continue;
      }
      throw new ConfigError(`Unknown argument: ${arg}`, { argument: arg });
    }

    const value = argv[i + 1];
    if (value === undefined) {
      throw new ConfigError(`Missing value for ${arg}`, { argument: arg });
    }
    values.set(name, value);
    i++;
  }

  const output = values.get('output');
  const rawFormat = values.get('format') ?? formatFromPath(output);
  const format = OutputFormatSchema.safeParse(rawFormat);
  if (!format.success) {
    throw new ConfigError(`Invalid format: ${formatIssues(format.error).join('; ')}`, {
      format: rawFormat,
    });
  }

  const input = values.get('input');
  if (!help && input === undefined) {
    throw new ConfigError('No input file given (use --input <file.csv>)');
  }

  const config = parseRenderConfig({
    radiusMeters: toNumber(values.get('radius')),
    maxSectors: toNumber(values.get('max-sectors')),
    zoom: toNumber(values.get('zoom')),
    style: {
      fillOpacity: toNumber(values.get('opacity')),
      fillColor: values.get('color'),
    },
  });

  return { help, input, output, format: format.data, config };
}

export const HELP_TEXT = `
SectorMap - draw antenna sectors from a CSV file

Usage:
  sectormap --input cells.csv [options]

Required CSV columns:
  ENODEB_ID, CELL_ID, LONGITUDE, LATITUDE, AZIMUTH, BEAMWIDTH_H

Options:
  -h, --help             Show this help message
  -i, --input FILE       CSV file to read
  -o, --output FILE      Write here instead of stdout
  -f, --format FORMAT    geojson | html (default: from output name, else geojson)
  -r, --radius M         Sector radius in meters, 50-2000 (default: 300)
      --opacity X        Fill opacity, 0-1 (default: 0.5)
      --color HEX        Fill color (default: #3388ff)
      --max-sectors N    Most sectors to draw (default: 100)
      --zoom Z           Initial map zoom for html output (default: 14)

Examples:
  sectormap cells.csv -o sectors.geojson
  sectormap -i cells.csv -o map.html --radius 500 --color #ff7800
`;
