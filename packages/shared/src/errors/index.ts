/**
 * Error taxonomy
 *
 * Geometry errors come from the sector engine and are handled per record by
 * the caller. Record errors are per-row and skipped. Column, input and config
 * errors are blocking: nothing is plotted.
 */

import type { RecordWarning } from '../types/index.js';

// ============================================================================
// Error Codes
// ============================================================================

export const ERROR_CODES = {
  /** Out-of-range coordinates, non-positive radius or beamwidth */
  INVALID_GEOMETRY: 'INVALID_GEOMETRY',
  /** A row whose required values are not numbers */
  MALFORMED_RECORD: 'MALFORMED_RECORD',
  /** Input lacks one or more required columns */
  MISSING_COLUMNS: 'MISSING_COLUMNS',
  /** Input cannot be read or parsed at all */
  UNREADABLE_INPUT: 'UNREADABLE_INPUT',
  /** Rendering configuration failed validation */
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// ============================================================================
// Error Classes
// ============================================================================

/** Base class carrying a machine-readable code */
export abstract class SectorMapError extends Error {
  abstract readonly code: ErrorCode;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
  }
}

/** Raised by the sector engine for inputs it cannot turn into a polygon */
export class InvalidGeometryError extends SectorMapError {
  readonly name = 'InvalidGeometryError';
  readonly code = ERROR_CODES.INVALID_GEOMETRY;
}

/** A record whose fields are present but unusable */
export class MalformedRecordError extends SectorMapError {
  readonly name = 'MalformedRecordError';
  readonly code = ERROR_CODES.MALFORMED_RECORD;

  constructor(
    message: string,
    public readonly row: number,
    details?: Record<string, unknown>
  ) {
    super(message, details);
  }
}

/** Input lacks required columns */
export class MissingColumnsError extends SectorMapError {
  readonly name = 'MissingColumnsError';
  readonly code = ERROR_CODES.MISSING_COLUMNS;

  constructor(public readonly columns: readonly string[]) {
    super(`Missing required columns in CSV: ${columns.join(', ')}`, { columns });
  }
}

/** Input that cannot be read */
export class UnreadableInputError extends SectorMapError {
  readonly name = 'UnreadableInputError';
  readonly code = ERROR_CODES.UNREADABLE_INPUT;
}

/** Invalid rendering configuration */
export class ConfigError extends SectorMapError {
  readonly name = 'ConfigError';
  readonly code = ERROR_CODES.INVALID_CONFIG;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert a per-record error into a warning for reporting
 */
export function toWarning(error: unknown, row?: number): RecordWarning {
  if (error instanceof SectorMapError) {
    return {
      code: error.code,
      message: error.message,
      severity: 'warning',
      row,
      context: error.details,
    };
  }
  return {
    code: 'UNKNOWN',
    message: errorMessage(error),
    severity: 'warning',
    row,
  };
}
