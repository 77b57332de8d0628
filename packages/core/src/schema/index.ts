/**
 * Antenna record and render configuration schemas
 * Runtime validation with Zod + TypeScript types
 */

import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_BORDER_COLOR,
  DEFAULT_BORDER_WEIGHT,
  DEFAULT_FILL_COLOR,
  DEFAULT_FILL_OPACITY,
  DEFAULT_MAP_ZOOM,
  DEFAULT_SECTOR_RADIUS,
  MAX_RENDERED_SECTORS,
  MAX_SECTOR_RADIUS,
  MIN_SECTOR_RADIUS,
  type Result,
} from '@sectormap/shared';

// ============================================================================
// Base Schemas
// ============================================================================

/** Hex color: #rgb or #rrggbb */
export const HexColorSchema = z
  .string()
  .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, 'Expected a hex color like #3388ff');

// ============================================================================
// Antenna Schemas
// ============================================================================

/**
 * Antenna record as consumed by the sector engine.
 *
 * Only finiteness is checked here. Range checks (latitude, longitude,
 * beamwidth) belong to the engine, which reports them per record as
 * geometry errors.
 */
export const AntennaRecordSchema = z.object({
  enodebId: z.string(),
  cellId: z.string(),
  latitude: z.number().finite(),
  longitude: z.number().finite(),
  azimuth: z.number().finite(), // degrees clockwise from north
  beamwidth: z.number().finite(), // horizontal beamwidth, degrees
});

/** Plain decimal or exponent notation; no hex, binary or octal literals */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Numeric CSV cell: trimmed decimal text converted to a finite number */
const NumericCellSchema = z
  .string()
  .trim()
  .regex(DECIMAL_PATTERN, 'Expected a decimal number')
  .transform(Number)
  .pipe(z.number().finite());

/**
 * One CSV row keyed by the required column names.
 * Transforms into an AntennaRecord.
 */
export const AntennaRowSchema = z
  .object({
    ENODEB_ID: z.string().trim(),
    CELL_ID: z.string().trim(),
    LATITUDE: NumericCellSchema,
    LONGITUDE: NumericCellSchema,
    AZIMUTH: NumericCellSchema,
    BEAMWIDTH_H: NumericCellSchema,
  })
  .transform((row) => ({
    enodebId: row.ENODEB_ID,
    cellId: row.CELL_ID,
    latitude: row.LATITUDE,
    longitude: row.LONGITUDE,
    azimuth: row.AZIMUTH,
    beamwidth: row.BEAMWIDTH_H,
  }));

// ============================================================================
// Sector & Render Schemas
// ============================================================================

/** Parameters passed to the engine alongside each record */
export const SectorParametersSchema = z.object({
  radiusMeters: z.number().positive(),
});

/** Polygon styling for renderers */
export const SectorStyleSchema = z.object({
  fillColor: HexColorSchema.default(DEFAULT_FILL_COLOR),
  fillOpacity: z.number().min(0).max(1).default(DEFAULT_FILL_OPACITY),
  borderColor: z.string().min(1).default(DEFAULT_BORDER_COLOR),
  borderWeight: z.number().nonnegative().default(DEFAULT_BORDER_WEIGHT),
});

/**
 * Everything a render run is configured with.
 * Replaces implicit UI state: radius, opacity and color are explicit here.
 */
export const RenderConfigSchema = z.object({
  radiusMeters: z
    .number()
    .min(MIN_SECTOR_RADIUS)
    .max(MAX_SECTOR_RADIUS)
    .default(DEFAULT_SECTOR_RADIUS),
  style: SectorStyleSchema.default({}),
  maxSectors: z.number().int().positive().default(MAX_RENDERED_SECTORS),
  zoom: z.number().min(0).max(22).default(DEFAULT_MAP_ZOOM),
});

// ============================================================================
// Type Exports
// ============================================================================

export type AntennaRecord = z.infer<typeof AntennaRecordSchema>;
export type AntennaRow = z.input<typeof AntennaRowSchema>;
export type SectorParameters = z.infer<typeof SectorParametersSchema>;
export type SectorStyle = z.infer<typeof SectorStyleSchema>;
export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type RenderConfigInput = z.input<typeof RenderConfigSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Format Zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a render configuration
 */
export function validateRenderConfig(data: unknown): Result<RenderConfig, z.ZodError> {
  const result = RenderConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Parse and validate a render configuration (throws ConfigError on failure)
 */
export function parseRenderConfig(data: unknown): RenderConfig {
  const result = validateRenderConfig(data);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error).join('; ')}`, {
      issues: formatIssues(result.error),
    });
  }
  return result.data;
}
