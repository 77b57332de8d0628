/**
 * Physical and application constants
 */

// ============================================================================
// Physical Constants
// ============================================================================

/** Earth radius in meters (WGS84 equatorial), used as a spherical radius */
export const EARTH_RADIUS_EQUATORIAL = 6378137.0;

// ============================================================================
// Sector Sampling Constants
// ============================================================================

/** A full turn in degrees */
export const FULL_CIRCLE_DEG = 360;

/** Fewest arc points a sector may have (keeps slivers from collapsing to a line) */
export const MIN_ARC_POINTS = 3;

/** Arc point count used for narrow beams */
export const NARROW_BEAM_ARC_POINTS = 10;

/** Beams at or below this width (deg) use NARROW_BEAM_ARC_POINTS */
export const NARROW_BEAM_THRESHOLD_DEG = 10;

// ============================================================================
// Rendering Defaults
// ============================================================================

/** Default sector radius (m) */
export const DEFAULT_SECTOR_RADIUS = 300;

/** Smallest selectable sector radius (m) */
export const MIN_SECTOR_RADIUS = 50;

/** Largest selectable sector radius (m) */
export const MAX_SECTOR_RADIUS = 2000;

/** Default polygon fill opacity */
export const DEFAULT_FILL_OPACITY = 0.5;

/** Default polygon fill color */
export const DEFAULT_FILL_COLOR = '#3388ff';

/** Default polygon border color */
export const DEFAULT_BORDER_COLOR = 'black';

/** Default polygon border weight (px) */
export const DEFAULT_BORDER_WEIGHT = 1;

/** Default initial map zoom */
export const DEFAULT_MAP_ZOOM = 14;

/** Maximum sectors rendered in one batch */
export const MAX_RENDERED_SECTORS = 100;

// ============================================================================
// Record Source
// ============================================================================

/** Columns an antenna CSV must carry */
export const REQUIRED_COLUMNS = [
  'ENODEB_ID',
  'CELL_ID',
  'LONGITUDE',
  'LATITUDE',
  'AZIMUTH',
  'BEAMWIDTH_H',
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

/** Cell values treated as missing */
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  '',
  'NA',
  'N/A',
  '#N/A',
  'NaN',
  'nan',
  'NULL',
  'null',
  'None',
]);
