export { runCli, renderDocument, nodeIo, type CliIo } from './cli.js';
export {
  HELP_TEXT,
  OutputFormatSchema,
  formatFromPath,
  parseCliArgs,
  type CliOptions,
  type OutputFormat,
} from './config.js';
export { parseCsv, splitCsvRecords, type CsvTable } from './io/csv.js';
export {
  isMissingValue,
  loadAntennaRecords,
  resolveColumns,
  type ColumnIndex,
  type RecordLoadResult,
} from './io/records.js';
export {
  toExteriorRing,
  toFeatureCollection,
  toSectorFeature,
  type SectorFeature,
  type SectorFeatureCollection,
  type SectorFeatureProperties,
} from './rendering/geojson.js';
export {
  LEAFLET_VERSION,
  inlineJson,
  renderLeafletHtml,
  type LeafletPageOptions,
} from './rendering/leaflet.js';
