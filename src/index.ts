/**
 * crabgrounds - distance, clustering and extent analysis for fishing-ground
 * survey points
 *
 * @packageDocumentation
 */

// ============================================================================
// GEO UTILITIES
// ============================================================================

export {
  EARTH_RADIUS_KM,
  type Coordinate,
  type BoundingBox,
  greatCircleDistance,
  initialBearing,
  isValidCoordinate,
  isWithinBounds,
} from './geo-utils.js';

// ============================================================================
// POINTS & ERRORS
// ============================================================================

export {
  type SurveyRecord,
  type SurveyPoint,
  type Dataset,
  parseCoordinate,
  createPoint,
  toDataset,
  toRecord,
} from './points.js';

export {
  type SurveyErrorCode,
  SurveyError,
  InvalidInputError,
  EmptyDatasetError,
  MalformedFileError,
  SurveyFileNotFoundError,
  SurveyFileWriteError,
} from './errors.js';

// ============================================================================
// ANALYSIS
// ============================================================================

export {
  type AnalysisConfig,
  DEFAULT_ANALYSIS_CONFIG,
  type DistanceRecord,
  type Cluster,
  type DatasetSummary,
  computeAllDistances,
  clusterByRadius,
  getBoundingBox,
  summarize,
} from './analysis.js';

export {
  type DensityGrid,
  DEFAULT_DENSITY_BINS,
  densityGrid,
} from './density.js';

// ============================================================================
// PREPROCESSING & COORDINATES
// ============================================================================

export {
  cleanData,
  filterData,
  capitalizeComment,
  standardizeComments,
} from './preprocessing.js';

export { parseDms } from './coordinates.js';

// ============================================================================
// FILE I/O & FORMATTING
// ============================================================================

export {
  type SupportedFormat,
  CSV_FIELDS,
  getFileType,
  getSupportedExtensions,
  splitCsvLine,
  splitCsvRows,
  parseCsv,
  loadCsv,
  serializeCsv,
  saveCsv,
  parseGpx,
  parseKml,
  loadSurveyFile,
} from './parser.js';

export {
  type OutputFormat,
  OUTPUT_FORMATS,
  formatPoints,
  formatClusters,
  formatDistances,
  formatSummary,
} from './formatters.js';
