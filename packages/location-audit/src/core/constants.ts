/**
 * Shared constants for the location audit pipeline
 *
 * Sampling caps, classifier tolerances and the fixed status strings that end
 * up in the report. Centralized so the loaders, classifiers and runner agree.
 */

// ============================================================================
// Sampling
// ============================================================================

/**
 * Maximum number of data rows read from any file, sheet or layer
 */
export const SAMPLE_ROW_LIMIT = 100;

/**
 * Number of leading rows searched for an HXL tag row
 */
export const TAG_ROW_SCAN_LIMIT = 10;

/**
 * Default number of header rows assumed for a composite spreadsheet header
 */
export const COMPOSITE_HEADER_ROWS = 3;

// ============================================================================
// Classification
// ============================================================================

/**
 * Maximum count of non-matching, non-missing values a candidate column may
 * carry and still be accepted
 */
export const MISMATCH_TOLERANCE = 5;

/**
 * Separator between the parts of a composite column label
 */
export const HEADER_SEPARATOR = '||';

/**
 * Label given to a column whose header cell was empty
 */
export const placeholderLabel = (index: number): string => `Unnamed: ${index}`;

export const PLACEHOLDER_PATTERN = /^Unnamed: \d+/;

/**
 * Cell text treated as a missing value on load
 */
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

// ============================================================================
// Run limits and status strings
// ============================================================================

/**
 * Resources above this size (1 GiB) are never downloaded
 */
export const MAX_RESOURCE_BYTES = 1_073_741_824;

export const STATUS_MESSAGES = {
  NOT_CHECKING_FORMAT: 'Not checking format',
  NOT_CHECKING_SIZE: 'Not checking files of this size',
  CANT_CHECK_FORMATS: "Can't check formats",
} as const;

/**
 * Fixed column order of the status report
 */
export const REPORT_COLUMNS = [
  'dataset name',
  'resource name',
  'format',
  'pcoded',
  'mis_pcoded',
  'error',
] as const;
