/**
 * Location Audit Core Types
 *
 * Tables, sample sets and verdicts shared by the loaders, the header
 * normalizer and the classifiers.
 */

// ============================================================================
// Tables
// ============================================================================

/**
 * A single cell value. Missing values are always `null`.
 */
export type Cell = string | number | boolean | null;

/**
 * Column dtype, fixed when the table is loaded and carried through every
 * row-level transformation. `object` means text or mixed values.
 */
export type ColumnType = 'object' | 'number' | 'boolean';

/**
 * In-memory, row-capped sample of one file, sheet or layer
 */
export interface Table {
  readonly columns: readonly string[];
  readonly dtypes: readonly ColumnType[];
  readonly rows: readonly (readonly Cell[])[];
  /** Set once the header normalizer has resolved the header */
  readonly headerResolved?: boolean;
}

/**
 * Table whose header has been resolved by the normalizer
 */
export interface NormalizedTable extends Table {
  readonly headerResolved: true;
}

/**
 * Samples keyed by a synthetic unique id (one per sheet, file or layer)
 */
export type SampleSet = ReadonlyMap<string, Table>;

// ============================================================================
// Candidates
// ============================================================================

/**
 * A file (or a layer inside a multi-layer container) believed to hold
 * tabular data
 */
export interface CandidateFile {
  readonly path: string;
  /** Layer name inside a geopackage/geodatabase container */
  readonly layer?: string;
}

// ============================================================================
// Verdicts
// ============================================================================

/**
 * Tri-state classification: `null` means the check could not run
 */
export type Verdict = boolean | null;

export interface LocationCheckResult {
  readonly pcoded: Verdict;
  readonly latlonged: Verdict;
  readonly error: string | null;
}

/**
 * One row of the status report
 */
export interface StatusRow {
  readonly datasetName: string;
  readonly resourceName: string;
  readonly format: string;
  readonly pcoded: Verdict;
  /** Lat/long verdict, reported under the `mis_pcoded` column */
  readonly latlonged: Verdict;
  readonly error: string | null;
}
