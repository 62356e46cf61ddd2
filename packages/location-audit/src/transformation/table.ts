/**
 * Table construction helpers shared by every reader
 *
 * Readers hand over raw header cells and raw rows; these helpers apply the
 * load-time conventions: missing-value spellings become `null`, numeric and
 * boolean text become values, empty header cells become `Unnamed: <index>`
 * placeholders, repeated labels get `.1`, `.2` suffixes and each column's
 * dtype is fixed from its values.
 */

import { MISSING_VALUE_TOKENS, placeholderLabel } from '../core/constants.js';
import type { Cell, ColumnType, Table } from '../core/types.js';

const NUMERIC_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const BOOLEAN_TEXT: Readonly<Record<string, boolean>> = {
  True: true,
  true: true,
  TRUE: true,
  False: false,
  false: false,
  FALSE: false,
};

export function isMissing(cell: Cell | undefined): boolean {
  return cell === null || cell === undefined || cell === '' || (typeof cell === 'number' && Number.isNaN(cell));
}

/**
 * Convert a cell read as text into its typed value
 */
export function coerceText(text: string): Cell {
  if (MISSING_VALUE_TOKENS.has(text)) return null;
  if (NUMERIC_TEXT.test(text)) return Number(text);
  const bool = BOOLEAN_TEXT[text];
  return bool ?? text;
}

/**
 * Normalize a cell coming from a typed source (spreadsheet, attribute table)
 */
export function coerceValue(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return MISSING_VALUE_TOKENS.has(value) ? null : value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value) || value instanceof Uint8Array) return null;
  return JSON.stringify(value);
}

/**
 * Render a cell as label or match text
 */
export function cellText(cell: Cell): string {
  return cell === null ? '' : String(cell);
}

/**
 * Suffix repeated labels with `.1`, `.2`, ... in order of appearance
 */
export function dedupeLabels(labels: readonly string[]): string[] {
  const seen = new Set<string>();
  const counts = new Map<string, number>();
  const result: string[] = [];

  for (const label of labels) {
    if (!seen.has(label)) {
      seen.add(label);
      result.push(label);
      continue;
    }

    let count = counts.get(label) ?? 0;
    let candidate: string;
    do {
      count += 1;
      candidate = `${label}.${count}`;
    } while (seen.has(candidate));

    counts.set(label, count);
    seen.add(candidate);
    result.push(candidate);
  }

  return result;
}

/**
 * Infer a column's dtype from its non-missing values
 */
export function inferColumnType(values: readonly Cell[]): ColumnType {
  const present = values.filter((value) => !isMissing(value));
  if (present.every((value) => typeof value === 'number')) return 'number';
  if (present.every((value) => typeof value === 'boolean')) return 'boolean';
  return 'object';
}

export function columnValues(table: Table, index: number): Cell[] {
  return table.rows.map((row) => row[index] ?? null);
}

/**
 * Build a table from a raw header row and raw data rows
 *
 * Rows longer than the header extend it with placeholder columns; shorter
 * rows are padded with `null`.
 */
export function createTable(header: readonly Cell[], rows: readonly (readonly Cell[])[]): Table {
  const width = rows.reduce((max, row) => Math.max(max, row.length), header.length);

  const labels: string[] = [];
  for (let i = 0; i < width; i++) {
    const cell = header[i] ?? null;
    labels.push(isMissing(cell) ? placeholderLabel(i) : cellText(cell));
  }

  const paddedRows = rows.map((row) => {
    const padded: Cell[] = [];
    for (let i = 0; i < width; i++) {
      padded.push(row[i] ?? null);
    }
    return padded;
  });

  const dtypes: ColumnType[] = [];
  for (let i = 0; i < width; i++) {
    dtypes.push(inferColumnType(paddedRows.map((row) => row[i] ?? null)));
  }

  return {
    columns: dedupeLabels(labels),
    dtypes,
    rows: paddedRows,
  };
}

/**
 * Build a table from attribute records (feature properties, JSON rows)
 *
 * Columns follow first-seen key order across the records.
 */
export function createTableFromRecords(records: readonly Readonly<Record<string, unknown>>[]): Table {
  const keys: string[] = [];
  const known = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!known.has(key)) {
        known.add(key);
        keys.push(key);
      }
    }
  }

  const rows = records.map((record) => keys.map((key) => coerceValue(record[key])));
  return createTable(keys, rows);
}

export function isEmptyTable(table: Table): boolean {
  return table.rows.length === 0 || table.columns.length === 0;
}
