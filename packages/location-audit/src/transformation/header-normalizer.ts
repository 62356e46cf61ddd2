/**
 * Header Normalizer
 *
 * Rebuilds a meaningful header for samples read from spreadsheets and
 * delimited text. Published humanitarian tables often carry a human header
 * followed by an HXL tag row, or a multi-row title block above the data;
 * classification needs both the human name and the tag in one label.
 *
 * Steps, in order:
 * 1. Drop empty rows, then empty columns
 * 2. Labels become strings
 * 3. All-placeholder header: row 0 becomes the header
 * 4. Any non-text column dtype: header already found upstream, stop
 * 5. A single data row: stop
 * 6. Look for an HXL tag row among the first 10 rows
 * 7. Tag row at h: fold rows 0..h into the labels
 * 8. No tag row, delimited text: keep the header as read
 * 9. Otherwise fold the leading header block (3 rows) into the labels
 *
 * Pure and deterministic; no I/O.
 */

import {
  COMPOSITE_HEADER_ROWS,
  HEADER_SEPARATOR,
  PLACEHOLDER_PATTERN,
  TAG_ROW_SCAN_LIMIT,
  placeholderLabel,
} from '../core/constants.js';
import type { FormatFamily } from '../core/formats.js';
import type { Cell, ColumnType, NormalizedTable, Table } from '../core/types.js';
import { cellText, dedupeLabels, isMissing } from './table.js';

const TAG_PATTERN = /^#/;

export function isPlaceholder(label: string): boolean {
  return PLACEHOLDER_PATTERN.test(label);
}

/**
 * Normalize the header of one raw sample
 *
 * @param table - Raw sample as loaded
 * @param family - Format family the sample was read from
 */
export function normalizeHeaders(table: Table, family: FormatFamily): NormalizedTable {
  if (table.headerResolved) {
    return resolved(table);
  }

  let current = dropEmptyColumns(dropEmptyRows(table));
  current = { ...current, columns: current.columns.map((label) => String(label)) };

  if (current.columns.length > 0 && current.columns.every(isPlaceholder)) {
    current = promoteFirstRow(current);
  }

  if (!current.dtypes.every((dtype) => dtype === 'object')) {
    return resolved(current);
  }

  if (current.rows.length === 1) {
    return resolved(current);
  }

  const tagRow = findTagRow(current);
  if (tagRow !== null) {
    return resolved(foldHeaderRows(current, tagRow + 1));
  }

  if (family === 'delimited') {
    return resolved(current);
  }

  const dataStart = Math.min(COMPOSITE_HEADER_ROWS, current.rows.length);
  return resolved(foldHeaderRows(current, dataStart));
}

/**
 * Index of the first row (within the scan window) whose cells are all
 * missing or HXL hashtags
 */
export function findTagRow(table: Table): number | null {
  const limit = Math.min(TAG_ROW_SCAN_LIMIT, table.rows.length);

  for (let i = 0; i < limit; i++) {
    const row = table.rows[i] ?? [];
    if (row.every((cell) => isMissing(cell) || TAG_PATTERN.test(cellText(cell)))) {
      return i;
    }
  }

  return null;
}

function resolved(table: Table): NormalizedTable {
  return {
    columns: dedupeLabels(table.columns),
    dtypes: table.dtypes,
    rows: table.rows,
    headerResolved: true,
  };
}

function dropEmptyRows(table: Table): Table {
  return {
    ...table,
    rows: table.rows.filter((row) => !row.every((cell) => isMissing(cell))),
  };
}

function dropEmptyColumns(table: Table): Table {
  const keep: number[] = [];
  table.columns.forEach((_, index) => {
    if (table.rows.some((row) => !isMissing(row[index] ?? null))) {
      keep.push(index);
    }
  });

  if (keep.length === table.columns.length) {
    return table;
  }

  const columns: string[] = [];
  const dtypes: ColumnType[] = [];
  for (const index of keep) {
    columns.push(table.columns[index] ?? placeholderLabel(index));
    dtypes.push(table.dtypes[index] ?? 'object');
  }

  return {
    columns,
    dtypes,
    rows: table.rows.map((row) => keep.map((index) => row[index] ?? null)),
  };
}

/**
 * Use row 0 as the header; empty cells keep a positional placeholder
 */
function promoteFirstRow(table: Table): Table {
  const first = table.rows[0];
  if (!first) {
    return table;
  }

  return {
    ...table,
    columns: table.columns.map((_, index) => {
      const cell = first[index] ?? null;
      return isMissing(cell) ? placeholderLabel(index) : cellText(cell);
    }),
    rows: table.rows.slice(1),
  };
}

/**
 * Fold the first `count` rows into the column labels and drop them
 *
 * Each label is the existing label (unless it is a placeholder) followed by
 * the column's non-missing cells, top to bottom, joined with `||`.
 */
function foldHeaderRows(table: Table, count: number): Table {
  const headerRows = table.rows.slice(0, count);

  const columns = table.columns.map((label, index) => {
    const parts: string[] = isPlaceholder(label) ? [] : [label];
    for (const row of headerRows) {
      const cell: Cell = row[index] ?? null;
      if (!isMissing(cell)) {
        parts.push(cellText(cell));
      }
    }
    return parts.length > 0 ? parts.join(HEADER_SEPARATOR) : label;
  });

  return {
    ...table,
    columns,
    rows: table.rows.slice(count),
  };
}
