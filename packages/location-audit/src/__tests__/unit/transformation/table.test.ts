/**
 * Table construction tests
 *
 * Load-time conventions every reader relies on: missing-value spellings,
 * numeric/boolean text, placeholder labels, label de-duplication and dtypes.
 */

import { describe, it, expect } from 'vitest';
import {
  coerceText,
  coerceValue,
  createTable,
  createTableFromRecords,
  dedupeLabels,
  inferColumnType,
  isEmptyTable,
  isMissing,
} from '../../../transformation/table.js';

describe('coerceText', () => {
  it('maps missing-value spellings to null', () => {
    expect(coerceText('')).toBeNull();
    expect(coerceText('NA')).toBeNull();
    expect(coerceText('n/a')).toBeNull();
    expect(coerceText('#N/A')).toBeNull();
  });

  it('parses numeric text', () => {
    expect(coerceText('12')).toBe(12);
    expect(coerceText('-1.5')).toBe(-1.5);
    expect(coerceText('.5')).toBe(0.5);
    expect(coerceText('1e3')).toBe(1000);
  });

  it('parses boolean text', () => {
    expect(coerceText('True')).toBe(true);
    expect(coerceText('FALSE')).toBe(false);
  });

  it('keeps other text as is', () => {
    expect(coerceText('KE001')).toBe('KE001');
    expect(coerceText('36.8 N')).toBe('36.8 N');
  });
});

describe('coerceValue', () => {
  it('normalizes typed source values', () => {
    expect(coerceValue(undefined)).toBeNull();
    expect(coerceValue(Number.NaN)).toBeNull();
    expect(coerceValue('N/A')).toBeNull();
    expect(coerceValue(BigInt(10))).toBe(10);
    expect(coerceValue(new Date('2024-01-02T00:00:00.000Z'))).toBe('2024-01-02T00:00:00.000Z');
    expect(coerceValue(Buffer.from([1, 2, 3]))).toBeNull();
    expect(coerceValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('isMissing', () => {
  it('treats null, empty text and NaN as missing', () => {
    expect(isMissing(null)).toBe(true);
    expect(isMissing('')).toBe(true);
    expect(isMissing(Number.NaN)).toBe(true);
    expect(isMissing(0)).toBe(false);
    expect(isMissing(false)).toBe(false);
  });
});

describe('dedupeLabels', () => {
  it('suffixes repeats in order of appearance', () => {
    expect(dedupeLabels(['name', 'name', 'code', 'name'])).toEqual(['name', 'name.1', 'code', 'name.2']);
  });

  it('skips suffixes already taken', () => {
    expect(dedupeLabels(['a', 'a.1', 'a'])).toEqual(['a', 'a.1', 'a.2']);
  });
});

describe('inferColumnType', () => {
  it('infers number, boolean and object', () => {
    expect(inferColumnType([1, null, 2.5])).toBe('number');
    expect(inferColumnType([true, false])).toBe('boolean');
    expect(inferColumnType(['KE01', 2])).toBe('object');
  });

  it('treats an all-missing column as number', () => {
    expect(inferColumnType([null, null])).toBe('number');
  });
});

describe('createTable', () => {
  it('pads rows, fills placeholders and dedupes labels', () => {
    const table = createTable(['code', null, 'code'], [['KE01', 1, 'x'], ['KE02', 2]]);

    expect(table.columns).toEqual(['code', 'Unnamed: 1', 'code.1']);
    expect(table.rows).toEqual([
      ['KE01', 1, 'x'],
      ['KE02', 2, null],
    ]);
    expect(table.dtypes).toEqual(['object', 'number', 'object']);
  });

  it('extends the header for rows wider than it', () => {
    const table = createTable(['a'], [['x', 'y']]);
    expect(table.columns).toEqual(['a', 'Unnamed: 1']);
  });
});

describe('createTableFromRecords', () => {
  it('uses first-seen key order across records', () => {
    const table = createTableFromRecords([{ a: 1 }, { b: 'x', a: 2 }]);

    expect(table.columns).toEqual(['a', 'b']);
    expect(table.rows).toEqual([
      [1, null],
      [2, 'x'],
    ]);
    expect(table.dtypes).toEqual(['number', 'object']);
  });

  it('produces an empty table for no records', () => {
    expect(isEmptyTable(createTableFromRecords([]))).toBe(true);
  });
});
