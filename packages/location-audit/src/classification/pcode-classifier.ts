/**
 * Pcode Classifier
 *
 * Finds columns that carry administrative p-codes: a header that reads like
 * a p-code header (`ADM1PCODE`, `#adm2+code`, `pcode`) over text values that
 * mostly start with a country code followed by digits (`KEN01`, `TR3401`).
 *
 * The country list is supplied at construction so tests can use a small
 * fixture reference.
 */

import type { Cell, SampleSet, Table } from '../core/types.js';
import type { CountryCodes } from '../reference/country-reference.js';
import { columnValues } from '../transformation/table.js';
import { countMatches, labelMatches, withinTolerance } from './tolerance.js';

/**
 * Optional admin-level token followed by an optional p-code token, either
 * as a human header or as an HXL hashtag
 */
export const PCODE_HEADER = /^(?:(?:adm)?.*p?.?cod.*|#\s?adm\s?\d?\+?\s?p?(?:code)?)/i;

/**
 * Build the `(ISO3|...|ISO2|...)\d+` value pattern, anchored at the start
 */
export function buildPcodePattern(countries: readonly CountryCodes[]): RegExp {
  const codes = [
    ...countries.map((country) => country.iso3),
    ...countries.map((country) => country.iso2),
  ].filter((code) => /^[A-Za-z]+$/.test(code));

  if (codes.length === 0) {
    throw new Error('Cannot build pcode pattern from an empty country reference');
  }

  return new RegExp(`^(?:${codes.join('|')})\\d+`, 'i');
}

export class PcodeClassifier {
  private readonly valuePattern: RegExp;

  constructor(countries: readonly CountryCodes[]) {
    this.valuePattern = buildPcodePattern(countries);
  }

  /**
   * True once any sample holds a qualifying p-code column
   */
  hasPcode(samples: SampleSet): boolean {
    for (const table of samples.values()) {
      if (this.tableHasPcode(table)) {
        return true;
      }
    }
    return false;
  }

  tableHasPcode(table: Table): boolean {
    return table.columns.some(
      (label, index) =>
        table.dtypes[index] === 'object' &&
        labelMatches(label, PCODE_HEADER) &&
        this.isPcodeColumn(columnValues(table, index))
    );
  }

  /**
   * Non-string values can never be p-codes and count as mismatches
   */
  isPcodeColumn(values: readonly Cell[]): boolean {
    return withinTolerance(
      countMatches(values, (value) => typeof value === 'string' && this.valuePattern.test(value))
    );
  }
}
