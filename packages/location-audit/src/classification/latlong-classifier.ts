/**
 * LatLong Classifier
 *
 * A sample is lat/long-coded when, within that one sample, a latitude-like
 * column and a longitude-like column both hold mostly coordinate-formatted
 * values. The two roles may be satisfied by different columns or by one
 * ambiguous column.
 */

import type { Cell, SampleSet, Table } from '../core/types.js';
import { cellText, columnValues } from '../transformation/table.js';
import {
  LATITUDE_HEADER,
  LATITUDE_PATTERNS,
  LONGITUDE_HEADER,
  LONGITUDE_PATTERNS,
  matchesAny,
} from './coordinate-patterns.js';
import { countMatches, labelMatches, withinTolerance } from './tolerance.js';

export class LatLongClassifier {
  hasLatLong(samples: SampleSet): boolean {
    for (const table of samples.values()) {
      if (this.tableHasLatLong(table)) {
        return true;
      }
    }
    return false;
  }

  tableHasLatLong(table: Table): boolean {
    let latitude = false;
    let longitude = false;

    for (let index = 0; index < table.columns.length; index++) {
      const label = table.columns[index] ?? '';
      const isLatHeader = labelMatches(label, LATITUDE_HEADER);
      const isLonHeader = labelMatches(label, LONGITUDE_HEADER);
      if (!isLatHeader && !isLonHeader) continue;

      const values = columnValues(table, index);
      if (isLatHeader && !latitude) {
        latitude = columnMatches(values, LATITUDE_PATTERNS);
      }
      if (isLonHeader && !longitude) {
        longitude = columnMatches(values, LONGITUDE_PATTERNS);
      }

      if (latitude && longitude) {
        return true;
      }
    }

    return false;
  }
}

function columnMatches(values: readonly Cell[], patterns: readonly RegExp[]): boolean {
  return withinTolerance(countMatches(values, (value) => matchesAny(cellText(value), patterns)));
}
