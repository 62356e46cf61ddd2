import { HEADER_SEPARATOR, MISMATCH_TOLERANCE } from '../core/constants.js';
import type { Cell } from '../core/types.js';
import { isMissing } from '../transformation/table.js';

/**
 * Count of values accepted by `accepts`, over the non-missing values
 */
export interface MatchCount {
  readonly matches: number;
  readonly present: number;
}

export function countMatches(values: readonly Cell[], accepts: (value: Cell) => boolean): MatchCount {
  let matches = 0;
  let present = 0;
  for (const value of values) {
    if (isMissing(value)) continue;
    present += 1;
    if (accepts(value)) matches += 1;
  }
  return { matches, present };
}

/**
 * A column qualifies with at least one match and no more than
 * MISMATCH_TOLERANCE mismatches
 */
export function withinTolerance({ matches, present }: MatchCount): boolean {
  return matches > 0 && present - matches <= MISMATCH_TOLERANCE;
}

/**
 * True when any `||` part of a (possibly composite) label matches `pattern`
 */
export function labelMatches(label: string, pattern: RegExp): boolean {
  return label.split(HEADER_SEPARATOR).some((part) => pattern.test(part));
}
