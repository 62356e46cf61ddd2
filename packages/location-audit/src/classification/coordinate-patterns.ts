/**
 * Coordinate text formats accepted as latitude or longitude values
 *
 * Each role accepts signed decimal degrees or degrees/minutes/seconds, with
 * the hemisphere letter either before or after the number. Ranges are not
 * checked.
 */

const NUMBER = String.raw`\d+(?:\.\d*)?`;

// Each following group starts after a mark or whitespace, so a run of
// digits is only ever read as one number
const DEGREES_SEPARATOR = String.raw`(?:\s*°\s*|\s+)`;
const MINUTES_SEPARATOR = String.raw`(?:\s*['′]\s*|\s+)`;
const SECONDS_MARK = String.raw`(?:\s*(?:"|''|″))`;

const DMS =
  `${NUMBER}` +
  `(?:${DEGREES_SEPARATOR}${NUMBER}` +
  `(?:${MINUTES_SEPARATOR}${NUMBER}${SECONDS_MARK}?|\\s*['′])?` +
  `|\\s*°)?\\s*`;

function patternsFor(hemispheres: string): readonly RegExp[] {
  return [
    new RegExp(`^[+-]?${DMS}$`, 'i'),
    new RegExp(`^[${hemispheres}]\\s*${DMS}$`, 'i'),
    new RegExp(`^${DMS}[${hemispheres}]$`, 'i'),
  ];
}

export const LATITUDE_PATTERNS = patternsFor('NS');

export const LONGITUDE_PATTERNS = patternsFor('EW');

export const LATITUDE_HEADER = /^(?:.*latitud|lat|(?:point.?)?y$|#\s?geo\s?\+\s?lat)/i;

export const LONGITUDE_HEADER = /^(?:.*longitud|lon|(?:point.?)?x$|#\s?geo\s?\+\s?lon)/i;

export function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(text));
}
