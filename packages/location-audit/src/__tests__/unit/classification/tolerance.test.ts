import { describe, it, expect } from 'vitest';
import { countMatches, labelMatches, withinTolerance } from '../../../classification/tolerance.js';

describe('countMatches', () => {
  it('counts over non-missing values only', () => {
    const result = countMatches(['a', null, 'b', '', 'a'], (value) => value === 'a');
    expect(result).toEqual({ matches: 2, present: 3 });
  });
});

describe('withinTolerance', () => {
  it('needs at least one match', () => {
    expect(withinTolerance({ matches: 0, present: 0 })).toBe(false);
  });

  it('allows up to five mismatches', () => {
    expect(withinTolerance({ matches: 1, present: 6 })).toBe(true);
    expect(withinTolerance({ matches: 1, present: 7 })).toBe(false);
  });
});

describe('labelMatches', () => {
  it('tests each part of a composite label', () => {
    expect(labelMatches('Region||#adm1+pcode', /^#adm/)).toBe(true);
    expect(labelMatches('Region||Name', /^#adm/)).toBe(false);
  });
});
