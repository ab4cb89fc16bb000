import { describe, it, expect } from 'vitest';
import { dedupeLabels, findDuplicateLabels, normalizeLabel } from './label-normalizer';

describe('normalizeLabel', () => {
  it('trims, collapses whitespace and lower-cases', () => {
    expect(normalizeLabel('  Dark \t  Red ')).toBe('dark red');
    expect(normalizeLabel('Green ')).toBe('green');
    expect(normalizeLabel('GREEN')).toBe('green');
  });

  it('folds non-ASCII letters', () => {
    expect(normalizeLabel('GRÜN')).toBe('grün');
  });
});

describe('dedupeLabels', () => {
  it('keeps the first spelling of each label and drops blanks', () => {
    expect(dedupeLabels(['Red', 'red ', 'Blue', '', ' RED'])).toEqual(['Red', 'Blue']);
  });
});

describe('findDuplicateLabels', () => {
  it('lists repeated labels once each', () => {
    expect(findDuplicateLabels(['Red', 'red', 'Blue', 'BLUE', 'red'])).toEqual(['red', 'blue']);
    expect(findDuplicateLabels(['Red', 'Blue'])).toEqual([]);
  });
});
