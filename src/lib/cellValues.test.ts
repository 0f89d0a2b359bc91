import { describe, expect, it } from 'vitest';
import { cellToText, cellsEmpty, coerceCell, countFilled, isEmptyCell, parseNumericText } from './cellValues.js';

describe('isEmptyCell', () => {
  it('treats null, undefined and blank text as empty', () => {
    expect(isEmptyCell(null)).toBe(true);
    expect(isEmptyCell(undefined)).toBe(true);
    expect(isEmptyCell('   ')).toBe(true);
  });

  it('keeps zero and false as values', () => {
    expect(isEmptyCell(0)).toBe(false);
    expect(isEmptyCell(false)).toBe(false);
  });
});

describe('countFilled / cellsEmpty', () => {
  it('counts non-empty cells', () => {
    expect(countFilled(['a', null, ' ', 0, 'b'])).toBe(3);
  });

  it('treats cells past the end of a row as empty', () => {
    expect(cellsEmpty(['Title'], 1, 4)).toBe(true);
    expect(cellsEmpty(['Title', null, null, 'x'], 1, 4)).toBe(false);
  });
});

describe('parseNumericText', () => {
  it('accepts plain and grouped numbers', () => {
    expect(parseNumericText(' -3.5 ')).toBe(-3.5);
    expect(parseNumericText('1e3')).toBe(1000);
    expect(parseNumericText('.5')).toBe(0.5);
    expect(parseNumericText('1,234.5')).toBe(1234.5);
  });

  it('rejects text with units or bad grouping', () => {
    expect(parseNumericText('12abc')).toBeNull();
    expect(parseNumericText('R$ 10')).toBeNull();
    expect(parseNumericText('1,23')).toBeNull();
  });

  it('rejects numbers that overflow', () => {
    expect(parseNumericText('1e400')).toBeNull();
    expect(parseNumericText('-1e400')).toBeNull();
  });
});

describe('coerceCell', () => {
  it('turns numeric text into numbers', () => {
    expect(coerceCell('12')).toBe(12);
    expect(coerceCell(7.25)).toBe(7.25);
  });

  it('keeps absent cells absent, not zero', () => {
    expect(coerceCell(null)).toBeNull();
    expect(coerceCell('')).toBeNull();
    expect(coerceCell('  ')).toBeNull();
  });

  it('renders dates and booleans as text', () => {
    expect(coerceCell(new Date(Date.UTC(2024, 0, 15)))).toBe('2024-01-15');
    expect(coerceCell(true)).toBe('true');
  });

  it('leaves other text untouched', () => {
    expect(coerceCell('UFV Norte')).toBe('UFV Norte');
    expect(coerceCell(Number.NaN)).toBe('NaN');
    expect(coerceCell('1e400')).toBe('1e400');
  });
});

describe('cellToText', () => {
  it('trims text and stringifies numbers', () => {
    expect(cellToText('  Usina ')).toBe('Usina');
    expect(cellToText(2024)).toBe('2024');
    expect(cellToText(null)).toBe('');
  });
});
