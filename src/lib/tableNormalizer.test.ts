import { describe, expect, it } from 'vitest';
import type { RawGrid } from '../types.js';
import {
  columnValues,
  normalizeTable,
  numericColumns,
  syntheticTable,
  tableToGrid,
} from './tableNormalizer.js';

const grid: RawGrid = [
  ['Relatório de usinas', null, null, null],
  ['Usina', 'Capacidade (MW CA)', null, 'Status'],
  ['UFV Norte', '5.5', 'nota', 'ativa'],
  [null, null, 'solto', null],
  [null, null, null, null],
  ['UFV Sul', 3, null, null],
];

describe('normalizeTable', () => {
  it('labels columns from the header row and drops unlabeled ones', () => {
    const table = normalizeTable(grid, 1);

    expect(table.columns).toEqual(['Usina', 'Capacidade (MW CA)', 'Status']);
    expect(table.rows).toEqual([
      ['UFV Norte', 5.5, 'ativa'],
      ['UFV Sul', 3, null],
    ]);
    expect(table.sourceRows).toEqual([2, 5]);
  });

  it('never keeps a row whose values are all absent', () => {
    for (let header = 0; header < grid.length; header++) {
      const table = normalizeTable(grid, header);
      for (const row of table.rows) {
        expect(row.some(value => value !== null)).toBe(true);
      }
    }
  });

  it('takes rows only from below the header and labels only from the header', () => {
    for (let header = 0; header < grid.length; header++) {
      const table = normalizeTable(grid, header);
      const headerTexts = grid[header].map(cell => (typeof cell === 'string' ? cell.trim() : String(cell)));

      for (const source of table.sourceRows) {
        expect(source).toBeGreaterThan(header);
      }
      for (const label of table.columns) {
        expect(headerTexts).toContain(label);
      }
    }
  });

  it('is stable when normalized again from its own output', () => {
    const first = normalizeTable(grid, 1);
    const again = normalizeTable(tableToGrid(first), 0);

    expect(again.columns).toEqual(first.columns);
    expect(again.rows).toEqual(first.rows);
  });

  it('keeps overflowing numeric text as text, stable across passes', () => {
    const first = normalizeTable([['A', 'B'], ['1e400', 'x']], 0);
    const again = normalizeTable(tableToGrid(first), 0);

    expect(first.rows).toEqual([['1e400', 'x']]);
    expect(again.rows).toEqual(first.rows);
    expect(numericColumns(first)).toEqual([]);
  });

  it('clamps a header index past the end to the last row', () => {
    const table = normalizeTable(grid, 99);

    expect(table.columns).toEqual(['UFV Sul', '3']);
    expect(table.rows).toEqual([]);
  });

  it('clamps a negative header index to the first row', () => {
    const table = normalizeTable(grid, -4);

    expect(table.columns).toEqual(['Relatório de usinas']);
    expect(table.rows).toEqual([['Usina'], ['UFV Norte'], ['UFV Sul']]);
    expect(table.sourceRows).toEqual([1, 2, 5]);
  });

  it('returns an empty table for an empty grid', () => {
    const table = normalizeTable([], 0);

    expect(table.columns).toEqual([]);
    expect(table.rows).toEqual([]);
  });

  it('keeps duplicate labels as separate columns', () => {
    const table = normalizeTable([['A', 'A', 'B'], [1, 2, 3]], 0);

    expect(table.columns).toEqual(['A', 'A', 'B']);
    expect(table.rows).toEqual([[1, 2, 3]]);
  });

  it('returns a frozen snapshot', () => {
    const table = normalizeTable(grid, 1);

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.rows)).toBe(true);
    expect(Object.isFrozen(table.rows[0])).toBe(true);
  });
});

describe('syntheticTable', () => {
  it('labels every column by position and drops only empty rows', () => {
    const table = syntheticTable(grid);

    expect(table.columns).toEqual(['Col_0', 'Col_1', 'Col_2', 'Col_3']);
    expect(table.sourceRows).toEqual([0, 1, 2, 3, 5]);
    expect(table.rows[0]).toEqual(['Relatório de usinas', null, null, null]);
    expect(table.rows[2]).toEqual(['UFV Norte', 5.5, 'nota', 'ativa']);
  });
});

describe('numericColumns / columnValues', () => {
  it('selects columns whose values are all numbers', () => {
    const table = normalizeTable(grid, 1);

    expect(numericColumns(table)).toEqual([1]);
    expect(columnValues(table, 2)).toEqual(['ativa', null]);
  });

  it('ignores columns with no values at all', () => {
    const table = normalizeTable([['A', 'B'], [1, null]], 0);
    expect(numericColumns(table)).toEqual([0]);
  });
});
