/**
 * Table Normalizer
 *
 * Turns a raw grid plus a header row index into a typed table:
 * - header cells become column labels
 * - columns without a label are dropped with all their data
 * - rows with no value in the surviving columns are dropped
 * - values are coerced (numeric text -> number, blanks -> absent)
 *
 * Duplicate labels are kept as-is. Rows are positional arrays, so callers
 * address columns by index when labels repeat.
 */

import type { CellValue, NormalizedTable, RawGrid, TypedValue } from '../types.js';
import { cellToText, coerceCell, isEmptyCell } from './cellValues.js';

export interface CandidateRow {
  index: number; // Row index in the source grid
  cells: ReadonlyArray<CellValue>;
}

// ============ Snapshots ============

/**
 * Freeze a table so the aggregator never sees a half-edited one
 */
export function freezeTable(
  columns: string[],
  rows: TypedValue[][],
  sourceRows: number[]
): NormalizedTable {
  for (const row of rows) Object.freeze(row);
  return Object.freeze({
    columns: Object.freeze(columns),
    rows: Object.freeze(rows),
    sourceRows: Object.freeze(sourceRows),
  });
}

export const EMPTY_TABLE: NormalizedTable = freezeTable([], [], []);

/**
 * True when every value of a typed row is absent
 */
export function isAbsentRow(row: readonly TypedValue[]): boolean {
  return row.every(value => value === null);
}

// ============ Normalization ============

/**
 * Build a table from a header row and its candidate data rows.
 * Shared by the single-table path and the title splitter.
 */
export function buildTable(
  header: ReadonlyArray<CellValue>,
  candidates: ReadonlyArray<CandidateRow>
): NormalizedTable {
  const columns: string[] = [];
  const keep: number[] = [];

  header.forEach((cell, idx) => {
    const label = cellToText(cell);
    if (label !== '') {
      columns.push(label);
      keep.push(idx);
    }
  });

  const rows: TypedValue[][] = [];
  const sourceRows: number[] = [];

  for (const candidate of candidates) {
    const typed = keep.map(idx => coerceCell(candidate.cells[idx]));
    if (isAbsentRow(typed)) continue;
    rows.push(typed);
    sourceRows.push(candidate.index);
  }

  return freezeTable(columns, rows, sourceRows);
}

/**
 * Normalize a grid using the row at `headerRowIndex` as header.
 * The index is clamped into the grid; it never raises for out-of-range values.
 */
export function normalizeTable(grid: RawGrid, headerRowIndex: number): NormalizedTable {
  if (grid.length === 0) {
    return EMPTY_TABLE;
  }

  const requested = Number.isFinite(headerRowIndex) ? Math.trunc(headerRowIndex) : 0;
  const headerIdx = Math.min(Math.max(requested, 0), grid.length - 1);

  const candidates: CandidateRow[] = [];
  for (let i = headerIdx + 1; i < grid.length; i++) {
    candidates.push({ index: i, cells: grid[i] });
  }

  return buildTable(grid[headerIdx], candidates);
}

/**
 * Degraded path when no header is known: keep every column, label them
 * Col_0, Col_1, ... and drop only the fully empty rows.
 */
export function syntheticTable(grid: RawGrid): NormalizedTable {
  const width = grid.reduce((max, row) => Math.max(max, row.length), 0);
  const columns = Array.from({ length: width }, (_, i) => `Col_${i}`);

  const rows: TypedValue[][] = [];
  const sourceRows: number[] = [];

  grid.forEach((row, index) => {
    if (row.every(cell => isEmptyCell(cell))) return;
    rows.push(columns.map((_, col) => coerceCell(row[col])));
    sourceRows.push(index);
  });

  return freezeTable(columns, rows, sourceRows);
}

/**
 * Labels row followed by the data rows, ready to be normalized again at 0
 */
export function tableToGrid(table: NormalizedTable): CellValue[][] {
  return [[...table.columns], ...table.rows.map(row => [...row])];
}

// ============ Column Views ============

/**
 * Positions of columns whose non-absent values are all numbers (and that
 * have at least one). This is the chart-worthy subset of a table.
 */
export function numericColumns(table: NormalizedTable): number[] {
  const positions: number[] = [];

  table.columns.forEach((_, col) => {
    let seen = 0;
    for (const row of table.rows) {
      const value = row[col];
      if (value === null) continue;
      if (typeof value !== 'number') return;
      seen++;
    }
    if (seen > 0) positions.push(col);
  });

  return positions;
}

/**
 * Values of one column, by position
 */
export function columnValues(table: NormalizedTable, col: number): TypedValue[] {
  return table.rows.map(row => row[col] ?? null);
}
