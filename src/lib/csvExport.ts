/**
 * CSV export of tables and raw grids (comma separated, header row = labels)
 */

import * as XLSX from 'xlsx';
import type { CellValue, NormalizedTable, RawGrid } from '../types.js';
import { tableToGrid } from './tableNormalizer.js';

/**
 * Serialize a raw grid. Absent cells become empty fields.
 */
export function gridToCsv(grid: RawGrid | CellValue[][]): string {
  const sheet = XLSX.utils.aoa_to_sheet(grid.map(row => [...row]));
  return XLSX.utils.sheet_to_csv(sheet, { FS: ',', RS: '\n', blankrows: true });
}

/**
 * Serialize a normalized table with its labels as the first line
 */
export function toCsv(table: NormalizedTable): string {
  if (table.columns.length === 0) return '';
  return gridToCsv(tableToGrid(table));
}
