/**
 * Cell inspection and coercion helpers shared by detection, normalization and
 * aggregation.
 */

import type { CellValue, TypedValue } from '../types.js';

const PLAIN_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const GROUPED_NUMBER = /^[+-]?\d{1,3}(,\d{3})+(\.\d+)?$/;

/**
 * True for null, undefined and whitespace-only text
 */
export function isEmptyCell(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  return false;
}

/**
 * Count non-empty cells in a row
 */
export function countFilled(row: ReadonlyArray<CellValue>): number {
  let filled = 0;
  for (const cell of row) {
    if (!isEmptyCell(cell)) filled++;
  }
  return filled;
}

/**
 * True when cells from..to (inclusive) are all empty. Cells past the end of
 * the row count as empty.
 */
export function cellsEmpty(row: ReadonlyArray<CellValue>, from: number, to: number): boolean {
  for (let i = from; i <= to; i++) {
    if (!isEmptyCell(row[i])) return false;
  }
  return true;
}

/**
 * Text form of a cell, used for labels and titles. Empty cells give "".
 */
export function cellToText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatDate(value);
  return String(value).trim();
}

/**
 * Parse text that is unambiguously a number: "12", "-3.5", "1e3", "1,234.56".
 * Anything else (units, currency, "12abc", overflow) is not a number.
 */
export function parseNumericText(text: string): number | null {
  const trimmed = text.trim();
  let parsed: number;
  if (PLAIN_NUMBER.test(trimmed)) {
    parsed = Number(trimmed);
  } else if (GROUPED_NUMBER.test(trimmed)) {
    parsed = Number(trimmed.replace(/,/g, ''));
  } else {
    return null;
  }
  // "1e400" overflows to Infinity; keep it as text
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Coerce a raw cell to its typed value
 */
export function coerceCell(value: CellValue | undefined): TypedValue {
  if (value === null || value === undefined) return null;

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (value instanceof Date) {
    return formatDate(value);
  }

  if (value.trim() === '') return null;

  const num = parseNumericText(value);
  return num !== null ? num : value;
}

/**
 * ISO date, without the time part when it is midnight UTC
 */
function formatDate(date: Date): string {
  if (Number.isNaN(date.getTime())) return '';
  const iso = date.toISOString();
  return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}
