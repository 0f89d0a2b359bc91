/**
 * Table edits
 *
 * The dashboard lets users edit the plant table inline. Edits never touch the
 * table they were made on: applyEdits copies it, applies the edit list in
 * order and returns a new frozen snapshot with the table invariants restored
 * (rows left without any value are dropped).
 */

import type { CellEdit, NormalizedTable, TypedValue } from '../types.js';
import { coerceCell } from './cellValues.js';
import { WorkbookError } from './errors.js';
import { freezeTable, isAbsentRow } from './tableNormalizer.js';

export class InvalidEditError extends WorkbookError {
  constructor(message: string) {
    super(message, 400);
  }
}

function checkRow(row: number, rowCount: number): void {
  if (!Number.isInteger(row) || row < 0 || row >= rowCount) {
    throw new InvalidEditError(`Row ${row} is out of range (table has ${rowCount} rows)`);
  }
}

/**
 * Apply edits to a copy of `table`
 */
export function applyEdits(table: NormalizedTable, edits: ReadonlyArray<CellEdit>): NormalizedTable {
  const width = table.columns.length;
  const rows: TypedValue[][] = table.rows.map(row => [...row]);
  const sourceRows = [...table.sourceRows];

  for (const edit of edits) {
    switch (edit.kind) {
      case 'set': {
        checkRow(edit.row, rows.length);
        if (!Number.isInteger(edit.column) || edit.column < 0 || edit.column >= width) {
          throw new InvalidEditError(`Column ${edit.column} is out of range (table has ${width} columns)`);
        }
        rows[edit.row][edit.column] = coerceCell(edit.value);
        break;
      }
      case 'addRow': {
        const values = edit.values ?? [];
        rows.push(table.columns.map((_, col) => coerceCell(values[col])));
        sourceRows.push(-1);
        break;
      }
      case 'deleteRow': {
        checkRow(edit.row, rows.length);
        rows.splice(edit.row, 1);
        sourceRows.splice(edit.row, 1);
        break;
      }
    }
  }

  const keptRows: TypedValue[][] = [];
  const keptSources: number[] = [];
  rows.forEach((row, i) => {
    if (isAbsentRow(row)) return;
    keptRows.push(row);
    keptSources.push(sourceRows[i]);
  });

  return freezeTable([...table.columns], keptRows, keptSources);
}

/**
 * Validate an untrusted edit list (request bodies)
 */
export function parseEdits(input: unknown): CellEdit[] {
  if (!Array.isArray(input)) {
    throw new InvalidEditError('edits must be an array');
  }

  return input.map((item: unknown, i): CellEdit => {
    if (typeof item !== 'object' || item === null) {
      throw new InvalidEditError(`Edit #${i} must be an object with a kind`);
    }

    const record = new Map<string, unknown>(Object.entries(item));
    const kind = record.get('kind');
    const row = record.get('row');

    switch (kind) {
      case 'set': {
        const column = record.get('column');
        if (typeof row !== 'number' || typeof column !== 'number') {
          throw new InvalidEditError(`Edit #${i}: set needs numeric row and column`);
        }
        return { kind: 'set', row, column, value: toCellValue(record.get('value'), i) };
      }
      case 'addRow': {
        const values = record.get('values');
        if (values === undefined) return { kind: 'addRow' };
        if (!Array.isArray(values)) {
          throw new InvalidEditError(`Edit #${i}: addRow values must be an array`);
        }
        return { kind: 'addRow', values: values.map((v: unknown) => toCellValue(v, i)) };
      }
      case 'deleteRow':
        if (typeof row !== 'number') {
          throw new InvalidEditError(`Edit #${i}: deleteRow needs a numeric row`);
        }
        return { kind: 'deleteRow', row };
      default:
        throw new InvalidEditError(`Edit #${i}: unknown kind "${String(kind)}"`);
    }
  });
}

function toCellValue(value: unknown, i: number): string | number | boolean | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  throw new InvalidEditError(`Edit #${i}: values must be text, numbers, booleans or null`);
}
