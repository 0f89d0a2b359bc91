/**
 * Workbook Loader
 *
 * Reads an Excel workbook (or one CSV file) into raw, header-less grids.
 * Nothing is interpreted here: row 0 is the first physical row of the sheet
 * and every row is padded to the sheet's width.
 *
 * Failure modes:
 * - missing file            -> SourceNotFoundError
 * - corrupt archive / text  -> SourceFormatError
 * CSV text is decoded as UTF-8 first and retried once as windows-1252.
 */

import * as XLSX from 'xlsx';
import AdmZip from 'adm-zip';
import * as fs from 'fs';
import * as path from 'path';
import type { CellValue, RawGrid, WorkbookGrids } from '../types.js';
import { SourceFormatError, SourceNotFoundError } from './errors.js';

// ============ Types ============

export type SourceKind = 'xlsx' | 'xls' | 'csv';

const ARCHIVE_EXTENSIONS = ['.xlsx', '.xlsm'];
const CSV_EXTENSIONS = ['.csv', '.txt'];

/**
 * Which parser a file name calls for
 */
export function sourceKind(filename: string): SourceKind {
  const ext = path.extname(filename).toLowerCase();
  if (ARCHIVE_EXTENSIONS.includes(ext)) return 'xlsx';
  if (CSV_EXTENSIONS.includes(ext)) return 'csv';
  return 'xls';
}

// ============ Grid Extraction ============

/**
 * Convert one worksheet into a rectangular grid anchored at A1
 */
export function sheetToGrid(sheet: XLSX.WorkSheet): RawGrid {
  const ref = sheet['!ref'];
  if (!ref) return Object.freeze([]);

  const range = XLSX.utils.decode_range(ref);
  const rows: CellValue[][] = XLSX.utils.sheet_to_json<CellValue[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: true,
    range: { s: { r: 0, c: 0 }, e: range.e },
  });

  const width = range.e.c + 1;
  return Object.freeze(
    rows.map(row => {
      const padded: CellValue[] = Array.from({ length: width }, (_, c) => normalizeRawCell(row[c]));
      return Object.freeze(padded);
    })
  );
}

function normalizeRawCell(value: CellValue | undefined): CellValue {
  return value === undefined ? null : value;
}

/**
 * Turn a parsed SheetJS workbook into trimmed-name -> grid.
 * When two names collide after trimming the later sheet wins.
 */
export function workbookToGrids(workbook: XLSX.WorkBook): WorkbookGrids {
  const grids: Record<string, RawGrid> = {};
  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) continue;
    grids[sheetName.trim()] = sheetToGrid(sheet);
  }
  return Object.freeze(grids);
}

// ============ Decoding ============

/**
 * Check that an .xlsx buffer is a readable archive with a workbook part
 */
function assertWorkbookArchive(buffer: Buffer, source: string): void {
  let zip: AdmZip;
  try {
    zip = new AdmZip(buffer);
  } catch (e) {
    throw new SourceFormatError(source, `not a valid archive (${e instanceof Error ? e.message : String(e)})`);
  }
  if (!zip.getEntry('xl/workbook.xml')) {
    throw new SourceFormatError(source, 'archive has no xl/workbook.xml');
  }
}

/**
 * Decode CSV bytes: strict UTF-8, then one retry as windows-1252
 */
export function decodeCsv(buffer: Buffer, source: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    console.warn(`[Workbook] ${source} is not valid UTF-8, retrying as windows-1252`);
  }
  try {
    return new TextDecoder('windows-1252', { fatal: true }).decode(buffer);
  } catch (e) {
    throw new SourceFormatError(source, `unsupported text encoding (${e instanceof Error ? e.message : String(e)})`);
  }
}

// ============ Main Loader ============

/**
 * Parse workbook bytes. `filename` picks the parser and names a CSV's sheet.
 */
export function parseWorkbookBuffer(buffer: Buffer, filename: string): WorkbookGrids {
  const kind = sourceKind(filename);

  if (kind === 'csv') {
    const text = decodeCsv(buffer, filename);
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(text, { type: 'string', cellDates: true });
    } catch (e) {
      throw new SourceFormatError(filename, e instanceof Error ? e.message : String(e));
    }
    const firstSheet = workbook.SheetNames[0];
    const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
    const sheetName = path.basename(filename, path.extname(filename)).trim();
    return Object.freeze({ [sheetName]: sheet ? sheetToGrid(sheet) : Object.freeze([]) });
  }

  if (kind === 'xlsx') {
    assertWorkbookArchive(buffer, filename);
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true, cellFormula: false });
  } catch (e) {
    throw new SourceFormatError(filename, e instanceof Error ? e.message : String(e));
  }

  if (workbook.SheetNames.length === 0) {
    throw new SourceFormatError(filename, 'workbook has no sheets');
  }

  return workbookToGrids(workbook);
}

/**
 * Load every sheet of the workbook at `sourcePath`
 */
export function loadWorkbook(sourcePath: string): WorkbookGrids {
  if (!fs.existsSync(sourcePath) || !fs.statSync(sourcePath).isFile()) {
    throw new SourceNotFoundError(sourcePath);
  }

  console.log(`[Workbook] Loading: ${sourcePath}`);

  const buffer = fs.readFileSync(sourcePath);
  const grids = parseWorkbookBuffer(buffer, path.basename(sourcePath));

  const names = Object.keys(grids);
  console.log(`[Workbook] Loaded ${names.length} sheet(s): ${names.map(n => `"${n}"`).join(', ')}`);

  return grids;
}
