/**
 * Workbook fixtures for tests: sample sheets and a helper that writes them
 * to a real .xlsx file with SheetJS.
 */

import * as XLSX from 'xlsx';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { CellValue } from '../types.js';

export const PLANT_SHEET: CellValue[][] = [
  ['Informações Usinas', null, null, null, null],
  ['Usina', 'Capacidade (MW CA)', 'Capacidade (MWp)', 'Tarifa Gerador', 'Status'],
  ['UFV Norte', 5, 6, 200, 'ativa'],
  ['UFV Sul', 3, 4, 300, 'ativa'],
  ['UFV Norte', 2, null, null, 'obras'],
];

export const CLIENT_SHEET: CellValue[][] = [
  ['Cliente', 'UC', 'Consumo (kWh)'],
  ['Ana', 'UC-1', 120],
  ['Bruno', 'UC-2', 80],
];

export const OPERATIONAL_SHEET: CellValue[][] = [
  ['GERAÇÃO MENSAL POR USINA', null, null, null, null],
  ['Usina', 'Mês', 'Geração (MWh)', null, null],
  ['UFV Norte', 'jan', 810, null, null],
  ['UFV Sul', 'jan', 420, null, null],
  [null, null, null, null, null],
  ['CONSUMO POR DISTRIBUIDORA', null, null, null, null],
  ['Distribuidora', 'Consumo (kWh)', 'Clientes', null, null],
  ['CEMIG', 1500, 12, null, null],
];

export const SUMMARY_SHEET: CellValue[][] = [
  [null, null, null],
  ['Distribuidora', null, 'Energia'],
  ['CEMIG', null, 100],
];

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'plantdesk-'));
}

/**
 * Build an .xlsx buffer, one sheet per entry (insertion order)
 */
export function workbookBuffer(sheets: Record<string, CellValue[][]>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}

export function writeWorkbook(dir: string, filename: string, sheets: Record<string, CellValue[][]>): string {
  const filePath = path.join(dir, filename);
  fs.writeFileSync(filePath, workbookBuffer(sheets));
  return filePath;
}
