/**
 * Multi-Table Extractor
 *
 * The operational dashboard sheet stacks several tables vertically, each
 * under a one-cell title row:
 *
 *   | GERAÇÃO MENSAL POR USINA |        |       |
 *   | Usina                    | Mês    | MWh   |
 *   | UFV Norte                | jan/24 | 812.4 |
 *   |                          |        |       |
 *   | RECEITA POR DISTRIBUIDORA|        |       |
 *   | Distribuidora            | Receita|       |
 *   ...
 *
 * Every title row opens a span that runs until the next title row (or the end
 * of the grid). Inside a span the first non-empty row is the header.
 */

import type { DetectionOptions, RawGrid, TitledSubTable } from '../types.js';
import { cellToText, cellsEmpty, isEmptyCell } from './cellValues.js';
import { DEFAULT_DETECTION_OPTIONS } from './structureDetector.js';
import { buildTable, type CandidateRow } from './tableNormalizer.js';

/**
 * Title boundary: long enough first cell, followed by `titleEmptySpan` empty cells.
 * Unlike the single-table detector this matches every such row.
 */
export function isTitleBoundary(
  row: RawGrid[number],
  options: Pick<DetectionOptions, 'titleEmptySpan' | 'titleMinLength'> = DEFAULT_DETECTION_OPTIONS
): boolean {
  const title = cellToText(row[0]);
  return title.length > options.titleMinLength && cellsEmpty(row, 1, options.titleEmptySpan);
}

/**
 * Indices of all title boundary rows, top to bottom
 */
export function findTitleRows(grid: RawGrid, overrides: Partial<DetectionOptions> = {}): number[] {
  const options = { ...DEFAULT_DETECTION_OPTIONS, ...overrides };
  const rows: number[] = [];
  grid.forEach((row, i) => {
    if (isTitleBoundary(row, options)) rows.push(i);
  });
  return rows;
}

/**
 * Split a grid into its titled sub-tables, in title order.
 * No title rows means no sub-tables; that is not an error.
 */
export function splitByTitles(
  grid: RawGrid,
  overrides: Partial<DetectionOptions> = {}
): TitledSubTable[] {
  const titleRows = findTitleRows(grid, overrides);
  const result: TitledSubTable[] = [];

  titleRows.forEach((titleRow, i) => {
    const end = i + 1 < titleRows.length ? titleRows[i + 1] : grid.length;

    const span: CandidateRow[] = [];
    for (let r = titleRow + 1; r < end; r++) {
      const cells = grid[r];
      if (cells.every(cell => isEmptyCell(cell))) continue;
      span.push({ index: r, cells });
    }

    if (span.length === 0) return;

    const [header, ...data] = span;
    result.push({
      title: cellToText(grid[titleRow][0]),
      titleRow,
      table: buildTable(header.cells, data),
    });
  });

  console.log(`[Extractor] ${titleRows.length} title row(s), ${result.length} sub-table(s)`);

  return result;
}
