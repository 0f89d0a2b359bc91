/**
 * Structure Detector
 *
 * Locates the title row and header row of a raw grid with positional and
 * density heuristics. No schema is assumed: sheets in the management workbook
 * put their headers at different offsets, often under a one-cell title.
 *
 * Both heuristics are thresholds over cell counts, tuned on observed sheets.
 * They can misfire (a data row with exactly three filled cells reads as a
 * header), so the thresholds are options rather than constants.
 */

import type { DetectionOptions, RawGrid, StructureInfo } from '../types.js';
import { cellsEmpty, countFilled, isEmptyCell } from './cellValues.js';
import { StructureUnresolvedError } from './errors.js';

// ============ Configuration ============

export const DEFAULT_DETECTION_OPTIONS: DetectionOptions = {
  headerMinCells: 3,
  titleEmptySpan: 4,
  titleMinLength: 10,
};

// ============ Heuristics ============

/**
 * A title row has a first cell and nothing in the next `titleEmptySpan` cells
 */
export function isTitleRow(
  row: RawGrid[number],
  options: Pick<DetectionOptions, 'titleEmptySpan'> = DEFAULT_DETECTION_OPTIONS
): boolean {
  return !isEmptyCell(row[0]) && cellsEmpty(row, 1, options.titleEmptySpan);
}

/**
 * A header row has at least `headerMinCells` filled cells
 */
export function isHeaderRow(
  row: RawGrid[number],
  options: Pick<DetectionOptions, 'headerMinCells'> = DEFAULT_DETECTION_OPTIONS
): boolean {
  return countFilled(row) >= options.headerMinCells;
}

// ============ Main Detector ============

/**
 * Detect title row, header row and data start of a grid.
 * The two scans are independent; only the first match of each is kept.
 */
export function detectStructure(
  grid: RawGrid,
  overrides: Partial<DetectionOptions> = {}
): StructureInfo {
  const options = { ...DEFAULT_DETECTION_OPTIONS, ...overrides };
  const info: StructureInfo = { columnLabels: [] };

  for (let i = 0; i < grid.length; i++) {
    if (isTitleRow(grid[i], options)) {
      info.titleRow = i;
      break;
    }
  }

  for (let i = 0; i < grid.length; i++) {
    if (isHeaderRow(grid[i], options)) {
      info.headerRow = i;
      info.dataStartRow = i + 1;
      info.columnLabels = [...grid[i]];
      break;
    }
  }

  return info;
}

/**
 * Header row of a detection result, or StructureUnresolvedError when none
 * was found. Callers catch the error and switch to synthetic labels.
 */
export function requireHeaderRow(info: StructureInfo): number {
  if (info.headerRow === undefined) {
    throw new StructureUnresolvedError('No header row detected, showing raw data');
  }
  return info.headerRow;
}
