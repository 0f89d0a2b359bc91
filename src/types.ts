/**
 * Shared types for the PlantDesk workbook engine
 */

/**
 * A single spreadsheet cell as read from the source, before interpretation
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * Unprocessed rows x columns of one sheet. Rectangular: short rows are
 * padded with null by the loader.
 */
export type RawGrid = ReadonlyArray<ReadonlyArray<CellValue>>;

/**
 * Sheet name (trimmed) -> raw grid
 */
export type WorkbookGrids = Readonly<Record<string, RawGrid>>;

/**
 * A cell after coercion. null means absent, never zero.
 */
export type TypedValue = number | string | null;

/**
 * Result of structure detection on one grid
 */
export interface StructureInfo {
  titleRow?: number;
  headerRow?: number;
  dataStartRow?: number; // Always headerRow + 1 when headerRow is set
  columnLabels: CellValue[]; // Header row cells, positionally (empty when no header)
}

/**
 * Thresholds used by structure detection and title splitting
 */
export interface DetectionOptions {
  headerMinCells: number; // Non-empty cells a row needs to count as a header
  titleEmptySpan: number; // Cells after the first that must be empty on a title row
  titleMinLength: number; // Title text must be strictly longer than this (title splitting only)
}

/**
 * Typed table produced from a grid and a header row.
 * Rows are positional: rows[i][j] belongs to columns[j]. Labels may repeat.
 */
export interface NormalizedTable {
  readonly columns: readonly string[];
  readonly rows: ReadonlyArray<readonly TypedValue[]>;
  readonly sourceRows: readonly number[]; // Grid row each row came from, -1 for rows added by edits
}

/**
 * One section of a sheet that stacks several titled tables vertically
 */
export interface TitledSubTable {
  title: string;
  titleRow: number;
  table: NormalizedTable;
}

/**
 * Aggregates over the non-absent values of one numeric column
 */
export interface ColumnMetrics {
  sum: number;
  mean: number;
  min: number;
  max: number;
  count: number;
}

/**
 * Column label -> aggregates
 */
export type MetricSet = Record<string, ColumnMetrics>;

export type DomainAggregation = 'sum' | 'mean' | 'count' | 'distinct';

/**
 * How to find and aggregate one business metric by column name
 */
export interface DomainMetricRule {
  columnNameSubstrings: string[]; // Column matches if its label contains any of these
  requiredSubstrings?: string[]; // ...and all of these, when given
  aggregation: DomainAggregation;
  whenMissing?: 'omit' | 'rowCount'; // Fallback when no column matches (default: omit)
}

/**
 * Metric label -> rule. Evaluated in key order.
 */
export type DomainMetricRules = Record<string, DomainMetricRule>;

/**
 * A non-blocking message telling the user which assumption failed
 */
export interface ViewNotice {
  code:
    | 'header-not-detected'
    | 'sheet-missing'
    | 'no-titled-tables'
    | 'no-numeric-columns'
    | 'no-domain-metrics';
  message: string;
}

/**
 * An edit to a normalized table. Row and column are positions in the table.
 */
export type CellEdit =
  | { kind: 'set'; row: number; column: number; value: CellValue }
  | { kind: 'addRow'; values?: CellValue[] }
  | { kind: 'deleteRow'; row: number };

/**
 * API error response
 */
export interface ErrorResponse {
  error: string;
  details?: string;
}
