/**
 * Dashboard view assembly
 *
 * Runs one full pass from the loaded grids to what a page shows: tables,
 * metrics, chart configurations and notices. Nothing is kept between calls.
 *
 * Ambiguous structure never fails a view. It degrades to synthetic column
 * labels or the raw grid, and a notice says which assumption failed.
 */

import type {
  DetectionOptions,
  DomainMetricRules,
  MetricSet,
  NormalizedTable,
  RawGrid,
  StructureInfo,
  ViewNotice,
  WorkbookGrids,
} from '../types.js';
import { buildNumericChart, type NumericChartConfig, type NumericChartType } from './chartBuilder.js';
import type { DashboardConfig, OverviewCardConfig, ViewConfig, ViewLayout } from './dashboardConfig.js';
import { SheetNotFoundError, StructureUnresolvedError } from './errors.js';
import { aggregateNumeric, matchDomainMetric } from './metricAggregator.js';
import { splitByTitles } from './multiTableExtractor.js';
import { detectStructure, requireHeaderRow } from './structureDetector.js';
import { normalizeTable, numericColumns, syntheticTable } from './tableNormalizer.js';

// ============ Types ============

export interface ResolvedTable {
  headerRow: number | null; // null when synthetic labels were used
  structure: StructureInfo;
  table: NormalizedTable;
  notices: ViewNotice[];
}

export interface TableSection {
  title?: string;
  titleRow?: number;
  table: NormalizedTable;
  metrics: MetricSet;
  domainMetrics: Record<string, number>;
  chart: NumericChartConfig | null;
}

export interface DashboardView {
  id: string;
  title: string;
  sheet: string;
  layout: ViewLayout;
  editable: boolean;
  headerRow: number | null;
  sections: TableSection[];
  notices: ViewNotice[];
}

export interface OverviewCard {
  label: string;
  sheet: string;
  value: number | null;
}

export interface DashboardOverview {
  cards: OverviewCard[];
  notices: ViewNotice[];
}

// ============ Sheets ============

/**
 * Grid of a sheet by name (names are compared trimmed)
 */
export function getSheet(grids: WorkbookGrids, sheetName: string): RawGrid {
  const grid = grids[sheetName.trim()];
  if (!grid) {
    throw new SheetNotFoundError(sheetName.trim());
  }
  return grid;
}

// ============ Tables ============

/**
 * Normalize a grid at a fixed header row, or at the detected one for 'auto'.
 * Without a detectable header the whole grid becomes data with Col_N labels.
 */
export function resolveTable(
  grid: RawGrid,
  headerRow: number | 'auto',
  detection: Partial<DetectionOptions> = {}
): ResolvedTable {
  const structure = detectStructure(grid, detection);

  if (headerRow !== 'auto') {
    const clamped = grid.length === 0 ? 0 : Math.min(Math.max(Math.trunc(headerRow), 0), grid.length - 1);
    return { headerRow: clamped, structure, table: normalizeTable(grid, clamped), notices: [] };
  }

  try {
    const detected = requireHeaderRow(structure);
    return { headerRow: detected, structure, table: normalizeTable(grid, detected), notices: [] };
  } catch (e) {
    if (!(e instanceof StructureUnresolvedError)) throw e;
    return {
      headerRow: null,
      structure,
      table: syntheticTable(grid),
      notices: [
        {
          code: 'header-not-detected',
          message: `${e.message}; columns are labelled by position. Pick a header row to adjust.`,
        },
      ],
    };
  }
}

/**
 * Metrics, domain metrics and chart of one table
 */
export function buildSection(
  table: NormalizedTable,
  rules: DomainMetricRules | undefined,
  chart: NumericChartType | undefined,
  title?: string
): TableSection {
  return {
    title,
    table,
    metrics: aggregateNumeric(table),
    domainMetrics: rules ? matchDomainMetric(table, rules) : {},
    chart: chart ? buildNumericChart(table, chart, title) : null,
  };
}

function sectionNotices(sections: TableSection[], view: ViewConfig): ViewNotice[] {
  const notices: ViewNotice[] = [];

  if (view.metrics && Object.keys(view.metrics).length > 0) {
    const found = sections.some(s => Object.keys(s.domainMetrics).length > 0);
    if (!found) {
      notices.push({
        code: 'no-domain-metrics',
        message: `None of the configured metrics matched a column in "${view.sheet}"`,
      });
    }
  }

  if (view.chart && !sections.some(s => numericColumns(s.table).length > 0)) {
    notices.push({
      code: 'no-numeric-columns',
      message: 'No numeric column was identified, nothing to chart',
    });
  }

  return notices;
}

// ============ Views ============

/**
 * Assemble one configured view from the workbook
 */
export function buildView(
  grids: WorkbookGrids,
  view: ViewConfig,
  detection: Partial<DetectionOptions> = {}
): DashboardView {
  const grid = getSheet(grids, view.sheet);
  const notices: ViewNotice[] = [];
  let sections: TableSection[] = [];
  let headerRow: number | null = null;

  switch (view.layout) {
    case 'table': {
      const resolved = resolveTable(grid, view.headerRow ?? 'auto', detection);
      headerRow = resolved.headerRow;
      notices.push(...resolved.notices);
      sections = [buildSection(resolved.table, view.metrics, view.chart)];
      break;
    }
    case 'raw': {
      sections = [buildSection(syntheticTable(grid), view.metrics, view.chart)];
      break;
    }
    case 'titled': {
      const subTables = splitByTitles(grid, detection);
      if (subTables.length === 0) {
        notices.push({
          code: 'no-titled-tables',
          message: `No section titles found in "${view.sheet}", showing raw data`,
        });
        sections = [buildSection(syntheticTable(grid), view.metrics, view.chart)];
      } else {
        sections = subTables.map(sub => ({
          ...buildSection(sub.table, view.metrics, view.chart, sub.title),
          titleRow: sub.titleRow,
        }));
      }
      break;
    }
  }

  notices.push(...sectionNotices(sections, view));

  return {
    id: view.id,
    title: view.title,
    sheet: view.sheet,
    layout: view.layout,
    editable: view.editable ?? false,
    headerRow,
    sections,
    notices,
  };
}

function buildCard(grids: WorkbookGrids, card: OverviewCardConfig): { card: OverviewCard; notice?: ViewNotice } {
  const grid = grids[card.sheet.trim()];
  if (!grid) {
    return {
      card: { label: card.label, sheet: card.sheet, value: null },
      notice: { code: 'sheet-missing', message: `Sheet "${card.sheet}" not found, "${card.label}" unavailable` },
    };
  }

  const table = normalizeTable(grid, card.headerRow);
  if (!card.rule) {
    return { card: { label: card.label, sheet: card.sheet, value: table.rows.length } };
  }

  const value = matchDomainMetric(table, { [card.label]: card.rule })[card.label];
  if (value === undefined) {
    return {
      card: { label: card.label, sheet: card.sheet, value: null },
      notice: { code: 'no-domain-metrics', message: `No column in "${card.sheet}" matches "${card.label}"` },
    };
  }
  return { card: { label: card.label, sheet: card.sheet, value } };
}

/**
 * Summary cards of the general dashboard. A missing sheet only blanks its cards.
 */
export function buildOverview(grids: WorkbookGrids, config: DashboardConfig): DashboardOverview {
  const cards: OverviewCard[] = [];
  const notices: ViewNotice[] = [];

  for (const cardConfig of config.overview) {
    const { card, notice } = buildCard(grids, cardConfig);
    cards.push(card);
    if (notice) notices.push(notice);
  }

  return { cards, notices };
}

/**
 * Find a configured view by id
 */
export function findView(config: DashboardConfig, id: string): ViewConfig | undefined {
  return config.views.find(view => view.id === id);
}
