/**
 * Chart Builder
 *
 * Builds Chart.js configurations for the dashboard from the numeric columns
 * of a normalized table. Rendering happens in the browser; this module only
 * decides what to plot:
 * - one dataset per numeric column
 * - category labels from the first text column, else the source row number
 * - absent values stay null so Chart.js leaves a gap
 */

import type { ChartConfiguration, ChartOptions } from 'chart.js';
import type { NormalizedTable, TypedValue } from '../types.js';
import { columnValues, numericColumns } from './tableNormalizer.js';

// Excel-like color palette
const CHART_COLORS = [
  '#4472C4', '#ED7D31', '#A5A5A5', '#FFC000', '#5B9BD5',
  '#70AD47', '#264478', '#9E480E', '#636363', '#997300',
  '#255E91', '#43682B', '#698ED0', '#F1975A', '#B7B7B7'
];

// ============ Types ============

export type NumericChartType = 'bar' | 'line';

export interface ChartData {
  type: NumericChartType;
  title?: string;
  labels: string[];
  datasets: Array<{
    label: string;
    data: Array<number | null>;
    color: string;
  }>;
}

export type NumericChartConfig = ChartConfiguration<NumericChartType, Array<number | null>, string>;

// ============ Chart Data ============

/**
 * Pick the label for each row: the first column with any text value,
 * otherwise the 1-based source row (spreadsheet numbering)
 */
function rowLabels(table: NormalizedTable, numeric: ReadonlySet<number>): string[] {
  const labelCol = table.columns.findIndex(
    (_, col) => !numeric.has(col) && table.rows.some(row => typeof row[col] === 'string')
  );

  return table.rows.map((row, i) => {
    if (labelCol !== -1) {
      const value: TypedValue = row[labelCol];
      if (value !== null) return String(value);
    }
    const source = table.sourceRows[i];
    return source >= 0 ? String(source + 1) : `new ${i + 1}`;
  });
}

/**
 * Collect chart data from a table, or null when it has no numeric column
 */
export function buildChartData(
  table: NormalizedTable,
  type: NumericChartType,
  title?: string
): ChartData | null {
  const numeric = numericColumns(table);
  if (numeric.length === 0 || table.rows.length === 0) {
    return null;
  }

  const datasets = numeric.map((col, i) => ({
    label: table.columns[col],
    data: columnValues(table, col).map(v => (typeof v === 'number' ? v : null)),
    color: CHART_COLORS[i % CHART_COLORS.length],
  }));

  return {
    type,
    title,
    labels: rowLabels(table, new Set(numeric)),
    datasets,
  };
}

// ============ Chart Configuration ============

/**
 * Build Chart.js configuration from chart data
 */
export function buildChartConfig(chartData: ChartData): NumericChartConfig {
  const isLine = chartData.type === 'line';

  const options: ChartOptions<NumericChartType> = {
    responsive: true,
    plugins: {
      title: {
        display: !!chartData.title,
        text: chartData.title || '',
        font: { size: 16, weight: 'bold' },
        padding: { bottom: 10 },
      },
      legend: {
        display: chartData.datasets.length > 1,
        position: 'bottom',
      },
    },
    scales: {
      y: { beginAtZero: true },
    },
  };

  return {
    type: chartData.type,
    data: {
      labels: chartData.labels,
      datasets: chartData.datasets.map(ds => ({
        label: ds.label,
        data: ds.data,
        backgroundColor: ds.color,
        borderColor: ds.color,
        borderWidth: isLine ? 2 : 1,
        tension: isLine ? 0.1 : 0,
      })),
    },
    options,
  };
}

/**
 * Chart configuration over every numeric column of a table
 */
export function buildNumericChart(
  table: NormalizedTable,
  type: NumericChartType,
  title?: string
): NumericChartConfig | null {
  const chartData = buildChartData(table, type, title);
  if (!chartData) return null;

  console.log(`[Chart] Built ${type} chart: ${chartData.datasets.length} series, ${chartData.labels.length} points`);

  return buildChartConfig(chartData);
}
