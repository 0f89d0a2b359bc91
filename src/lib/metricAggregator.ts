/**
 * Metric Aggregator
 *
 * Two entry points:
 * - aggregateNumeric: sum/mean/min/max/count for every numeric column
 * - matchDomainMetric: business metrics found by column name, driven by
 *   declarative rules so the vocabulary (Portuguese column names in the
 *   management workbook) lives in configuration
 *
 * Absent values are excluded from every aggregate. A column without numeric
 * data produces no metric at all, never NaN.
 */

import type {
  ColumnMetrics,
  DomainAggregation,
  DomainMetricRule,
  DomainMetricRules,
  MetricSet,
  NormalizedTable,
  TypedValue,
} from '../types.js';
import { columnValues, numericColumns } from './tableNormalizer.js';

// ============ Numeric Columns ============

/**
 * Aggregates over a list of numbers, or null when the list is empty
 */
export function computeMetrics(numbers: readonly number[]): ColumnMetrics | null {
  if (numbers.length === 0) return null;

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const n of numbers) {
    sum += n;
    if (n < min) min = n;
    if (n > max) max = n;
  }

  return {
    sum,
    mean: sum / numbers.length,
    min,
    max,
    count: numbers.length,
  };
}

function numbersOf(values: readonly TypedValue[]): number[] {
  return values.filter((v): v is number => typeof v === 'number');
}

/**
 * First free key for a column label: the label, then "label (col N)", then
 * "label (col N) #2" and so on when a real column already uses that text
 */
function uniqueKey(result: MetricSet, label: string, col: number): string {
  if (!(label in result)) return label;
  const base = `${label} (col ${col})`;
  let key = base;
  for (let n = 2; key in result; n++) {
    key = `${base} #${n}`;
  }
  return key;
}

/**
 * Metrics for every column whose non-absent values are all numeric.
 * A repeated label is keyed "label (col N)" after its first occurrence.
 */
export function aggregateNumeric(table: NormalizedTable): MetricSet {
  const result: MetricSet = {};

  for (const col of numericColumns(table)) {
    const metrics = computeMetrics(numbersOf(columnValues(table, col)));
    if (!metrics) continue;

    result[uniqueKey(result, table.columns[col], col)] = metrics;
  }

  return result;
}

// ============ Domain Metrics ============

/**
 * Position of the first column (table order) matching a rule, or -1
 */
export function findColumn(
  table: NormalizedTable,
  rule: Pick<DomainMetricRule, 'columnNameSubstrings' | 'requiredSubstrings'>
): number {
  const required = rule.requiredSubstrings ?? [];
  return table.columns.findIndex(
    label =>
      rule.columnNameSubstrings.some(s => label.includes(s)) &&
      required.every(s => label.includes(s))
  );
}

/**
 * Apply one aggregation to a column's values. Null means "no value to show".
 */
export function aggregateColumn(values: readonly TypedValue[], aggregation: DomainAggregation): number | null {
  const present = values.filter((v): v is number | string => v !== null);

  switch (aggregation) {
    case 'sum': {
      const numbers = numbersOf(present);
      return numbers.length > 0 ? numbers.reduce((sum, n) => sum + n, 0) : null;
    }
    case 'mean': {
      const metrics = computeMetrics(numbersOf(present));
      return metrics ? metrics.mean : null;
    }
    case 'count':
      return present.length;
    case 'distinct':
      return new Set(present).size;
  }
}

/**
 * Evaluate domain metric rules against a table, in rule order.
 * The first matching column wins; unmatched rules are omitted unless they
 * fall back to the table's row count.
 */
export function matchDomainMetric(table: NormalizedTable, rules: DomainMetricRules): Record<string, number> {
  const result: Record<string, number> = {};

  for (const [label, rule] of Object.entries(rules)) {
    const col = findColumn(table, rule);

    if (col === -1) {
      if (rule.whenMissing === 'rowCount') {
        result[label] = table.rows.length;
      }
      continue;
    }

    const value = aggregateColumn(columnValues(table, col), rule.aggregation);
    if (value !== null) {
      result[label] = value;
    }
  }

  return result;
}
