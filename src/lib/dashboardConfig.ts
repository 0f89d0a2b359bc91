/**
 * Dashboard configuration: which sheets the views read, at which header
 * offsets, and the column-name vocabulary of their metrics.
 *
 * Loaded from JSON and checked by hand; a malformed file fails at startup.
 */

import * as fs from 'fs';
import type { DomainAggregation, DomainMetricRule, DomainMetricRules } from '../types.js';
import type { NumericChartType } from './chartBuilder.js';

// ============ Types ============

export type ViewLayout = 'table' | 'raw' | 'titled';

/**
 * A summary card. Without a rule the card shows the table's row count.
 */
export interface OverviewCardConfig {
  label: string;
  sheet: string;
  headerRow: number;
  rule?: DomainMetricRule;
}

export interface ViewConfig {
  id: string;
  title: string;
  sheet: string;
  layout: ViewLayout;
  headerRow?: number | 'auto'; // table layout only (default: auto)
  editable?: boolean;
  chart?: NumericChartType;
  metrics?: DomainMetricRules;
}

export interface DashboardConfig {
  overview: OverviewCardConfig[];
  views: ViewConfig[];
}

export class DashboardConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DashboardConfigError';
  }
}

// ============ Validation ============

const AGGREGATIONS: readonly DomainAggregation[] = ['sum', 'mean', 'count', 'distinct'];
const LAYOUTS: readonly ViewLayout[] = ['table', 'raw', 'titled'];
const CHART_TYPES: readonly NumericChartType[] = ['bar', 'line'];

type Fields = Map<string, unknown>;

function fieldsOf(value: unknown, where: string): Fields {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new DashboardConfigError(`${where} must be an object`);
  }
  return new Map<string, unknown>(Object.entries(value));
}

function requireString(fields: Fields, key: string, where: string): string {
  const value = fields.get(key);
  if (typeof value !== 'string' || value.trim() === '') {
    throw new DashboardConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function stringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new DashboardConfigError(`${where} must be a non-empty array of strings`);
  }
  return value.map((item: unknown, i) => {
    if (typeof item !== 'string' || item === '') {
      throw new DashboardConfigError(`${where}[${i}] must be a non-empty string`);
    }
    return item;
  });
}

function pick<T extends string>(value: unknown, allowed: readonly T[], where: string): T {
  const match = allowed.find(option => option === value);
  if (match === undefined) {
    throw new DashboardConfigError(`${where} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

function headerRowOf(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new DashboardConfigError(`${where} must be a non-negative integer`);
  }
  return value;
}

export function parseMetricRule(value: unknown, where: string): DomainMetricRule {
  const fields = fieldsOf(value, where);
  const rule: DomainMetricRule = {
    columnNameSubstrings: stringList(fields.get('columnNameSubstrings'), `${where}.columnNameSubstrings`),
    aggregation: pick(fields.get('aggregation'), AGGREGATIONS, `${where}.aggregation`),
  };

  if (fields.has('requiredSubstrings')) {
    rule.requiredSubstrings = stringList(fields.get('requiredSubstrings'), `${where}.requiredSubstrings`);
  }
  if (fields.has('whenMissing')) {
    rule.whenMissing = pick(fields.get('whenMissing'), ['omit', 'rowCount'] as const, `${where}.whenMissing`);
  }
  return rule;
}

function parseMetricRules(value: unknown, where: string): DomainMetricRules {
  const rules: DomainMetricRules = {};
  for (const [label, rule] of fieldsOf(value, where)) {
    rules[label] = parseMetricRule(rule, `${where}["${label}"]`);
  }
  return rules;
}

function parseOverviewCard(value: unknown, where: string): OverviewCardConfig {
  const fields = fieldsOf(value, where);
  const card: OverviewCardConfig = {
    label: requireString(fields, 'label', where),
    sheet: requireString(fields, 'sheet', where),
    headerRow: headerRowOf(fields.get('headerRow') ?? 0, `${where}.headerRow`),
  };
  if (fields.has('rule')) {
    card.rule = parseMetricRule(fields.get('rule'), `${where}.rule`);
  }
  return card;
}

function parseView(value: unknown, where: string): ViewConfig {
  const fields = fieldsOf(value, where);
  const view: ViewConfig = {
    id: requireString(fields, 'id', where),
    title: requireString(fields, 'title', where),
    sheet: requireString(fields, 'sheet', where),
    layout: pick(fields.get('layout'), LAYOUTS, `${where}.layout`),
  };

  const headerRow = fields.get('headerRow');
  if (headerRow !== undefined) {
    view.headerRow = headerRow === 'auto' ? 'auto' : headerRowOf(headerRow, `${where}.headerRow`);
  }
  const editable = fields.get('editable');
  if (editable !== undefined) {
    if (typeof editable !== 'boolean') {
      throw new DashboardConfigError(`${where}.editable must be a boolean`);
    }
    view.editable = editable;
  }
  if (fields.has('chart')) {
    view.chart = pick(fields.get('chart'), CHART_TYPES, `${where}.chart`);
  }
  if (fields.has('metrics')) {
    view.metrics = parseMetricRules(fields.get('metrics'), `${where}.metrics`);
  }
  return view;
}

/**
 * Validate parsed JSON as a dashboard configuration
 */
export function parseDashboardConfig(value: unknown): DashboardConfig {
  const fields = fieldsOf(value, 'dashboard');

  const overview = fields.get('overview') ?? [];
  const views = fields.get('views') ?? [];
  if (!Array.isArray(overview)) throw new DashboardConfigError('dashboard.overview must be an array');
  if (!Array.isArray(views)) throw new DashboardConfigError('dashboard.views must be an array');

  const config: DashboardConfig = {
    overview: overview.map((card: unknown, i) => parseOverviewCard(card, `overview[${i}]`)),
    views: views.map((view: unknown, i) => parseView(view, `views[${i}]`)),
  };

  const ids = new Set<string>();
  for (const view of config.views) {
    if (ids.has(view.id)) {
      throw new DashboardConfigError(`Duplicate view id "${view.id}"`);
    }
    ids.add(view.id);
  }

  return config;
}

/**
 * Read and validate the dashboard configuration file
 */
export function loadDashboardConfig(configPath: string): DashboardConfig {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (e) {
    throw new DashboardConfigError(
      `Could not read dashboard config ${configPath}: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  const config = parseDashboardConfig(json);
  console.log(`[Dashboard] Loaded ${config.views.length} view(s), ${config.overview.length} overview card(s)`);
  return config;
}
