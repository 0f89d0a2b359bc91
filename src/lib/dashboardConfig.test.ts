import { describe, expect, it } from 'vitest';
import { DashboardConfigError, loadDashboardConfig, parseDashboardConfig } from './dashboardConfig.js';

describe('loadDashboardConfig', () => {
  it('loads the bundled configuration', () => {
    const config = loadDashboardConfig('config/dashboard.json');

    expect(config.overview.map(card => card.label)).toEqual([
      'Quantidade de usinas',
      'Potência total (soma das usinas)',
      'Quantidade de clientes (Base SIGH)',
    ]);
    expect(config.views.map(view => view.id)).toEqual([
      'usinas',
      'quadro-resumo',
      'quadro-resumo-ativas',
      'dashboard-operacional',
      'dashboard-financeiro',
    ]);
    expect(config.views[0].headerRow).toBe(1);
    expect(config.views[0].editable).toBe(true);
    expect(config.views[0].metrics?.['Potência total (MWp)']).toEqual({
      columnNameSubstrings: ['Capacidade (MWp'],
      aggregation: 'sum',
    });
  });

  it('wraps unreadable files in DashboardConfigError', () => {
    expect(() => loadDashboardConfig('config/missing.json')).toThrow(DashboardConfigError);
  });
});

describe('parseDashboardConfig', () => {
  it('defaults missing sections to empty lists', () => {
    expect(parseDashboardConfig({})).toEqual({ overview: [], views: [] });
  });

  it('rejects unknown layouts', () => {
    expect(() =>
      parseDashboardConfig({ views: [{ id: 'x', title: 'X', sheet: 'S', layout: 'grid' }] })
    ).toThrow('views[0].layout must be one of: table, raw, titled');
  });

  it('rejects metric rules without column names', () => {
    expect(() =>
      parseDashboardConfig({
        views: [{ id: 'x', title: 'X', sheet: 'S', layout: 'table', metrics: { Total: { aggregation: 'sum' } } }],
      })
    ).toThrow('views[0].metrics["Total"].columnNameSubstrings must be a non-empty array of strings');
  });

  it('rejects duplicate view ids', () => {
    const view = { id: 'x', title: 'X', sheet: 'S', layout: 'raw' };
    expect(() => parseDashboardConfig({ views: [view, view] })).toThrow('Duplicate view id "x"');
  });

  it('accepts "auto" as a header row', () => {
    const config = parseDashboardConfig({
      views: [{ id: 'x', title: 'X', sheet: 'S', layout: 'table', headerRow: 'auto' }],
    });
    expect(config.views[0].headerRow).toBe('auto');
  });
});
