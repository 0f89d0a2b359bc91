import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { Server } from 'http';
import { once } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { loadDashboardConfig } from './lib/dashboardConfig.js';
import { WorkbookCache } from './lib/workbookCache.js';
import {
  CLIENT_SHEET,
  OPERATIONAL_SHEET,
  PLANT_SHEET,
  SUMMARY_SHEET,
  makeTempDir,
  workbookBuffer,
  writeWorkbook,
} from './test/fixtures.js';

const dir = makeTempDir();
const dashboard = loadDashboardConfig('config/dashboard.json');
const PLANTS = encodeURIComponent('Informações Usinas');

async function start(workbookPath: string): Promise<{ server: Server; baseUrl: string }> {
  const app = createApp({
    config: loadConfig({ WORKBOOK_PATH: workbookPath }),
    dashboard,
    cache: new WorkbookCache(),
  });
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function stop(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}

describe('workbook API', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const file = writeWorkbook(dir, 'Gestao.xlsx', {
      'Informações Usinas': PLANT_SHEET,
      'Base SIGH - Clientes': CLIENT_SHEET,
      'Dashboard Operacional': OPERATIONAL_SHEET,
      'Quadro Resumo ': SUMMARY_SHEET,
    });
    ({ server, baseUrl } = await start(file));
  });

  afterAll(async () => {
    await stop(server);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists sheets with their detected rows', async () => {
    const res = await fetch(`${baseUrl}/api/workbook`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      sheets: [
        { name: 'Informações Usinas', rowCount: 5, columnCount: 5, titleRow: 0, headerRow: 1 },
        { name: 'Base SIGH - Clientes', headerRow: 0 },
        { name: 'Dashboard Operacional', titleRow: 0, headerRow: 1 },
        { name: 'Quadro Resumo', headerRow: null },
      ],
    });
  });

  it('normalizes a sheet at the detected header row', async () => {
    const res = await fetch(`${baseUrl}/api/workbook/sheets/${PLANTS}/table`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      headerRow: 1,
      table: { columns: ['Usina', 'Capacidade (MW CA)', 'Capacidade (MWp)', 'Tarifa Gerador', 'Status'] },
      metrics: { 'Capacidade (MW CA)': { sum: 10, mean: 10 / 3, min: 2, max: 5, count: 3 } },
      numericColumns: [1, 2, 3],
      notices: [],
    });
  });

  it('clamps an out-of-range header row', async () => {
    const res = await fetch(`${baseUrl}/api/workbook/sheets/${PLANTS}/table?headerRow=999`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ headerRow: 4, table: { rows: [] } });
  });

  it('rejects a header row that is not a number', async () => {
    const res = await fetch(`${baseUrl}/api/workbook/sheets/${PLANTS}/table?headerRow=abc`);
    expect(res.status).toBe(400);
  });

  it('returns 404 for an unknown sheet', async () => {
    const res = await fetch(`${baseUrl}/api/workbook/sheets/Inexistente/raw`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: 'SheetNotFoundError',
      details: 'Sheet "Inexistente" not found in workbook',
    });
  });

  it('splits titled sheets', async () => {
    const res = await fetch(`${baseUrl}/api/workbook/sheets/Dashboard%20Operacional/tables`);

    expect(await res.json()).toMatchObject({
      tables: [
        { title: 'GERAÇÃO MENSAL POR USINA', titleRow: 0, metrics: { 'Geração (MWh)': { sum: 1230 } } },
        { title: 'CONSUMO POR DISTRIBUIDORA', titleRow: 5 },
      ],
      notices: [],
    });
  });

  it('exports a normalized table as CSV', async () => {
    const res = await fetch(`${baseUrl}/api/workbook/sheets/${PLANTS}/export.csv?headerRow=1`);
    const lines = (await res.text()).replace(/\n$/, '').split('\n');

    expect(res.headers.get('content-type')).toContain('text/csv');
    expect(lines[0]).toBe('Usina,Capacidade (MW CA),Capacidade (MWp),Tarifa Gerador,Status');
    expect(lines[1]).toBe('UFV Norte,5,6,200,ativa');
    expect(lines).toHaveLength(4);
  });

  it('exports a raw grid as CSV', async () => {
    const res = await fetch(`${baseUrl}/api/workbook/sheets/Quadro%20Resumo/export.csv?raw=1`);
    const lines = (await res.text()).replace(/\n$/, '').split('\n');

    expect(lines).toEqual([',,', 'Distribuidora,,Energia', 'CEMIG,,100']);
  });

  it('applies edits to a copy and recomputes metrics', async () => {
    const edit = () =>
      fetch(`${baseUrl}/api/workbook/sheets/${PLANTS}/edits`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ headerRow: 1, edits: [{ kind: 'set', row: 0, column: 1, value: 15 }] }),
      });

    const first = await edit();
    expect(first.status).toBe(200);
    expect(await first.json()).toMatchObject({ metrics: { 'Capacidade (MW CA)': { sum: 20 } } });

    // The served table is unchanged, so the same edit gives the same result
    const second = await edit();
    expect(await second.json()).toMatchObject({ metrics: { 'Capacidade (MW CA)': { sum: 20 } } });
  });

  it('rejects malformed edits', async () => {
    const res = await fetch(`${baseUrl}/api/workbook/sheets/${PLANTS}/edits`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ edits: [{ kind: 'deleteRow', row: 42 }] }),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'InvalidEditError' });
  });

  it('analyzes an uploaded workbook', async () => {
    const form = new FormData();
    const bytes = new Uint8Array(workbookBuffer({ 'Informações Usinas': PLANT_SHEET }));
    form.append('file', new Blob([bytes]), 'usinas.xlsx');

    const res = await fetch(`${baseUrl}/api/workbook/analyze`, { method: 'POST', body: form });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      workbook: 'usinas.xlsx',
      sheets: [{ name: 'Informações Usinas', titleRow: 0, headerRow: 1, dataRowCount: 3, notices: [] }],
    });
  });

  it('rejects uploads that are not spreadsheets', async () => {
    const form = new FormData();
    form.append('file', new Blob(['%PDF-1.4']), 'relatorio.pdf');

    const res = await fetch(`${baseUrl}/api/workbook/analyze`, { method: 'POST', body: form });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: 'SourceFormatError' });
  });
});

describe('dashboard API', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const file = writeWorkbook(makeTempDir(), 'Gestao.xlsx', {
      'Informações Usinas': PLANT_SHEET,
      'Dashboard Operacional': OPERATIONAL_SHEET,
    });
    ({ server, baseUrl } = await start(file));
  });

  afterAll(async () => {
    await stop(server);
  });

  it('lists configured views', async () => {
    const res = await fetch(`${baseUrl}/api/dashboard/views`);
    const body: unknown = await res.json();

    expect(body).toMatchObject({ views: [{ id: 'usinas', layout: 'table' }, {}, {}, {}, {}] });
  });

  it('blanks overview cards whose sheet is missing', async () => {
    const res = await fetch(`${baseUrl}/api/dashboard/overview`);

    expect(await res.json()).toEqual({
      cards: [
        { label: 'Quantidade de usinas', sheet: 'Informações Usinas', value: 2 },
        { label: 'Potência total (soma das usinas)', sheet: 'Informações Usinas', value: 10 },
        { label: 'Quantidade de clientes (Base SIGH)', sheet: 'Base SIGH - Clientes', value: null },
      ],
      notices: [
        {
          code: 'sheet-missing',
          message: 'Sheet "Base SIGH - Clientes" not found, "Quantidade de clientes (Base SIGH)" unavailable',
        },
      ],
    });
  });

  it('builds a configured view', async () => {
    const res = await fetch(`${baseUrl}/api/dashboard/views/dashboard-operacional`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      id: 'dashboard-operacional',
      sections: [
        { title: 'GERAÇÃO MENSAL POR USINA', domainMetrics: { 'Geração total (MWh)': 1230 } },
        { title: 'CONSUMO POR DISTRIBUIDORA', domainMetrics: { 'Consumo total (kWh)': 1500 } },
      ],
    });
  });

  it('fails only the view whose sheet is missing', async () => {
    const res = await fetch(`${baseUrl}/api/dashboard/views/dashboard-financeiro`);

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: 'SheetNotFoundError' });
  });

  it('returns 404 for an unknown view', async () => {
    const res = await fetch(`${baseUrl}/api/dashboard/views/inexistente`);
    expect(res.status).toBe(404);
  });
});

describe('missing workbook', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await start(path.join(makeTempDir(), 'nao-existe.xlsx')));
  });

  afterAll(async () => {
    await stop(server);
  });

  it('answers 503 for routes that need the workbook', async () => {
    const res = await fetch(`${baseUrl}/api/dashboard/overview`);

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ error: 'SourceNotFoundError' });
  });

  it('still serves the health check', async () => {
    const res = await fetch(`${baseUrl}/api/workbook/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', cached: false });
  });
});
