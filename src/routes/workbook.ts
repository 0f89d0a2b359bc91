/**
 * Workbook Routes
 *
 * Raw browsing and on-demand normalization of any sheet:
 * - raw grids, detected structure, normalized tables at any header offset
 * - title-split sub-tables for dashboard-style sheets
 * - CSV export and inline edits (returned as a new table, never saved)
 * - analysis of an uploaded workbook without touching the served one
 */

import { Router, type Request, type Response } from 'express';
import multer from 'multer';
import type { DetectionOptions, RawGrid, WorkbookGrids } from '../types.js';
import { buildNumericChart } from '../lib/chartBuilder.js';
import { gridToCsv, toCsv } from '../lib/csvExport.js';
import { getSheet, resolveTable } from '../lib/dashboard.js';
import { SourceFormatError } from '../lib/errors.js';
import { aggregateNumeric } from '../lib/metricAggregator.js';
import { findTitleRows, splitByTitles } from '../lib/multiTableExtractor.js';
import { detectStructure } from '../lib/structureDetector.js';
import { applyEdits, parseEdits } from '../lib/tableEdits.js';
import { numericColumns } from '../lib/tableNormalizer.js';
import type { WorkbookCache } from '../lib/workbookCache.js';
import { parseWorkbookBuffer } from '../lib/workbookLoader.js';
import { requireWorkbook, workbookOf } from '../middleware/workbook.js';

export interface WorkbookRouterOptions {
  cache: WorkbookCache;
  workbookPath: string;
  detection: DetectionOptions;
}

// Configure multer for file uploads (memory storage)
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 50 * 1024 * 1024, // 50MB max file size
  },
  fileFilter: (_req, file, cb) => {
    const allowedExtensions = ['.xlsx', '.xlsm', '.xls', '.csv'];
    const ext = file.originalname.toLowerCase().slice(file.originalname.lastIndexOf('.'));

    if (allowedExtensions.includes(ext)) {
      cb(null, true);
    } else {
      cb(new SourceFormatError(file.originalname, 'only Excel (.xlsx, .xlsm, .xls) and CSV files are accepted'));
    }
  },
});

/**
 * Parse ?headerRow=: absent or "auto" means detect, otherwise an integer
 */
function headerRowParam(req: Request): number | 'auto' | null {
  const raw = req.query.headerRow;
  if (raw === undefined || raw === 'auto') return 'auto';
  if (typeof raw !== 'string' || !/^-?\d+$/.test(raw.trim())) return null;
  return Number(raw);
}

function badHeaderRow(res: Response): void {
  res.status(400).json({ error: 'Invalid headerRow', details: 'headerRow must be an integer or "auto"' });
}

function summarizeSheet(name: string, grid: RawGrid, detection: DetectionOptions) {
  const structure = detectStructure(grid, detection);
  return {
    name,
    rowCount: grid.length,
    columnCount: grid[0]?.length ?? 0,
    titleRow: structure.titleRow ?? null,
    headerRow: structure.headerRow ?? null,
  };
}

function analyzeGrids(grids: WorkbookGrids, detection: DetectionOptions) {
  return Object.entries(grids).map(([name, grid]) => {
    const resolved = resolveTable(grid, 'auto', detection);
    return {
      ...summarizeSheet(name, grid, detection),
      columns: resolved.table.columns,
      dataRowCount: resolved.table.rows.length,
      titledTables: splitByTitles(grid, detection).map(sub => sub.title),
      metrics: aggregateNumeric(resolved.table),
      notices: resolved.notices,
    };
  });
}

export function createWorkbookRouter(options: WorkbookRouterOptions): Router {
  const { cache, workbookPath, detection } = options;
  const router = Router();
  const withWorkbook = requireWorkbook(cache, workbookPath);

  /**
   * GET /api/workbook/health
   */
  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'workbook-engine',
      workbook: workbookPath,
      cached: cache.has(workbookPath),
      supportedFormats: ['.xlsx', '.xlsm', '.xls', '.csv'],
    });
  });

  /**
   * GET /api/workbook
   *
   * Sheet list with dimensions and detected title/header rows
   */
  router.get('/', withWorkbook, (req, res) => {
    const grids = workbookOf(req);
    res.json({
      workbook: workbookPath,
      sheets: Object.entries(grids).map(([name, grid]) => summarizeSheet(name, grid, detection)),
    });
  });

  /**
   * GET /api/workbook/sheets/:sheet/raw
   */
  router.get('/sheets/:sheet/raw', withWorkbook, (req, res) => {
    const grid = getSheet(workbookOf(req), req.params.sheet);
    res.json({ sheet: req.params.sheet.trim(), rows: grid });
  });

  /**
   * GET /api/workbook/sheets/:sheet/structure
   */
  router.get('/sheets/:sheet/structure', withWorkbook, (req, res) => {
    const grid = getSheet(workbookOf(req), req.params.sheet);
    res.json({
      sheet: req.params.sheet.trim(),
      rowCount: grid.length,
      columnCount: grid[0]?.length ?? 0,
      structure: detectStructure(grid, detection),
      titleRows: findTitleRows(grid, detection),
    });
  });

  /**
   * GET /api/workbook/sheets/:sheet/table?headerRow=1
   *
   * Normalized table with metrics and chart. Without headerRow the header is
   * detected; when none is found the table uses positional labels.
   */
  router.get('/sheets/:sheet/table', withWorkbook, (req, res) => {
    const headerRow = headerRowParam(req);
    if (headerRow === null) {
      badHeaderRow(res);
      return;
    }

    const grid = getSheet(workbookOf(req), req.params.sheet);
    const resolved = resolveTable(grid, headerRow, detection);

    res.json({
      sheet: req.params.sheet.trim(),
      headerRow: resolved.headerRow,
      structure: resolved.structure,
      table: resolved.table,
      metrics: aggregateNumeric(resolved.table),
      numericColumns: numericColumns(resolved.table),
      chart: buildNumericChart(resolved.table, 'bar'),
      notices: resolved.notices,
    });
  });

  /**
   * GET /api/workbook/sheets/:sheet/tables
   *
   * Title-split sub-tables in sheet order
   */
  router.get('/sheets/:sheet/tables', withWorkbook, (req, res) => {
    const grid = getSheet(workbookOf(req), req.params.sheet);
    const tables = splitByTitles(grid, detection);

    res.json({
      sheet: req.params.sheet.trim(),
      tables: tables.map(sub => ({
        title: sub.title,
        titleRow: sub.titleRow,
        table: sub.table,
        metrics: aggregateNumeric(sub.table),
      })),
      notices:
        tables.length === 0
          ? [{ code: 'no-titled-tables', message: 'No section titles found, showing raw data instead' }]
          : [],
    });
  });

  /**
   * GET /api/workbook/sheets/:sheet/export.csv?headerRow=1 | ?raw=1
   */
  router.get('/sheets/:sheet/export.csv', withWorkbook, (req, res) => {
    const sheetName = req.params.sheet.trim();
    const grid = getSheet(workbookOf(req), sheetName);

    let csv: string;
    if (req.query.raw === '1' || req.query.raw === 'true') {
      csv = gridToCsv(grid);
    } else {
      const headerRow = headerRowParam(req);
      if (headerRow === null) {
        badHeaderRow(res);
        return;
      }
      csv = toCsv(resolveTable(grid, headerRow, detection).table);
    }

    res.attachment(`${sheetName}.csv`);
    res.type('text/csv');
    res.send(csv);
  });

  /**
   * POST /api/workbook/sheets/:sheet/edits
   *
   * Body: { headerRow?: number | "auto", edits: CellEdit[] }
   * Applies the edits to a fresh copy of the table and returns it with
   * recomputed metrics. Nothing is written back to the workbook.
   */
  router.post('/sheets/:sheet/edits', withWorkbook, (req, res) => {
    const body: unknown = req.body;
    const fields = new Map<string, unknown>(typeof body === 'object' && body !== null ? Object.entries(body) : []);

    const rawHeader = fields.get('headerRow') ?? 'auto';
    let headerRow: number | 'auto';
    if (rawHeader === 'auto') {
      headerRow = 'auto';
    } else if (typeof rawHeader === 'number' && Number.isInteger(rawHeader)) {
      headerRow = rawHeader;
    } else {
      badHeaderRow(res);
      return;
    }

    const edits = parseEdits(fields.get('edits'));
    const grid = getSheet(workbookOf(req), req.params.sheet);
    const resolved = resolveTable(grid, headerRow, detection);
    const edited = applyEdits(resolved.table, edits);

    console.log(`[Workbook] Applied ${edits.length} edit(s) to "${req.params.sheet.trim()}"`);

    res.json({
      sheet: req.params.sheet.trim(),
      headerRow: resolved.headerRow,
      table: edited,
      metrics: aggregateNumeric(edited),
      numericColumns: numericColumns(edited),
      chart: buildNumericChart(edited, 'bar'),
      notices: resolved.notices,
    });
  });

  /**
   * POST /api/workbook/analyze
   *
   * Request: multipart/form-data with "file" field
   * Response: per-sheet structure, columns and metrics of the uploaded file
   */
  router.post('/analyze', upload.single('file'), (req, res) => {
    if (!req.file) {
      res.status(400).json({
        error: 'No file uploaded',
        details: 'Please provide an Excel or CSV file in the "file" field.',
      });
      return;
    }

    const { buffer, originalname } = req.file;
    console.log(`[Workbook] Analyzing upload: ${originalname} (${(buffer.length / 1024).toFixed(1)}KB)`);

    const grids = parseWorkbookBuffer(buffer, originalname);
    res.json({
      workbook: originalname,
      sheets: analyzeGrids(grids, detection),
    });
  });

  return router;
}
