/**
 * Express application
 *
 * Built separately from server.ts so tests can mount it on an ephemeral port.
 */

import express from 'express';
import cors from 'cors';
import type { AppConfig } from './lib/config.js';
import type { DashboardConfig } from './lib/dashboardConfig.js';
import { WorkbookCache, workbookCache } from './lib/workbookCache.js';
import { errorHandler, notFound } from './middleware/errors.js';
import { createDashboardRouter } from './routes/dashboard.js';
import { createWorkbookRouter } from './routes/workbook.js';

export interface AppOptions {
  config: AppConfig;
  dashboard: DashboardConfig;
  cache?: WorkbookCache;
}

export function createApp(options: AppOptions): express.Express {
  const { config, dashboard } = options;
  const cache = options.cache ?? workbookCache;

  const app = express();

  // CORS configuration - localhost plus configured origins
  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl)
      if (!origin) {
        return callback(null, true);
      }

      // Allow localhost for development
      if (origin.includes('localhost') || origin.includes('127.0.0.1')) {
        return callback(null, true);
      }

      if (config.corsOrigins.includes(origin)) {
        return callback(null, true);
      }

      // Reject other origins
      callback(new Error('Not allowed by CORS'));
    },
  }));

  // Parse JSON bodies
  app.use(express.json({ limit: '5mb' }));

  const shared = {
    cache,
    workbookPath: config.workbookPath,
    detection: config.detection,
  };

  // Mount routes
  app.use('/api/workbook', createWorkbookRouter(shared));
  app.use('/api/dashboard', createDashboardRouter({ ...shared, dashboard }));

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      name: 'PlantDesk Workbook API',
      version: '1.0.0',
      workbook: config.workbookPath,
      endpoints: {
        // Workbook
        'GET /api/workbook': 'Sheets with detected title/header rows',
        'GET /api/workbook/sheets/:sheet/raw': 'Raw grid of a sheet',
        'GET /api/workbook/sheets/:sheet/structure': 'Detected structure of a sheet',
        'GET /api/workbook/sheets/:sheet/table': 'Normalized table, metrics and chart (?headerRow=)',
        'GET /api/workbook/sheets/:sheet/tables': 'Title-delimited sub-tables',
        'GET /api/workbook/sheets/:sheet/export.csv': 'CSV export (?headerRow= or ?raw=1)',
        'POST /api/workbook/sheets/:sheet/edits': 'Apply edits to a copy of a table',
        'POST /api/workbook/analyze': 'Upload Excel/CSV for structure analysis',
        // Dashboard
        'GET /api/dashboard/overview': 'Summary cards',
        'GET /api/dashboard/views': 'Configured views',
        'GET /api/dashboard/views/:id': 'One configured view',
      },
    });
  });

  app.use('/api', notFound);

  // Error handling middleware
  app.use(errorHandler);

  return app;
}
