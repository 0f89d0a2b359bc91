/**
 * Dashboard Routes
 *
 * Configured views of the management workbook: summary cards, the plant
 * table, summary boards and the title-split operational/financial sheets.
 */

import { Router } from 'express';
import type { DetectionOptions } from '../types.js';
import { buildOverview, buildView, findView } from '../lib/dashboard.js';
import type { DashboardConfig } from '../lib/dashboardConfig.js';
import type { WorkbookCache } from '../lib/workbookCache.js';
import { requireWorkbook, workbookOf } from '../middleware/workbook.js';

export interface DashboardRouterOptions {
  cache: WorkbookCache;
  workbookPath: string;
  detection: DetectionOptions;
  dashboard: DashboardConfig;
}

export function createDashboardRouter(options: DashboardRouterOptions): Router {
  const { cache, workbookPath, detection, dashboard } = options;
  const router = Router();
  const withWorkbook = requireWorkbook(cache, workbookPath);

  /**
   * GET /api/dashboard/views
   *
   * Navigation entries, in configured order
   */
  router.get('/views', (_req, res) => {
    res.json({
      views: dashboard.views.map(view => ({
        id: view.id,
        title: view.title,
        sheet: view.sheet,
        layout: view.layout,
      })),
    });
  });

  /**
   * GET /api/dashboard/overview
   *
   * Summary cards. Missing sheets blank their cards and add a notice.
   */
  router.get('/overview', withWorkbook, (req, res) => {
    res.json(buildOverview(workbookOf(req), dashboard));
  });

  /**
   * GET /api/dashboard/views/:id
   *
   * One view. A missing sheet fails only this view (404).
   */
  router.get('/views/:id', withWorkbook, (req, res) => {
    const view = findView(dashboard, req.params.id);
    if (!view) {
      res.status(404).json({ error: 'View not found', details: `No view with id "${req.params.id}"` });
      return;
    }

    console.log(`[Dashboard] Building view "${view.id}"`);
    res.json(buildView(workbookOf(req), view, detection));
  });

  return router;
}
