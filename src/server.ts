/**
 * PlantDesk Backend Server
 *
 * Express server exposing the workbook engine to the dashboard front end:
 * raw sheets, detected structure, normalized tables, metrics and charts.
 *
 * Environment Variables: see src/lib/config.ts and .env.example
 *
 * Usage:
 *   1. Copy .env.example to .env and point WORKBOOK_PATH at the workbook
 *   2. Run: npm run dev
 *   3. Test: curl http://localhost:4000/api/dashboard/overview
 */

import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { loadDashboardConfig } from './lib/dashboardConfig.js';

// Configuration
const config = loadConfig();
const dashboard = loadDashboardConfig(config.dashboardConfigPath);

const app = createApp({ config, dashboard });

// Start server
app.listen(config.port, () => {
  console.log('');
  console.log('╔════════════════════════════════════════╗');
  console.log('║   PlantDesk Workbook API v1.0          ║');
  console.log('╠════════════════════════════════════════╣');
  console.log(`║  🚀 Running on http://localhost:${config.port}    ║`);
  console.log('╚════════════════════════════════════════╝');
  console.log('');

  // Config status
  console.log('Configuration:');
  console.log(`  Workbook:  ${config.workbookPath}`);
  console.log(`  Dashboard: ${config.dashboardConfigPath} (${dashboard.views.length} views)`);
  console.log(
    `  Detection: header >= ${config.detection.headerMinCells} cells, ` +
    `title span ${config.detection.titleEmptySpan}, title length > ${config.detection.titleMinLength}`
  );
  console.log('');

  console.log('Endpoints:');
  console.log('  Workbook:');
  console.log('    GET  /api/workbook                        - Sheets');
  console.log('    GET  /api/workbook/sheets/:sheet/table    - Normalized table');
  console.log('    GET  /api/workbook/sheets/:sheet/tables   - Titled sub-tables');
  console.log('    POST /api/workbook/analyze                - Analyze an upload');
  console.log('  Dashboard:');
  console.log('    GET  /api/dashboard/overview              - Summary cards');
  console.log('    GET  /api/dashboard/views/:id             - One view');
  console.log('');
});
