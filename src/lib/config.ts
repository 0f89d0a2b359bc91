/**
 * Runtime configuration
 *
 * Environment Variables:
 *   - PORT: Server port (default: 4000)
 *   - WORKBOOK_PATH: Workbook served by the API (default: Gestao_de_Usinas_e_UCs.xlsx)
 *   - DASHBOARD_CONFIG: Views and metric vocabulary (default: config/dashboard.json)
 *   - HEADER_MIN_CELLS / TITLE_EMPTY_SPAN / TITLE_MIN_LENGTH: detection thresholds
 *   - CORS_ORIGINS: extra allowed origins, comma separated
 */

import type { DetectionOptions } from '../types.js';
import { DEFAULT_DETECTION_OPTIONS } from './structureDetector.js';

export interface AppConfig {
  port: number;
  workbookPath: string;
  dashboardConfigPath: string;
  detection: DetectionOptions;
  corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.warn(`[Config] Ignoring ${name}="${raw}" (expected an integer >= ${min}), using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Build the configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readInt(env, 'PORT', 4000, 0),
    workbookPath: env.WORKBOOK_PATH || 'Gestao_de_Usinas_e_UCs.xlsx',
    dashboardConfigPath: env.DASHBOARD_CONFIG || 'config/dashboard.json',
    detection: {
      headerMinCells: readInt(env, 'HEADER_MIN_CELLS', DEFAULT_DETECTION_OPTIONS.headerMinCells, 1),
      titleEmptySpan: readInt(env, 'TITLE_EMPTY_SPAN', DEFAULT_DETECTION_OPTIONS.titleEmptySpan, 0),
      titleMinLength: readInt(env, 'TITLE_MIN_LENGTH', DEFAULT_DETECTION_OPTIONS.titleMinLength, 0),
    },
    corsOrigins: (env.CORS_ORIGINS || '')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin !== ''),
  };
}
