/**
 * Error handling middleware
 *
 * Maps the workbook error taxonomy to HTTP statuses. Anything else is a 500.
 */

import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import type { ErrorResponse } from '../types.js';
import { WorkbookError } from '../lib/errors.js';

export function errorHandler(err: unknown, _req: Request, res: Response<ErrorResponse>, _next: NextFunction): void {
  if (err instanceof WorkbookError) {
    console.warn(`[Server] ${err.name}: ${err.message}`);
    res.status(err.status).json({ error: err.name, details: err.message });
    return;
  }

  if (err instanceof multer.MulterError) {
    console.warn(`[Server] Upload rejected: ${err.message}`);
    res.status(400).json({ error: 'UploadError', details: err.message });
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  console.error('[Server] Error:', message);
  res.status(500).json({
    error: 'Internal server error',
    details: message,
  });
}

/**
 * 404 for unknown API paths
 */
export function notFound(req: Request, res: Response<ErrorResponse>): void {
  res.status(404).json({ error: 'Not found', details: `${req.method} ${req.path}` });
}
