/**
 * Workbook Middleware
 *
 * Loads the configured workbook through the process-wide cache and attaches
 * its grids to the request. Loader errors (missing file, unparsable content)
 * go to the error handler and abort the request.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { WorkbookGrids } from '../types.js';
import type { WorkbookCache } from '../lib/workbookCache.js';

// Extend Express Request to include the loaded workbook
declare global {
  namespace Express {
    interface Request {
      workbook?: {
        path: string;
        grids: WorkbookGrids;
      };
    }
  }
}

/**
 * Require the workbook - fail the request if it cannot be loaded
 */
export function requireWorkbook(cache: WorkbookCache, workbookPath: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.workbook = {
        path: workbookPath,
        grids: cache.get(workbookPath),
      };
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Grids attached by requireWorkbook
 */
export function workbookOf(req: Request): WorkbookGrids {
  if (!req.workbook) {
    throw new Error('requireWorkbook middleware is not mounted on this route');
  }
  return req.workbook.grids;
}
