/**
 * Process-wide workbook cache
 *
 * Keyed by the resolved source path. Each entry remembers the file's
 * modification time; a different mtime on the next read reloads the file.
 * A file that disappeared is evicted and reported as SourceNotFoundError.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { WorkbookGrids } from '../types.js';
import { SourceNotFoundError } from './errors.js';
import { loadWorkbook } from './workbookLoader.js';

export type WorkbookLoadFn = (sourcePath: string) => WorkbookGrids;
export type ModifiedTimeFn = (sourcePath: string) => number | null;

interface CacheEntry {
  mtimeMs: number;
  grids: WorkbookGrids;
}

/**
 * Modification time of a file, or null when it does not exist
 */
export function fileModifiedTime(sourcePath: string): number | null {
  try {
    return fs.statSync(sourcePath).mtimeMs;
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return null;
    }
    throw e;
  }
}

export class WorkbookCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly load: WorkbookLoadFn;
  private readonly modifiedTime: ModifiedTimeFn;

  constructor(load: WorkbookLoadFn = loadWorkbook, modifiedTime: ModifiedTimeFn = fileModifiedTime) {
    this.load = load;
    this.modifiedTime = modifiedTime;
  }

  /**
   * Grids of the workbook at `sourcePath`, parsed at most once per mtime
   */
  get(sourcePath: string): WorkbookGrids {
    const key = path.resolve(sourcePath);
    const mtimeMs = this.modifiedTime(key);

    if (mtimeMs === null) {
      this.entries.delete(key);
      throw new SourceNotFoundError(sourcePath);
    }

    const cached = this.entries.get(key);
    if (cached && cached.mtimeMs === mtimeMs) {
      return cached.grids;
    }

    if (cached) {
      console.log(`[Workbook] ${sourcePath} changed on disk, reloading`);
    }

    const grids = this.load(key);
    this.entries.set(key, { mtimeMs, grids });
    return grids;
  }

  /**
   * Drop one entry, or all of them
   */
  invalidate(sourcePath?: string): void {
    if (sourcePath === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(path.resolve(sourcePath));
    }
  }

  has(sourcePath: string): boolean {
    return this.entries.has(path.resolve(sourcePath));
  }
}

export const workbookCache = new WorkbookCache();
