/**
 * Workbook error taxonomy
 *
 * Loader errors abort the request. A missing sheet only fails the view that
 * asked for it. StructureUnresolvedError never reaches the client: callers
 * catch it and fall back to synthetic column labels.
 */

export class WorkbookError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * The workbook file does not exist
 */
export class SourceNotFoundError extends WorkbookError {
  readonly sourcePath: string;

  constructor(sourcePath: string) {
    super(`Workbook not found: ${sourcePath}`, 503);
    this.sourcePath = sourcePath;
  }
}

/**
 * The file exists but cannot be read as a grid (corrupt archive, bad encoding)
 */
export class SourceFormatError extends WorkbookError {
  readonly sourcePath: string;

  constructor(sourcePath: string, reason: string) {
    super(`Could not parse ${sourcePath}: ${reason}`, 422);
    this.sourcePath = sourcePath;
  }
}

/**
 * A view asked for a sheet the workbook does not have
 */
export class SheetNotFoundError extends WorkbookError {
  readonly sheetName: string;

  constructor(sheetName: string) {
    super(`Sheet "${sheetName}" not found in workbook`, 404);
    this.sheetName = sheetName;
  }
}

/**
 * No header row could be detected in a grid
 */
export class StructureUnresolvedError extends WorkbookError {
  constructor(message = 'No header row detected') {
    super(message, 422);
  }
}
