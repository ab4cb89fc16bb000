/**
 * Error types shared by the catalog repository, the CSV reader and the importer.
 */

export type CatalogErrorCode = 'NO_SUCH_ENTITY' | 'INVALID_INPUT' | 'STATE_CONFLICT';

/**
 * Raised by the persistence layer. Always caught at the row or step boundary.
 */
export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string) {
    super(message);
    this.name = 'CatalogError';
    this.code = code;
  }
}

/**
 * The CSV file is missing, unreadable or cannot be tokenized.
 */
export class CsvFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = 'CsvFileError';
    this.path = path;
  }
}

/**
 * The CSV grid does not have the expected shape (header, column counts).
 */
export class CsvShapeError extends Error {
  /** 1-based file line of the offending row (the header is line 1) */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(message);
    this.name = 'CsvShapeError';
    this.line = line;
  }
}

/**
 * Invalid options, missing required columns or bad configuration.
 * Fatal to the whole run, raised before any row is processed.
 */
export class ImportValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImportValidationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
