/**
 * Catalog attribute import - library entry point
 */

export * from './import/index';
export { createCatalogRepository } from './catalog/repository';
export type { CatalogRepository } from './catalog/repository';
export * from './catalog/types';
export { createDatabase, createMemoryDatabase } from './db/index';
export type { Database } from './db/index';
export { loadConfig } from './utils/config';
export type { ImportConfig } from './utils/config';
export { CatalogError, CsvFileError, CsvShapeError, ImportValidationError } from './utils/errors';
