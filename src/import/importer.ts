/**
 * Importer - validate an import request and run it row by row.
 *
 * Rows are processed strictly in file order. Row failures are counted and
 * reported; they never stop the run, and nothing is rolled back.
 */

import type { CatalogRepository } from '../catalog/repository';
import { CsvShapeError, ImportValidationError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { createAttributeReconciler, type ImportBehavior } from './attribute-reconciler';
import { deleteAttributeSets } from './attribute-set-reconciler';
import { buildHeaderMap, dataRows, headerOf, validateCsvTable, type CsvTable } from './csv-table';
import {
  createImportOutput,
  createRowContext,
  createTableLayout,
  emptyCounters,
  mergeCounters,
  summarize,
  type ImportCounters,
  type ImportMessage,
  type ImportOutput,
  type ImportSummary,
} from './report';
import { createStoreResolver } from './store-resolver';

const logger = createLogger('importer');

export type ImportType = 'attribute' | 'attribute-set';

export const IMPORT_TYPES: readonly ImportType[] = ['attribute', 'attribute-set'];
export const IMPORT_BEHAVIORS: readonly ImportBehavior[] = ['add', 'update', 'delete'];

/** Column each import type cannot run without */
const REQUIRED_COLUMN: Record<ImportType, string> = {
  attribute: 'attribute_code',
  'attribute-set': 'attribute_set',
};

export interface ImportRequest {
  table: CsvTable;
  type: string;
  behavior: string;
  verbose?: boolean;
}

export interface ImportDeps {
  repository: CatalogRepository;
  /** Receives every report message as it is emitted */
  onMessage?: (message: ImportMessage) => void;
}

export interface ImportResult extends ImportSummary {
  messages: ImportMessage[];
}

function isImportType(value: string): value is ImportType {
  return IMPORT_TYPES.some((type) => type === value);
}

function isImportBehavior(value: string): value is ImportBehavior {
  return IMPORT_BEHAVIORS.some((behavior) => behavior === value);
}

export interface ValidatedRequest {
  type: ImportType;
  behavior: ImportBehavior;
}

/**
 * Check the table shape and the type/behavior combination.
 * Throws CsvShapeError or ImportValidationError.
 */
export function validateImportRequest(request: ImportRequest): ValidatedRequest {
  validateCsvTable(request.table);

  const { type, behavior } = request;
  if (!isImportType(type)) {
    throw new ImportValidationError(`Invalid --type '${type}'; must be one of: ${IMPORT_TYPES.join(', ')}`);
  }
  if (!isImportBehavior(behavior)) {
    throw new ImportValidationError(`Invalid --behavior '${behavior}'; must be one of: ${IMPORT_BEHAVIORS.join(', ')}`);
  }
  if (type === 'attribute-set' && behavior !== 'delete') {
    throw new ImportValidationError(`Invalid --behavior '${behavior}' for type '${type}'; must be 'delete'`);
  }

  const column = REQUIRED_COLUMN[type];
  if (!buildHeaderMap(headerOf(request.table)).has(column)) {
    throw new ImportValidationError(`The CSV file is missing the '${column}' column`);
  }
  return { type, behavior };
}

function importAttributes(
  table: CsvTable,
  behavior: ImportBehavior,
  output: ImportOutput,
  repository: CatalogRepository,
): ImportCounters {
  const layout = createTableLayout(buildHeaderMap(headerOf(table)));
  const stores = createStoreResolver(repository);
  const reconciler = createAttributeReconciler({ behavior });
  let totals = emptyCounters();

  for (const { line, cells } of dataRows(table)) {
    const context = createRowContext({ line, cells, layout, output, repository, stores });
    try {
      reconciler.processRow(context);
    } catch (err) {
      context.fail(`An error occurred while processing line ${line}: ${errorMessage(err)}`);
    }
    totals = mergeCounters(totals, context.counters);
  }

  if (behavior === 'delete') {
    output.info(`Deleted ${totals.deleted} attribute(s)`);
  } else if (behavior === 'update') {
    output.info(`Added ${totals.added} attribute(s), updated ${totals.updated} attribute(s)`);
  } else {
    output.info(`Added ${totals.added} attribute(s)`);
  }
  return totals;
}

/**
 * Run an attribute or attribute-set import against the catalog.
 */
export function runImport(request: ImportRequest, deps: ImportDeps): ImportResult {
  const output = createImportOutput({ verbose: request.verbose, sink: deps.onMessage });

  let validated: ValidatedRequest;
  try {
    validated = validateImportRequest(request);
  } catch (err) {
    if (!(err instanceof CsvShapeError || err instanceof ImportValidationError)) throw err;
    output.error(err.message);
    logger.warn({ type: request.type, behavior: request.behavior, error: err.message }, 'Import rejected');
    return { ...emptyCounters(), status: 'failure', messages: output.messages };
  }

  const { type, behavior } = validated;
  logger.info({ type, behavior, records: request.table.records.length - 1 }, 'Starting import');

  let totals: ImportCounters;
  if (type === 'attribute-set') {
    totals = deleteAttributeSets(request.table, buildHeaderMap(headerOf(request.table)), output, deps.repository);
    output.info(`Deleted ${totals.deleted} attribute set(s)`);
  } else {
    totals = importAttributes(request.table, behavior, output, deps.repository);
  }

  if (totals.errors > 0) {
    output.error(`${totals.errors} error(s) occurred during import`);
  }
  const summary = summarize(totals);
  logger.info({ ...summary }, 'Import finished');
  return { ...summary, messages: output.messages };
}
