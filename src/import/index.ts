/**
 * Attribute import - public surface of the CSV importer.
 */

export { runImport, validateImportRequest, IMPORT_TYPES, IMPORT_BEHAVIORS } from './importer';
export type { ImportType, ImportRequest, ImportDeps, ImportResult, ValidatedRequest } from './importer';
export type { ImportBehavior, AttributeReconciler } from './attribute-reconciler';
export { createAttributeReconciler, buildAttributeData } from './attribute-reconciler';
export { assignToAttributeSets, deleteAttributeSets, collectAttributeSetNames } from './attribute-set-reconciler';
export {
  readCsvFile,
  parseCsv,
  validateCsvTable,
  buildHeaderMap,
  readCell,
  parseList,
  dataRows,
  resolveCsvPath,
  assertReadableFile,
} from './csv-table';
export type { CsvTable, HeaderMap, DataRow } from './csv-table';
export { classifyColumn, classifyHeader, RESERVED_COLUMNS } from './columns';
export type { ColumnKind, ClassifiedColumn } from './columns';
export { normalizeLabel, dedupeLabels, findDuplicateLabels } from './label-normalizer';
export { createStoreResolver } from './store-resolver';
export type { StoreResolver } from './store-resolver';
export {
  reconcileOptions,
  planOptions,
  buildOptionEntries,
  buildOptionOrders,
  supportsOptions,
} from './option-reconciler';
export type { OptionEntry, OptionPlan, OptionRequest, OptionStrategy } from './option-reconciler';
export { resolveDefaultValue, applyDefaultValue } from './default-resolver';
export { collectScopedLabels, mergeStoreLabels, applyScopedLabels } from './label-assigner';
export { createImportOutput, createRowContext, createTableLayout } from './report';
export type {
  ImportOutput,
  ImportMessage,
  MessageLevel,
  ImportSummary,
  ImportCounters,
  RowContext,
  TableLayout,
} from './report';
