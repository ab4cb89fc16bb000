/**
 * Helpers for building import tables and row contexts from CSV text in tests.
 */

import type { CatalogRepository } from '../catalog/repository';
import { buildHeaderMap, headerOf, parseCsv, type CsvTable } from './csv-table';
import {
  createImportOutput,
  createRowContext,
  createTableLayout,
  type BufferedImportOutput,
  type RowContext,
} from './report';
import { createStoreResolver } from './store-resolver';

export function tableFrom(csv: string): CsvTable {
  return { records: parseCsv(csv) };
}

export interface TestRow {
  context: RowContext;
  output: BufferedImportOutput;
}

/** Context for the first data record of `csv` (or record `index`) */
export function rowFrom(
  csv: string,
  repository: CatalogRepository,
  options: { verbose?: boolean; index?: number } = {},
): TestRow {
  const table = tableFrom(csv);
  const index = options.index ?? 1;
  const output = createImportOutput({ verbose: options.verbose });
  const context = createRowContext({
    line: index + 1,
    cells: table.records[index] ?? [],
    layout: createTableLayout(buildHeaderMap(headerOf(table))),
    output,
    repository,
    stores: createStoreResolver(repository),
  });
  return { context, output };
}

/** Message texts, optionally of one level */
export function textsOf(output: BufferedImportOutput, level?: string): string[] {
  return output.messages.filter((message) => !level || message.level === level).map((message) => message.text);
}
