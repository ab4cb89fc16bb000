/**
 * Run report - user-facing import messages, per-row context and run totals.
 */

import { createLogger } from '../utils/logger';
import type { CatalogRepository } from '../catalog/repository';
import { classifyHeader, type ClassifiedColumn } from './columns';
import { readCell, type HeaderMap } from './csv-table';
import type { StoreResolver } from './store-resolver';

const logger = createLogger('import');

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

/** `line` is unstyled progress, `comment` a warning */
export type MessageLevel = 'line' | 'info' | 'comment' | 'error';

export interface ImportMessage {
  level: MessageLevel;
  text: string;
}

export interface ImportOutput {
  readonly verbose: boolean;
  line(text: string): void;
  info(text: string): void;
  comment(text: string): void;
  error(text: string): void;
  /** Comment emitted only in verbose mode */
  detail(text: string): void;
}

export interface BufferedImportOutput extends ImportOutput {
  readonly messages: ImportMessage[];
}

export interface ImportOutputOptions {
  verbose?: boolean;
  /** Called for every emitted message, e.g. to print it */
  sink?: (message: ImportMessage) => void;
}

export function createImportOutput(options: ImportOutputOptions = {}): BufferedImportOutput {
  const verbose = options.verbose ?? false;
  const messages: ImportMessage[] = [];

  const emit = (level: MessageLevel, text: string): void => {
    const message = { level, text };
    messages.push(message);
    logger.debug({ level }, text);
    options.sink?.(message);
  };

  return {
    verbose,
    messages,
    line: (text) => emit('line', text),
    info: (text) => emit('info', text),
    comment: (text) => emit('comment', text),
    error: (text) => emit('error', text),
    detail: (text) => {
      if (verbose) emit('comment', text);
    },
  };
}

// ---------------------------------------------------------------------------
// Counters
// ---------------------------------------------------------------------------

export interface ImportCounters {
  added: number;
  updated: number;
  deleted: number;
  skipped: number;
  errors: number;
}

export interface ImportSummary extends ImportCounters {
  status: 'success' | 'failure';
}

export function emptyCounters(): ImportCounters {
  return { added: 0, updated: 0, deleted: 0, skipped: 0, errors: 0 };
}

export function mergeCounters(total: ImportCounters, row: ImportCounters): ImportCounters {
  return {
    added: total.added + row.added,
    updated: total.updated + row.updated,
    deleted: total.deleted + row.deleted,
    skipped: total.skipped + row.skipped,
    errors: total.errors + row.errors,
  };
}

export function summarize(counters: ImportCounters): ImportSummary {
  return { status: counters.errors > 0 ? 'failure' : 'success', ...counters };
}

// ---------------------------------------------------------------------------
// Row context
// ---------------------------------------------------------------------------

/** Header data shared by every row of a run */
export interface TableLayout {
  headerMap: HeaderMap;
  columns: ClassifiedColumn[];
}

export function createTableLayout(headerMap: HeaderMap): TableLayout {
  return { headerMap, columns: classifyHeader(headerMap) };
}

/**
 * Everything one row's pipeline reads and writes. Counters are row-local and
 * merged into the run totals when the row finishes.
 */
export interface RowContext {
  readonly line: number;
  readonly cells: readonly string[];
  readonly layout: TableLayout;
  readonly output: ImportOutput;
  readonly repository: CatalogRepository;
  readonly stores: StoreResolver;
  readonly counters: ImportCounters;
  /** Trimmed cell by column name, '' when absent */
  cell(name: string): string;
  /** Report an error and count it */
  fail(text: string): void;
  /** Count an error already reported (or reported only in verbose mode) */
  countError(): void;
}

export interface RowContextInit {
  line: number;
  cells: readonly string[];
  layout: TableLayout;
  output: ImportOutput;
  repository: CatalogRepository;
  stores: StoreResolver;
}

export function createRowContext(init: RowContextInit): RowContext {
  const counters = emptyCounters();
  return {
    ...init,
    counters,
    cell: (name) => readCell(init.cells, init.layout.headerMap, name),
    fail: (text) => {
      init.output.error(text);
      counters.errors++;
    },
    countError: () => {
      counters.errors++;
    },
  };
}
