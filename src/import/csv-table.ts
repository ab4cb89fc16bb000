/**
 * CSV Table - Read the import file into a header-indexed grid
 *
 * Handles:
 * - Comma delimiter, double-quote enclosure with "" escapes
 * - Quoted fields spanning several lines
 * - UTF-8 BOM stripping
 * - Windows (\r\n) and Unix (\n) line endings
 * - Shape validation (header present, data rows, consistent column counts)
 */

import { accessSync, constants, existsSync, readFileSync, realpathSync, statSync } from 'fs';
import { join } from 'path';
import { createLogger } from '../utils/logger';
import { CsvFileError, CsvShapeError, errorMessage } from '../utils/errors';

const logger = createLogger('csv-table');

export interface CsvTable {
  /** Parsed records; the first one is the header */
  records: string[][];
}

/** Lower-cased, trimmed column name -> column index (first occurrence wins) */
export type HeaderMap = ReadonlyMap<string, number>;

export interface DataRow {
  /** 1-based record number in the file (the header is line 1) */
  line: number;
  cells: string[];
}

// ---------------------------------------------------------------------------
// Lexer
// ---------------------------------------------------------------------------

const DELIMITER = ',';
const ENCLOSURE = '"';

/**
 * Split CSV text into records of raw (untrimmed) fields.
 * Throws CsvShapeError on an unterminated quoted field.
 */
export function parseCsv(text: string): string[][] {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let quoteLine = 0;
  let line = 1;
  let i = 0;

  const endRecord = (): void => {
    fields.push(current);
    records.push(fields);
    fields = [];
    current = '';
  };

  while (i < input.length) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === ENCLOSURE) {
        // Escaped quote ""
        if (input[i + 1] === ENCLOSURE) {
          current += ENCLOSURE;
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      if (ch === '\n') line++;
      current += ch;
      i++;
      continue;
    }

    if (ch === ENCLOSURE && current.length === 0) {
      inQuotes = true;
      quoteLine = line;
      i++;
      continue;
    }
    if (ch === DELIMITER) {
      fields.push(current);
      current = '';
      i++;
      continue;
    }
    if (ch === '\r' && input[i + 1] === '\n') {
      i++;
      continue;
    }
    if (ch === '\n') {
      endRecord();
      line++;
      i++;
      continue;
    }
    current += ch;
    i++;
  }

  if (inQuotes) {
    throw new CsvShapeError(`Unterminated quoted field starting on line ${quoteLine}`, quoteLine);
  }
  // No trailing empty record for a final newline
  if (current.length > 0 || fields.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Read and tokenize a CSV file.
 */
export function readCsvFile(path: string): CsvTable {
  try {
    const records = parseCsv(readFileSync(path, 'utf-8'));
    logger.debug({ path, records: records.length }, 'Read CSV file');
    return { records };
  } catch (err) {
    throw new CsvFileError(path, `An error occurred while reading the CSV file '${path}': ${errorMessage(err)}`);
  }
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/**
 * Resolve a CSV argument under the var directory. Leading separators are
 * stripped so absolute-looking arguments stay inside varDir.
 */
export function resolveCsvPath(varDir: string, csvArg: string): string {
  const candidate = join(varDir.replace(/[\\/]+$/, ''), csvArg.replace(/^[\\/]+/, ''));
  return existsSync(candidate) ? realpathSync(candidate) : candidate;
}

export function assertReadableFile(path: string): void {
  try {
    if (!statSync(path).isFile()) {
      throw new Error('not a file');
    }
    accessSync(path, constants.R_OK);
  } catch {
    throw new CsvFileError(path, `The CSV file '${path}' does not exist or is not readable`);
  }
}

// ---------------------------------------------------------------------------
// Shape
// ---------------------------------------------------------------------------

export function isBlankRow(cells: readonly string[]): boolean {
  return cells.every((cell) => cell.trim() === '');
}

/**
 * Validate the grid: non-empty, non-blank header, at least one data record,
 * and every non-blank record as wide as the header.
 */
export function validateCsvTable(table: CsvTable): void {
  const [header, ...rows] = table.records;
  if (!header) {
    throw new CsvShapeError('The CSV file is empty');
  }
  if (isBlankRow(header)) {
    throw new CsvShapeError('The CSV file header is empty or contains only whitespace', 1);
  }
  if (rows.length === 0) {
    throw new CsvShapeError('The CSV file contains only the header row');
  }
  rows.forEach((row, index) => {
    if (isBlankRow(row) || row.length === header.length) return;
    const line = index + 2;
    throw new CsvShapeError(
      `The CSV file has a row on line ${line} with ${row.length} columns, but the header has ${header.length} columns`,
      line,
    );
  });
}

// ---------------------------------------------------------------------------
// Access
// ---------------------------------------------------------------------------

export function buildHeaderMap(header: readonly string[]): HeaderMap {
  const map = new Map<string, number>();
  header.forEach((name, index) => {
    const key = name.trim().toLowerCase();
    if (key !== '' && !map.has(key)) {
      map.set(key, index);
    }
  });
  return map;
}

/** Trimmed cell for a column, or '' when the column or the cell is missing */
export function readCell(cells: readonly string[], headerMap: HeaderMap, name: string): string {
  const index = headerMap.get(name);
  if (index === undefined) return '';
  return (cells[index] ?? '').trim();
}

/** Split a ;-separated cell into its non-empty trimmed values */
export function parseList(cell: string): string[] {
  return cell
    .split(';')
    .map((value) => value.trim())
    .filter((value) => value !== '');
}

/** Data records in file order, skipping entirely blank ones */
export function* dataRows(table: CsvTable): Generator<DataRow> {
  for (let index = 1; index < table.records.length; index++) {
    const cells = table.records[index];
    if (isBlankRow(cells)) continue;
    yield { line: index + 1, cells };
  }
}

export function headerOf(table: CsvTable): string[] {
  return table.records[0] ?? [];
}
