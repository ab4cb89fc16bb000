#!/usr/bin/env node
/**
 * attribute-import CLI
 *
 *   attribute-import <csv> [-t attribute|attribute-set] [-b add|update|delete] [-v]
 *
 * The CSV path is resolved under the configured var directory. Exit code is
 * 0 only when the import reports success.
 */

import { Command, Option } from 'commander';
import { createCatalogRepository } from '../catalog/repository';
import { createDatabase } from '../db/index';
import { runImport, IMPORT_BEHAVIORS, IMPORT_TYPES } from '../import/importer';
import { assertReadableFile, readCsvFile, resolveCsvPath } from '../import/csv-table';
import type { ImportMessage } from '../import/report';
import { loadConfig } from '../utils/config';
import { CsvFileError, ImportValidationError, errorMessage } from '../utils/errors';
import { logger, setLogLevel } from '../utils/logger';

interface CliOptions {
  type: string;
  behavior: string;
  verbose?: boolean;
  db?: string;
  varDir?: string;
  config?: string;
}

const STYLES: Record<ImportMessage['level'], (text: string) => string> = {
  line: (text) => text,
  info: (text) => `\x1b[32m${text}\x1b[0m`,
  comment: (text) => `\x1b[33m${text}\x1b[0m`,
  error: (text) => `\x1b[31m${text}\x1b[0m`,
};

function printMessage(message: ImportMessage): void {
  const text = process.stdout.isTTY ? STYLES[message.level](message.text) : message.text;
  if (message.level === 'error') {
    console.error(text);
  } else {
    console.log(text);
  }
}

async function importCommand(csvArg: string, options: CliOptions): Promise<number> {
  const config = loadConfig({ configPath: options.config });
  setLogLevel(config.logLevel);

  const varDir = options.varDir ?? config.varDir;
  const csvPath = resolveCsvPath(varDir, csvArg);
  assertReadableFile(csvPath);
  const table = readCsvFile(csvPath);

  const db = await createDatabase(options.db ?? config.database.path);
  try {
    const result = runImport(
      { table, type: options.type, behavior: options.behavior, verbose: options.verbose },
      { repository: createCatalogRepository(db), onMessage: printMessage },
    );
    return result.status === 'success' ? 0 : 1;
  } finally {
    db.close();
  }
}

const program = new Command();

program
  .name('attribute-import')
  .description('Import product attributes from a CSV file')
  .version('0.1.0')
  .argument('<csv>', 'Path to the CSV file relative to the var directory')
  .addOption(
    new Option('-t, --type <type>', 'Type of entity to import; attribute or attribute-set')
      .default('attribute')
      .choices([...IMPORT_TYPES]),
  )
  .addOption(
    new Option('-b, --behavior <behavior>', 'Import behavior; add, update, or delete')
      .default('add')
      .choices([...IMPORT_BEHAVIORS]),
  )
  .option('-v, --verbose', 'Report merges, fallbacks and skipped columns')
  .option('--db <path>', 'Catalog database file (overrides config)')
  .option('--var-dir <dir>', 'Directory CSV paths are resolved against (overrides config)')
  .option('-c, --config <path>', 'Config file path')
  .action(async (csvArg: string, options: CliOptions) => {
    try {
      process.exitCode = await importCommand(csvArg, options);
    } catch (err) {
      if (err instanceof CsvFileError || err instanceof ImportValidationError) {
        printMessage({ level: 'error', text: err.message });
      } else {
        logger.error({ error: err }, 'Import failed');
        printMessage({ level: 'error', text: `Import failed: ${errorMessage(err)}` });
      }
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error({ error: err }, 'Command failed');
  process.exitCode = 1;
});
