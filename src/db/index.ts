/**
 * Database - SQLite (sql.js WASM) catalog storage
 *
 * In-memory WASM database that saves to its file on every mutation
 * (temp file + rename). Tests use createMemoryDatabase().
 */

import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js';
import { dirname } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync } from 'fs';
import { createLogger } from '../utils/logger';
import { SCHEMA_SQL, SEED_SQL } from './schema';

const logger = createLogger('db');

export type { SqlValue };

/** A result row keyed by column name */
export type SqlRow = Record<string, SqlValue>;

export interface Database {
  close(): void;
  save(): void;

  run(sql: string, params?: SqlValue[]): void;
  query(sql: string, params?: SqlValue[]): SqlRow[];
  get(sql: string, params?: SqlValue[]): SqlRow | undefined;

  /** Rowid of the last INSERT on this connection */
  lastInsertId(): number;
}

// ---------------------------------------------------------------------------
// Row readers
// ---------------------------------------------------------------------------

export function readString(row: SqlRow, column: string): string {
  const value = row[column];
  if (value === null || value === undefined) return '';
  return typeof value === 'string' ? value : String(value);
}

export function readNumber(row: SqlRow, column: string): number {
  const value = row[column];
  return typeof value === 'number' ? value : Number(value ?? 0);
}

export function readOptionalNumber(row: SqlRow, column: string): number | undefined {
  const value = row[column];
  if (value === null || value === undefined) return undefined;
  return typeof value === 'number' ? value : Number(value);
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

function wrap(db: SqlJsDatabase, persist: () => void): Database {
  // export() reopens the connection, so capture the rowid before persisting
  let lastId = 0;

  const instance: Database = {
    close() {
      persist();
      db.close();
    },

    save() {
      persist();
    },

    run(sql: string, params: SqlValue[] = []): void {
      db.run(sql, params);
      const [result] = db.exec('SELECT last_insert_rowid() AS id');
      const id = result?.values[0]?.[0];
      lastId = typeof id === 'number' ? id : 0;
      persist();
    },

    query(sql: string, params: SqlValue[] = []): SqlRow[] {
      const stmt = db.prepare(sql);
      try {
        stmt.bind(params);
        const results: SqlRow[] = [];
        while (stmt.step()) {
          results.push(stmt.getAsObject());
        }
        return results;
      } finally {
        stmt.free();
      }
    },

    get(sql: string, params: SqlValue[] = []): SqlRow | undefined {
      return instance.query(sql, params)[0];
    },

    lastInsertId(): number {
      return lastId;
    },
  };
  return instance;
}

function initSchema(db: SqlJsDatabase): void {
  db.run('PRAGMA foreign_keys = ON');
  db.exec(SCHEMA_SQL);
  db.exec(SEED_SQL);
}

/**
 * Open (or create) the catalog database stored at `filePath`.
 */
export async function createDatabase(filePath: string): Promise<Database> {
  const SQL = await initSqlJs();

  let db: SqlJsDatabase;
  if (existsSync(filePath)) {
    logger.info({ path: filePath }, 'Loading catalog database');
    db = new SQL.Database(readFileSync(filePath));
  } else {
    logger.info({ path: filePath }, 'Creating catalog database');
    mkdirSync(dirname(filePath), { recursive: true });
    db = new SQL.Database();
  }
  initSchema(db);

  const persist = (): void => {
    const tmpPath = filePath + '.tmp';
    writeFileSync(tmpPath, Buffer.from(db.export()));
    renameSync(tmpPath, filePath);
  };
  persist();

  return wrap(db, persist);
}

/**
 * In-memory catalog database with the schema and seed data applied.
 */
export async function createMemoryDatabase(): Promise<Database> {
  const SQL = await initSqlJs();
  const db = new SQL.Database();
  initSchema(db);
  return wrap(db, () => {});
}
