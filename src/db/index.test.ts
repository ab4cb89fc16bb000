import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createDatabase, createMemoryDatabase, readNumber, readOptionalNumber, readString } from './index';

describe('createMemoryDatabase', () => {
  it('applies the schema and seed data', async () => {
    const db = await createMemoryDatabase();

    expect(db.query('SELECT code FROM stores ORDER BY store_id').map((r) => r.code)).toEqual(['admin', 'default']);
    expect(db.get('SELECT attribute_set_name FROM attribute_sets WHERE attribute_set_id = 1')).toEqual({
      attribute_set_name: 'Default',
    });
    expect(db.query('SELECT attribute_group_name FROM attribute_groups ORDER BY sort_order')).toEqual([
      { attribute_group_name: 'General' },
      { attribute_group_name: 'Prices' },
    ]);
  });

  it('reports the rowid of the last insert', async () => {
    const db = await createMemoryDatabase();
    db.run("INSERT INTO attributes (attribute_code) VALUES ('a')");
    db.run("INSERT INTO attributes (attribute_code) VALUES ('b')");
    expect(db.lastInsertId()).toBe(2);
  });

  it('returns undefined from get() when nothing matches', async () => {
    const db = await createMemoryDatabase();
    expect(db.get('SELECT * FROM attributes WHERE attribute_code = ?', ['nope'])).toBeUndefined();
  });
});

describe('createDatabase', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('persists writes and reloads them', async () => {
    dir = mkdtempSync(join(tmpdir(), 'catalog-db-'));
    const path = join(dir, 'nested', 'catalog.db');

    const first = await createDatabase(path);
    first.run("INSERT INTO attributes (attribute_code, frontend_input) VALUES ('color', 'select')");
    expect(first.lastInsertId()).toBe(1);
    first.close();
    expect(existsSync(path)).toBe(true);

    const second = await createDatabase(path);
    const row = second.get("SELECT * FROM attributes WHERE attribute_code = 'color'");
    expect(row && readString(row, 'frontend_input')).toBe('select');
    second.close();
  });
});

describe('row readers', () => {
  it('coerces column values', () => {
    const row = { a: 'x', b: 3, c: null, d: '12' };
    expect(readString(row, 'b')).toBe('3');
    expect(readString(row, 'c')).toBe('');
    expect(readNumber(row, 'd')).toBe(12);
    expect(readNumber(row, 'c')).toBe(0);
    expect(readOptionalNumber(row, 'c')).toBeUndefined();
    expect(readOptionalNumber(row, 'b')).toBe(3);
  });
});
