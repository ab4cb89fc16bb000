import { beforeEach, describe, it, expect, vi } from 'vitest';
import { createMemoryDatabase } from '../db';
import { createCatalogRepository, type CatalogRepository } from '../catalog/repository';
import { CsvShapeError, ImportValidationError } from '../utils/errors';
import { runImport, validateImportRequest } from './importer';
import type { ImportMessage } from './report';
import { tableFrom } from './test-utils';

let repository: CatalogRepository;

beforeEach(async () => {
  repository = createCatalogRepository(await createMemoryDatabase());
});

function run(csv: string, type: string, behavior: string, verbose = false) {
  return runImport({ table: tableFrom(csv), type, behavior, verbose }, { repository });
}

function optionLabels(code: string): string[] {
  return repository.getOptions(code).map((option) => option.label);
}

describe('validateImportRequest', () => {
  it('accepts a valid attribute import', () => {
    expect(validateImportRequest({ table: tableFrom('attribute_code\ncolor\n'), type: 'attribute', behavior: 'add' })).toEqual({
      type: 'attribute',
      behavior: 'add',
    });
  });

  it('rejects a malformed table before looking at options', () => {
    expect(() => validateImportRequest({ table: tableFrom('attribute_code\n'), type: 'product', behavior: 'add' })).toThrow(
      CsvShapeError,
    );
  });

  it('rejects update for attribute sets', () => {
    expect(() =>
      validateImportRequest({ table: tableFrom('attribute_set\nShoes\n'), type: 'attribute-set', behavior: 'update' }),
    ).toThrow(ImportValidationError);
  });
});

describe('runImport', () => {
  it('adds an attribute with options and a default option', () => {
    const result = run('attribute_code,input,label,option,default\ncolor,select,Color,Red;Green;Blue,Green\n', 'attribute', 'add');

    expect(result).toEqual({
      status: 'success',
      added: 1,
      updated: 0,
      deleted: 0,
      skipped: 0,
      errors: 0,
      messages: [
        { level: 'line', text: "Adding attribute 'color'..." },
        { level: 'info', text: 'Added 1 attribute(s)' },
      ],
    });
    expect(optionLabels('color')).toEqual(['Red', 'Green', 'Blue']);
    expect(repository.getAttribute('color')?.defaultValue).toBe('2');
  });

  it('merges new options into an existing attribute on update', () => {
    run('attribute_code,input,label,option\ncolor,select,Color,Red;Green;Blue\n', 'attribute', 'add');

    const result = run('attribute_code,option\ncolor,green;Yellow\n', 'attribute', 'update');

    expect(result.updated).toBe(1);
    expect(result.messages.at(-1)).toEqual({ level: 'info', text: 'Added 0 attribute(s), updated 1 attribute(s)' });
    expect(optionLabels('color')).toEqual(['Red', 'Green', 'Blue', 'Yellow']);
    expect(repository.getAttribute('color')?.frontendInput).toBe('select');
  });

  it('replaces options when asked to', () => {
    run('attribute_code,input,option\nmaterial,select,Wool;Silk\n', 'attribute', 'add');

    run('attribute_code,option,option_strategy\nmaterial,Cotton;Linen,replace\n', 'attribute', 'update');

    expect(optionLabels('material')).toEqual(['Cotton', 'Linen']);
  });

  it('stores options in the given order', () => {
    run('attribute_code,input,option,option_order\nsize,select,Red;Green;Blue,20;10;30\n', 'attribute', 'add');

    expect(repository.getOptions('size').map((option) => [option.label, option.sortOrder])).toEqual([
      ['Green', 10],
      ['Red', 20],
      ['Blue', 30],
    ]);
  });

  it('deletes attributes', () => {
    run('attribute_code\ncolor\n', 'attribute', 'add');

    const result = run('attribute_code\ncolor\nsize\n', 'attribute', 'delete');

    expect(result).toMatchObject({ status: 'success', deleted: 1, skipped: 1 });
    expect(result.messages.at(-1)).toEqual({ level: 'info', text: 'Deleted 1 attribute(s)' });
  });

  it('deletes attribute sets', () => {
    repository.createAttributeSet('Shoes', 1);

    const result = run('attribute_set\nShoes\nMissing\n', 'attribute-set', 'delete');

    expect(result).toMatchObject({ status: 'success', deleted: 1, skipped: 1, errors: 0 });
    expect(result.messages.at(-1)).toEqual({ level: 'info', text: 'Deleted 1 attribute set(s)' });
    expect(repository.listAttributeSets().map((set) => set.name)).toEqual(['Default']);
  });

  it('deletes attribute sets listed in one cell', () => {
    repository.createAttributeSet('Legacy Set', 1);
    repository.createAttributeSet('Obsolete Set', 1);

    const result = run('attribute_set\nLegacy Set;Obsolete Set\n', 'attribute-set', 'delete');

    expect(result).toMatchObject({ status: 'success', deleted: 2, skipped: 0, errors: 0 });
    expect(result.messages).toEqual([
      { level: 'line', text: "Deleting attribute set 'Legacy Set'..." },
      { level: 'line', text: "Deleting attribute set 'Obsolete Set'..." },
      { level: 'info', text: 'Deleted 2 attribute set(s)' },
    ]);
    expect(repository.listAttributeSets().map((set) => set.name)).toEqual(['Default']);
  });

  it('keeps going after a failed row and reports failure', () => {
    const result = run('attribute_code,label\nbad-code,Bad\n,\nsize,Size\n', 'attribute', 'add');

    expect(result).toMatchObject({ status: 'failure', added: 1, errors: 1 });
    expect(result.messages.map((message) => message.level)).toEqual(['line', 'error', 'line', 'info', 'error']);
    expect(result.messages.at(-1)).toEqual({ level: 'error', text: '1 error(s) occurred during import' });
    expect(repository.getAttribute('size')?.frontendLabel).toBe('Size');
  });

  it('still places the attribute in sets after a store label failure', () => {
    vi.spyOn(repository, 'getStoreIdByCode').mockImplementation(() => {
      throw new Error('store lookup failed');
    });

    const result = run('attribute_code,label_fr\nsize,Taille\n', 'attribute', 'add');

    expect(result).toMatchObject({ status: 'failure', added: 1, errors: 1 });
    expect(result.messages).toContainEqual({
      level: 'error',
      text: 'An error occurred while applying scoped frontend labels: store lookup failed',
    });
    expect(repository.getAttributeSetAssignments('size')).toEqual([{ attributeSetId: 1, attributeGroupId: 1 }]);
  });

  it('turns an unexpected row failure into a counted error', () => {
    vi.spyOn(repository, 'getStoreIdByCode').mockImplementation(() => {
      throw new Error('store lookup failed');
    });

    const result = run('attribute_code,input,option,option_fr\nsize,select,S,P\n', 'attribute', 'add');

    expect(result).toMatchObject({ status: 'failure', added: 0, errors: 1 });
    expect(result.messages).toContainEqual({
      level: 'error',
      text: 'An error occurred while processing line 2: store lookup failed',
    });
  });

  it.each([
    ['attribute_code\ncolor\n', 'product', 'add', "Invalid --type 'product'; must be one of: attribute, attribute-set"],
    ['attribute_code\ncolor\n', 'attribute', 'replace', "Invalid --behavior 'replace'; must be one of: add, update, delete"],
    ['attribute_set\nShoes\n', 'attribute-set', 'add', "Invalid --behavior 'add' for type 'attribute-set'; must be 'delete'"],
    ['code\ncolor\n', 'attribute', 'add', "The CSV file is missing the 'attribute_code' column"],
    ['', 'attribute', 'add', 'The CSV file is empty'],
    ['attribute_code\n', 'attribute', 'add', 'The CSV file contains only the header row'],
    [
      'attribute_code,label\ncolor\n',
      'attribute',
      'add',
      'The CSV file has a row on line 2 with 1 columns, but the header has 2 columns',
    ],
  ])('rejects %j as %s/%s', (csv, type, behavior, message) => {
    const result = run(csv, type, behavior);

    expect(result).toEqual({
      status: 'failure',
      added: 0,
      updated: 0,
      deleted: 0,
      skipped: 0,
      errors: 0,
      messages: [{ level: 'error', text: message }],
    });
  });

  it('streams messages to the listener', () => {
    const received: ImportMessage[] = [];

    runImport(
      { table: tableFrom('attribute_code\ncolor\n'), type: 'attribute', behavior: 'add' },
      { repository, onMessage: (message) => received.push(message) },
    );

    expect(received.map((message) => message.text)).toEqual(["Adding attribute 'color'...", 'Added 1 attribute(s)']);
  });
});
