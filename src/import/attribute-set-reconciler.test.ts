import { beforeEach, describe, it, expect, vi } from 'vitest';
import { createMemoryDatabase } from '../db';
import { createCatalogRepository, type CatalogRepository } from '../catalog/repository';
import { buildHeaderMap, headerOf } from './csv-table';
import { createImportOutput } from './report';
import {
  assignToAttributeSets,
  collectAttributeSetNames,
  deleteAttributeSets,
  parseOptionalInt,
} from './attribute-set-reconciler';
import { rowFrom, tableFrom, textsOf } from './test-utils';

let repository: CatalogRepository;

beforeEach(async () => {
  repository = createCatalogRepository(await createMemoryDatabase());
  repository.saveAttribute('color', { input: 'select', label: 'Color' });
});

function assign(csv: string, verbose = true) {
  const { context, output } = rowFrom(csv, repository, { verbose });
  assignToAttributeSets(context, 'color');
  return output;
}

describe('parseOptionalInt', () => {
  it('accepts digits only', () => {
    expect(parseOptionalInt(' 12 ')).toBe(12);
    expect(parseOptionalInt('')).toBeUndefined();
    expect(parseOptionalInt('-1')).toBeUndefined();
    expect(parseOptionalInt('1.5')).toBeUndefined();
  });
});

describe('assignToAttributeSets', () => {
  it('uses the default set and group when no set is listed', () => {
    assign('attribute_code,attribute_set\ncolor,\n');

    expect(repository.getAttributeSetAssignments('color')).toEqual([{ attributeSetId: 1, attributeGroupId: 1 }]);
  });

  it('creates missing sets and groups and applies orders', () => {
    const output = assign(
      'attribute_code,attribute_set,attribute_set_order,group,sort_order\ncolor,Shoes;default,6;5,Details,12\n',
    );

    expect(repository.getAttributeSetAssignments('color')).toEqual([
      { attributeSetId: 1, attributeGroupId: 6, sortOrder: 12 },
      { attributeSetId: 2, attributeGroupId: 5, sortOrder: 12 },
    ]);
    expect(repository.listAttributeSets()).toEqual([
      { id: 1, name: 'Default', sortOrder: 5 },
      { id: 2, name: 'Shoes', sortOrder: 6 },
    ]);
    expect(repository.listAttributeGroups(2).map((group) => group.name)).toEqual(['General', 'Prices', 'Details']);
    expect(textsOf(output)).toEqual(["The attribute set 'Shoes' did not exist; created automatically"]);
  });

  it('skips unknown set ids', () => {
    const output = assign('attribute_code,attribute_set\ncolor,99\n');

    expect(repository.getAttributeSetAssignments('color')).toEqual([]);
    expect(textsOf(output)).toEqual(["The attribute set ID '99' does not exist; skipping"]);
  });

  it('processes a set named twice only once', () => {
    const addAttributeToSet = vi.spyOn(repository, 'addAttributeToSet');

    assign('attribute_code,attribute_set\ncolor,Default;1\n');

    expect(addAttributeToSet).toHaveBeenCalledTimes(1);
  });

  it('applies a single set order to every set', () => {
    assign('attribute_code,attribute_set,attribute_set_order\ncolor,Shoes;Boots,7\n');

    expect(repository.listAttributeSets().map((set) => set.sortOrder)).toEqual([0, 7, 7]);
  });

  it('warns when set orders do not line up with sets', () => {
    const output = assign('attribute_code,attribute_set,attribute_set_order\ncolor,Shoes;Boots;Bags,1;2\n');

    expect(repository.listAttributeSets().map((set) => [set.name, set.sortOrder])).toEqual([
      ['Default', 0],
      ['Shoes', 1],
      ['Boots', 2],
      ['Bags', 0],
    ]);
    expect(textsOf(output)[0]).toBe(
      "The number of 'attribute_set_order' values (2) does not match the number of 'attribute_set' values (3) for attribute 'color'",
    );
  });

  it('falls back to the default group when a group cannot be created', () => {
    vi.spyOn(repository, 'addAttributeGroup').mockImplementation(() => {
      throw new Error('locked');
    });

    const output = assign('attribute_code,group\ncolor,Details\n');

    expect(repository.getAttributeSetAssignments('color')).toEqual([{ attributeSetId: 1, attributeGroupId: 1 }]);
    expect(textsOf(output)).toEqual([
      "The attribute group 'Details' could not be created or retrieved; using default group (locked)",
    ]);
  });
});

describe('collectAttributeSetNames', () => {
  it('keeps the first spelling of each set', () => {
    const table = tableFrom('attribute_set\nShoes;Default\n shoes ;Bags\n\n');
    expect(collectAttributeSetNames(table, buildHeaderMap(headerOf(table)))).toEqual(['Shoes', 'Default', 'Bags']);
  });
});

describe('deleteAttributeSets', () => {
  function run(csv: string, verbose = false) {
    const table = tableFrom(csv);
    const output = createImportOutput({ verbose });
    const counters = deleteAttributeSets(table, buildHeaderMap(headerOf(table)), output, repository);
    return { counters, output };
  }

  it('deletes named sets and skips the default and missing ones', () => {
    repository.createAttributeSet('Shoes', 1);

    const { counters, output } = run('attribute_set\nShoes;Default\nshoes;Missing\n');

    expect(counters).toEqual({ added: 0, updated: 0, deleted: 1, skipped: 2, errors: 0 });
    expect(repository.listAttributeSets().map((set) => set.name)).toEqual(['Default']);
    expect(textsOf(output)).toEqual([
      "Deleting attribute set 'Shoes'...",
      "Deleting attribute set 'Default'...",
      "Deleting attribute set 'Missing'...",
      "The attribute set 'Missing' does not exist; skipping",
    ]);
  });

  it('protects the default set when given by id', () => {
    const { counters, output } = run('attribute_set\n1\n', true);

    expect(counters.skipped).toBe(1);
    expect(textsOf(output, 'comment')).toEqual(['The default attribute set cannot be deleted; skipping']);
  });

  it('counts a failed delete', () => {
    repository.createAttributeSet('Shoes', 1);
    vi.spyOn(repository, 'removeAttributeSet').mockImplementation(() => {
      throw new Error('locked');
    });

    const { counters, output } = run('attribute_set\nShoes\n');

    expect(counters.errors).toBe(1);
    expect(textsOf(output, 'error')).toEqual(["An error occurred while deleting attribute set 'Shoes': locked"]);
  });
});
