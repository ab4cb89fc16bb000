import { beforeEach, describe, it, expect, vi } from 'vitest';
import { createMemoryDatabase } from '../db';
import { createCatalogRepository, type CatalogRepository } from '../catalog/repository';
import type { AttributeRecord } from '../catalog/types';
import { applyScopedLabels, collectScopedLabels, mergeStoreLabels } from './label-assigner';
import { rowFrom, textsOf } from './test-utils';

let repository: CatalogRepository;
let color: AttributeRecord;

beforeEach(async () => {
  const db = await createMemoryDatabase();
  db.run("INSERT INTO stores (store_id, code, name) VALUES (2, 'fr', 'French')");
  repository = createCatalogRepository(db);
  color = repository.saveAttribute('color', { input: 'select', label: 'Color' });
});

describe('collectScopedLabels', () => {
  it('resolves store columns and skips unknown stores', () => {
    const { context, output } = rowFrom(
      'attribute_code,label_default,label_fr,label_de,label_admin\ncolor,Colour,Couleur,Farbe,\n',
      repository,
      { verbose: true },
    );

    expect(collectScopedLabels(context, 'color')).toEqual([
      { storeId: 1, label: 'Colour' },
      { storeId: 2, label: 'Couleur' },
    ]);
    expect(textsOf(output)).toEqual([
      "The store code 'de' is not valid for attribute 'color' on column 'label_de'; column ignored",
    ]);
  });
});

describe('mergeStoreLabels', () => {
  const current = [
    { storeId: 1, label: 'Colour' },
    { storeId: 2, label: 'Couleur' },
  ];

  it('replaces labels of the incoming stores only', () => {
    expect(mergeStoreLabels(current, [{ storeId: 2, label: 'Teinte' }])).toEqual({
      labels: [
        { storeId: 1, label: 'Colour' },
        { storeId: 2, label: 'Teinte' },
      ],
      changed: true,
    });
  });

  it('reports identical labels as unchanged', () => {
    expect(mergeStoreLabels(current, [{ storeId: 2, label: 'Couleur' }]).changed).toBe(false);
  });
});

describe('applyScopedLabels', () => {
  it('stores merged labels', () => {
    repository.setStoreLabels('color', [{ storeId: 1, label: 'Colour' }]);
    const saved = repository.getAttribute('color');
    if (!saved) throw new Error('color missing');
    const { context } = rowFrom('attribute_code,label_fr\ncolor,Couleur\n', repository);

    applyScopedLabels(context, saved);

    expect(repository.getAttribute('color')?.storeLabels).toEqual([
      { storeId: 1, label: 'Colour' },
      { storeId: 2, label: 'Couleur' },
    ]);
  });

  it('leaves unchanged labels alone', () => {
    repository.setStoreLabels('color', [{ storeId: 2, label: 'Couleur' }]);
    const saved = repository.getAttribute('color');
    if (!saved) throw new Error('color missing');
    const setStoreLabels = vi.spyOn(repository, 'setStoreLabels');
    const { context } = rowFrom('attribute_code,label_fr\ncolor,Couleur\n', repository);

    applyScopedLabels(context, saved);

    expect(setStoreLabels).not.toHaveBeenCalled();
  });

  it('reports a failed write', () => {
    vi.spyOn(repository, 'setStoreLabels').mockImplementation(() => {
      throw new Error('write failed');
    });
    const { context, output } = rowFrom('attribute_code,label_fr\ncolor,Couleur\n', repository);

    applyScopedLabels(context, color);

    expect(context.counters.errors).toBe(1);
    expect(textsOf(output, 'error')).toEqual(['An error occurred while applying scoped frontend labels: write failed']);
  });

  it('reports a failed store lookup', () => {
    vi.spyOn(repository, 'getStoreIdByCode').mockImplementation(() => {
      throw new Error('store lookup failed');
    });
    const { context, output } = rowFrom('attribute_code,label_fr\ncolor,Couleur\n', repository);

    applyScopedLabels(context, color);

    expect(context.counters.errors).toBe(1);
    expect(textsOf(output, 'error')).toEqual([
      'An error occurred while applying scoped frontend labels: store lookup failed',
    ]);
  });
});
