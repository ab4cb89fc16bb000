/**
 * Store-scoped attribute labels from `label_{store}` columns.
 */

import type { AttributeRecord, StoreLabel } from '../catalog/types';
import { errorMessage } from '../utils/errors';
import type { RowContext } from './report';

export interface MergedStoreLabels {
  labels: StoreLabel[];
  changed: boolean;
}

/** Non-empty `label_{store}` cells by resolved store; later columns win */
export function collectScopedLabels(context: RowContext, attributeCode: string): StoreLabel[] {
  const byStore = new Map<number, string>();
  for (const { name, index, column } of context.layout.columns) {
    if (column.kind !== 'storeLabel') continue;
    const cell = (context.cells[index] ?? '').trim();
    if (cell === '') continue;
    const storeId = context.stores.resolve(column.storeCode);
    if (storeId === null) {
      context.output.detail(
        `The store code '${column.storeCode}' is not valid for attribute '${attributeCode}' on column '${name}'; column ignored`,
      );
      continue;
    }
    byStore.set(storeId, cell);
  }
  return [...byStore].map(([storeId, label]) => ({ storeId, label }));
}

function sameLabels(a: readonly StoreLabel[], b: readonly StoreLabel[]): boolean {
  if (a.length !== b.length) return false;
  const key = (labels: readonly StoreLabel[]): string =>
    labels
      .map(({ storeId, label }) => `${storeId}\u0000${label}`)
      .sort()
      .join('\u0001');
  return key(a) === key(b);
}

/**
 * Replace the labels of every incoming store, keep the others.
 */
export function mergeStoreLabels(current: readonly StoreLabel[], incoming: readonly StoreLabel[]): MergedStoreLabels {
  const affected = new Set(incoming.map((label) => label.storeId));
  const labels = [...current.filter((label) => !affected.has(label.storeId)), ...incoming];
  return { labels, changed: !sameLabels(current, labels) };
}

export function applyScopedLabels(context: RowContext, attribute: AttributeRecord): void {
  try {
    const incoming = collectScopedLabels(context, attribute.code);
    if (incoming.length === 0) return;
    const { labels, changed } = mergeStoreLabels(attribute.storeLabels, incoming);
    if (!changed) return;
    context.repository.setStoreLabels(attribute.code, labels);
  } catch (err) {
    context.fail(`An error occurred while applying scoped frontend labels: ${errorMessage(err)}`);
  }
}
