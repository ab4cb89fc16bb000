/**
 * Column classification for attribute import headers.
 */

import type { HeaderMap } from './csv-table';

export type ColumnKind =
  | { kind: 'scalar' }
  | { kind: 'reserved' }
  | { kind: 'storeLabel'; storeCode: string }
  | { kind: 'storeOption'; storeCode: string };

export interface ClassifiedColumn {
  name: string;
  index: number;
  column: ColumnKind;
}

/** Columns consumed by dedicated steps rather than stored on the attribute */
export const RESERVED_COLUMNS: ReadonlySet<string> = new Set([
  'attribute_code',
  'attribute_set',
  'group',
  'group_order',
  'attribute_set_order',
  'option',
  'option_order',
  'option_strategy',
]);

const LABEL_PREFIX = 'label_';
const OPTION_PREFIX = 'option_';

export function classifyColumn(name: string): ColumnKind {
  if (RESERVED_COLUMNS.has(name)) {
    return { kind: 'reserved' };
  }
  if (name.startsWith(LABEL_PREFIX)) {
    const storeCode = name.slice(LABEL_PREFIX.length);
    return storeCode === '' ? { kind: 'reserved' } : { kind: 'storeLabel', storeCode };
  }
  if (name.startsWith(OPTION_PREFIX)) {
    const storeCode = name.slice(OPTION_PREFIX.length);
    return storeCode === '' ? { kind: 'reserved' } : { kind: 'storeOption', storeCode };
  }
  return { kind: 'scalar' };
}

/** Classify every mapped column once, in header order */
export function classifyHeader(headerMap: HeaderMap): ClassifiedColumn[] {
  return [...headerMap.entries()]
    .sort(([, a], [, b]) => a - b)
    .map(([name, index]) => ({ name, index, column: classifyColumn(name) }));
}
