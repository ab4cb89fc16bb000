/**
 * Option Reconciler - turn a row's `option` columns into option mutations.
 *
 * New attributes (and replace runs) get their options embedded in the save
 * payload. Existing attributes get only the options they lack, added one at
 * a time; a failed add is counted and the next option is still attempted.
 */

import type { NewAttributeOption, StoreLabel } from '../catalog/types';
import { errorMessage } from '../utils/errors';
import { parseList } from './csv-table';
import { dedupeLabels, findDuplicateLabels, normalizeLabel } from './label-normalizer';
import type { ImportOutput, RowContext } from './report';

export type OptionStrategy = 'merge' | 'replace';

/** Frontend inputs that carry an option list */
const OPTION_INPUTS = new Set(['select', 'multiselect']);

/** Gap between synthetic sort orders */
const ORDER_STEP = 10;

export interface OptionEntry {
  /** Position in the de-duplicated base list */
  key: number;
  label: string;
  storeLabels: StoreLabel[];
  sortOrder?: number;
}

export interface OptionPlan {
  entries: OptionEntry[];
}

export interface OptionRequest {
  attributeCode: string;
  frontendInput: string;
  strategy: OptionStrategy;
  attributeExists: boolean;
  /** Treat the attribute as having no stored options (first save after an input change) */
  assumeNoExistingOptions: boolean;
}

export function supportsOptions(frontendInput: string, sourceCell: string): boolean {
  return OPTION_INPUTS.has(frontendInput.trim().toLowerCase()) && sourceCell === '';
}

export function readOptionStrategy(context: RowContext): OptionStrategy {
  return normalizeLabel(context.cell('option_strategy')) === 'replace' ? 'replace' : 'merge';
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

/**
 * Per-store option labels from `option_{store}` columns, in column order.
 * Unknown store codes are skipped.
 */
export function collectScopedOptionLabels(
  context: RowContext,
  attributeCode: string,
  report = true,
): Map<number, string[]> {
  const byStore = new Map<number, string[]>();
  for (const { name, index, column } of context.layout.columns) {
    if (column.kind !== 'storeOption') continue;
    const cell = (context.cells[index] ?? '').trim();
    if (cell === '') continue;
    const storeId = context.stores.resolve(column.storeCode);
    if (storeId === null) {
      if (report) {
        context.output.detail(
          `The store code '${column.storeCode}' is not valid for attribute '${attributeCode}' on column '${name}'`,
        );
      }
      continue;
    }
    byStore.set(storeId, parseList(cell));
  }
  return byStore;
}

/**
 * Build one entry per base label, attaching the scoped label at the same
 * position for each store. A blank base label takes the first scoped label
 * found at its position; entries left without a label are dropped.
 */
export function buildOptionEntries(
  baseLabels: readonly string[],
  scopedLabels: ReadonlyMap<number, readonly string[]>,
  output?: ImportOutput,
): OptionEntry[] {
  const entries: OptionEntry[] = [];
  baseLabels.forEach((baseLabel, key) => {
    let label = baseLabel.trim();
    if (label === '') {
      for (const labels of scopedLabels.values()) {
        const candidate = (labels[key] ?? '').trim();
        if (candidate !== '') {
          output?.detail(
            `Using scoped option label '${candidate}' as fallback for missing base option label at index ${key}; treating as base label`,
          );
          label = candidate;
          break;
        }
      }
    }
    if (label === '') {
      output?.detail(`The option label at index ${key} is empty; skipping`);
      return;
    }

    const storeLabels: StoreLabel[] = [];
    for (const [storeId, labels] of scopedLabels) {
      const scoped = (labels[key] ?? '').trim();
      if (scoped !== '') storeLabels.push({ storeId, label: scoped });
    }
    entries.push({ key, label, storeLabels });
  });
  return entries;
}

/**
 * Sort orders by entry key. `rawLabels` and `rawOrders` are the unfiltered
 * `option` / `option_order` values, aligned by position; a label takes the
 * order found at its first occurrence. Entries with no usable order follow
 * the highest resolved order in steps of ten.
 */
export function buildOptionOrders(
  rawLabels: readonly string[],
  rawOrders: readonly string[],
  entries: readonly OptionEntry[],
  output?: ImportOutput,
  attributeCode = '',
): Map<number, number> {
  const firstIndexByLabel = new Map<string, number>();
  rawLabels.forEach((label, index) => {
    const key = normalizeLabel(label);
    if (key !== '' && !firstIndexByLabel.has(key)) firstIndexByLabel.set(key, index);
  });

  const orderByLabel = new Map<string, number>();
  for (const [label, index] of firstIndexByLabel) {
    const value = (rawOrders[index] ?? '').trim();
    if (value === '') continue;
    if (!/^\d+$/.test(value)) {
      output?.detail(
        `The value '${value}' for option '${label}' is not a valid sort order for attribute '${attributeCode}'; ignoring this order`,
      );
      continue;
    }
    orderByLabel.set(label, Number(value));
  }

  const orders = new Map<number, number>();
  const missing: number[] = [];
  for (const entry of entries) {
    const order = orderByLabel.get(normalizeLabel(entry.label));
    if (order === undefined) {
      missing.push(entry.key);
    } else {
      orders.set(entry.key, order);
    }
  }

  const max = orders.size > 0 ? Math.max(...orders.values()) : 0;
  missing.forEach((key, index) => orders.set(key, max + (index + 1) * ORDER_STEP));
  return orders;
}

/**
 * The row's option plan, or undefined when the `option` cell lists nothing.
 * With `report` off, no warnings are emitted (used when re-planning for
 * default resolution).
 */
export function planOptions(context: RowContext, attributeCode: string, report = true): OptionPlan | undefined {
  const optionCell = context.cell('option');
  const listed = parseList(optionCell);
  if (listed.length === 0) return undefined;
  const output = report ? context.output : undefined;

  const duplicates = findDuplicateLabels(listed);
  if (duplicates.length > 0) {
    output?.detail(
      `The attribute '${attributeCode}' contains duplicate option labels: ${duplicates.join(', ')}; keeping first occurrence(s)`,
    );
  }
  const baseLabels = dedupeLabels(listed);

  const scoped = collectScopedOptionLabels(context, attributeCode, report);
  for (const [storeId, labels] of scoped) {
    if (labels.length !== baseLabels.length) {
      output?.detail(
        `The number of scoped option labels for store ${storeId} (${labels.length}) does not match the number of base option labels (${baseLabels.length}) for attribute '${attributeCode}'; mapping by index, extras ignored`,
      );
    }
  }

  const entries = buildOptionEntries(baseLabels, scoped, output);
  const orderCell = context.cell('option_order');
  if (orderCell !== '' && entries.length > 0) {
    const split = (cell: string): string[] => cell.split(';').map((value) => value.trim());
    const orders = buildOptionOrders(split(optionCell), split(orderCell), entries, output, attributeCode);
    for (const entry of entries) {
      entry.sortOrder = orders.get(entry.key);
    }
  }
  return { entries };
}

export function toNewOption(entry: OptionEntry): NewAttributeOption {
  return entry.sortOrder === undefined
    ? { label: entry.label, storeLabels: entry.storeLabels }
    : { label: entry.label, sortOrder: entry.sortOrder, storeLabels: entry.storeLabels };
}

// ---------------------------------------------------------------------------
// Reconciliation
// ---------------------------------------------------------------------------

function deleteAllOptions(context: RowContext, attributeCode: string): void {
  try {
    for (const option of context.repository.getOptions(attributeCode)) {
      context.repository.deleteOption(attributeCode, option.id);
    }
  } catch (err) {
    context.fail(
      `An error occurred while deleting existing options for replacement for attribute '${attributeCode}': ${errorMessage(err)}`,
    );
  }
}

/** Drop options whose admin or store labels match a stored admin label */
function withoutExisting(
  context: RowContext,
  attributeCode: string,
  options: NewAttributeOption[],
): NewAttributeOption[] {
  let existing: Set<string>;
  try {
    existing = new Set(
      context.repository
        .getOptions(attributeCode)
        .map((option) => normalizeLabel(option.label))
        .filter((label) => label !== ''),
    );
  } catch (err) {
    if (context.output.verbose) {
      context.output.error(
        `An error occurred while fetching existing options for attribute '${attributeCode}': ${errorMessage(err)}`,
      );
    }
    context.countError();
    return options;
  }

  return options.filter((option) => {
    const labels = [option.label, ...option.storeLabels.map((storeLabel) => storeLabel.label)];
    return !labels.some((label) => existing.has(normalizeLabel(label)));
  });
}

function addOptionsIncrementally(context: RowContext, attributeCode: string, options: NewAttributeOption[]): void {
  for (const option of options) {
    try {
      context.repository.addOption(attributeCode, option);
      context.output.detail(`Added option '${option.label}' to attribute '${attributeCode}'`);
    } catch (err) {
      context.fail(
        `An error occurred while adding option '${option.label}' to attribute '${attributeCode}': ${errorMessage(err)}`,
      );
    }
  }
}

/**
 * Apply the row's options. Returns the options to embed in the attribute
 * save, or undefined when there is nothing to embed (no options, or they were
 * added incrementally).
 */
export function reconcileOptions(context: RowContext, request: OptionRequest): NewAttributeOption[] | undefined {
  const { attributeCode } = request;
  const sourceCell = context.cell('source');
  if (!supportsOptions(request.frontendInput, sourceCell)) {
    if (supportsOptions(request.frontendInput, '') && context.cell('option') !== '') {
      context.output.detail(
        `Both 'option' and 'source' are set for attribute '${attributeCode}'; ignoring 'option'`,
      );
    }
    return undefined;
  }

  const plan = planOptions(context, attributeCode);
  if (!plan) return undefined;

  const replace = request.attributeExists && request.strategy === 'replace';
  if (replace) {
    context.output.detail(
      `Replacing existing options for attribute '${attributeCode}'; existing options will be deleted before adding new ones`,
    );
    deleteAllOptions(context, attributeCode);
  }

  const options = plan.entries.map(toNewOption);
  if (!request.attributeExists || replace || request.assumeNoExistingOptions) {
    return options.length > 0 ? options : undefined;
  }

  addOptionsIncrementally(context, attributeCode, withoutExisting(context, attributeCode, options));
  return undefined;
}
