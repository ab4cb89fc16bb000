/**
 * Attribute Set Reconciler - place attributes in sets and groups, and delete
 * attribute sets listed in an attribute-set import.
 */

import type { CatalogRepository } from '../catalog/repository';
import { errorMessage } from '../utils/errors';
import { dataRows, readCell, parseList, type CsvTable, type HeaderMap } from './csv-table';
import { normalizeLabel } from './label-normalizer';
import { emptyCounters, type ImportCounters, type ImportOutput, type RowContext } from './report';

const DEFAULT_SET_NAME = 'default';

/** Digits only; anything else counts as absent */
export function parseOptionalInt(value: string): number | undefined {
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : undefined;
}

function isNumericId(identifier: string): boolean {
  return /^\d+$/.test(identifier);
}

function findSetIdByName(repository: CatalogRepository, name: string): number | undefined {
  const key = normalizeLabel(name);
  return repository.listAttributeSets().find((set) => normalizeLabel(set.name) === key)?.id;
}

// ---------------------------------------------------------------------------
// Assignment
// ---------------------------------------------------------------------------

/**
 * Resolve (or create) a set by id or name and apply its sort order.
 * Undefined when the set is unknown and cannot be created.
 */
function ensureAttributeSet(context: RowContext, identifier: string, sortOrder: number | undefined): number | undefined {
  const { repository, output } = context;

  if (isNumericId(identifier)) {
    const set = repository.getAttributeSetById(Number(identifier));
    if (!set) {
      output.detail(`The attribute set ID '${identifier}' does not exist; skipping`);
      return undefined;
    }
    if (sortOrder !== undefined) repository.updateAttributeSetSortOrder(set.id, sortOrder);
    return set.id;
  }

  const existingId = findSetIdByName(repository, identifier);
  if (existingId !== undefined) {
    if (sortOrder !== undefined) repository.updateAttributeSetSortOrder(existingId, sortOrder);
    return existingId;
  }

  try {
    const created = repository.createAttributeSet(identifier, repository.getDefaultAttributeSetId(), sortOrder);
    output.detail(`The attribute set '${identifier}' did not exist; created automatically`);
    return created.id;
  } catch (err) {
    if (output.verbose) {
      output.error(`An error occurred while creating attribute set '${identifier}': ${errorMessage(err)}`);
    }
    return undefined;
  }
}

function ensureAttributeGroup(
  context: RowContext,
  attributeSetId: number,
  groupName: string,
  sortOrder: number | undefined,
): number {
  const { repository } = context;
  const defaultGroupId = repository.getDefaultAttributeGroupId(attributeSetId);
  if (groupName === '') return defaultGroupId;

  try {
    repository.addAttributeGroup(attributeSetId, groupName, sortOrder);
    const groupId = repository.getAttributeGroupId(attributeSetId, groupName);
    if (groupId === undefined) throw new Error(`group '${groupName}' not found after creation`);
    return groupId;
  } catch (err) {
    context.output.detail(
      `The attribute group '${groupName}' could not be created or retrieved; using default group (${errorMessage(err)})`,
    );
    return defaultGroupId;
  }
}

/**
 * Attach the row's attribute to each listed set (the default set when the
 * cell is blank). Repository failures while attaching propagate.
 */
export function assignToAttributeSets(context: RowContext, attributeCode: string): void {
  const { repository, output } = context;
  const listed = parseList(context.cell('attribute_set'));
  const identifiers = listed.length > 0 ? listed : [String(repository.getDefaultAttributeSetId())];

  const setOrders = parseList(context.cell('attribute_set_order'));
  const sharedSetOrder = setOrders.length === 1 ? parseOptionalInt(setOrders[0]) : undefined;
  if (setOrders.length > 1 && setOrders.length !== identifiers.length) {
    output.detail(
      `The number of 'attribute_set_order' values (${setOrders.length}) does not match the number of 'attribute_set' values (${identifiers.length}) for attribute '${attributeCode}'`,
    );
  }

  const groupName = context.cell('group');
  const groupOrder = parseOptionalInt(context.cell('group_order'));
  const sortOrder = parseOptionalInt(context.cell('sort_order'));

  const processed = new Set<number>();
  identifiers.forEach((identifier, index) => {
    const setOrder = setOrders.length === 1 ? sharedSetOrder : parseOptionalInt(setOrders[index] ?? '');
    const setId = ensureAttributeSet(context, identifier, setOrder);
    if (setId === undefined || processed.has(setId)) return;
    processed.add(setId);

    const groupId = ensureAttributeGroup(context, setId, groupName, groupOrder);
    repository.addAttributeToSet(setId, groupId, attributeCode, sortOrder);
  });
}

// ---------------------------------------------------------------------------
// Deletion
// ---------------------------------------------------------------------------

/** Set names across all rows, de-duplicated by identity; first spelling wins */
export function collectAttributeSetNames(table: CsvTable, headerMap: HeaderMap): string[] {
  const names = new Map<string, string>();
  for (const { cells } of dataRows(table)) {
    for (const name of parseList(readCell(cells, headerMap, 'attribute_set'))) {
      const key = normalizeLabel(name);
      if (key !== '' && !names.has(key)) names.set(key, name);
    }
  }
  return [...names.values()];
}

/**
 * Delete every set named in the table. The default set is never deleted,
 * whether named or given by id.
 */
export function deleteAttributeSets(
  table: CsvTable,
  headerMap: HeaderMap,
  output: ImportOutput,
  repository: CatalogRepository,
): ImportCounters {
  const counters = emptyCounters();
  const defaultSetId = repository.getDefaultAttributeSetId();

  for (const name of collectAttributeSetNames(table, headerMap)) {
    output.line(`Deleting attribute set '${name}'...`);
    if (normalizeLabel(name) === DEFAULT_SET_NAME) {
      output.detail('The default attribute set cannot be deleted; skipping');
      counters.skipped++;
      continue;
    }

    let setId: number | undefined;
    try {
      setId = isNumericId(name) ? repository.getAttributeSetById(Number(name))?.id : findSetIdByName(repository, name);
    } catch (err) {
      output.error(`An error occurred while loading attribute set '${name}': ${errorMessage(err)}`);
      counters.errors++;
      continue;
    }
    if (setId === undefined) {
      output.comment(`The attribute set '${name}' does not exist; skipping`);
      counters.skipped++;
      continue;
    }
    if (setId === defaultSetId) {
      output.detail('The default attribute set cannot be deleted; skipping');
      counters.skipped++;
      continue;
    }

    try {
      repository.removeAttributeSet(setId);
      counters.deleted++;
    } catch (err) {
      output.error(`An error occurred while deleting attribute set '${name}': ${errorMessage(err)}`);
      counters.errors++;
    }
  }

  return counters;
}
