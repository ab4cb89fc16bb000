/**
 * Attribute Reconciler - apply one CSV row to one attribute.
 *
 * add     creates the attribute, skipping ones that already exist
 * update  creates or updates (blank cells inherit the stored values)
 * delete  removes the attribute if it exists
 *
 * Changing the input type of an existing attribute saves in two passes: the
 * first embeds the row's options as if none were stored, the second merges
 * against the options that save produced.
 */

import { ARRAY_BACKEND_MODEL, type AttributeData, type AttributeRecord } from '../catalog/types';
import { CatalogError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { assignToAttributeSets } from './attribute-set-reconciler';
import { parseList } from './csv-table';
import { applyDefaultValue } from './default-resolver';
import { applyScopedLabels } from './label-assigner';
import { readOptionStrategy, reconcileOptions } from './option-reconciler';
import type { RowContext } from './report';

const logger = createLogger('attribute-reconciler');

export type ImportBehavior = 'add' | 'update' | 'delete';

export interface AttributeReconcilerDeps {
  behavior: ImportBehavior;
}

export interface AttributeReconciler {
  processRow(context: RowContext): void;
}

/**
 * Lazy read of the stored attribute for inheritance. A failed read is
 * counted and retried the next time a value is needed.
 */
interface ExistingAttributeSnapshot {
  load(): AttributeRecord | undefined;
}

function createSnapshot(context: RowContext, attributeCode: string): ExistingAttributeSnapshot {
  let loaded: AttributeRecord | undefined;
  return {
    load() {
      if (loaded) return loaded;
      try {
        const attribute = context.repository.getAttribute(attributeCode);
        if (!attribute) {
          throw new CatalogError('NO_SUCH_ENTITY', `The attribute with a "${attributeCode}" attributeCode doesn't exist.`);
        }
        loaded = attribute;
        return loaded;
      } catch (err) {
        context.output.detail(
          `An error occurred while loading existing attribute '${attributeCode}': ${errorMessage(err)}`,
        );
        context.countError();
        return undefined;
      }
    },
  };
}

/** Attribute payload from the row's scalar columns */
export function buildAttributeData(context: RowContext): AttributeData {
  const data: AttributeData = {};
  for (const { name, index, column } of context.layout.columns) {
    if (column.kind !== 'scalar') continue;
    data[name] = (context.cells[index] ?? '').trim();
  }
  const applyTo = parseList(data.apply_to ?? '');
  if (applyTo.length > 0) {
    data.apply_to = [...new Set(applyTo)].join(',');
  }
  return data;
}

export function createAttributeReconciler(deps: AttributeReconcilerDeps): AttributeReconciler {
  const { behavior } = deps;

  function deleteAttribute(context: RowContext, attributeCode: string, exists: boolean): void {
    if (!exists) {
      context.output.comment(`The attribute '${attributeCode}' does not exist and cannot be deleted; skipping`);
      context.counters.skipped++;
      return;
    }
    try {
      context.repository.removeAttribute(attributeCode);
      context.counters.deleted++;
    } catch (err) {
      context.fail(`An error occurred while deleting attribute '${attributeCode}': ${errorMessage(err)}`);
    }
  }

  function saveAttribute(context: RowContext, attributeCode: string, exists: boolean): void {
    const { repository, output } = context;
    const snapshot = createSnapshot(context, attributeCode);
    const data = buildAttributeData(context);

    let frontendInput = data.input ?? '';
    if (exists && frontendInput === '') {
      const current = snapshot.load();
      if (current) {
        frontendInput = current.frontendInput;
        if (frontendInput !== '') data.input = frontendInput;
      }
    }

    if (frontendInput.toLowerCase() === 'multiselect' && !data.backend) {
      data.backend = ARRAY_BACKEND_MODEL;
    }

    if (exists && (data.default ?? '') === '') {
      const current = snapshot.load();
      if (current && current.defaultValue !== '') data.default = current.defaultValue;
    }

    let inputChanging = false;
    if (exists && frontendInput !== '') {
      const current = snapshot.load();
      const from = current?.frontendInput.toLowerCase() ?? '';
      const to = frontendInput.toLowerCase();
      if (from !== '' && from !== to) {
        output.comment(`Warning: The frontend input type for attribute '${attributeCode}' is changing from '${from}' to '${to}'`);
        inputChanging = true;
      }
    }

    if (exists && (data.label ?? '') === '') {
      const current = snapshot.load();
      if (current && current.frontendLabel !== '') data.label = current.frontendLabel;
    }

    const strategy = readOptionStrategy(context);
    const embedded = reconcileOptions(context, {
      attributeCode,
      frontendInput,
      strategy,
      attributeExists: exists,
      assumeNoExistingOptions: inputChanging,
    });

    let attribute: AttributeRecord;
    try {
      attribute = repository.saveAttribute(attributeCode, data, embedded);
      repository.clearCache();
      if (inputChanging) {
        reconcileOptions(context, {
          attributeCode,
          frontendInput,
          strategy: 'merge',
          attributeExists: true,
          assumeNoExistingOptions: false,
        });
      }
    } catch (err) {
      const verb = behavior === 'update' ? 'updating' : 'adding';
      context.fail(`An error occurred while ${verb} attribute '${attributeCode}': ${errorMessage(err)}`);
      return;
    }

    if (behavior === 'update' && exists) {
      context.counters.updated++;
    } else {
      context.counters.added++;
    }
    logger.debug({ attributeCode, behavior, inputChanging, options: embedded?.length ?? 0 }, 'Attribute saved');

    applyDefaultValue(context, attribute, frontendInput);
    applyScopedLabels(context, attribute);
    try {
      assignToAttributeSets(context, attributeCode);
    } catch (err) {
      context.fail(
        `An error occurred while assigning attribute '${attributeCode}' to attribute sets: ${errorMessage(err)}`,
      );
    }
  }

  return {
    processRow(context: RowContext): void {
      const attributeCode = context.cell('attribute_code');
      if (attributeCode === '') return;

      let exists: boolean;
      try {
        exists = context.repository.getAttribute(attributeCode) !== undefined;
      } catch (err) {
        context.fail(`An error occurred while loading attribute '${attributeCode}': ${errorMessage(err)}`);
        return;
      }

      const verb = behavior === 'delete' ? 'Deleting' : behavior === 'update' && exists ? 'Updating' : 'Adding';
      context.output.line(`${verb} attribute '${attributeCode}'...`);

      if (behavior === 'delete') {
        deleteAttribute(context, attributeCode, exists);
        return;
      }
      if (behavior === 'add' && exists) {
        context.output.comment(`The attribute '${attributeCode}' already exists and cannot be added; skipping`);
        context.counters.skipped++;
        return;
      }
      saveAttribute(context, attributeCode, exists);
    },
  };
}
