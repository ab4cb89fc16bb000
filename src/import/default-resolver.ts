/**
 * Default value resolution for option-backed attributes: the `default` cell
 * names options by id or by label and is stored as option id(s).
 */

import type { AttributeRecord } from '../catalog/types';
import { errorMessage } from '../utils/errors';
import { parseList } from './csv-table';
import { normalizeLabel } from './label-normalizer';
import { planOptions, supportsOptions } from './option-reconciler';
import type { RowContext } from './report';

export interface DefaultValueRequest {
  attributeCode: string;
  frontendInput: string;
}

/**
 * Option id(s) named by the `default` cell: a comma-joined list for
 * multiselect, the first match otherwise. Undefined when nothing resolves.
 * Throws when the stored options cannot be read.
 */
export function resolveDefaultValue(context: RowContext, request: DefaultValueRequest): string | undefined {
  const { attributeCode } = request;
  if (!supportsOptions(request.frontendInput, context.cell('source'))) return undefined;
  const defaultCell = context.cell('default');
  if (defaultCell === '') return undefined;

  const multiselect = request.frontendInput.trim().toLowerCase() === 'multiselect';
  const values = multiselect ? parseList(defaultCell) : [defaultCell];

  const options = context.repository.getOptions(attributeCode);
  const ids = new Set<number>();
  const labelToId = new Map<string, number>();
  for (const option of options) {
    ids.add(option.id);
    const label = normalizeLabel(option.label);
    if (label !== '') labelToId.set(label, option.id);
  }

  // Labels of this row's options (base and scoped) resolve to the stored
  // option they produced, so a default can name an option added by the row
  const labelSets = (planOptions(context, attributeCode, false)?.entries ?? []).map((entry) => [
    ...new Set(
      [entry.label, ...entry.storeLabels.map((storeLabel) => storeLabel.label)]
        .map(normalizeLabel)
        .filter((label) => label !== ''),
    ),
  ]);
  const idBySet = new Map<number, number>();
  for (const option of options) {
    const label = normalizeLabel(option.label);
    const index = labelSets.findIndex((labels) => labels.includes(label));
    if (index !== -1 && !idBySet.has(index)) idBySet.set(index, option.id);
  }
  for (const [index, optionId] of idBySet) {
    for (const label of labelSets[index]) labelToId.set(label, optionId);
  }

  const resolved: number[] = [];
  for (const value of values) {
    if (/^\d+$/.test(value) && ids.has(Number(value))) {
      resolved.push(Number(value));
      continue;
    }
    const label = normalizeLabel(value);
    const optionId = labelToId.get(label);
    if (optionId !== undefined) {
      resolved.push(optionId);
    } else if (context.output.verbose) {
      context.output.comment(
        `The option label '${label}' for attribute '${attributeCode}' is not valid; available options: ${[...labelToId.keys()].join(', ')}`,
      );
    } else {
      context.output.comment(
        `The option label '${label}' for attribute '${attributeCode}' is not valid; not set as default`,
      );
    }
  }

  const unique = [...new Set(resolved)];
  if (unique.length === 0) return undefined;
  return multiselect ? unique.join(',') : String(unique[0]);
}

/** Resolve and store the default; skipped when it already matches */
export function applyDefaultValue(context: RowContext, attribute: AttributeRecord, frontendInput: string): void {
  try {
    const value = resolveDefaultValue(context, { attributeCode: attribute.code, frontendInput });
    if (value === undefined || value === attribute.defaultValue) return;
    context.repository.setDefaultValue(attribute.code, value);
  } catch (err) {
    context.fail(
      `An error occurred while setting default option(s) for attribute '${attribute.code}': ${errorMessage(err)}`,
    );
  }
}
