/**
 * Catalog Repository - persistence for attributes, options, store labels,
 * attribute sets and groups on top of the sql.js catalog database.
 *
 * All calls are synchronous. Failures raise CatalogError.
 */

import { createLogger } from '../utils/logger';
import { CatalogError } from '../utils/errors';
import { readNumber, readOptionalNumber, readString, type Database, type SqlRow } from '../db/index';
import { DEFAULT_ATTRIBUTE_SET_ID } from '../db/schema';
import { normalizeLabel } from '../import/label-normalizer';
import {
  ADMIN_STORE_ID,
  type AttributeData,
  type AttributeGroupRecord,
  type AttributeOption,
  type AttributeRecord,
  type AttributeSetAssignment,
  type AttributeSetRecord,
  type NewAttributeOption,
  type StoreLabel,
} from './types';

const logger = createLogger('catalog-repository');

export interface CatalogRepository {
  // Attributes
  getAttribute(code: string): AttributeRecord | undefined;
  /**
   * Create or update an attribute. Embedded options are inserted unless an
   * option with the same normalized admin label already exists.
   */
  saveAttribute(code: string, data: AttributeData, options?: NewAttributeOption[]): AttributeRecord;
  removeAttribute(code: string): void;
  setDefaultValue(code: string, value: string): void;
  setStoreLabels(code: string, labels: StoreLabel[]): void;
  /** Drop cached attribute metadata */
  clearCache(): void;

  // Options
  getOptions(code: string): AttributeOption[];
  addOption(code: string, option: NewAttributeOption): number;
  deleteOption(code: string, optionId: number): void;

  // Stores
  getStoreIdByCode(storeCode: string): number | undefined;

  // Attribute sets and groups
  listAttributeSets(): AttributeSetRecord[];
  getAttributeSetById(id: number): AttributeSetRecord | undefined;
  getDefaultAttributeSetId(): number;
  createAttributeSet(name: string, skeletonId: number, sortOrder?: number): AttributeSetRecord;
  updateAttributeSetSortOrder(id: number, sortOrder: number): void;
  removeAttributeSet(id: number): void;
  listAttributeGroups(attributeSetId: number): AttributeGroupRecord[];
  getDefaultAttributeGroupId(attributeSetId: number): number;
  addAttributeGroup(attributeSetId: number, name: string, sortOrder?: number): void;
  getAttributeGroupId(attributeSetId: number, name: string): number | undefined;
  addAttributeToSet(attributeSetId: number, attributeGroupId: number, code: string, sortOrder?: number): void;
  getAttributeSetAssignments(code: string): AttributeSetAssignment[];
}

/** CSV column -> attributes table column */
const FIELD_COLUMNS: Record<string, string> = {
  input: 'frontend_input',
  label: 'frontend_label',
  backend: 'backend_model',
  source: 'source_model',
  default: 'default_value',
  apply_to: 'apply_to',
};

const ATTRIBUTE_CODE_PATTERN = /^[a-z][a-z0-9_]{0,59}$/i;

function parseProperties(raw: string): Record<string, string> {
  const result: Record<string, string> = {};
  try {
    const parsed: unknown = JSON.parse(raw || '{}');
    if (typeof parsed === 'object' && parsed !== null) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string') result[key] = value;
      }
    }
  } catch (err) {
    logger.warn({ error: err }, 'Ignoring unreadable attribute properties');
  }
  return result;
}

export function createCatalogRepository(db: Database): CatalogRepository {
  const attributeCache = new Map<string, AttributeRecord>();

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  function loadAttributeRow(code: string): SqlRow | undefined {
    return db.get('SELECT * FROM attributes WHERE attribute_code = ?', [code]);
  }

  function requireAttributeId(code: string): number {
    const row = loadAttributeRow(code);
    if (!row) {
      throw new CatalogError('NO_SUCH_ENTITY', `The attribute with a "${code}" attributeCode doesn't exist.`);
    }
    return readNumber(row, 'attribute_id');
  }

  function requireAttributeSet(id: number): AttributeSetRecord {
    const set = repository.getAttributeSetById(id);
    if (!set) {
      throw new CatalogError('NO_SUCH_ENTITY', `The attribute set with ID "${id}" doesn't exist.`);
    }
    return set;
  }

  function parseAttribute(row: SqlRow): AttributeRecord {
    const id = readNumber(row, 'attribute_id');
    const storeLabels = db
      .query('SELECT store_id, label FROM attribute_labels WHERE attribute_id = ? ORDER BY store_id', [id])
      .map((labelRow) => ({ storeId: readNumber(labelRow, 'store_id'), label: readString(labelRow, 'label') }));
    return {
      id,
      code: readString(row, 'attribute_code'),
      frontendInput: readString(row, 'frontend_input'),
      frontendLabel: readString(row, 'frontend_label'),
      backendModel: readString(row, 'backend_model'),
      sourceModel: readString(row, 'source_model'),
      defaultValue: readString(row, 'default_value'),
      applyTo: readString(row, 'apply_to'),
      properties: parseProperties(readString(row, 'properties')),
      storeLabels,
    };
  }

  function parseAttributeSet(row: SqlRow): AttributeSetRecord {
    return {
      id: readNumber(row, 'attribute_set_id'),
      name: readString(row, 'attribute_set_name'),
      sortOrder: readNumber(row, 'sort_order'),
    };
  }

  function parseGroup(row: SqlRow): AttributeGroupRecord {
    return {
      id: readNumber(row, 'attribute_group_id'),
      attributeSetId: readNumber(row, 'attribute_set_id'),
      name: readString(row, 'attribute_group_name'),
      sortOrder: readNumber(row, 'sort_order'),
      isDefault: readNumber(row, 'is_default') === 1,
    };
  }

  /** Normalized admin labels of the attribute's stored options */
  function adminLabelKeys(attributeId: number): Set<string> {
    const rows = db.query(
      `SELECT v.value FROM attribute_options o
       JOIN attribute_option_values v ON v.option_id = o.option_id AND v.store_id = ?
       WHERE o.attribute_id = ?`,
      [ADMIN_STORE_ID, attributeId],
    );
    return new Set(rows.map((row) => normalizeLabel(readString(row, 'value'))).filter((key) => key !== ''));
  }

  function insertOption(attributeId: number, option: NewAttributeOption): number {
    db.run('INSERT INTO attribute_options (attribute_id, sort_order) VALUES (?, ?)', [
      attributeId,
      option.sortOrder ?? 0,
    ]);
    const optionId = db.lastInsertId();
    db.run('INSERT INTO attribute_option_values (option_id, store_id, value) VALUES (?, ?, ?)', [
      optionId,
      ADMIN_STORE_ID,
      option.label.trim(),
    ]);
    for (const storeLabel of option.storeLabels) {
      if (storeLabel.storeId === ADMIN_STORE_ID || storeLabel.label.trim() === '') continue;
      db.run(
        'INSERT OR REPLACE INTO attribute_option_values (option_id, store_id, value) VALUES (?, ?, ?)',
        [optionId, storeLabel.storeId, storeLabel.label.trim()],
      );
    }
    return optionId;
  }

  function deleteOptionRows(optionId: number): void {
    db.run('DELETE FROM attribute_option_values WHERE option_id = ?', [optionId]);
    db.run('DELETE FROM attribute_options WHERE option_id = ?', [optionId]);
  }

  // -------------------------------------------------------------------------
  // Repository
  // -------------------------------------------------------------------------

  const repository: CatalogRepository = {
    getAttribute(code: string): AttributeRecord | undefined {
      const cached = attributeCache.get(code);
      if (cached) return structuredClone(cached);
      const row = loadAttributeRow(code);
      if (!row) return undefined;
      const attribute = parseAttribute(row);
      attributeCache.set(code, attribute);
      return structuredClone(attribute);
    },

    saveAttribute(code: string, data: AttributeData, options: NewAttributeOption[] = []): AttributeRecord {
      if (!ATTRIBUTE_CODE_PATTERN.test(code)) {
        throw new CatalogError(
          'INVALID_INPUT',
          `Attribute code "${code}" is invalid. Please use only letters (a-z or A-Z), numbers (0-9) or underscore (_) in this field, and the first character should be a letter.`,
        );
      }

      const columns: Record<string, string> = {};
      const properties: Record<string, string> = {};
      for (const [key, value] of Object.entries(data)) {
        const column = FIELD_COLUMNS[key];
        if (column) {
          columns[column] = value;
        } else {
          properties[key] = value;
        }
      }
      // An attribute always keeps an input type
      if (columns.frontend_input === '') delete columns.frontend_input;

      const existing = loadAttributeRow(code);
      let attributeId: number;
      if (existing) {
        attributeId = readNumber(existing, 'attribute_id');
        const merged = { ...parseProperties(readString(existing, 'properties')), ...properties };
        const assignments = Object.keys(columns).map((column) => `${column} = ?`);
        db.run(
          `UPDATE attributes SET ${[...assignments, 'properties = ?', 'updated_at = ?'].join(', ')} WHERE attribute_id = ?`,
          [...Object.values(columns), JSON.stringify(merged), Date.now(), attributeId],
        );
      } else {
        const names = [...Object.keys(columns), 'attribute_code', 'properties'];
        const values = [...Object.values(columns), code, JSON.stringify(properties)];
        db.run(
          `INSERT INTO attributes (${names.join(', ')}) VALUES (${names.map(() => '?').join(', ')})`,
          values,
        );
        attributeId = db.lastInsertId();
      }

      const stored = adminLabelKeys(attributeId);
      for (const option of options) {
        const key = normalizeLabel(option.label);
        if (key === '' || stored.has(key)) continue;
        insertOption(attributeId, option);
        stored.add(key);
      }

      attributeCache.delete(code);
      logger.debug({ code, created: !existing, options: options.length }, 'Saved attribute');
      const saved = repository.getAttribute(code);
      if (!saved) {
        throw new CatalogError('STATE_CONFLICT', `The attribute "${code}" could not be reloaded after saving.`);
      }
      return saved;
    },

    removeAttribute(code: string): void {
      const attributeId = requireAttributeId(code);
      for (const row of db.query('SELECT option_id FROM attribute_options WHERE attribute_id = ?', [attributeId])) {
        deleteOptionRows(readNumber(row, 'option_id'));
      }
      db.run('DELETE FROM entity_attributes WHERE attribute_id = ?', [attributeId]);
      db.run('DELETE FROM attribute_labels WHERE attribute_id = ?', [attributeId]);
      db.run('DELETE FROM attributes WHERE attribute_id = ?', [attributeId]);
      attributeCache.delete(code);
    },

    setDefaultValue(code: string, value: string): void {
      const attributeId = requireAttributeId(code);
      db.run('UPDATE attributes SET default_value = ?, updated_at = ? WHERE attribute_id = ?', [
        value,
        Date.now(),
        attributeId,
      ]);
      attributeCache.delete(code);
    },

    setStoreLabels(code: string, labels: StoreLabel[]): void {
      const attributeId = requireAttributeId(code);
      db.run('DELETE FROM attribute_labels WHERE attribute_id = ?', [attributeId]);
      for (const { storeId, label } of labels) {
        db.run('INSERT OR REPLACE INTO attribute_labels (attribute_id, store_id, label) VALUES (?, ?, ?)', [
          attributeId,
          storeId,
          label,
        ]);
      }
      attributeCache.delete(code);
    },

    clearCache(): void {
      attributeCache.clear();
    },

    getOptions(code: string): AttributeOption[] {
      const attributeId = requireAttributeId(code);
      const rows = db.query(
        'SELECT option_id, sort_order FROM attribute_options WHERE attribute_id = ? ORDER BY sort_order, option_id',
        [attributeId],
      );
      return rows.map((row) => {
        const optionId = readNumber(row, 'option_id');
        const values = db.query(
          'SELECT store_id, value FROM attribute_option_values WHERE option_id = ? ORDER BY store_id',
          [optionId],
        );
        let label = '';
        const storeLabels: StoreLabel[] = [];
        for (const valueRow of values) {
          const storeId = readNumber(valueRow, 'store_id');
          if (storeId === ADMIN_STORE_ID) {
            label = readString(valueRow, 'value');
          } else {
            storeLabels.push({ storeId, label: readString(valueRow, 'value') });
          }
        }
        return { id: optionId, label, sortOrder: readNumber(row, 'sort_order'), storeLabels };
      });
    },

    addOption(code: string, option: NewAttributeOption): number {
      const attributeId = requireAttributeId(code);
      if (option.label.trim() === '') {
        throw new CatalogError('INVALID_INPUT', 'The option label is required.');
      }
      if (adminLabelKeys(attributeId).has(normalizeLabel(option.label))) {
        throw new CatalogError(
          'STATE_CONFLICT',
          `Admin store attribute option label "${option.label.trim()}" already exists.`,
        );
      }
      return insertOption(attributeId, option);
    },

    deleteOption(code: string, optionId: number): void {
      const attributeId = requireAttributeId(code);
      const row = db.get('SELECT option_id FROM attribute_options WHERE option_id = ? AND attribute_id = ?', [
        optionId,
        attributeId,
      ]);
      if (!row) {
        throw new CatalogError('NO_SUCH_ENTITY', `The "${optionId}" option doesn't exist for "${code}".`);
      }
      deleteOptionRows(optionId);
    },

    getStoreIdByCode(storeCode: string): number | undefined {
      const row = db.get('SELECT store_id FROM stores WHERE code = ?', [storeCode]);
      return row ? readNumber(row, 'store_id') : undefined;
    },

    listAttributeSets(): AttributeSetRecord[] {
      return db
        .query('SELECT attribute_set_id, attribute_set_name, sort_order FROM attribute_sets ORDER BY attribute_set_id')
        .map(parseAttributeSet);
    },

    getAttributeSetById(id: number): AttributeSetRecord | undefined {
      const row = db.get(
        'SELECT attribute_set_id, attribute_set_name, sort_order FROM attribute_sets WHERE attribute_set_id = ?',
        [id],
      );
      return row ? parseAttributeSet(row) : undefined;
    },

    getDefaultAttributeSetId(): number {
      return DEFAULT_ATTRIBUTE_SET_ID;
    },

    createAttributeSet(name: string, skeletonId: number, sortOrder?: number): AttributeSetRecord {
      const trimmed = name.trim();
      if (trimmed === '') {
        throw new CatalogError('INVALID_INPUT', 'The attribute set name is empty. Enter the name and try again.');
      }
      if (db.get('SELECT attribute_set_id FROM attribute_sets WHERE lower(attribute_set_name) = lower(?)', [trimmed])) {
        throw new CatalogError('STATE_CONFLICT', `An attribute set named "${trimmed}" already exists.`);
      }
      requireAttributeSet(skeletonId);

      db.run('INSERT INTO attribute_sets (attribute_set_name, sort_order) VALUES (?, ?)', [trimmed, sortOrder ?? 0]);
      const setId = db.lastInsertId();

      // Initialize from the skeleton: copy its groups and attribute placement
      for (const group of repository.listAttributeGroups(skeletonId)) {
        db.run(
          'INSERT INTO attribute_groups (attribute_set_id, attribute_group_name, sort_order, is_default) VALUES (?, ?, ?, ?)',
          [setId, group.name, group.sortOrder, group.isDefault ? 1 : 0],
        );
        const groupId = db.lastInsertId();
        for (const row of db.query(
          'SELECT attribute_id, sort_order FROM entity_attributes WHERE attribute_set_id = ? AND attribute_group_id = ?',
          [skeletonId, group.id],
        )) {
          db.run(
            'INSERT INTO entity_attributes (attribute_set_id, attribute_group_id, attribute_id, sort_order) VALUES (?, ?, ?, ?)',
            [setId, groupId, readNumber(row, 'attribute_id'), readOptionalNumber(row, 'sort_order') ?? null],
          );
        }
      }

      logger.debug({ setId, name: trimmed, skeletonId }, 'Created attribute set');
      return requireAttributeSet(setId);
    },

    updateAttributeSetSortOrder(id: number, sortOrder: number): void {
      requireAttributeSet(id);
      db.run('UPDATE attribute_sets SET sort_order = ? WHERE attribute_set_id = ?', [sortOrder, id]);
    },

    removeAttributeSet(id: number): void {
      if (id === DEFAULT_ATTRIBUTE_SET_ID) {
        throw new CatalogError('STATE_CONFLICT', 'The default attribute set can\'t be deleted.');
      }
      requireAttributeSet(id);
      db.run('DELETE FROM entity_attributes WHERE attribute_set_id = ?', [id]);
      db.run('DELETE FROM attribute_groups WHERE attribute_set_id = ?', [id]);
      db.run('DELETE FROM attribute_sets WHERE attribute_set_id = ?', [id]);
    },

    listAttributeGroups(attributeSetId: number): AttributeGroupRecord[] {
      return db
        .query(
          'SELECT * FROM attribute_groups WHERE attribute_set_id = ? ORDER BY sort_order, attribute_group_id',
          [attributeSetId],
        )
        .map(parseGroup);
    },

    getDefaultAttributeGroupId(attributeSetId: number): number {
      const groups = repository.listAttributeGroups(attributeSetId);
      const group = groups.find((candidate) => candidate.isDefault) ?? groups[0];
      if (!group) {
        throw new CatalogError('NO_SUCH_ENTITY', `The attribute set with ID "${attributeSetId}" has no groups.`);
      }
      return group.id;
    },

    addAttributeGroup(attributeSetId: number, name: string, sortOrder?: number): void {
      requireAttributeSet(attributeSetId);
      const trimmed = name.trim();
      if (trimmed === '') {
        throw new CatalogError('INVALID_INPUT', 'The attribute group name is empty.');
      }
      const existingId = repository.getAttributeGroupId(attributeSetId, trimmed);
      if (existingId !== undefined) {
        if (sortOrder !== undefined) {
          db.run('UPDATE attribute_groups SET sort_order = ? WHERE attribute_group_id = ?', [sortOrder, existingId]);
        }
        return;
      }
      const nextOrder = db.get(
        'SELECT COALESCE(MAX(sort_order), 0) + 1 AS next FROM attribute_groups WHERE attribute_set_id = ?',
        [attributeSetId],
      );
      db.run(
        'INSERT INTO attribute_groups (attribute_set_id, attribute_group_name, sort_order, is_default) VALUES (?, ?, ?, 0)',
        [attributeSetId, trimmed, sortOrder ?? (nextOrder ? readNumber(nextOrder, 'next') : 1)],
      );
    },

    getAttributeGroupId(attributeSetId: number, name: string): number | undefined {
      const row = db.get(
        'SELECT attribute_group_id FROM attribute_groups WHERE attribute_set_id = ? AND lower(attribute_group_name) = lower(?)',
        [attributeSetId, name.trim()],
      );
      return row ? readNumber(row, 'attribute_group_id') : undefined;
    },

    addAttributeToSet(attributeSetId: number, attributeGroupId: number, code: string, sortOrder?: number): void {
      const attributeId = requireAttributeId(code);
      requireAttributeSet(attributeSetId);
      const group = db.get('SELECT attribute_group_id FROM attribute_groups WHERE attribute_group_id = ? AND attribute_set_id = ?', [
        attributeGroupId,
        attributeSetId,
      ]);
      if (!group) {
        throw new CatalogError(
          'NO_SUCH_ENTITY',
          `The group with ID "${attributeGroupId}" doesn't belong to attribute set "${attributeSetId}".`,
        );
      }
      db.run(
        `INSERT INTO entity_attributes (attribute_set_id, attribute_group_id, attribute_id, sort_order)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(attribute_set_id, attribute_id) DO UPDATE SET
           attribute_group_id = excluded.attribute_group_id,
           sort_order = COALESCE(excluded.sort_order, sort_order)`,
        [attributeSetId, attributeGroupId, attributeId, sortOrder ?? null],
      );
    },

    getAttributeSetAssignments(code: string): AttributeSetAssignment[] {
      const attributeId = requireAttributeId(code);
      return db
        .query(
          'SELECT attribute_set_id, attribute_group_id, sort_order FROM entity_attributes WHERE attribute_id = ? ORDER BY attribute_set_id',
          [attributeId],
        )
        .map((row) => ({
          attributeSetId: readNumber(row, 'attribute_set_id'),
          attributeGroupId: readNumber(row, 'attribute_group_id'),
          sortOrder: readOptionalNumber(row, 'sort_order'),
        }));
    },
  };

  return repository;
}
