/**
 * Catalog domain types
 */

/** Store id of the admin (all stores) scope */
export const ADMIN_STORE_ID = 0;

/** Backend model stored for multiselect attributes (comma-joined option ids) */
export const ARRAY_BACKEND_MODEL = 'array';

export interface StoreLabel {
  storeId: number;
  label: string;
}

export interface AttributeRecord {
  id: number;
  code: string;
  frontendInput: string;
  frontendLabel: string;
  backendModel: string;
  sourceModel: string;
  defaultValue: string;
  applyTo: string;
  /** Column values with no dedicated field (flags, scope, position...) */
  properties: Record<string, string>;
  storeLabels: StoreLabel[];
}

/**
 * Attribute definition as imported: column name -> trimmed cell value.
 * `input`, `label`, `default`, `backend`, `source` and `apply_to` map onto
 * the typed fields of AttributeRecord; every other key is a property.
 */
export type AttributeData = Record<string, string>;

export interface AttributeOption {
  id: number;
  /** Admin (store 0) label */
  label: string;
  sortOrder: number;
  storeLabels: StoreLabel[];
}

export interface NewAttributeOption {
  label: string;
  sortOrder?: number;
  /** Store-specific labels; store 0 entries are ignored (the admin label is `label`) */
  storeLabels: StoreLabel[];
}

export interface AttributeSetRecord {
  id: number;
  name: string;
  sortOrder: number;
}

export interface AttributeGroupRecord {
  id: number;
  attributeSetId: number;
  name: string;
  sortOrder: number;
  isDefault: boolean;
}

export interface AttributeSetAssignment {
  attributeSetId: number;
  attributeGroupId: number;
  sortOrder?: number;
}
