/**
 * Catalog schema - stores, attributes, options, attribute sets and groups.
 */

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS stores (
    store_id INTEGER PRIMARY KEY,
    code TEXT UNIQUE NOT NULL,
    name TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS attributes (
    attribute_id INTEGER PRIMARY KEY AUTOINCREMENT,
    attribute_code TEXT UNIQUE NOT NULL,
    frontend_input TEXT NOT NULL DEFAULT 'text',
    frontend_label TEXT NOT NULL DEFAULT '',
    backend_model TEXT NOT NULL DEFAULT '',
    source_model TEXT NOT NULL DEFAULT '',
    default_value TEXT NOT NULL DEFAULT '',
    apply_to TEXT NOT NULL DEFAULT '',
    properties TEXT NOT NULL DEFAULT '{}',
    created_at INTEGER DEFAULT (strftime('%s','now') * 1000),
    updated_at INTEGER DEFAULT (strftime('%s','now') * 1000)
  );

  CREATE TABLE IF NOT EXISTS attribute_labels (
    attribute_id INTEGER NOT NULL,
    store_id INTEGER NOT NULL,
    label TEXT NOT NULL,
    PRIMARY KEY (attribute_id, store_id),
    FOREIGN KEY (attribute_id) REFERENCES attributes(attribute_id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS attribute_options (
    option_id INTEGER PRIMARY KEY AUTOINCREMENT,
    attribute_id INTEGER NOT NULL,
    sort_order INTEGER NOT NULL DEFAULT 0,
    FOREIGN KEY (attribute_id) REFERENCES attributes(attribute_id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS attribute_option_values (
    option_id INTEGER NOT NULL,
    store_id INTEGER NOT NULL,
    value TEXT NOT NULL,
    PRIMARY KEY (option_id, store_id),
    FOREIGN KEY (option_id) REFERENCES attribute_options(option_id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS attribute_sets (
    attribute_set_id INTEGER PRIMARY KEY AUTOINCREMENT,
    attribute_set_name TEXT UNIQUE NOT NULL,
    sort_order INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS attribute_groups (
    attribute_group_id INTEGER PRIMARY KEY AUTOINCREMENT,
    attribute_set_id INTEGER NOT NULL,
    attribute_group_name TEXT NOT NULL,
    sort_order INTEGER NOT NULL DEFAULT 0,
    is_default INTEGER NOT NULL DEFAULT 0,
    UNIQUE (attribute_set_id, attribute_group_name),
    FOREIGN KEY (attribute_set_id) REFERENCES attribute_sets(attribute_set_id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS entity_attributes (
    attribute_set_id INTEGER NOT NULL,
    attribute_group_id INTEGER NOT NULL,
    attribute_id INTEGER NOT NULL,
    sort_order INTEGER,
    PRIMARY KEY (attribute_set_id, attribute_id),
    FOREIGN KEY (attribute_set_id) REFERENCES attribute_sets(attribute_set_id) ON DELETE CASCADE,
    FOREIGN KEY (attribute_group_id) REFERENCES attribute_groups(attribute_group_id) ON DELETE CASCADE,
    FOREIGN KEY (attribute_id) REFERENCES attributes(attribute_id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_attribute_options_attribute ON attribute_options(attribute_id);
  CREATE INDEX IF NOT EXISTS idx_attribute_groups_set ON attribute_groups(attribute_set_id);
`;

/** Id of the seeded default attribute set */
export const DEFAULT_ATTRIBUTE_SET_ID = 1;

export const SEED_SQL = `
  INSERT OR IGNORE INTO stores (store_id, code, name) VALUES (0, 'admin', 'Admin');
  INSERT OR IGNORE INTO stores (store_id, code, name) VALUES (1, 'default', 'Default Store View');

  INSERT OR IGNORE INTO attribute_sets (attribute_set_id, attribute_set_name, sort_order)
    VALUES (${DEFAULT_ATTRIBUTE_SET_ID}, 'Default', 0);

  INSERT OR IGNORE INTO attribute_groups (attribute_group_id, attribute_set_id, attribute_group_name, sort_order, is_default)
    VALUES (1, ${DEFAULT_ATTRIBUTE_SET_ID}, 'General', 1, 1);
  INSERT OR IGNORE INTO attribute_groups (attribute_group_id, attribute_set_id, attribute_group_name, sort_order, is_default)
    VALUES (2, ${DEFAULT_ATTRIBUTE_SET_ID}, 'Prices', 2, 0);
`;
