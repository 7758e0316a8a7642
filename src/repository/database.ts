//this file manages the database schema and initialization for the catalog and the imported quotations

import Database from 'better-sqlite3';

//SQL SCHEMA DEFINITION
const SCHEMA = `
-- Units of measure, matched by display name
CREATE TABLE IF NOT EXISTS units_of_measure (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  is_default INTEGER NOT NULL DEFAULT 0
);

-- Catalog items, matched by internal reference code
-- default_code is unique: imports that race on the same code share one item
CREATE TABLE IF NOT EXISTS catalog_items (
  id TEXT PRIMARY KEY,
  default_code TEXT NOT NULL UNIQUE,
  name TEXT NOT NULL,
  type TEXT NOT NULL CHECK (type IN ('service', 'consumable', 'product')),
  uom_id TEXT NOT NULL REFERENCES units_of_measure(id),
  purchase_uom_id TEXT NOT NULL REFERENCES units_of_measure(id),
  list_price REAL NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL
);

-- One row per import run
CREATE TABLE IF NOT EXISTS import_versions (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  created_at TEXT NOT NULL
);

-- Quotations
CREATE TABLE IF NOT EXISTS orders (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  version_id TEXT NOT NULL REFERENCES import_versions(id),
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS order_lines (
  id TEXT PRIMARY KEY,
  order_id TEXT NOT NULL REFERENCES orders(id),
  sequence INTEGER NOT NULL,
  catalog_item_id TEXT NOT NULL REFERENCES catalog_items(id),
  name TEXT NOT NULL,
  quantity REAL NOT NULL,
  unit_price REAL NOT NULL,
  uom_id TEXT NOT NULL REFERENCES units_of_measure(id)
);

CREATE INDEX IF NOT EXISTS idx_order_lines_order_id ON order_lines(order_id);
CREATE INDEX IF NOT EXISTS idx_orders_version_id ON orders(version_id);
`;

//units every catalog starts with; "Units" is the fallback for names the catalog does not know
const SEED_UNITS: { id: string; name: string; isDefault: boolean }[] = [
  { id: 'uom-unit', name: 'Units', isDefault: true },
  { id: 'uom-m', name: 'm', isDefault: false },
  { id: 'uom-m2', name: 'm2', isDefault: false },
  { id: 'uom-m3', name: 'm3', isDefault: false },
  { id: 'uom-kg', name: 'kg', isDefault: false },
  { id: 'uom-h', name: 'h', isDefault: false },
];

//initializing the database
//WAL- better concurrency for read-heavy workloads
//foreign keys- lines can only point at catalog rows that exist
export function initializeDatabase(dbPath: string = ':memory:'): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  //db schema execution
  db.exec(SCHEMA);

  const seed = db.prepare<[string, string, number]>('INSERT OR IGNORE INTO units_of_measure (id, name, is_default) VALUES (?, ?, ?)');
  db.transaction(() => {
    for (const u of SEED_UNITS) seed.run(u.id, u.name, u.isDefault ? 1 : 0);
  })();

  return db;
}

//closing the database connection
export function closeDatabase(db: Database.Database): void {
  db.close();
}
