//catalog port: the two exact-match lookups the reconciler needs, plus item creation
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { CatalogItem, CatalogItemType, NewCatalogItem, UnitOfMeasure } from '../models/index.js';

export interface ICatalogRepository {
  //exact display-name match
  findUnitByName(name: string): UnitOfMeasure | undefined;
  getDefaultUnit(): UnitOfMeasure;
  //exact internal-reference-code match
  findItemByCode(defaultCode: string): CatalogItem | undefined;
  //returns the stored item for this code, which is an existing one if another writer got there first
  createItem(item: NewCatalogItem): CatalogItem;
}

export class CatalogRepository implements ICatalogRepository {
  constructor(private db: Database.Database) {}

  findUnitByName(name: string): UnitOfMeasure | undefined {
    const row = this.db.prepare<[string], UnitRow>(`SELECT * FROM units_of_measure WHERE name = ? LIMIT 1`).get(name);
    return row ? this.toUnit(row) : undefined;
  }

  getDefaultUnit(): UnitOfMeasure {
    const row = this.db.prepare<[], UnitRow>(`SELECT * FROM units_of_measure WHERE is_default = 1 LIMIT 1`).get();
    if (!row) throw new Error('Catalog has no default unit of measure; was the database initialized?');
    return this.toUnit(row);
  }

  findItemByCode(defaultCode: string): CatalogItem | undefined {
    const row = this.db.prepare<[string], CatalogItemRow>(`SELECT * FROM catalog_items WHERE default_code = ? LIMIT 1`).get(defaultCode);
    return row ? this.toItem(row) : undefined;
  }

  createItem(item: NewCatalogItem): CatalogItem {
    this.db.prepare(`INSERT INTO catalog_items (id, default_code, name, type, uom_id, purchase_uom_id, list_price, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?) ON CONFLICT(default_code) DO NOTHING`)
      .run(uuidv4(), item.defaultCode, item.name, item.type, item.uomId, item.purchaseUomId, item.listPrice, new Date().toISOString());
    const stored = this.findItemByCode(item.defaultCode);
    if (!stored) throw new Error(`Catalog item "${item.defaultCode}" vanished after insert`);
    return stored;
  }

  private toUnit(r: UnitRow): UnitOfMeasure {
    return { id: r.id, name: r.name, isDefault: r.is_default === 1 };
  }

  private toItem(r: CatalogItemRow): CatalogItem {
    return { id: r.id, defaultCode: r.default_code, name: r.name, type: r.type, uomId: r.uom_id, purchaseUomId: r.purchase_uom_id, listPrice: r.list_price, createdAt: new Date(r.created_at) };
  }
}

//row types (DB → App mapping)
interface UnitRow { id: string; name: string; is_default: number; }
interface CatalogItemRow { id: string; default_code: string; name: string; type: CatalogItemType; uom_id: string; purchase_uom_id: string; list_price: number; created_at: string; }
