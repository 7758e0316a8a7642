//order port: import versions, quotation headers and their lines
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { ImportVersion, Order, OrderHeader, OrderLine, OrderLineDraft } from '../models/index.js';

export interface IOrderRepository {
  createVersion(name: string): ImportVersion;
  createOrder(header: OrderHeader): Order;
  //lines keep the order they are given in, as their sequence
  createLines(drafts: OrderLineDraft[]): OrderLine[];
  findOrderById(id: string): Order | undefined;
  findLinesByOrder(orderId: string): OrderLine[];
  countOrders(): number;
}

export class OrderRepository implements IOrderRepository {
  constructor(private db: Database.Database) {}

  createVersion(name: string): ImportVersion {
    const version: ImportVersion = { id: uuidv4(), name, createdAt: new Date() };
    this.db.prepare(`INSERT INTO import_versions (id, name, created_at) VALUES (?, ?, ?)`).run(version.id, version.name, version.createdAt.toISOString());
    return version;
  }

  createOrder(header: OrderHeader): Order {
    const order: Order = { id: uuidv4(), title: header.title, versionId: header.versionId, createdAt: new Date() };
    this.db.prepare(`INSERT INTO orders (id, title, version_id, created_at) VALUES (?, ?, ?, ?)`).run(order.id, order.title, order.versionId, order.createdAt.toISOString());
    return order;
  }

  createLines(drafts: OrderLineDraft[]): OrderLine[] {
    const insert = this.db.prepare(`INSERT INTO order_lines (id, order_id, sequence, catalog_item_id, name, quantity, unit_price, uom_id) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`);
    const lines = drafts.map((d, i): OrderLine => ({ ...d, id: uuidv4(), sequence: (i + 1) * 10 }));
    this.db.transaction(() => {
      for (const l of lines) insert.run(l.id, l.orderId, l.sequence, l.catalogItemId, l.name, l.quantity, l.unitPrice, l.uomId);
    })();
    return lines;
  }

  findOrderById(id: string): Order | undefined {
    const row = this.db.prepare<[string], OrderRow>(`SELECT * FROM orders WHERE id = ?`).get(id);
    return row ? { id: row.id, title: row.title, versionId: row.version_id, createdAt: new Date(row.created_at) } : undefined;
  }

  findLinesByOrder(orderId: string): OrderLine[] {
    return this.db.prepare<[string], OrderLineRow>(`SELECT * FROM order_lines WHERE order_id = ? ORDER BY sequence ASC`).all(orderId)
      .map(r => ({ id: r.id, orderId: r.order_id, sequence: r.sequence, catalogItemId: r.catalog_item_id, name: r.name, quantity: r.quantity, unitPrice: r.unit_price, uomId: r.uom_id }));
  }

  countOrders(): number {
    return this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM orders`).get()?.n ?? 0;
  }
}

//row types (DB → App mapping)
interface OrderRow { id: string; title: string; version_id: string; created_at: string; }
interface OrderLineRow { id: string; order_id: string; sequence: number; catalog_item_id: string; name: string; quantity: number; unit_price: number; uom_id: string; }
