//CatalogReconciler: resolves each concept against the catalog and turns it into a quotation line
//units fall back to the default unit on a miss, items are created on a miss
import type { CatalogItem, Concept, Order, OrderLineDraft, UnitOfMeasure } from '../models/index.js';
import type { ICatalogRepository } from '../repository/catalog-repository.js';
import { childLogger, type ImportLogger } from '../logger.js';

export interface ResolvedLine {
  draft: OrderLineDraft;
  createdItem: boolean;
  usedDefaultUnit: boolean;
}

export interface ICatalogReconciler {
  resolveLine(concept: Concept, order: Pick<Order, 'id'>): ResolvedLine;
}

export class CatalogReconciler implements ICatalogReconciler {
  constructor(private catalog: ICatalogRepository, private log: ImportLogger = childLogger('reconciler')) {}

  resolveLine(concept: Concept, order: Pick<Order, 'id'>): ResolvedLine {
    const { unit, isFallback } = this.resolveUnit(concept.uom);
    const { item, created } = this.resolveItem(concept, unit);

    return {
      draft: {
        orderId: order.id,
        catalogItemId: item.id,
        quantity: concept.quantity,
        unitPrice: concept.price,
        name: concept.description,
        uomId: unit.id,
      },
      createdItem: created,
      usedDefaultUnit: isFallback,
    };
  }

  resolveUnit(name: string): { unit: UnitOfMeasure; isFallback: boolean } {
    const unit = this.catalog.findUnitByName(name);
    if (unit) return { unit, isFallback: false };
    const fallback = this.catalog.getDefaultUnit();
    this.log.debug({ uom: name, fallback: fallback.name }, 'unknown unit of measure, using default');
    return { unit: fallback, isFallback: true };
  }

  //items are matched on the concept description, not on its budget code
  resolveItem(concept: Concept, unit: UnitOfMeasure): { item: CatalogItem; created: boolean } {
    const existing = this.catalog.findItemByCode(concept.description);
    if (existing) return { item: existing, created: false };

    const item = this.catalog.createItem({
      defaultCode: concept.description,
      name: concept.description,
      type: 'service',
      uomId: unit.id,
      purchaseUomId: unit.id,
      listPrice: concept.price,
    });
    this.log.info({ itemId: item.id, defaultCode: item.defaultCode, code: concept.code }, 'created catalog item');
    return { item, created: true };
  }
}
