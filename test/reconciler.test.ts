import { describe, it, expect, beforeEach } from 'vitest';
import { CatalogReconciler } from '../src/services/reconciler.js';
import type { Concept } from '../src/models/index.js';
import { InMemoryCatalog } from './fakes/in-memory-catalog.js';
import { createRecordingLogger } from './setup.js';

const concept = (overrides: Partial<Concept> = {}): Concept => ({
  code: 'A1', uom: 'm2', description: 'Concrete wall', price: 12.5, quantity: 1, versionId: 'v1', lineNumber: 1, ...overrides,
});

describe('CatalogReconciler', () => {
  let catalog: InMemoryCatalog, reconciler: CatalogReconciler;

  beforeEach(() => { catalog = new InMemoryCatalog(['m2', 'm3']); reconciler = new CatalogReconciler(catalog, createRecordingLogger()); });

  it('creates a service item for an unknown description', () => {
    const resolved = reconciler.resolveLine(concept(), { id: 'order-1' });

    expect(catalog.items).toHaveLength(1);
    const item = catalog.items[0];
    expect(item).toMatchObject({ defaultCode: 'Concrete wall', name: 'Concrete wall', type: 'service', uomId: 'uom-m2', purchaseUomId: 'uom-m2', listPrice: 12.5 });
    expect(resolved).toEqual({
      draft: { orderId: 'order-1', catalogItemId: item?.id, quantity: 1, unitPrice: 12.5, name: 'Concrete wall', uomId: 'uom-m2' },
      createdItem: true,
      usedDefaultUnit: false,
    });
  });

  it('reuses an item whose reference code equals the description', () => {
    const existing = catalog.createItem({ defaultCode: 'Concrete wall', name: 'Wall (catalog)', type: 'service', uomId: 'uom-m2', purchaseUomId: 'uom-m2', listPrice: 99 });

    const resolved = reconciler.resolveLine(concept({ price: 14 }), { id: 'order-1' });

    expect(catalog.items).toHaveLength(1);
    expect(resolved.createdItem).toBe(false);
    expect(resolved.draft.catalogItemId).toBe(existing.id);
    expect(resolved.draft.unitPrice).toBe(14);
  });

  it('matches the description exactly', () => {
    catalog.createItem({ defaultCode: 'concrete wall', name: 'lower', type: 'service', uomId: 'uom-m2', purchaseUomId: 'uom-m2', listPrice: 1 });
    expect(reconciler.resolveLine(concept(), { id: 'order-1' }).createdItem).toBe(true);
    expect(catalog.items).toHaveLength(2);
  });

  it('falls back to the default unit and never creates one', () => {
    const resolved = reconciler.resolveLine(concept({ uom: 'ud', description: 'Door' }), { id: 'order-1' });

    expect(resolved.usedDefaultUnit).toBe(true);
    expect(resolved.draft.uomId).toBe('uom-default');
    expect(catalog.items[0]?.uomId).toBe('uom-default');
    expect(catalog.units.map(u => u.name)).toEqual(['Units', 'm2', 'm3']);
  });
});
