//catalog port backed by plain maps, for reconciler tests that need no database
import type { CatalogItem, NewCatalogItem, UnitOfMeasure } from '../../src/models/index.js';
import type { ICatalogRepository } from '../../src/repository/catalog-repository.js';

export class InMemoryCatalog implements ICatalogRepository {
  readonly units: UnitOfMeasure[];
  readonly items: CatalogItem[] = [];
  private nextId = 1;

  constructor(unitNames: string[] = ['m2', 'm3']) {
    this.units = [{ id: 'uom-default', name: 'Units', isDefault: true }, ...unitNames.map(name => ({ id: `uom-${name}`, name, isDefault: false }))];
  }

  findUnitByName(name: string): UnitOfMeasure | undefined {
    return this.units.find(u => u.name === name);
  }

  getDefaultUnit(): UnitOfMeasure {
    const unit = this.units.find(u => u.isDefault);
    if (!unit) throw new Error('no default unit');
    return unit;
  }

  findItemByCode(defaultCode: string): CatalogItem | undefined {
    return this.items.find(i => i.defaultCode === defaultCode);
  }

  //plain insert, no uniqueness check on defaultCode
  createItem(item: NewCatalogItem): CatalogItem {
    const stored: CatalogItem = { ...item, id: `item-${this.nextId++}`, createdAt: new Date() };
    this.items.push(stored);
    return stored;
  }
}
