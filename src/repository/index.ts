export { initializeDatabase, closeDatabase } from './database.js';
export { CatalogRepository, type ICatalogRepository } from './catalog-repository.js';
export { OrderRepository, type IOrderRepository } from './order-repository.js';
export { SqliteUnitOfWork, type IUnitOfWork } from './unit-of-work.js';
