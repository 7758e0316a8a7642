//an import either lands completely or not at all
import Database from 'better-sqlite3';

export interface IUnitOfWork {
  run<T>(work: () => T): T;
}

//better-sqlite3 transactions nest as savepoints, so repositories may open their own inside
export class SqliteUnitOfWork implements IUnitOfWork {
  constructor(private db: Database.Database) {}

  run<T>(work: () => T): T {
    return this.db.transaction(work)();
  }
}
