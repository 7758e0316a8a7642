#!/usr/bin/env node
import { readFileSync, existsSync, unlinkSync } from 'fs';
import { basename } from 'path';
import { initializeDatabase, closeDatabase } from './repository/database.js';
import { CatalogRepository } from './repository/catalog-repository.js';
import { OrderRepository } from './repository/order-repository.js';
import { SqliteUnitOfWork } from './repository/unit-of-work.js';
import { Bc3Importer } from './services/importer.js';
import { Bc3ImportError } from './errors.js';
import { config } from './config/env.js';
import { logger } from './logger.js';
import type { ImportResult } from './models/index.js';

//parse CLI flags
const args = process.argv.slice(2);
const [useFresh, useMemory] = [['--fresh', '-f'], ['--memory', '-m']].map(f => f.some(x => args.includes(x)));
const dbFlag = args.indexOf('--db');
const dbOverride = dbFlag !== -1 ? args[dbFlag + 1] : undefined;
const filePath = args.find((a, i) => !a.startsWith('-') && args[i - 1] !== '--db');

//ANSI color helpers
const c = { reset: '\x1b[0m', bright: '\x1b[1m', dim: '\x1b[2m', green: '\x1b[32m', yellow: '\x1b[33m', cyan: '\x1b[36m', red: '\x1b[31m' };

const log = console.log;
const header = (t: string) => log(`\n${c.bright}${c.cyan}${'='.repeat(70)}\n ${t}\n${'='.repeat(70)}${c.reset}`);
const money = (n: number) => n.toFixed(2).padStart(12);

const printResult = (r: ImportResult) => {
  header(`Quotation: ${r.order.title}`);
  log(`${c.dim}order=${r.order.id} version=${r.version.id} (${r.version.name})${c.reset}\n`);
  r.lines.forEach(l => log(`  ${String(l.sequence).padStart(4)}  ${l.name.slice(0, 44).padEnd(44)} ${l.quantity.toFixed(2).padStart(6)} x${money(l.unitPrice)}`));
  const total = r.lines.reduce((sum, l) => sum + l.quantity * l.unitPrice, 0);
  log(`\n  ${'Total'.padEnd(62)}${c.bright}${money(total)}${c.reset}`);

  const s = r.summary;
  log(`\n${c.green}Imported ${s.importedConcepts} concepts${c.reset} from ${s.conceptLines} concept lines (${s.totalLines} lines, ${s.encoding})`);
  log(`${c.dim}Catalog items created: ${s.createdItems}, default units used: ${s.fallbackUnits}${c.reset}`);
  if (s.diagnostics.length) {
    log(`${c.yellow}Skipped ${s.skippedLines} lines:${c.reset}`);
    s.diagnostics.forEach(d => log(`${d.severity === 'error' ? c.red : c.yellow}  line ${d.lineNumber}: ${d.message}${c.reset}`));
  }
};

//entry point
function main(): number {
  if (!filePath) {
    log(`Usage: bc3-import <file.bc3> [--db <path>] [--memory|-m] [--fresh|-f]`);
    return 2;
  }
  const dbPath = useMemory ? ':memory:' : dbOverride ?? config.BC3_DB_PATH;
  if (useFresh && !useMemory && existsSync(dbPath)) { unlinkSync(dbPath); log(`${c.yellow}Cleared database${c.reset}`); }

  const db = initializeDatabase(dbPath);
  try {
    const importer = new Bc3Importer({ catalog: new CatalogRepository(db), orders: new OrderRepository(db), unitOfWork: new SqliteUnitOfWork(db) });
    printResult(importer.importFile({ content: readFileSync(filePath), filename: basename(filePath) }));
    return 0;
  } catch (err) {
    if (!(err instanceof Bc3ImportError)) throw err;
    logger.error({ code: err.code }, err.message);
    log(`${c.red}${err.message}${c.reset}`);
    return 1;
  } finally { closeDatabase(db); }
}

process.exitCode = main();
