// Import orchestrator: Decode → Extract → Reconcile → Assemble
import type { AuditEntry, Bc3Upload, ImportResult, LineDiagnostic, OrderLineDraft } from '../models/index.js';
import type { ICatalogRepository } from '../repository/catalog-repository.js';
import type { IOrderRepository } from '../repository/order-repository.js';
import type { IUnitOfWork } from '../repository/unit-of-work.js';
import { MissingInputError, NoValidDataError } from '../errors.js';
import { config } from '../config/env.js';
import { childLogger, type ImportLogger } from '../logger.js';
import { Decoder, type IDecoder } from './decoder.js';
import { ConceptExtractor, type IConceptExtractor } from './extractor.js';
import { CatalogReconciler, type ICatalogReconciler } from './reconciler.js';

export interface Bc3ImporterDeps {
  catalog: ICatalogRepository;
  orders: IOrderRepository;
  unitOfWork: IUnitOfWork;
  decoder?: IDecoder;
  extractor?: IConceptExtractor;
  reconciler?: ICatalogReconciler;
  logger?: ImportLogger;
  defaultOrderTitle?: string;
  defaultVersionName?: string;
}

//public importer interface
export interface IBc3Importer {
  importFile(upload: Bc3Upload): ImportResult;
}

//turns whatever the upload layer delivered into bytes, or nothing
export function readUploadContent(content: Bc3Upload['content']): Uint8Array | undefined {
  if (content == null) return undefined;
  const bytes = typeof content === 'string' ? Buffer.from(content, 'base64') : content;
  return bytes.length > 0 ? bytes : undefined;
}

export class Bc3Importer implements IBc3Importer {
  private orders: IOrderRepository;
  private unitOfWork: IUnitOfWork;
  private decoder: IDecoder;
  private extractor: IConceptExtractor;
  private reconciler: ICatalogReconciler;
  private log: ImportLogger;
  private defaultOrderTitle: string;
  private defaultVersionName: string;

  constructor(deps: Bc3ImporterDeps) {
    this.orders = deps.orders;
    this.unitOfWork = deps.unitOfWork;
    this.log = deps.logger ?? childLogger('importer');
    this.decoder = deps.decoder ?? new Decoder(undefined, this.log);
    this.extractor = deps.extractor ?? new ConceptExtractor(this.log);
    this.reconciler = deps.reconciler ?? new CatalogReconciler(deps.catalog, this.log);
    this.defaultOrderTitle = deps.defaultOrderTitle ?? config.BC3_DEFAULT_ORDER_TITLE;
    this.defaultVersionName = deps.defaultVersionName ?? config.BC3_DEFAULT_VERSION_NAME;
  }

  //import one uploaded file; nothing is persisted unless the whole run succeeds
  importFile(upload: Bc3Upload): ImportResult {
    const raw = readUploadContent(upload.content);
    if (!raw) throw new MissingInputError();
    const filename = upload.filename?.trim() || undefined;

    return this.unitOfWork.run(() => {
      const auditTrail: AuditEntry[] = [];

      //Step 1: Decode
      const decoded = this.decoder.decode(raw);
      this.audit(auditTrail, 'decode', `Decoded ${raw.length} bytes as ${decoded.encoding} into ${decoded.lines.length} lines`);

      //Step 2: Extract concepts under a fresh version marker
      const version = this.orders.createVersion(filename ?? this.defaultVersionName);
      const extraction = this.extractor.extract(decoded.lines, version.id);
      this.audit(auditTrail, 'extract', `Extracted ${extraction.concepts.size} concepts from ${extraction.conceptLines} concept lines${this.describeDiagnostics(extraction.diagnostics)}`);

      if (extraction.concepts.size === 0) throw new NoValidDataError();

      //Step 3: Reconcile every concept against the catalog
      const order = this.orders.createOrder({ title: filename ?? this.defaultOrderTitle, versionId: version.id });
      const drafts: OrderLineDraft[] = [];
      let createdItems = 0, fallbackUnits = 0;
      for (const concept of extraction.concepts.values()) {
        const resolved = this.reconciler.resolveLine(concept, order);
        drafts.push(resolved.draft);
        if (resolved.createdItem) createdItems++;
        if (resolved.usedDefaultUnit) fallbackUnits++;
      }
      this.audit(auditTrail, 'reconcile', `Resolved ${drafts.length} lines: ${createdItems} catalog items created, ${fallbackUnits} default units used`);

      //Step 4: Assemble the quotation
      const lines = this.orders.createLines(drafts);
      this.audit(auditTrail, 'assemble', `Order ${order.id} "${order.title}" created with ${lines.length} lines`);

      return {
        order, lines, version, auditTrail,
        summary: {
          encoding: decoded.encoding,
          totalLines: decoded.lines.length,
          conceptLines: extraction.conceptLines,
          importedConcepts: extraction.concepts.size,
          skippedLines: extraction.diagnostics.length,
          createdItems,
          fallbackUnits,
          diagnostics: extraction.diagnostics,
        },
      };
    });
  }

  private describeDiagnostics(diagnostics: LineDiagnostic[]): string {
    if (!diagnostics.length) return '';
    const malformed = diagnostics.filter(d => d.kind === 'malformed_line').length;
    return `, skipped ${malformed} malformed and ${diagnostics.length - malformed} with invalid price`;
  }

  private audit(trail: AuditEntry[], step: AuditEntry['step'], details: string): void {
    const entry: AuditEntry = { step, timestamp: new Date().toISOString(), details };
    trail.push(entry);
    this.log.info({ step }, details);
  }
}
