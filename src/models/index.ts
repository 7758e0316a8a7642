//data contracts for the BC3 import pipeline: upload → lines → concepts → catalog → quotation

//what the upload layer hands over; base64 text is accepted as it arrives from a form field
export interface Bc3Upload {
  content?: Uint8Array | string | null;
  filename?: string | null;
}

export type TextLines = readonly string[];

export type SupportedEncoding = 'windows-1252' | 'utf-8';

export interface DecodedFile {
  encoding: SupportedEncoding;
  lines: TextLines;
}

//one ~C record of the budget
export interface Concept {
  code: string;
  uom: string;
  description: string;
  price: number;
  quantity: number;
  versionId: string;
  lineNumber: number;
}

//keyed by concept code, the last occurrence of a code in the file wins
export type ConceptTable = Map<string, Concept>;

//every import run gets its own version marker, the order points back to it
export interface ImportVersion {
  id: string;
  name: string;
  createdAt: Date;
}

//catalog side
export interface UnitOfMeasure {
  id: string;
  name: string;
  isDefault: boolean;
}

export type CatalogItemType = 'service' | 'consumable' | 'product';

export interface NewCatalogItem {
  defaultCode: string;
  name: string;
  type: CatalogItemType;
  uomId: string;
  purchaseUomId: string;
  listPrice: number;
}

export interface CatalogItem extends NewCatalogItem {
  id: string;
  createdAt: Date;
}

//quotation side
export interface OrderHeader {
  title: string;
  versionId: string;
}

export interface Order extends OrderHeader {
  id: string;
  createdAt: Date;
}

export interface OrderLineDraft {
  orderId: string;
  catalogItemId: string;
  quantity: number;
  unitPrice: number;
  name: string;
  uomId: string;
}

export interface OrderLine extends OrderLineDraft {
  id: string;
  sequence: number;
}

//per-line diagnostics: logged, and handed back so callers can show a summary
interface BaseDiagnostic {
  lineNumber: number;
  line: string;
  message: string;
}

export interface MalformedLineWarning extends BaseDiagnostic {
  kind: 'malformed_line';
  severity: 'warning';
}

export interface LinePriceDiagnostic extends BaseDiagnostic {
  kind: 'line_price_error';
  severity: 'error';
}

export type LineDiagnostic = MalformedLineWarning | LinePriceDiagnostic;

export interface AuditEntry {
  step: 'decode' | 'extract' | 'reconcile' | 'assemble';
  timestamp: string;
  details: string;
}

export interface ImportSummary {
  encoding: SupportedEncoding;
  totalLines: number;
  conceptLines: number;
  importedConcepts: number;
  skippedLines: number;
  createdItems: number;
  fallbackUnits: number;
  diagnostics: LineDiagnostic[];
}

//final output of an import, the order is what the caller opens afterwards
export interface ImportResult {
  order: Order;
  lines: OrderLine[];
  version: ImportVersion;
  summary: ImportSummary;
  auditTrail: AuditEntry[];
}

export const CONCEPT_MARKER = '~C|';
export const FIELD_DELIMITER = '|';
export const MIN_CONCEPT_FIELDS = 4;
export const CONCEPT_QUANTITY = 1;
