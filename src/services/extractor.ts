//ConceptExtractor: picks the ~C records out of the decoded lines and folds them into a table by code
//lines of any other record type are skipped without a trace; broken ~C lines are reported and skipped
import type { Concept, ConceptTable, LineDiagnostic, TextLines } from '../models/index.js';
import { CONCEPT_MARKER, CONCEPT_QUANTITY, FIELD_DELIMITER, MIN_CONCEPT_FIELDS } from '../models/index.js';
import { LinePriceError } from '../errors.js';
import { childLogger, type ImportLogger } from '../logger.js';

export interface ExtractionResult {
  concepts: ConceptTable;
  diagnostics: LineDiagnostic[];
  conceptLines: number;
}

export interface IConceptExtractor {
  extract(lines: TextLines, versionId: string): ExtractionResult;
}

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

//"12,50" and "12.50" are the same price; an empty field means 0
export function parsePrice(text: string): number {
  if (text === '') return 0;
  const normalized = text.replace(/,/g, '.').trim();
  if (!DECIMAL_LITERAL.test(normalized)) throw new LinePriceError(text);
  const value = Number(normalized);
  if (!Number.isFinite(value) || value < 0) throw new LinePriceError(text);
  // -0 is still zero
  return value === 0 ? 0 : value;
}

export class ConceptExtractor implements IConceptExtractor {
  constructor(private log: ImportLogger = childLogger('extractor')) {}

  extract(lines: TextLines, versionId: string): ExtractionResult {
    const concepts: ConceptTable = new Map();
    const diagnostics: LineDiagnostic[] = [];
    let conceptLines = 0;

    lines.forEach((raw, index) => {
      const line = raw.trim();
      if (!line.startsWith(CONCEPT_MARKER)) return;
      conceptLines++;

      const lineNumber = index + 1;
      const fields = line.slice(CONCEPT_MARKER.length).split(FIELD_DELIMITER);
      if (fields.length < MIN_CONCEPT_FIELDS) {
        const message = `Concept line ignored due to incorrect format: ${line}`;
        this.log.warn({ lineNumber, fields: fields.length }, message);
        diagnostics.push({ kind: 'malformed_line', severity: 'warning', lineNumber, line, message });
        return;
      }

      const [rawCode = '', uom = '', description = '', priceText = ''] = fields;
      const code = rawCode.trim();
      if (!code) return;

      let price: number;
      try {
        price = parsePrice(priceText);
      } catch (err) {
        if (!(err instanceof LinePriceError)) throw err;
        const message = `Error processing line '${line}': ${err.message}`;
        this.log.error({ lineNumber, priceText: err.priceText }, message);
        diagnostics.push({ kind: 'line_price_error', severity: 'error', lineNumber, line, message });
        return;
      }

      const concept: Concept = { code, uom, description, price, quantity: CONCEPT_QUANTITY, versionId, lineNumber };
      concepts.set(code, concept);
    });

    return { concepts, diagnostics, conceptLines };
  }
}

export function extractConcepts(lines: TextLines, versionId: string): ExtractionResult {
  return new ConceptExtractor().extract(lines, versionId);
}
