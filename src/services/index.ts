//public API of the import pipeline
//the single controlled entry point into decode, extract, reconcile and assemble

export { Decoder, decodeBc3, decodeWindows1252, decodeUtf8, splitLines, DECODE_ATTEMPTS, type IDecoder, type DecodeAttempt } from './decoder.js';
export { ConceptExtractor, extractConcepts, parsePrice, type IConceptExtractor, type ExtractionResult } from './extractor.js';
export { CatalogReconciler, type ICatalogReconciler, type ResolvedLine } from './reconciler.js';
export { Bc3Importer, readUploadContent, type IBc3Importer, type Bc3ImporterDeps } from './importer.js';
