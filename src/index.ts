// src/index.ts
export { HydrationExtractor, extract, extractChunks } from './core/extractor.js';
export { search, findDataByPattern, getAllKeys } from './core/search/index.js';
export { parseStructured } from './core/parse/structured.js';
export { parseJsLiteral, parseLenient, nestingDepth } from './core/parse/permissive.js';
export { reassemble } from './core/assemble/reassembler.js';
export { ScannerRegistry, createScannerRegistry } from './core/scan/registry.js';
export { BaseScanner } from './core/scan/scanners/base.js';
export { PushMarkerScanner } from './core/scan/scanners/push-marker.js';
export { NextDataScanner } from './core/scan/scanners/next-data.js';
export { formatReportJson, summarizeReport } from './core/report/json.js';
export { ErrorCode, HydrationError } from './core/errors.js';
export { LiteralSyntaxError } from './core/parse/errors.js';
export type { LiteralErrorCode } from './core/parse/errors.js';
export type { StructuredParse } from './core/parse/structured.js';
export type { MarkerScanner, ScanOutcome } from './core/scan/types.js';
export type {
  Chunk,
  ChunkSource,
  DuplicateChunkWarning,
  ExtractionReport,
  ExtractionStats,
  ExtractionWarning,
  ExtractorOptions,
  JsObjectResult,
  JsonObject,
  JsonResult,
  JsonValue,
  ParsedResult,
  ParsedRowItem,
  ParseFailure,
  Payload,
  RowItem,
  RowsResult,
  ScanWarning,
  SearchMatch,
  SearchOptions,
  TextRowItem,
  UnparseableResult,
  UnparseableRowItem,
} from './core/types/index.js';
