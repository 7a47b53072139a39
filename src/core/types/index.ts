// src/core/types/index.ts
import type { ErrorCode } from '../errors.js';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type ChunkSource = 'push' | 'next-data';

export interface Chunk {
  stream: string;
  index: number;
  rawText: string;
  position: number;
  source: ChunkSource;
}

export interface Payload {
  stream: string;
  text: string;
  chunkCount: number;
  indices: number[];
  positions: number[];
}

interface ResultBase {
  readonly stream: string;
  readonly text: string;
  readonly chunkCount: number;
  readonly positions: readonly number[];
}

export interface JsonResult extends ResultBase {
  readonly kind: 'json';
  readonly value: JsonValue;
  readonly identifier?: string;
}

export interface JsObjectResult extends ResultBase {
  readonly kind: 'js_object';
  readonly value: JsonValue;
  readonly identifier?: string;
}

export interface ParsedRowItem {
  readonly identifier: string;
  readonly tag?: string;
  readonly kind: 'json' | 'js_object';
  readonly value: JsonValue;
}

// `T<hex length>,` rows carry raw text
export interface TextRowItem {
  readonly identifier: string;
  readonly tag: 'T';
  readonly kind: 'text';
  readonly value: string;
}

export interface UnparseableRowItem {
  readonly identifier: string;
  readonly kind: 'unparseable';
  readonly text: string;
  readonly reason: string;
}

export type RowItem = ParsedRowItem | TextRowItem | UnparseableRowItem;

/**
 * A payload of newline-separated `id:value` rows, one item per row.
 */
export interface RowsResult extends ResultBase {
  readonly kind: 'rows';
  readonly items: readonly RowItem[];
}

export interface UnparseableResult extends ResultBase {
  readonly kind: 'unparseable';
  readonly reason: string;
}

export type ParsedResult = JsonResult | JsObjectResult | RowsResult | UnparseableResult;

export interface ScanWarning {
  code: ErrorCode.MALFORMED_MARKER;
  scanner: string;
  position: number;
  message: string;
}

export interface DuplicateChunkWarning {
  code: ErrorCode.DUPLICATE_CHUNK;
  stream: string;
  index: number;
  position: number;
  message: string;
}

export type ExtractionWarning = ScanWarning | DuplicateChunkWarning;

export interface ParseFailure {
  code: ErrorCode.PARSE_FAILED;
  stream: string;
  resultIndex: number;
  reason: string;
}

export interface ExtractionStats {
  chunksSeen: number;
  payloadsAssembled: number;
  parseFailures: number;
  warnings: number;
}

export interface ExtractionReport {
  readonly results: readonly ParsedResult[];
  readonly warnings: readonly ExtractionWarning[];
  readonly failures: readonly ParseFailure[];
  readonly stats: Readonly<ExtractionStats>;
}

export interface ExtractorOptions {
  receivers?: readonly string[];
  nextData?: boolean;
  verbose?: boolean;
}

export interface SearchMatch {
  resultIndex: number;
  // Set when the value sits in a row of a `rows` result
  item?: number;
  identifier?: string;
  path: string;
  value: JsonValue;
}

export interface SearchOptions {
  deep?: boolean;
}
