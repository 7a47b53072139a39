// src/core/extractor.ts
import { createScannerRegistry, type ScannerRegistry } from './scan/registry.js';
import { reassemble } from './assemble/reassembler.js';
import { parseStructured } from './parse/structured.js';
import { buildExtractionReport, buildResult, preview } from './report/json.js';
import { search, findDataByPattern, getAllKeys } from './search/index.js';
import { ErrorCode, HydrationError, assertText, describeType } from './errors.js';
import { DEFAULT_RECEIVERS } from './config/constants.js';
import type {
  Chunk,
  ExtractionReport,
  ExtractionWarning,
  ExtractorOptions,
  ParsedResult,
  SearchMatch,
  SearchOptions,
} from './types/index.js';

function validateReceivers(receivers: unknown): readonly string[] {
  if (receivers === undefined) {
    return DEFAULT_RECEIVERS;
  }

  const names = Array.isArray(receivers)
    ? receivers.filter((name): name is string => typeof name === 'string' && name.length > 0)
    : [];

  if (!Array.isArray(receivers) || names.length !== receivers.length) {
    throw new HydrationError(
      ErrorCode.INVALID_INPUT,
      `Expected receivers to be an array of names, received ${describeType(receivers)}`,
      { received: describeType(receivers) }
    );
  }

  return names;
}

export class HydrationExtractor {
  private registry: ScannerRegistry;
  private verbose: boolean;

  constructor(options: ExtractorOptions = {}) {
    this.registry = createScannerRegistry({
      receivers: validateReceivers(options.receivers),
      nextData: options.nextData ?? true,
    });
    this.verbose = options.verbose ?? false;
  }

  /**
   * Raw chunk records in the order their markers appear in `text`.
   */
  extractChunks(text: string): Chunk[] {
    assertText(text);
    return this.registry.scan(text).chunks;
  }

  extract(text: string): ExtractionReport {
    assertText(text);

    const scanned = this.registry.scan(text);
    if (this.verbose) {
      console.log(`[Scan] ${scanned.chunks.length} chunks, ${scanned.warnings.length} malformed markers`);
      for (const warning of scanned.warnings) {
        console.warn(`[Scan] ${warning.scanner} marker at ${warning.position}: ${warning.message}`);
      }
    }

    const { payloads, warnings: duplicates } = reassemble(scanned.chunks);
    if (this.verbose) {
      console.log(`[Assemble] ${payloads.length} payloads`);
      for (const duplicate of duplicates) {
        console.warn(`[Assemble] ${duplicate.message}`);
      }
    }

    const results: ParsedResult[] = payloads.map(payload => {
      const result = buildResult(payload, parseStructured(payload.text));
      if (this.verbose && result.kind === 'unparseable') {
        console.warn(`[Parse] stream ${payload.stream}: ${result.reason} (${preview(payload.text)})`);
      }
      return result;
    });

    const warnings: ExtractionWarning[] = [...scanned.warnings, ...duplicates];
    return buildExtractionReport(results, warnings, scanned.chunks.length);
  }

  search(report: ExtractionReport, key: string, options?: SearchOptions): Iterable<SearchMatch> {
    return search(report, key, options);
  }

  findDataByPattern(report: ExtractionReport, pattern: string): SearchMatch[] {
    return findDataByPattern(report, pattern);
  }

  getAllKeys(report: ExtractionReport, maxDepth?: number): Map<string, number> {
    return getAllKeys(report, maxDepth);
  }
}

export function extract(text: string, options?: ExtractorOptions): ExtractionReport {
  return new HydrationExtractor(options).extract(text);
}

export function extractChunks(text: string, options?: ExtractorOptions): Chunk[] {
  return new HydrationExtractor(options).extractChunks(text);
}
