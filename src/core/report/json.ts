// src/core/report/json.ts
import { ErrorCode } from '../errors.js';
import { PREVIEW_LENGTH } from '../config/constants.js';
import type {
  ExtractionReport,
  ExtractionWarning,
  JsObjectResult,
  JsonResult,
  JsonValue,
  ParsedResult,
  ParseFailure,
  Payload,
  RowItem,
  RowsResult,
  UnparseableResult,
} from '../types/index.js';
import type { StructuredParse } from '../parse/structured.js';

export function freezeValue(value: JsonValue): JsonValue {
  const pending: JsonValue[] = [value];

  for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
    if (typeof current !== 'object' || current === null || Object.isFrozen(current)) continue;

    Object.freeze(current);
    for (const child of Array.isArray(current) ? current : Object.values(current)) {
      pending.push(child);
    }
  }

  return value;
}

function freezeRow(item: RowItem): RowItem {
  if (item.kind === 'json' || item.kind === 'js_object') {
    freezeValue(item.value);
  }
  return Object.freeze(item);
}

export function buildResult(payload: Payload, parsed: StructuredParse): ParsedResult {
  const base = {
    stream: payload.stream,
    text: payload.text,
    chunkCount: payload.chunkCount,
    positions: Object.freeze([...payload.positions]),
  };

  if (parsed.kind === 'unparseable') {
    const result: UnparseableResult = { ...base, kind: 'unparseable', reason: parsed.reason };
    return Object.freeze(result);
  }

  if (parsed.kind === 'rows') {
    const result: RowsResult = { ...base, kind: 'rows', items: Object.freeze(parsed.items.map(freezeRow)) };
    return Object.freeze(result);
  }

  const identifier = parsed.identifier !== undefined ? { identifier: parsed.identifier } : {};
  const value = freezeValue(parsed.value);

  if (parsed.kind === 'json') {
    const result: JsonResult = { ...base, kind: 'json', value, ...identifier };
    return Object.freeze(result);
  }

  const result: JsObjectResult = { ...base, kind: 'js_object', value, ...identifier };
  return Object.freeze(result);
}

export function buildExtractionReport(
  results: ParsedResult[],
  warnings: ExtractionWarning[],
  chunksSeen: number
): ExtractionReport {
  const failures: ParseFailure[] = [];

  results.forEach((result, resultIndex) => {
    if (result.kind === 'unparseable') {
      failures.push(Object.freeze({
        code: ErrorCode.PARSE_FAILED,
        stream: result.stream,
        resultIndex,
        reason: result.reason,
      }));
    }
  });

  return Object.freeze({
    results: Object.freeze(results),
    warnings: Object.freeze(warnings.map(warning => Object.freeze(warning))),
    failures: Object.freeze(failures),
    stats: Object.freeze({
      chunksSeen,
      payloadsAssembled: results.length,
      parseFailures: failures.length,
      warnings: warnings.length,
    }),
  });
}

export function formatReportJson(report: ExtractionReport): string {
  return JSON.stringify(report, null, 2);
}

export function summarizeReport(report: ExtractionReport): string {
  const { chunksSeen, payloadsAssembled, parseFailures, warnings } = report.stats;
  return `${payloadsAssembled} payloads from ${chunksSeen} chunks, ` +
    `${parseFailures} parse failures, ${warnings} warnings`;
}

export function preview(text: string, length: number = PREVIEW_LENGTH): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > length ? `${flat.slice(0, length)}...` : flat;
}
