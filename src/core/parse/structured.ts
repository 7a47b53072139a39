// src/core/parse/structured.ts
import { parseJsLiteral, parseStrict } from './permissive.js';
import { LiteralSyntaxError } from './errors.js';
import type { JsonValue, RowItem } from '../types/index.js';

export type StructuredParse =
  | { kind: 'json'; value: JsonValue; identifier?: string }
  | { kind: 'js_object'; value: JsonValue; identifier?: string }
  | { kind: 'rows'; items: RowItem[] }
  | { kind: 'unparseable'; reason: string };

// `api_key:{...}`, `base64:eyJ...==:{...}`
const IDENTIFIER_PREFIX = /^([^{}[\]"'\r\n]+):\s*$/;

// `0:{...}`, `1:HL["/a.css","style"]`, `5:T1f,plain text`
const ROW_START = /^([\w$]+):/;
const ROW_TAG = /^([A-Z]+)(?=[[{"])/;
const TEXT_ROW = /^T[0-9a-fA-F]+,/;

type ValueParse = Extract<StructuredParse, { kind: 'json' | 'js_object' }>;
type Attempt = { ok: true; result: ValueParse } | { ok: false; reason: string };

/**
 * Turn payload text into a typed value: strict JSON, then a permissive
 * object-literal parse, then `identifier:payload`, then newline-separated
 * `id:value` rows.
 */
export function parseStructured(text: string): StructuredParse {
  const direct = tryParse(text);
  if (direct.ok) {
    return direct.result;
  }

  const prefixed = tryIdentifierPrefixed(text);
  if (prefixed) {
    return prefixed;
  }

  const items = tryRows(text);
  if (items) {
    return { kind: 'rows', items };
  }

  return { kind: 'unparseable', reason: direct.reason };
}

function tryParse(text: string): Attempt {
  const value = parseStrict(text);
  if (value !== undefined) {
    return { ok: true, result: { kind: 'json', value } };
  }

  try {
    return { ok: true, result: { kind: 'js_object', value: parseJsLiteral(text) } };
  } catch (error) {
    if (error instanceof LiteralSyntaxError) {
      return { ok: false, reason: error.message };
    }
    throw error;
  }
}

function tryIdentifierPrefixed(text: string): ValueParse | undefined {
  const start = text.search(/[{[]/);
  if (start <= 0) return undefined;

  const match = IDENTIFIER_PREFIX.exec(text.slice(0, start));
  const identifier = match?.[1].trim();
  if (!identifier) return undefined;

  const parsed = tryParse(text.slice(start));
  if (!parsed.ok) return undefined;

  return { ...parsed.result, identifier };
}

/**
 * Split streamed rows. A line that does not open a row continues the one
 * before it. Undefined unless the text starts with a row and at least one
 * row parses.
 */
function tryRows(text: string): RowItem[] | undefined {
  const rows: Array<{ identifier: string; body: string }> = [];

  for (const line of text.split(/\r?\n/)) {
    const match = ROW_START.exec(line);
    const last = rows[rows.length - 1];

    if (match) {
      rows.push({ identifier: match[1], body: line.slice(match[0].length) });
    } else if (last) {
      last.body += `\n${line}`;
    } else if (line.trim()) {
      return undefined;
    }
  }

  const items = rows.map(row => parseRow(row.identifier, row.body.trimEnd()));
  return items.some(item => item.kind !== 'unparseable') ? items : undefined;
}

function parseRow(identifier: string, body: string): RowItem {
  if (TEXT_ROW.test(body)) {
    return { identifier, tag: 'T', kind: 'text', value: body.slice(body.indexOf(',') + 1) };
  }

  const direct = tryParse(body);
  if (direct.ok) {
    return { identifier, kind: direct.result.kind, value: direct.result.value };
  }

  const tag = ROW_TAG.exec(body)?.[1];
  if (tag) {
    const tagged = tryParse(body.slice(tag.length));
    if (tagged.ok) {
      return { identifier, tag, kind: tagged.result.kind, value: tagged.result.value };
    }
  }

  return { identifier, kind: 'unparseable', text: body, reason: direct.reason };
}
