// src/core/search/query.ts
import { walkEntries, type KeyEntry } from './walk.js';
import { DEFAULT_KEY_DEPTH } from '../config/constants.js';
import type {
  ExtractionReport,
  JsonValue,
  ParsedResult,
  SearchMatch,
  SearchOptions,
} from '../types/index.js';

interface SearchTarget {
  value: JsonValue;
  origin: Pick<SearchMatch, 'item' | 'identifier'>;
}

/**
 * Values a result exposes to searches: its parsed value, or one per parsed
 * row.
 */
function searchTargets(result: ParsedResult): SearchTarget[] {
  switch (result.kind) {
    case 'json':
    case 'js_object':
      return [{ value: result.value, origin: {} }];
    case 'rows':
      return result.items.flatMap<SearchTarget>((item, index) =>
        item.kind === 'json' || item.kind === 'js_object'
          ? [{ value: item.value, origin: { item: index, identifier: item.identifier } }]
          : []
      );
    case 'unparseable':
      return [];
  }
}

function* matchEntries(
  report: ExtractionReport,
  predicate: (entry: KeyEntry) => boolean,
  maxDepth: number
): Generator<SearchMatch> {
  for (const [resultIndex, result] of report.results.entries()) {
    for (const { value, origin } of searchTargets(result)) {
      for (const entry of walkEntries(value, maxDepth)) {
        if (predicate(entry)) {
          yield { resultIndex, ...origin, path: entry.path, value: entry.value };
        }
      }
    }
  }
}

/**
 * Find values stored under `key`.
 *
 * The returned sequence is lazy and can be iterated more than once. A
 * shallow search looks at top-level keys only (including those of objects
 * inside a top-level array); a deep search walks the whole tree. Each row
 * of a `rows` result is searched as a top-level value.
 */
export function search(
  report: ExtractionReport,
  key: string,
  options: SearchOptions = {}
): Iterable<SearchMatch> {
  const maxDepth = options.deep ? Infinity : 0;
  return {
    [Symbol.iterator]: () => matchEntries(report, entry => entry.key === key, maxDepth),
  };
}

/**
 * Deep search for keys containing `pattern`, ignoring case.
 */
export function findDataByPattern(report: ExtractionReport, pattern: string): SearchMatch[] {
  const needle = pattern.toLowerCase();
  return Array.from(
    matchEntries(report, entry => entry.key.toLowerCase().includes(needle), Infinity)
  );
}

/**
 * Count key occurrences across all parsed results, in first-seen order.
 */
export function getAllKeys(
  report: ExtractionReport,
  maxDepth: number = DEFAULT_KEY_DEPTH
): Map<string, number> {
  const counts = new Map<string, number>();

  for (const result of report.results) {
    for (const { value } of searchTargets(result)) {
      for (const { key } of walkEntries(value, maxDepth)) {
        counts.set(key, (counts.get(key) ?? 0) + 1);
      }
    }
  }

  return counts;
}
