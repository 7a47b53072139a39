// src/core/search/walk.ts
import type { JsonObject, JsonValue } from '../types/index.js';

export interface KeyEntry {
  key: string;
  path: string;
  value: JsonValue;
  depth: number;
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function joinPath(parent: string, key: string): string {
  return parent ? `${parent}.${key}` : key;
}

type WalkStep =
  | { kind: 'visit'; value: JsonValue; path: string; depth: number; inArray: boolean }
  | { kind: 'entry'; entry: KeyEntry };

/**
 * Yield every object key under `value`, depth-first.
 *
 * Depth counts object nesting: the keys of the top-level object are at
 * depth 0. Elements of an array stay at the depth of that array, unless the
 * array is itself an array element, in which case they go one level deeper.
 */
export function* walkEntries(
  value: JsonValue,
  maxDepth: number = Infinity,
  path: string = '',
  depth: number = 0
): Generator<KeyEntry> {
  const pending: WalkStep[] = [{ kind: 'visit', value, path, depth, inArray: false }];

  for (let step = pending.pop(); step; step = pending.pop()) {
    if (step.kind === 'entry') {
      const { entry } = step;
      yield entry;
      pending.push({ kind: 'visit', value: entry.value, path: entry.path, depth: entry.depth + 1, inArray: false });
      continue;
    }

    const current = step.value;
    if (Array.isArray(current)) {
      const elementDepth = step.inArray ? step.depth + 1 : step.depth;
      for (let i = current.length - 1; i >= 0; i--) {
        pending.push({
          kind: 'visit',
          value: current[i],
          path: `${step.path}[${i}]`,
          depth: elementDepth,
          inArray: true,
        });
      }
      continue;
    }

    if (!isJsonObject(current) || step.depth > maxDepth) continue;

    const entries = Object.entries(current);
    for (let i = entries.length - 1; i >= 0; i--) {
      const [key, child] = entries[i];
      pending.push({
        kind: 'entry',
        entry: { key, path: joinPath(step.path, key), value: child, depth: step.depth },
      });
    }
  }
}
