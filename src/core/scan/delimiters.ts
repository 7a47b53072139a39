// src/core/scan/delimiters.ts
import { RECEIVER_LOOKBEHIND } from '../config/constants.js';

const CLOSERS: Record<string, string> = {
  '[': ']',
  '{': '}',
  '(': ')',
};

// `self.__next_f = self.__next_f || []` -> `__next_f`
const ASSIGNED_NAME = /^\s*(?:[A-Za-z_$][\w$]*\s*\.\s*)*([A-Za-z_$][\w$]*)\s*=(?!=)/;

export function isIdentifierChar(ch: string | undefined): boolean {
  return ch !== undefined && /[\w$]/.test(ch);
}

export function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

function skipWhitespaceBack(text: string, from: number): number {
  let i = from;
  while (i >= 0 && /\s/.test(text[i])) i--;
  return i;
}

function isScriptClose(text: string, at: number): boolean {
  return text.slice(at, at + 8).toLowerCase() === '</script';
}

function skipString(text: string, start: number): number {
  const quote = text[start];
  for (let i = start + 1; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\') {
      i++;
    } else if (ch === quote) {
      return i;
    } else if (ch === '<' && isScriptClose(text, i)) {
      return -1;
    }
  }
  return -1;
}

/**
 * Index of the bracket closing the one at `open`, or -1 when the
 * delimiters are unbalanced. Quoted strings are skipped; a `</script`
 * always ends the search.
 */
export function findClosingBracket(text: string, open: number): number {
  const expected: string[] = [];

  for (let i = open; i < text.length; i++) {
    const ch = text[i];

    if (ch === '"' || ch === "'" || ch === '`') {
      i = skipString(text, i);
      if (i === -1) return -1;
      continue;
    }

    if (ch === '<' && isScriptClose(text, i)) {
      return -1;
    }

    if (ch in CLOSERS) {
      expected.push(CLOSERS[ch]);
    } else if (ch === ']' || ch === '}' || ch === ')') {
      if (expected.pop() !== ch) return -1;
      if (expected.length === 0) return i;
    }
  }

  return -1;
}

/**
 * Name of the object a `push(` at `pushIndex` is called on.
 *
 * Returns '' for a bare call, the last member name for `a.b.push(`, the
 * assigned name for `(a.b = a.b || []).push(`, and undefined otherwise.
 */
export function receiverBefore(text: string, pushIndex: number): string | undefined {
  let i = skipWhitespaceBack(text, pushIndex - 1);
  if (i < 0 || text[i] !== '.') return '';

  i = skipWhitespaceBack(text, i - 1);
  if (i < 0) return undefined;

  if (isIdentifierChar(text[i])) {
    let start = i;
    while (start > 0 && isIdentifierChar(text[start - 1])) start--;
    return text.slice(start, i + 1);
  }

  if (text[i] === ')') {
    const floor = Math.max(0, i - RECEIVER_LOOKBEHIND);
    let depth = 0;
    for (let j = i; j >= floor; j--) {
      if (text[j] === ')') {
        depth++;
      } else if (text[j] === '(' && --depth === 0) {
        return ASSIGNED_NAME.exec(text.slice(j + 1, i))?.[1];
      }
    }
  }

  return undefined;
}
