// src/core/parse/permissive.ts
import { Lexer, type Punctuator, type Token } from './lexer.js';
import { LiteralSyntaxError } from './errors.js';
import { MAX_NESTING } from '../config/constants.js';
import type { JsonObject, JsonValue } from '../types/index.js';

const KEYWORDS = new Map<string, JsonValue>([
  ['true', true],
  ['false', false],
  ['null', null],
  ['undefined', null],
  ['NaN', NaN],
  ['Infinity', Infinity],
]);

/**
 * Parse a JavaScript object literal without evaluating it.
 *
 * Accepts unquoted keys, single quotes, trailing commas, comments and
 * call wrappers such as `Object.freeze({...})`, which are reduced to their
 * first argument.
 */
export function parseJsLiteral(source: string): JsonValue {
  return new LiteralParser(source).parseDocument();
}

/**
 * Strict JSON first, permissive literal parsing second.
 */
export function parseLenient(source: string): JsonValue {
  const value = parseStrict(source);
  return value === undefined ? parseJsLiteral(source) : value;
}

/**
 * `JSON.parse`, or undefined when the text is not JSON or nests deeper than
 * the permissive parser would accept.
 */
export function parseStrict(source: string): JsonValue | undefined {
  let value: JsonValue;
  try {
    value = JSON.parse(source);
  } catch {
    return undefined;
  }
  return nestingDepth(value) > MAX_NESTING ? undefined : value;
}

/**
 * Number of nested objects and arrays, counting the outermost one.
 */
export function nestingDepth(value: JsonValue): number {
  let deepest = 0;
  const pending: Array<[JsonValue, number]> = [[value, 0]];

  for (let next = pending.pop(); next; next = pending.pop()) {
    const [current, depth] = next;
    if (typeof current !== 'object' || current === null) continue;

    deepest = Math.max(deepest, depth + 1);
    for (const child of Array.isArray(current) ? current : Object.values(current)) {
      pending.push([child, depth + 1]);
    }
  }

  return deepest;
}

function describeToken(token: Token): string {
  switch (token.type) {
    case 'eof':
      return 'end of input';
    case 'punct':
      return `'${token.value}'`;
    case 'string':
      return 'string';
    case 'number':
      return `number ${token.value}`;
    case 'identifier':
      return `identifier '${token.value}'`;
  }
}

function unexpected(token: Token): LiteralSyntaxError {
  if (token.type === 'eof') {
    return new LiteralSyntaxError('unexpected end of input', 'UNEXPECTED_END', token.offset);
  }
  return new LiteralSyntaxError(
    `unexpected ${describeToken(token)} at offset ${token.offset}`,
    'UNEXPECTED_TOKEN',
    token.offset
  );
}

function isPunct(token: Token, value: Punctuator): boolean {
  return token.type === 'punct' && token.value === value;
}

function setKey(target: JsonObject, key: string, value: JsonValue): void {
  if (key === '__proto__') {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
    return;
  }
  target[key] = value;
}

class LiteralParser {
  private lexer: Lexer;
  private depth = 0;

  constructor(source: string) {
    this.lexer = new Lexer(source);
  }

  parseDocument(): JsonValue {
    const value = this.parseValue();

    while (isPunct(this.lexer.peek(), ';')) {
      this.lexer.next();
    }

    const trailing = this.lexer.next();
    if (trailing.type !== 'eof') {
      throw new LiteralSyntaxError(
        `unexpected trailing content at offset ${trailing.offset}`,
        'UNEXPECTED_TOKEN',
        trailing.offset
      );
    }

    return value;
  }

  private parseValue(): JsonValue {
    const token = this.lexer.next();

    switch (token.type) {
      case 'string':
      case 'number':
        return token.value;
      case 'identifier':
        return this.parseIdentifier(token.value, token.offset);
      case 'punct':
        return this.parsePunctuated(token);
      case 'eof':
        throw unexpected(token);
    }
  }

  private parsePunctuated(token: Extract<Token, { type: 'punct' }>): JsonValue {
    switch (token.value) {
      case '{':
        return this.nested(token.offset, () => this.parseObject());
      case '[':
        return this.nested(token.offset, () => this.parseArray());
      case '-':
      case '+': {
        const operand = this.lexer.next();
        const sign = token.value === '-' ? -1 : 1;
        if (operand.type === 'number') {
          return sign * operand.value;
        }
        if (operand.type === 'identifier' && (operand.value === 'Infinity' || operand.value === 'NaN')) {
          return sign * Number(operand.value);
        }
        throw unexpected(operand);
      }
      case '!': {
        // Minified booleans: !0 and !1
        const operand = this.lexer.next();
        if (operand.type === 'number') {
          return !operand.value;
        }
        throw unexpected(operand);
      }
      default:
        throw unexpected(token);
    }
  }

  private nested<T>(offset: number, parse: () => T): T {
    if (this.depth >= MAX_NESTING) {
      throw new LiteralSyntaxError(
        `nesting deeper than ${MAX_NESTING} levels at offset ${offset}`,
        'UNSUPPORTED_SYNTAX',
        offset
      );
    }

    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private parseIdentifier(first: string, firstOffset: number): JsonValue {
    let name = first;
    let offset = firstOffset;
    while (name === 'new') {
      const callee = this.lexer.next();
      if (callee.type !== 'identifier') {
        throw unexpected(callee);
      }
      name = callee.value;
      offset = callee.offset;
    }

    let callee = name;
    while (isPunct(this.lexer.peek(), '.')) {
      this.lexer.next();
      const member = this.lexer.next();
      if (member.type !== 'identifier') {
        throw unexpected(member);
      }
      callee += `.${member.value}`;
    }

    const open = this.lexer.peek();
    if (isPunct(open, '(')) {
      this.lexer.next();
      return this.nested(open.offset, () => this.parseCall(callee));
    }

    const keyword = KEYWORDS.get(name);
    if (callee === name && keyword !== undefined) {
      return keyword;
    }

    throw new LiteralSyntaxError(
      `unexpected identifier '${callee}' at offset ${offset}`,
      'UNEXPECTED_TOKEN',
      offset
    );
  }

  /**
   * Strip a call wrapper down to its first argument.
   */
  private parseCall(callee: string): JsonValue {
    if (isPunct(this.lexer.peek(), ')')) {
      this.lexer.next();
      return null;
    }

    const first = this.parseValue();

    while (isPunct(this.lexer.peek(), ',')) {
      this.lexer.next();
      if (isPunct(this.lexer.peek(), ')')) break;
      this.parseValue();
    }

    const close = this.lexer.next();
    if (!isPunct(close, ')')) {
      throw unexpected(close);
    }

    if (callee === 'JSON.parse' && typeof first === 'string') {
      return parseLenient(first);
    }

    return first;
  }

  private parseObject(): JsonObject {
    const result: JsonObject = {};

    for (;;) {
      const token = this.lexer.next();

      if (isPunct(token, '}')) {
        return result;
      }

      let key: string;
      if (token.type === 'string' || token.type === 'identifier') {
        key = token.value;
      } else if (token.type === 'number') {
        key = String(token.value);
      } else {
        throw unexpected(token);
      }

      const colon = this.lexer.next();
      if (!isPunct(colon, ':')) {
        throw unexpected(colon);
      }

      setKey(result, key, this.parseValue());

      const separator = this.lexer.next();
      if (isPunct(separator, '}')) {
        return result;
      }
      if (!isPunct(separator, ',')) {
        throw unexpected(separator);
      }
    }
  }

  private parseArray(): JsonValue[] {
    const result: JsonValue[] = [];

    for (;;) {
      const token = this.lexer.peek();

      if (isPunct(token, ']')) {
        this.lexer.next();
        return result;
      }

      // Hole: [1,,2]
      if (isPunct(token, ',')) {
        this.lexer.next();
        result.push(null);
        continue;
      }

      result.push(this.parseValue());

      const separator = this.lexer.next();
      if (isPunct(separator, ']')) {
        return result;
      }
      if (!isPunct(separator, ',')) {
        throw unexpected(separator);
      }
    }
  }
}
