// src/core/parse/lexer.ts
import { LiteralSyntaxError } from './errors.js';

export type Punctuator = '{' | '}' | '[' | ']' | '(' | ')' | ':' | ',' | ';' | '.' | '!' | '-' | '+';

export type Token =
  | { type: 'punct'; value: Punctuator; offset: number }
  | { type: 'string'; value: string; offset: number }
  | { type: 'number'; value: number; offset: number }
  | { type: 'identifier'; value: string; offset: number }
  | { type: 'eof'; offset: number };

const PUNCTUATORS = new Set<string>(['{', '}', '[', ']', '(', ')', ':', ',', ';', '.', '!', '-', '+']);
const NUMBER_PATTERN = /0[xX][0-9a-fA-F]+|0[bB][01]+|0[oO][0-7]+|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const IDENTIFIER_PATTERN = /[A-Za-z_$][\w$]*/y;
const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
  v: '\v',
  '0': '\0',
};

export function isPunctuator(value: string): value is Punctuator {
  return PUNCTUATORS.has(value);
}

/**
 * On-demand tokenizer for JavaScript object literals.
 */
export class Lexer {
  private pos = 0;
  private lookahead?: Token;

  constructor(private readonly source: string) {}

  peek(): Token {
    if (!this.lookahead) {
      this.lookahead = this.read();
    }
    return this.lookahead;
  }

  next(): Token {
    const token = this.peek();
    this.lookahead = undefined;
    return token;
  }

  private read(): Token {
    this.skipTrivia();
    const start = this.pos;

    if (start >= this.source.length) {
      return { type: 'eof', offset: start };
    }

    const ch = this.source[start];

    if (ch === '"' || ch === "'" || ch === '`') {
      return { type: 'string', value: this.readString(ch), offset: start };
    }

    NUMBER_PATTERN.lastIndex = start;
    const numberMatch = NUMBER_PATTERN.exec(this.source);
    if (numberMatch) {
      this.pos = start + numberMatch[0].length;
      return { type: 'number', value: Number(numberMatch[0]), offset: start };
    }

    IDENTIFIER_PATTERN.lastIndex = start;
    const identifierMatch = IDENTIFIER_PATTERN.exec(this.source);
    if (identifierMatch) {
      this.pos = start + identifierMatch[0].length;
      return { type: 'identifier', value: identifierMatch[0], offset: start };
    }

    if (isPunctuator(ch)) {
      this.pos = start + 1;
      return { type: 'punct', value: ch, offset: start };
    }

    throw new LiteralSyntaxError(
      `unexpected character '${ch}' at offset ${start}`,
      'UNEXPECTED_TOKEN',
      start
    );
  }

  private skipTrivia(): void {
    const src = this.source;
    while (this.pos < src.length) {
      const ch = src[this.pos];
      if (/\s/.test(ch)) {
        this.pos++;
      } else if (ch === '/' && src[this.pos + 1] === '/') {
        const end = src.indexOf('\n', this.pos);
        this.pos = end === -1 ? src.length : end + 1;
      } else if (ch === '/' && src[this.pos + 1] === '*') {
        const end = src.indexOf('*/', this.pos + 2);
        if (end === -1) {
          throw new LiteralSyntaxError(
            `unterminated comment at offset ${this.pos}`,
            'UNTERMINATED_COMMENT',
            this.pos
          );
        }
        this.pos = end + 2;
      } else {
        return;
      }
    }
  }

  private readString(quote: string): string {
    const src = this.source;
    const start = this.pos;
    let out = '';
    this.pos++;

    while (this.pos < src.length) {
      const ch = src[this.pos];

      if (ch === quote) {
        this.pos++;
        return out;
      }

      if (ch === '\\') {
        out += this.readEscape();
        continue;
      }

      if (quote === '`' && ch === '$' && src[this.pos + 1] === '{') {
        throw new LiteralSyntaxError(
          `template interpolation is not supported at offset ${this.pos}`,
          'UNSUPPORTED_SYNTAX',
          this.pos
        );
      }

      if (quote !== '`' && (ch === '\n' || ch === '\r')) {
        break;
      }

      out += ch;
      this.pos++;
    }

    throw new LiteralSyntaxError(
      `unterminated string at offset ${start}`,
      'UNTERMINATED_STRING',
      start
    );
  }

  private readEscape(): string {
    const src = this.source;
    const ch = src[this.pos + 1];
    this.pos += 2;

    if (ch === undefined) return '';
    if (ch in SIMPLE_ESCAPES) return SIMPLE_ESCAPES[ch];

    // Line continuation
    if (ch === '\n') return '';
    if (ch === '\r') {
      if (src[this.pos] === '\n') this.pos++;
      return '';
    }

    if (ch === 'x') {
      return this.readHexDigits(2) ?? 'x';
    }

    if (ch === 'u') {
      if (src[this.pos] === '{') {
        const end = src.indexOf('}', this.pos);
        const hex = end === -1 ? '' : src.slice(this.pos + 1, end);
        if (/^[0-9a-fA-F]{1,6}$/.test(hex) && parseInt(hex, 16) <= 0x10ffff) {
          this.pos = end + 1;
          return String.fromCodePoint(parseInt(hex, 16));
        }
        return 'u';
      }
      return this.readHexDigits(4) ?? 'u';
    }

    return ch;
  }

  private readHexDigits(count: number): string | undefined {
    const hex = this.source.slice(this.pos, this.pos + count);
    if (hex.length !== count || !/^[0-9a-fA-F]+$/.test(hex)) {
      return undefined;
    }
    this.pos += count;
    return String.fromCharCode(parseInt(hex, 16));
  }
}
