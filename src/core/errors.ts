// src/core/errors.ts
export enum ErrorCode {
  INVALID_INPUT = 'invalid_input',
  MALFORMED_MARKER = 'malformed_marker',
  DUPLICATE_CHUNK = 'duplicate_chunk',
  PARSE_FAILED = 'parse_failed',
}

export class HydrationError extends Error {
  code: ErrorCode;
  context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HydrationError';
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, HydrationError.prototype);
  }
}

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function assertText(value: unknown): asserts value is string {
  if (typeof value !== 'string') {
    throw new HydrationError(
      ErrorCode.INVALID_INPUT,
      `Expected HTML text as a string, received ${describeType(value)}`,
      { received: describeType(value) }
    );
  }
}
