// Permissive literal parser errors

export type LiteralErrorCode =
  | 'UNEXPECTED_TOKEN'
  | 'UNEXPECTED_END'
  | 'UNTERMINATED_STRING'
  | 'UNTERMINATED_COMMENT'
  | 'UNSUPPORTED_SYNTAX';

export class LiteralSyntaxError extends Error {
  constructor(
    message: string,
    public readonly code: LiteralErrorCode,
    public readonly offset: number
  ) {
    super(message);
    this.name = 'LiteralSyntaxError';
    Object.setPrototypeOf(this, LiteralSyntaxError.prototype);
  }
}
