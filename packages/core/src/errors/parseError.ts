/**
 * Error values produced while resolving a temporal expression.
 *
 * Parsers never throw these across the public API. They return a
 * `ParseResult`, shaped like zod's `safeParse` output, so callers can branch
 * on `success` without try/catch.
 */

/**
 * Category of a parse failure.
 */
export type ParseErrorKind =
  | 'malformed'
  | 'unknown-abbreviation'
  | 'out-of-range'
  | 'unit-order'
  | 'too-many-segments'
  | 'invalid-date';

export class ParseError extends Error {
  readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, message: string) {
    super(message);
    this.name = 'ParseError';
    this.kind = kind;
  }
}

/**
 * Outcome of a parse: the parsed value, or the reason it was rejected.
 */
export type ParseResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: ParseError };

export function parseOk<T>(data: T): ParseResult<T> {
  return { success: true, data };
}

export function parseFail<T>(kind: ParseErrorKind, message: string): ParseResult<T> {
  return { success: false, error: new ParseError(kind, message) };
}
