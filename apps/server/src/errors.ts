import type { ParseError } from '@time-banner/core';

export type ServiceErrorKind = 'parse' | 'render' | 'unsupported-format' | 'not-found';

const STATUS_BY_KIND: Record<ServiceErrorKind, number> = {
  parse: 400,
  render: 500,
  'unsupported-format': 415,
  'not-found': 404,
};

const PREFIX_BY_KIND: Record<ServiceErrorKind, string> = {
  parse: 'ParseError',
  render: 'RenderError',
  'unsupported-format': 'UnsupportedFormat',
  'not-found': 'NotFound',
};

/**
 * An error the HTTP layer knows how to answer.
 */
export class ServiceError extends Error {
  readonly kind: ServiceErrorKind;

  constructor(kind: ServiceErrorKind, message: string) {
    super(message);
    this.name = 'ServiceError';
    this.kind = kind;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }

  static fromParseError(error: ParseError): ServiceError {
    return new ServiceError('parse', error.message);
  }
}

/**
 * JSON body of every error response.
 */
export interface ErrorResponseBody {
  code: number;
  message: string;
}

/**
 * Builds the status and JSON body for an error.
 *
 * @example
 * toErrorResponse(new ServiceError('parse', 'Unknown timezone abbreviation: XYZ'))
 * // { status: 400, body: { code: 400, message: 'ParseError :: Unknown timezone abbreviation: XYZ' } }
 */
export function toErrorResponse(error: ServiceError): { status: number; body: ErrorResponseBody } {
  return {
    status: error.status,
    body: {
      code: error.status,
      message: `${PREFIX_BY_KIND[error.kind]} :: ${error.message}`,
    },
  };
}
