/**
 * Gateway Error Codes and Classes
 *
 * Every rejected HTTP request is answered with `{ error, code }` and the
 * status carried by the error.
 */

import { ErrorKinds } from '../domain/generation/stream-event.js';
import type { ErrorKind } from '../domain/generation/stream-event.js';

export const ErrorCodes = {
  PARSE_ERROR: 'parse_error',
  INVALID_REQUEST: 'invalid_request',
  NOT_FOUND: 'not_found',
  METHOD_NOT_ALLOWED: 'method_not_allowed',
  PAYLOAD_TOO_LARGE: 'payload_too_large',
  INTERNAL_ERROR: 'internal_error',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCodes.PARSE_ERROR]: 400,
  [ErrorCodes.INVALID_REQUEST]: 400,
  [ErrorCodes.NOT_FOUND]: 404,
  [ErrorCodes.METHOD_NOT_ALLOWED]: 405,
  [ErrorCodes.PAYLOAD_TOO_LARGE]: 413,
  [ErrorCodes.INTERNAL_ERROR]: 500,
};

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.PARSE_ERROR]: 'Parse error: Invalid JSON',
  [ErrorCodes.INVALID_REQUEST]: 'Invalid request',
  [ErrorCodes.NOT_FOUND]: 'Not found',
  [ErrorCodes.METHOD_NOT_ALLOWED]: 'Method not allowed',
  [ErrorCodes.PAYLOAD_TOO_LARGE]: 'Request body too large',
  [ErrorCodes.INTERNAL_ERROR]: 'Internal server error',
};

export interface ErrorBody {
  error: string;
  code: ErrorCode;
}

export class GatewayError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message?: string) {
    super(message || ErrorMessages[code]);
    this.name = 'GatewayError';
    this.code = code;
  }

  get status(): number {
    return STATUS_BY_CODE[this.code];
  }

  toBody(): ErrorBody {
    return { error: this.message, code: this.code };
  }

  static parseError(details?: string): GatewayError {
    return new GatewayError(ErrorCodes.PARSE_ERROR, details ? `Parse error: ${details}` : undefined);
  }

  static invalidRequest(details?: string): GatewayError {
    return new GatewayError(ErrorCodes.INVALID_REQUEST, details ? `Invalid request: ${details}` : undefined);
  }

  static notFound(resource?: string): GatewayError {
    return new GatewayError(ErrorCodes.NOT_FOUND, resource ? `Not found: ${resource}` : undefined);
  }

  static methodNotAllowed(method: string, path: string): GatewayError {
    return new GatewayError(ErrorCodes.METHOD_NOT_ALLOWED, `Method ${method} not allowed on ${path}`);
  }

  static payloadTooLarge(limitBytes: number): GatewayError {
    return new GatewayError(ErrorCodes.PAYLOAD_TOO_LARGE, `Request body exceeds ${limitBytes} bytes`);
  }

  static internalError(): GatewayError {
    return new GatewayError(ErrorCodes.INTERNAL_ERROR);
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  [ErrorKinds.RETRIEVAL]: 503,
  [ErrorKinds.TOOL_LOOP_EXCEEDED]: 500,
  [ErrorKinds.PROVIDER_TRANSPORT]: 502,
  [ErrorKinds.PROMPT_BUDGET_EXCEEDED]: 413,
  // Client closed the request
  [ErrorKinds.CANCELLED]: 499,
  [ErrorKinds.INTERNAL]: 500,
};

/**
 * HTTP status for a turn that ended in `failed`.
 */
export function statusForErrorKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}
