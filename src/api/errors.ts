import { ZodError } from 'zod';
import { isRegistryError, type RegistryErrorKind } from '../registry/errors.js';

export type ErrorCode =
  | 'invalid_input'
  | 'not_found'
  | 'index_out_of_range'
  | 'already_exists'
  | 'forbidden'
  | 'unauthorized'
  | 'internal_error';

export type ErrorResponse = {
  error: ErrorCode;
  message: string;
};

const KIND_MAPPING: Record<RegistryErrorKind, { status: number; code: ErrorCode }> = {
  InvalidInput: { status: 400, code: 'invalid_input' },
  Forbidden: { status: 403, code: 'forbidden' },
  NotFound: { status: 404, code: 'not_found' },
  IndexOutOfRange: { status: 404, code: 'index_out_of_range' },
  AlreadyExists: { status: 409, code: 'already_exists' },
};

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Map any thrown value to an HTTP status and error body. Registry kinds map
 * one-to-one; schema failures are invalid_input; everything else is 500
 * with a generic message.
 */
export function toErrorResponse(error: unknown): { status: number; body: ErrorResponse } {
  if (isRegistryError(error)) {
    const { status, code } = KIND_MAPPING[error.kind];
    return { status, body: { error: code, message: error.message } };
  }
  if (error instanceof ZodError) {
    return { status: 400, body: { error: 'invalid_input', message: describeZodError(error) } };
  }
  return { status: 500, body: { error: 'internal_error', message: 'Internal server error' } };
}
