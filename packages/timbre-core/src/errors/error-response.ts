import { BaseError } from './base.error';

export type ErrorKind =
  | 'ValidationError'
  | 'InputError'
  | 'ModelUnavailableError'
  | 'ProcessingError'
  | 'IOError'
  | 'CancelledError';

const KNOWN_KINDS: readonly string[] = [
  'ValidationError',
  'InputError',
  'ModelUnavailableError',
  'ProcessingError',
  'IOError',
  'CancelledError'
];

export interface ErrorDescriptor {
  kind: ErrorKind;
  code: string;
  statusCode: number;
  message: string;
  context?: Record<string, unknown>;
}

function isErrorKind(name: string): name is ErrorKind {
  return KNOWN_KINDS.includes(name);
}

/**
 * Map any thrown value onto the error taxonomy.
 * Faults outside the taxonomy are reported as processing errors with a
 * generic message so internals never leak into a response.
 */
export function describeError(error: unknown): ErrorDescriptor {
  if (error instanceof BaseError && isErrorKind(error.name)) {
    return {
      kind: error.name,
      code: error.code,
      statusCode: error.statusCode,
      message: error.message,
      context: error.context
    };
  }

  return {
    kind: 'ProcessingError',
    code: 'PROCESSING_ERROR',
    statusCode: 500,
    message: 'Internal processing failure'
  };
}
