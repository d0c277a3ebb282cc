import { BaseError } from './base.error';

/**
 * IO error - temp artifact read/write failures
 */
export class IOError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'IO_ERROR', 500, context);
  }
}
