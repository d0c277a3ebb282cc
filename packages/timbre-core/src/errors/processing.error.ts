import { BaseError } from './base.error';

/**
 * Processing error - engine or encoder failure while a job runs
 */
export class ProcessingError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PROCESSING_ERROR', 500, context);
  }
}
