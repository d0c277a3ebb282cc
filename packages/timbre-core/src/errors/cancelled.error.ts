import { BaseError } from './base.error';

/**
 * Job cancelled while it was still waiting for an admission slot
 */
export class CancelledError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'JOB_CANCELLED', 409, context);
  }
}
