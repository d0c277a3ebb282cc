import { BaseError } from './base.error';

/**
 * Input error - unreadable, missing or unsupported-format audio
 */
export class InputError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', 400, context);
  }
}
