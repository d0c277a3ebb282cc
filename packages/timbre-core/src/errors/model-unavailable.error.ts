import { BaseError } from './base.error';

/**
 * Model unavailable - the voice model engine is not loaded
 */
export class ModelUnavailableError extends BaseError {
  constructor(message: string = 'Models not loaded. Please check initialization.', context?: Record<string, unknown>) {
    super(message, 'MODEL_UNAVAILABLE', 503, context);
  }
}
