export * from './base.error';
export * from './validation.error';
export * from './input.error';
export * from './model-unavailable.error';
export * from './processing.error';
export * from './io.error';
export * from './cancelled.error';
export * from './error-response';
