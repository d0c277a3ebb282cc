export * from './validation.utils';
