export * from './limits';
export * from './formats';
export * from './states';
