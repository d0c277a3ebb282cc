export * from './audio.types';
export * from './engine.types';
export * from './transcoder.types';
