// Factories
export * from './factories/waveform.factory';
export * from './factories/request.factory';
export * from './factories/wav.factory';

// Fakes
export * from './fakes/fake-engine';
export * from './fakes/fake-transcoder';

// Helpers
export * from './helpers/wait.helper';
