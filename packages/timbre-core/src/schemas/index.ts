// Re-export all schemas and types
export * from './audio.schema';
export * from './conversion.schema';
export * from './response.schema';
export * from './engine.schema';
