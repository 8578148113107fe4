export * from './domain/errors';
export * from './domain/models';
export * from './domain/transcript';
export * from './app/AnalysisService';
export * from './app/ChunkSplitter';
export * from './app/Completion';
export * from './app/RequestCoordinator';
export * from './app/RequestQueue';
export * from './app/TokenBucket';
export * from './app/prompts';
export * from './app/tokens';
export * from './ports/Clock';
export * from './ports/LlmClient';
export * from './ports/Logger';
