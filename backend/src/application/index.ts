export * from './errors';
export * from './retry/abort';
export * from './retry/RetryPolicy';
export * from './services/InFlightRegistry';
export * from './services/AnalysisOrchestrator';
export * from './services/RepositoryService';
