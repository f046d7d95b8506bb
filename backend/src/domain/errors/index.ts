export * from './AnalysisError';
