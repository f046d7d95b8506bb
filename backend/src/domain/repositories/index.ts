export * from './IAnalysisJobRepository';
