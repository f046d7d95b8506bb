export * from './JobStatus';
export * from './InputRef';
export * from './AnalysisKind';
export * from './AnalysisResult';
