import { SubAnalysisKind } from './AnalysisKind';

export type FindingSeverity = 'info' | 'low' | 'medium' | 'high' | 'critical';

export interface Finding {
  title: string;
  severity: FindingSeverity;
  description: string;
  file?: string;
  line?: number;
  suggestion?: string;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

/** The artifact an analysis covered. */
export interface AnalysisSources {
  files: string[];
  skipped: SkippedFile[];
  truncated: boolean;
}

/**
 * Structured output of one analysis: free-text sections keyed by name plus
 * individual findings.
 */
export interface AnalysisResult {
  summary: string;
  sections: Record<string, string>;
  findings: Finding[];
  sources?: AnalysisSources;
}

/** Result of a full-repo-analysis, keyed by sub-kind. */
export interface AggregateResult {
  parts: Record<SubAnalysisKind, AnalysisResult>;
}

export type JobResult = AnalysisResult | AggregateResult;

export function isAggregateResult(result: JobResult): result is AggregateResult {
  return 'parts' in result;
}
