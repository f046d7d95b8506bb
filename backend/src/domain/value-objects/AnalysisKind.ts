export type SubAnalysisKind = 'code-review' | 'documentation' | 'bug-detection';
export type AnalysisKind = SubAnalysisKind | 'full-repo-analysis';

/** Order in which a full-repo-analysis runs its parts. */
export const SUB_ANALYSIS_KINDS: readonly SubAnalysisKind[] = ['code-review', 'documentation', 'bug-detection'];

export const ANALYSIS_KINDS: readonly AnalysisKind[] = [...SUB_ANALYSIS_KINDS, 'full-repo-analysis'];

export function isAnalysisKind(value: string): value is AnalysisKind {
  return ANALYSIS_KINDS.some((kind) => kind === value);
}
