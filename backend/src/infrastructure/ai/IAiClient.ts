/**
 * Port for the generative-AI service.
 * Infrastructure provides the adapter implementations (Gemini, ...)
 */

import { SubAnalysisKind } from '../../domain/value-objects/AnalysisKind';
import { AnalysisResult, SkippedFile } from '../../domain/value-objects/AnalysisResult';

export interface AnalyzeOptions {
  /** Human-readable artifact reference, e.g. owner/repo:src/app.ts */
  source?: string;
  /** Content was cut to the size cap before being sent */
  truncated?: boolean;
  /** Files of the artifact that were left out of the content */
  skipped?: SkippedFile[];
  signal?: AbortSignal;
}

export interface IAiClient {
  readonly name: string;

  /**
   * Run one analysis over the content and return validated, structured findings.
   * Fails with AnalysisError of kind RateLimited, QuotaExceeded, AuthFailure,
   * TransientNetworkError or InvalidResponse.
   */
  analyze(kind: SubAnalysisKind, content: string, options?: AnalyzeOptions): Promise<AnalysisResult>;
}

export const AI_CLIENT = Symbol('IAiClient');
