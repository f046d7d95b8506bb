export type ErrorKind =
  | 'NotFound'
  | 'AuthFailure'
  | 'RateLimited'
  | 'QuotaExceeded'
  | 'TransientNetworkError'
  | 'InvalidResponse'
  | 'Cancelled'
  | 'Internal';

export type JobStage = 'fetch' | 'analyze' | 'aggregate' | 'dispatch';

/**
 * Error descriptor persisted on a failed job.
 * `retryable` is true when the failure kind is transient and the retry
 * budget was exhausted, so resubmitting later may succeed.
 */
export interface JobError {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  attempts: number;
  stage: JobStage;
}

/**
 * Typed failure raised by the external service clients and the orchestrator.
 */
export class AnalysisError extends Error {
  readonly kind: ErrorKind;
  readonly retryAfterMs: number | null;

  constructor(kind: ErrorKind, message: string, options: { retryAfterMs?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'AnalysisError';
    this.kind = kind;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }

  static cancelled(reason = 'Cancelled by user'): AnalysisError {
    return new AnalysisError('Cancelled', reason);
  }

  /**
   * Wrap any thrown value, keeping AnalysisErrors as they are.
   */
  static from(error: unknown): AnalysisError {
    if (error instanceof AnalysisError) {
      return error;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    return new AnalysisError('Internal', message, { cause: error });
  }
}
