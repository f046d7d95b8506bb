import { AnalysisError, ErrorKind } from '../../domain/errors/AnalysisError';
import { abortableSleep, cancellationFrom, raceAbort, Sleeper } from './abort';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  /** Fraction of the computed delay applied as +/- random spread, 0..1 */
  jitter: number;
  maxDelayMs: number;
  retryableKinds: readonly ErrorKind[];
  /** Per-kind cap on retries, counted separately from maxAttempts */
  kindRetryLimits: Partial<Record<ErrorKind, number>>;
}

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  factor: 2,
  jitter: 0.2,
  maxDelayMs: 30000,
  retryableKinds: ['RateLimited', 'TransientNetworkError', 'InvalidResponse'],
  kindRetryLimits: { InvalidResponse: 2 },
};

export interface RetryNotice {
  attempt: number;
  delayMs: number;
  error: AnalysisError;
}

export interface RetryContext {
  signal?: AbortSignal;
  onRetry?: (notice: RetryNotice) => void;
}

export interface RetrySuccess<T> {
  value: T;
  attempts: number;
}

/**
 * Raised when an operation gives up: a non-retryable error, an exhausted
 * budget, or cancellation. `exhausted` marks the retryable-but-out-of-budget case.
 */
export class RetryFailure extends Error {
  constructor(
    readonly error: AnalysisError,
    readonly attempts: number,
    readonly exhausted: boolean,
  ) {
    super(error.message, { cause: error });
    this.name = 'RetryFailure';
  }
}

/**
 * Exponential backoff with jitter over typed AnalysisErrors.
 */
export class RetryPolicy {
  readonly options: RetryPolicyOptions;
  private readonly sleep: Sleeper;
  private readonly random: () => number;

  constructor(
    options: Partial<RetryPolicyOptions> = {},
    deps: { sleep?: Sleeper; random?: () => number } = {},
  ) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    if (this.options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be at least 1, got ${this.options.maxAttempts}`);
    }
    if (this.options.jitter < 0 || this.options.jitter > 1) {
      throw new Error(`jitter must be between 0 and 1, got ${this.options.jitter}`);
    }
    this.sleep = deps.sleep || abortableSleep;
    this.random = deps.random || Math.random;
  }

  isRetryableKind(kind: ErrorKind): boolean {
    return this.options.retryableKinds.includes(kind);
  }

  /**
   * Delay before the attempt following failed attempt number `attempt` (1-based).
   */
  delayFor(attempt: number, retryAfterMs: number | null = null): number {
    const { baseDelayMs, factor, jitter, maxDelayMs } = this.options;
    const exponential = baseDelayMs * Math.pow(factor, attempt - 1);
    const spread = 1 - jitter + this.random() * 2 * jitter;
    const jittered = Math.round(exponential * spread);
    return Math.min(Math.max(jittered, retryAfterMs ?? 0), maxDelayMs);
  }

  async execute<T>(
    operation: (attempt: number, signal?: AbortSignal) => Promise<T>,
    context: RetryContext = {},
  ): Promise<RetrySuccess<T>> {
    const { signal, onRetry } = context;
    const retriesByKind: Partial<Record<ErrorKind, number>> = {};
    let attempt = 0;

    for (;;) {
      if (signal?.aborted) {
        throw new RetryFailure(cancellationFrom(signal), attempt, false);
      }
      attempt++;

      let error: AnalysisError;
      try {
        const value = await raceAbort(operation(attempt, signal), signal);
        return { value, attempts: attempt };
      } catch (thrown) {
        error = AnalysisError.from(thrown);
      }

      if (error.kind === 'Cancelled' || !this.isRetryableKind(error.kind)) {
        throw new RetryFailure(error, attempt, false);
      }

      const kindRetries = retriesByKind[error.kind] ?? 0;
      const kindLimit = this.options.kindRetryLimits[error.kind];
      if (attempt >= this.options.maxAttempts || (kindLimit !== undefined && kindRetries >= kindLimit)) {
        throw new RetryFailure(error, attempt, true);
      }
      retriesByKind[error.kind] = kindRetries + 1;

      const delayMs = this.delayFor(attempt, error.retryAfterMs);
      if (onRetry) {
        onRetry({ attempt, delayMs, error });
      }

      try {
        await this.sleep(delayMs, signal);
      } catch (thrown) {
        throw new RetryFailure(AnalysisError.from(thrown), attempt, false);
      }
    }
  }
}
