export type JobStatusValue = 'pending' | 'fetching' | 'analyzing' | 'succeeded' | 'failed';

export const JOB_STATUS_VALUES: readonly JobStatusValue[] = ['pending', 'fetching', 'analyzing', 'succeeded', 'failed'];

const TRANSITIONS: Record<JobStatusValue, readonly JobStatusValue[]> = {
  pending: ['fetching', 'failed'],
  fetching: ['analyzing', 'failed'],
  analyzing: ['succeeded', 'failed'],
  succeeded: [],
  failed: [],
};

/**
 * Value object for the job lifecycle.
 * pending -> fetching -> analyzing -> succeeded, and any non-terminal status -> failed.
 */
export class JobStatus {
  private constructor(private readonly _value: JobStatusValue) {}

  static pending(): JobStatus {
    return new JobStatus('pending');
  }

  static fetching(): JobStatus {
    return new JobStatus('fetching');
  }

  static analyzing(): JobStatus {
    return new JobStatus('analyzing');
  }

  static succeeded(): JobStatus {
    return new JobStatus('succeeded');
  }

  static failed(): JobStatus {
    return new JobStatus('failed');
  }

  static fromString(value: string): JobStatus {
    if (!JobStatus.isValue(value)) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return new JobStatus(value);
  }

  static isValue(value: string): value is JobStatusValue {
    return Object.prototype.hasOwnProperty.call(TRANSITIONS, value);
  }

  get value(): JobStatusValue {
    return this._value;
  }

  get isPending(): boolean {
    return this._value === 'pending';
  }

  get isFetching(): boolean {
    return this._value === 'fetching';
  }

  get isAnalyzing(): boolean {
    return this._value === 'analyzing';
  }

  get isSucceeded(): boolean {
    return this._value === 'succeeded';
  }

  get isFailed(): boolean {
    return this._value === 'failed';
  }

  get isTerminal(): boolean {
    return this._value === 'succeeded' || this._value === 'failed';
  }

  /** fetching or analyzing: external calls may be outstanding */
  get isInFlight(): boolean {
    return this._value === 'fetching' || this._value === 'analyzing';
  }

  canTransitionTo(next: JobStatus): boolean {
    return TRANSITIONS[this._value].includes(next._value);
  }

  equals(other: JobStatus): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}

export const NON_TERMINAL_STATUSES: readonly JobStatusValue[] = ['pending', 'fetching', 'analyzing'];
