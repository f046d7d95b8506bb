import { v4 as uuidv4 } from 'uuid';
import { JobStatus } from '../value-objects/JobStatus';
import { InputRef } from '../value-objects/InputRef';
import { AnalysisKind } from '../value-objects/AnalysisKind';
import { JobResult } from '../value-objects/AnalysisResult';
import { JobError } from '../errors/AnalysisError';

export interface AnalysisJobProps {
  id?: string;
  kind: AnalysisKind;
  inputRef: InputRef;
  status?: JobStatus;
  result?: JobResult | null;
  error?: JobError | null;
  parentId?: string | null;
  childIds?: string[];
  requestedBy?: string | null;
  attempts?: number;
  contentHash?: string | null;
  createdAt?: Date;
  updatedAt?: Date;
}

/**
 * Fields written together by the store on every state change.
 */
export interface AnalysisJobState {
  status: JobStatus;
  result: JobResult | null;
  error: JobError | null;
  attempts: number;
  contentHash: string | null;
  childIds: string[];
  updatedAt: Date;
}

/**
 * One requested analysis of an artifact, tracked through its lifecycle.
 * A full-repo-analysis job owns ordered child jobs, one per sub-kind.
 */
export class AnalysisJob {
  private readonly _id: string;
  private readonly _kind: AnalysisKind;
  private readonly _inputRef: InputRef;
  private readonly _parentId: string | null;
  private readonly _requestedBy: string | null;
  private readonly _createdAt: Date;
  private _status: JobStatus;
  private _result: JobResult | null;
  private _error: JobError | null;
  private _childIds: string[];
  private _attempts: number;
  private _contentHash: string | null;
  private _updatedAt: Date;

  private constructor(props: AnalysisJobProps) {
    this._id = props.id || uuidv4();
    this._kind = props.kind;
    this._inputRef = props.inputRef;
    this._status = props.status || JobStatus.pending();
    this._result = props.result || null;
    this._error = props.error || null;
    this._parentId = props.parentId || null;
    this._childIds = props.childIds ? [...props.childIds] : [];
    this._requestedBy = props.requestedBy || null;
    this._attempts = props.attempts || 0;
    this._contentHash = props.contentHash || null;
    this._createdAt = props.createdAt || new Date();
    this._updatedAt = props.updatedAt || this._createdAt;
  }

  static create(props: {
    kind: AnalysisKind;
    inputRef: InputRef;
    parentId?: string | null;
    requestedBy?: string | null;
  }): AnalysisJob {
    return new AnalysisJob({
      kind: props.kind,
      inputRef: props.inputRef,
      parentId: props.parentId,
      requestedBy: props.requestedBy,
    });
  }

  static reconstitute(props: AnalysisJobProps): AnalysisJob {
    const job = new AnalysisJob(props);
    job.assertConsistent();
    return job;
  }

  get id(): string {
    return this._id;
  }

  get kind(): AnalysisKind {
    return this._kind;
  }

  get inputRef(): InputRef {
    return this._inputRef;
  }

  /** Key used to coalesce identical in-flight requests. */
  get dedupKey(): string {
    return `${this._kind}|${this._inputRef.key}`;
  }

  get status(): JobStatus {
    return this._status;
  }

  get result(): JobResult | null {
    return this._result;
  }

  get error(): JobError | null {
    return this._error;
  }

  get parentId(): string | null {
    return this._parentId;
  }

  get childIds(): readonly string[] {
    return this._childIds;
  }

  get requestedBy(): string | null {
    return this._requestedBy;
  }

  get attempts(): number {
    return this._attempts;
  }

  get contentHash(): string | null {
    return this._contentHash;
  }

  get createdAt(): Date {
    return this._createdAt;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get isAggregate(): boolean {
    return this._kind === 'full-repo-analysis';
  }

  // State transitions
  startFetching(): void {
    this.transitionTo(JobStatus.fetching());
  }

  startAnalyzing(contentHash: string | null = null): void {
    this.transitionTo(JobStatus.analyzing());
    if (contentHash) {
      this._contentHash = contentHash;
    }
  }

  succeed(result: JobResult): void {
    this.transitionTo(JobStatus.succeeded());
    this._result = result;
  }

  fail(error: JobError): void {
    if (!error.message) {
      throw new Error('A failed job requires a non-empty error message');
    }
    this.transitionTo(JobStatus.failed());
    this._error = { ...error };
  }

  recordAttempts(count: number): void {
    if (this._status.isTerminal) {
      throw new Error(`Cannot record attempts on ${this._status.value} job`);
    }
    this._attempts += count;
    this._updatedAt = new Date();
  }

  attachChild(childId: string): void {
    if (!this.isAggregate) {
      throw new Error('Only full-repo-analysis jobs have children');
    }
    if (this._status.isTerminal) {
      throw new Error(`Cannot attach child to ${this._status.value} job`);
    }
    if (!this._childIds.includes(childId)) {
      this._childIds.push(childId);
      this._updatedAt = new Date();
    }
  }

  toState(): AnalysisJobState {
    return {
      status: this._status,
      result: this._result,
      error: this._error,
      attempts: this._attempts,
      contentHash: this._contentHash,
      childIds: [...this._childIds],
      updatedAt: this._updatedAt,
    };
  }

  private transitionTo(newStatus: JobStatus): void {
    if (!this._status.canTransitionTo(newStatus)) {
      throw new Error(`Invalid status transition from ${this._status.value} to ${newStatus.value}`);
    }
    this._status = newStatus;
    this._updatedAt = new Date();
  }

  private assertConsistent(): void {
    if (this._result && this._error) {
      throw new Error(`Job ${this._id} has both a result and an error`);
    }
    if (this._status.isSucceeded !== (this._result !== null)) {
      throw new Error(`Job ${this._id} is ${this._status.value} but result is ${this._result ? 'set' : 'missing'}`);
    }
    if (this._status.isFailed !== (this._error !== null)) {
      throw new Error(`Job ${this._id} is ${this._status.value} but error is ${this._error ? 'set' : 'missing'}`);
    }
  }

  /** Detached copy of the current state; later transitions do not show in it. */
  snapshot(): AnalysisJob {
    return new AnalysisJob({
      id: this._id,
      kind: this._kind,
      inputRef: this._inputRef,
      parentId: this._parentId,
      requestedBy: this._requestedBy,
      createdAt: this._createdAt,
      ...this.toState(),
    });
  }
}
