import { createHash } from 'crypto';
import { Logger } from '@nestjs/common';
import {
  AnalysisJob,
  AnalysisError,
  AnalysisKind,
  AnalysisResult,
  AnalysisSources,
  IAnalysisJobRepository,
  InputRef,
  JobError,
  JobFilter,
  JobStage,
  SUB_ANALYSIS_KINDS,
  SubAnalysisKind,
  isAggregateResult,
} from '../../domain';
import { IAiClient } from '../../infrastructure/ai/IAiClient';
import { IHostingClient } from '../../infrastructure/github/IHostingClient';
import { JobNotFoundError, JobStateError } from '../errors';
import { cancellationFrom, raceAbort } from '../retry/abort';
import { RetryFailure, RetryNotice, RetryPolicy } from '../retry/RetryPolicy';
import { InFlightEntry, InFlightRegistry } from './InFlightRegistry';

export interface SubmitOptions {
  requestedBy?: string | null;
  /** Aborting this signal cancels the job if this submission created it. */
  signal?: AbortSignal;
  parentId?: string | null;
}

export interface SubmitResult {
  job: AnalysisJob;
  /** True when the request was coalesced onto a job already in flight. */
  isExisting: boolean;
}

export interface AggregateView {
  job: AnalysisJob;
  children: AnalysisJob[];
}

export interface OrchestratorOptions {
  /** How long a succeeded result may be reused for identical content. 0 disables reuse. */
  resultCacheTtlMs: number;
  now?: () => Date;
}

export function contentHashOf(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Job orchestrator - owns the lifecycle of every analysis job.
 * Single analyses: fetch artifact, analyze, persist.
 * Full-repo analyses: run one child job per sub-kind and aggregate.
 */
export class AnalysisOrchestrator {
  private readonly logger = new Logger(AnalysisOrchestrator.name);
  private readonly inFlight = new InFlightRegistry<AnalysisJob>();
  private readonly running = new Set<Promise<void>>();
  private readonly now: () => Date;

  constructor(
    private readonly jobRepo: IAnalysisJobRepository,
    private readonly hostingClient: Pick<IHostingClient, 'fetchArtifact'>,
    private readonly aiClient: IAiClient,
    private readonly retryPolicy: RetryPolicy,
    private readonly options: OrchestratorOptions,
  ) {
    this.now = options.now || (() => new Date());
  }

  /**
   * Start an analysis, or join the identical one already in flight.
   */
  async submit(kind: AnalysisKind, inputRef: InputRef, options: SubmitOptions = {}): Promise<SubmitResult> {
    const candidate = AnalysisJob.create({
      kind,
      inputRef,
      parentId: options.parentId,
      requestedBy: options.requestedBy,
    });

    // Nothing may be awaited before the claim.
    const { entry, isNew } = this.inFlight.claim(candidate.dedupKey, () => ({
      job: candidate,
      controller: new AbortController(),
    }));

    if (!isNew) {
      const failure = await entry.ready;
      if (failure) {
        throw failure;
      }
      this.log(entry.job, `coalesced ${kind} request for ${inputRef.toString()}`);
      return { job: entry.job.snapshot(), isExisting: true };
    }

    const job = entry.job;
    try {
      await this.jobRepo.create(job);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error('Unknown error');
      this.logger.error(`[Job ${job.id}] could not be stored: ${failure.message}`);
      job.fail({
        kind: 'Internal',
        message: `Could not store job: ${failure.message}`,
        retryable: false,
        attempts: 0,
        stage: 'dispatch',
      });
      this.inFlight.settle(entry.key, failure);
      throw failure;
    }
    this.inFlight.confirm(entry.key);

    // Taken before dispatch moves the job on.
    const submitted = job.snapshot();
    this.log(job, `submitted ${kind} for ${inputRef.toString()}`);
    this.dispatch(entry, options.signal);
    return { job: submitted, isExisting: false };
  }

  /**
   * Resolve with the job once it is terminal.
   */
  async waitFor(jobId: string): Promise<AnalysisJob> {
    const entry = this.inFlight.findByJobId(jobId);
    if (entry) {
      return entry.completion;
    }
    return this.getStatus(jobId);
  }

  async getStatus(jobId: string): Promise<AnalysisJob> {
    const job = await this.jobRepo.findById(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  /**
   * The job plus its children in sub-kind order. Children of a failed
   * full-repo job keep their own results.
   */
  async getAggregate(jobId: string): Promise<AggregateView> {
    const job = await this.getStatus(jobId);
    const children: AnalysisJob[] = [];
    for (const childId of job.childIds) {
      const child = await this.jobRepo.findById(childId);
      if (child) {
        children.push(child);
      }
    }
    return { job, children };
  }

  async list(filter: JobFilter = {}): Promise<AnalysisJob[]> {
    return this.jobRepo.findAll(filter);
  }

  /**
   * Cancel a non-terminal job and resolve once it has settled as Cancelled.
   */
  async cancel(jobId: string, reason = 'Cancelled by user'): Promise<AnalysisJob> {
    const entry = this.inFlight.findByJobId(jobId);
    if (entry) {
      if (!entry.controller.signal.aborted) {
        this.log(entry.job, `cancelling: ${reason}`);
        entry.controller.abort(AnalysisError.cancelled(reason));
      }
      return entry.completion;
    }

    const job = await this.getStatus(jobId);
    if (job.status.isTerminal) {
      throw new JobStateError(`Cannot cancel job in ${job.status.value} status`);
    }

    // Non-terminal but not owned by this process.
    job.fail({ kind: 'Cancelled', message: reason, retryable: false, attempts: job.attempts, stage: 'dispatch' });
    await this.jobRepo.update(job.id, job.toState());
    this.log(job, reason);
    return job;
  }

  /**
   * Fail jobs left non-terminal by a previous process. Returns how many were closed.
   */
  async recoverInterrupted(): Promise<number> {
    const stale = await this.jobRepo.findNonTerminal();
    let recovered = 0;
    for (const job of stale) {
      if (this.inFlight.findByJobId(job.id)) {
        continue;
      }
      job.fail({
        kind: 'Internal',
        message: 'Interrupted by restart',
        retryable: true,
        attempts: job.attempts,
        stage: job.status.isPending ? 'dispatch' : job.status.isAnalyzing ? 'analyze' : 'fetch',
      });
      await this.jobRepo.update(job.id, job.toState());
      recovered++;
    }
    if (recovered > 0) {
      this.logger.warn(`Marked ${recovered} interrupted job${recovered > 1 ? 's' : ''} as failed`);
    }
    return recovered;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Wait until every background run has finished.
   */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  /**
   * Cancel everything in flight and wait for the runs to settle.
   */
  async shutdown(reason = 'Shutting down'): Promise<void> {
    for (const entry of this.inFlight.entries()) {
      if (!entry.controller.signal.aborted) {
        entry.controller.abort(AnalysisError.cancelled(reason));
      }
    }
    await this.drain();
  }

  // ============= EXECUTION =============

  private dispatch(entry: InFlightEntry<AnalysisJob>, external?: AbortSignal): void {
    const { controller } = entry;
    const onExternalAbort = () => controller.abort(cancellationFrom(external ?? controller.signal));
    if (external) {
      if (external.aborted) {
        onExternalAbort();
      } else {
        external.addEventListener('abort', onExternalAbort, { once: true });
      }
    }

    const work = entry.job.isAggregate
      ? this.runAggregate(entry.job, controller.signal)
      : this.runSingle(entry.job, controller.signal);

    const run = work
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`[Job ${entry.job.id}] run aborted unexpectedly: ${message}`);
      })
      .finally(() => {
        external?.removeEventListener('abort', onExternalAbort);
        this.inFlight.settle(entry.key);
        this.running.delete(run);
      });
    this.running.add(run);
  }

  private async runSingle(job: AnalysisJob, signal: AbortSignal): Promise<void> {
    const kind = job.kind;
    if (kind === 'full-repo-analysis') {
      throw new Error(`Job ${job.id} is an aggregate`);
    }
    let stage: JobStage = 'fetch';

    try {
      job.startFetching();
      await this.save(job, `fetching ${job.inputRef.toString()}`);

      const fetched = await this.retryPolicy.execute(
        (_attempt, attemptSignal) => this.hostingClient.fetchArtifact(job.inputRef, attemptSignal),
        { signal, onRetry: (notice) => this.logRetry(job, 'fetch', notice) },
      );
      job.recordAttempts(fetched.attempts);
      const artifact = fetched.value;
      const contentHash = contentHashOf(artifact.content);

      stage = 'analyze';
      job.startAnalyzing(contentHash);
      await this.save(
        job,
        `analyzing ${artifact.files.length} file${artifact.files.length === 1 ? '' : 's'} (${artifact.size} bytes${artifact.truncated ? ', truncated' : ''})`,
      );

      const sources: AnalysisSources = {
        files: artifact.files,
        skipped: artifact.skipped,
        truncated: artifact.truncated,
      };
      const cached = await this.findCached(kind, contentHash);
      if (cached) {
        job.succeed({ ...cached, sources });
        await this.jobRepo.update(job.id, job.toState());
        this.logger.debug(`[Job ${job.id}] ${job.status.value} - reused cached result for identical content`);
        return;
      }

      const analyzed = await this.retryPolicy.execute(
        (_attempt, attemptSignal) =>
          this.aiClient.analyze(kind, artifact.content, {
            source: job.inputRef.toString(),
            truncated: artifact.truncated,
            skipped: artifact.skipped,
            signal: attemptSignal,
          }),
        { signal, onRetry: (notice) => this.logRetry(job, 'analyze', notice) },
      );
      job.recordAttempts(analyzed.attempts);
      job.succeed({ ...analyzed.value, sources });
      await this.save(job, `${analyzed.value.findings.length} finding${analyzed.value.findings.length === 1 ? '' : 's'}`);
    } catch (error) {
      await this.failJob(job, error, stage);
    }
  }

  private async runAggregate(parent: AnalysisJob, signal: AbortSignal): Promise<void> {
    let stage: JobStage = 'dispatch';

    try {
      parent.startFetching();
      await this.save(parent, `dispatching ${SUB_ANALYSIS_KINDS.length} sub-analyses`);

      const parts: Partial<Record<SubAnalysisKind, AnalysisResult>> = {};
      let firstFailure: { kind: SubAnalysisKind; error: JobError } | null = null;
      let attempts = 0;

      // Children run one after another so they share the fetch rate budget.
      for (const subKind of SUB_ANALYSIS_KINDS) {
        if (signal.aborted) {
          throw cancellationFrom(signal);
        }
        const { job: child } = await this.submit(subKind, parent.inputRef, {
          parentId: parent.id,
          requestedBy: parent.requestedBy,
          signal,
        });
        parent.attachChild(child.id);
        await this.jobRepo.update(parent.id, parent.toState());

        const finished = await raceAbort(this.waitFor(child.id), signal);
        attempts += finished.attempts;
        const result = finished.result;
        if (finished.status.isSucceeded && result && !isAggregateResult(result)) {
          parts[subKind] = result;
        } else if (finished.error && !firstFailure) {
          firstFailure = { kind: subKind, error: finished.error };
        }
      }

      stage = 'aggregate';
      parent.recordAttempts(attempts);
      if (firstFailure) {
        const { kind, error } = firstFailure;
        parent.fail({
          kind: error.kind,
          message: `${kind} failed: ${error.message}`,
          retryable: error.retryable,
          attempts: parent.attempts,
          stage,
        });
        await this.save(parent, `${kind} failed (${error.kind})`);
        return;
      }

      const complete = completeParts(parts);
      if (!complete) {
        throw new AnalysisError('Internal', 'Sub-analysis finished without a result');
      }
      parent.startAnalyzing();
      await this.jobRepo.update(parent.id, parent.toState());
      parent.succeed({ parts: complete });
      await this.save(parent, 'all sub-analyses succeeded');
    } catch (error) {
      await this.failJob(parent, error, stage);
    }
  }

  private async findCached(kind: SubAnalysisKind, contentHash: string): Promise<AnalysisResult | null> {
    if (this.options.resultCacheTtlMs <= 0) {
      return null;
    }
    const since = new Date(this.now().getTime() - this.options.resultCacheTtlMs);
    return this.jobRepo.findCachedResult(kind, contentHash, since);
  }

  private async failJob(job: AnalysisJob, thrown: unknown, stage: JobStage): Promise<void> {
    const failure = thrown instanceof RetryFailure ? thrown : null;
    const error = failure ? failure.error : AnalysisError.from(thrown);

    if (job.status.isTerminal) {
      // Reached a terminal state in memory but could not be stored.
      this.logger.error(`[Job ${job.id}] ${job.status.value} - could not be stored: ${error.message}`);
      return;
    }

    if (failure) {
      job.recordAttempts(failure.attempts);
    }
    job.fail({
      kind: error.kind,
      message: error.message,
      retryable: failure ? failure.exhausted : false,
      attempts: job.attempts,
      stage,
    });

    try {
      await this.save(job, `${error.kind} at ${stage}: ${error.message}`);
    } catch (saveError) {
      const message = saveError instanceof Error ? saveError.message : 'Unknown error';
      this.logger.error(`[Job ${job.id}] failed - could not be stored: ${message}`);
    }
  }

  private async save(job: AnalysisJob, message: string): Promise<void> {
    await this.jobRepo.update(job.id, job.toState());
    this.log(job, message);
  }

  private log(job: AnalysisJob, message: string): void {
    const line = `[Job ${job.id}] ${job.status.value} - ${message}`;
    if (job.status.isFailed) {
      this.logger.error(line);
    } else {
      this.logger.log(line);
    }
  }

  private logRetry(job: AnalysisJob, stage: JobStage, notice: RetryNotice): void {
    this.logger.warn(
      `[Job ${job.id}] ${stage} attempt ${notice.attempt} failed (${notice.error.kind}), retrying in ${notice.delayMs}ms`,
    );
  }
}

function completeParts(
  parts: Partial<Record<SubAnalysisKind, AnalysisResult>>,
): Record<SubAnalysisKind, AnalysisResult> | null {
  const codeReview = parts['code-review'];
  const documentation = parts.documentation;
  const bugDetection = parts['bug-detection'];
  if (!codeReview || !documentation || !bugDetection) {
    return null;
  }
  return { 'code-review': codeReview, documentation, 'bug-detection': bugDetection };
}
