import { AnalysisJob } from './AnalysisJob';
import { InputRef } from '../value-objects/InputRef';
import { JobStatus } from '../value-objects/JobStatus';
import { AnalysisResult } from '../value-objects/AnalysisResult';
import { JobError } from '../errors/AnalysisError';

const result: AnalysisResult = {
  summary: 'Looks fine',
  sections: { quality: 'Readable' },
  findings: [],
};

const error: JobError = {
  kind: 'NotFound',
  message: 'Repository not found: acme/widgets',
  retryable: false,
  attempts: 1,
  stage: 'fetch',
};

function newJob(kind: 'code-review' | 'full-repo-analysis' = 'code-review'): AnalysisJob {
  return AnalysisJob.create({ kind, inputRef: InputRef.fromFullName('acme/widgets', 'src') });
}

describe('AnalysisJob', () => {
  describe('create', () => {
    it('should start pending with no result or error', () => {
      const job = newJob();

      expect(job.id).toBeDefined();
      expect(job.status.isPending).toBe(true);
      expect(job.result).toBeNull();
      expect(job.error).toBeNull();
      expect(job.attempts).toBe(0);
      expect(job.childIds).toEqual([]);
    });

    it('should build the dedup key from kind and input', () => {
      expect(newJob().dedupKey).toBe('code-review|acme/widgets:src');
    });
  });

  describe('transitions', () => {
    it('should walk pending -> fetching -> analyzing -> succeeded', () => {
      const job = newJob();

      job.startFetching();
      job.startAnalyzing('abc123');
      job.succeed(result);

      expect(job.status.isSucceeded).toBe(true);
      expect(job.contentHash).toBe('abc123');
      expect(job.result).toEqual(result);
      expect(job.error).toBeNull();
    });

    it('should fail from pending', () => {
      const job = newJob();
      job.fail(error);

      expect(job.status.isFailed).toBe(true);
      expect(job.error).toEqual(error);
      expect(job.result).toBeNull();
    });

    it('should not skip fetching', () => {
      const job = newJob();
      expect(() => job.startAnalyzing()).toThrow('Invalid status transition from pending to analyzing');
    });

    it('should not change a terminal job', () => {
      const job = newJob();
      job.fail(error);

      expect(() => job.startFetching()).toThrow('Invalid status transition from failed to fetching');
      expect(() => job.fail(error)).toThrow('Invalid status transition from failed to failed');
      expect(() => job.recordAttempts(1)).toThrow('Cannot record attempts on failed job');
    });

    it('should require an error message', () => {
      const job = newJob();
      expect(() => job.fail({ ...error, message: '' })).toThrow('A failed job requires a non-empty error message');
      expect(job.status.isPending).toBe(true);
    });
  });

  describe('children', () => {
    it('should attach children to a full-repo job once each', () => {
      const parent = newJob('full-repo-analysis');
      parent.attachChild('child-1');
      parent.attachChild('child-2');
      parent.attachChild('child-1');

      expect(parent.childIds).toEqual(['child-1', 'child-2']);
      expect(parent.toState().childIds).toEqual(['child-1', 'child-2']);
    });

    it('should refuse children on a single analysis', () => {
      expect(() => newJob().attachChild('child-1')).toThrow('Only full-repo-analysis jobs have children');
    });
  });

  describe('reconstitute', () => {
    it('should reject a succeeded job without a result', () => {
      expect(() =>
        AnalysisJob.reconstitute({
          id: 'job-1',
          kind: 'code-review',
          inputRef: InputRef.fromFullName('acme/widgets'),
          status: JobStatus.succeeded(),
        }),
      ).toThrow('Job job-1 is succeeded but result is missing');
    });

    it('should reject a job with both result and error', () => {
      expect(() =>
        AnalysisJob.reconstitute({
          id: 'job-2',
          kind: 'code-review',
          inputRef: InputRef.fromFullName('acme/widgets'),
          status: JobStatus.failed(),
          result,
          error,
        }),
      ).toThrow('Job job-2 has both a result and an error');
    });
  });

  describe('snapshot', () => {
    it('should not follow later transitions', () => {
      const job = AnalysisJob.create({ kind: 'code-review', inputRef: InputRef.fromFullName('acme/widgets') });

      const copy = job.snapshot();
      job.startFetching();

      expect(copy.id).toBe(job.id);
      expect(copy.status.value).toBe('pending');
      expect(job.status.value).toBe('fetching');
    });
  });
});
