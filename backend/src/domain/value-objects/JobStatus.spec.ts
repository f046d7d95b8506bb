import { JobStatus } from './JobStatus';

describe('JobStatus', () => {
  it('should allow the forward path', () => {
    expect(JobStatus.pending().canTransitionTo(JobStatus.fetching())).toBe(true);
    expect(JobStatus.fetching().canTransitionTo(JobStatus.analyzing())).toBe(true);
    expect(JobStatus.analyzing().canTransitionTo(JobStatus.succeeded())).toBe(true);
  });

  it('should allow failure from every non-terminal status', () => {
    expect(JobStatus.pending().canTransitionTo(JobStatus.failed())).toBe(true);
    expect(JobStatus.fetching().canTransitionTo(JobStatus.failed())).toBe(true);
    expect(JobStatus.analyzing().canTransitionTo(JobStatus.failed())).toBe(true);
  });

  it('should not allow skipping a step', () => {
    expect(JobStatus.pending().canTransitionTo(JobStatus.analyzing())).toBe(false);
    expect(JobStatus.pending().canTransitionTo(JobStatus.succeeded())).toBe(false);
    expect(JobStatus.fetching().canTransitionTo(JobStatus.succeeded())).toBe(false);
  });

  it('should not leave a terminal status', () => {
    expect(JobStatus.succeeded().canTransitionTo(JobStatus.failed())).toBe(false);
    expect(JobStatus.failed().canTransitionTo(JobStatus.pending())).toBe(false);
    expect(JobStatus.succeeded().isTerminal).toBe(true);
    expect(JobStatus.failed().isTerminal).toBe(true);
  });

  it('should report in-flight statuses', () => {
    expect(JobStatus.pending().isInFlight).toBe(false);
    expect(JobStatus.fetching().isInFlight).toBe(true);
    expect(JobStatus.analyzing().isInFlight).toBe(true);
  });

  it('should parse known values and reject others', () => {
    expect(JobStatus.fromString('analyzing').equals(JobStatus.analyzing())).toBe(true);
    expect(() => JobStatus.fromString('running')).toThrow('Invalid job status: running');
  });
});
