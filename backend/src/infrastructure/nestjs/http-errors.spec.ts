import { ConflictException, HttpException, NotFoundException } from '@nestjs/common';
import { AnalysisError } from '../../domain';
import { JobNotFoundError, JobStateError } from '../../application/errors';
import { jobErrorToHttp, toHttpException } from './http-errors';

describe('http-errors', () => {
  it('should carry the job error in the response body', () => {
    const exception = jobErrorToHttp({ kind: 'RateLimited', message: 'Slow down', retryable: true });

    expect(exception.getStatus()).toBe(429);
    expect(exception.getResponse()).toEqual({
      statusCode: 429,
      kind: 'RateLimited',
      message: 'Slow down',
      retryable: true,
    });
  });

  it('should map error kinds to statuses', () => {
    expect(jobErrorToHttp({ kind: 'NotFound', message: '', retryable: false }).getStatus()).toBe(404);
    expect(jobErrorToHttp({ kind: 'AuthFailure', message: '', retryable: false }).getStatus()).toBe(403);
    expect(jobErrorToHttp({ kind: 'QuotaExceeded', message: '', retryable: true }).getStatus()).toBe(503);
    expect(jobErrorToHttp({ kind: 'InvalidResponse', message: '', retryable: true }).getStatus()).toBe(502);
    expect(jobErrorToHttp({ kind: 'Cancelled', message: '', retryable: false }).getStatus()).toBe(500);
  });

  it('should translate application errors', () => {
    expect(toHttpException(new JobNotFoundError('abc'))).toBeInstanceOf(NotFoundException);
    expect(toHttpException(new JobStateError('Cannot cancel job in completed status'))).toBeInstanceOf(
      ConflictException,
    );

    const translated = toHttpException(new AnalysisError('NotFound', 'Repository not found: a/b'));
    expect(translated).toBeInstanceOf(HttpException);
    expect(translated instanceof HttpException && translated.getStatus()).toBe(404);
  });

  it('should leave other errors untouched', () => {
    const error = new Error('boom');

    expect(toHttpException(error)).toBe(error);
  });
});
