import { ConflictException, HttpException, HttpStatus, NotFoundException } from '@nestjs/common';
import { AnalysisError, ErrorKind, JobError } from '../../domain';
import { JobNotFoundError, JobStateError } from '../../application/errors';

export const ERROR_KIND_HTTP_STATUS: Record<ErrorKind, HttpStatus> = {
  NotFound: HttpStatus.NOT_FOUND,
  AuthFailure: HttpStatus.FORBIDDEN,
  RateLimited: HttpStatus.TOO_MANY_REQUESTS,
  QuotaExceeded: HttpStatus.SERVICE_UNAVAILABLE,
  TransientNetworkError: HttpStatus.SERVICE_UNAVAILABLE,
  InvalidResponse: HttpStatus.BAD_GATEWAY,
  Cancelled: HttpStatus.INTERNAL_SERVER_ERROR,
  Internal: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function jobErrorToHttp(error: Pick<JobError, 'kind' | 'message' | 'retryable'>): HttpException {
  const status = ERROR_KIND_HTTP_STATUS[error.kind];
  return new HttpException(
    { statusCode: status, kind: error.kind, message: error.message, retryable: error.retryable },
    status,
  );
}

/**
 * Translate application errors into Nest HTTP exceptions; anything else is returned unchanged.
 */
export function toHttpException(error: unknown): unknown {
  if (error instanceof JobNotFoundError) {
    return new NotFoundException(error.message);
  }
  if (error instanceof JobStateError) {
    return new ConflictException(error.message);
  }
  if (error instanceof AnalysisError) {
    return jobErrorToHttp({ kind: error.kind, message: error.message, retryable: false });
  }
  return error;
}
