export type ErrorCode =
  | 'invalid_input'
  | 'provider_exhausted'
  | 'dimension_mismatch'
  | 'length_mismatch'
  | 'empty_reference'
  | 'empty_resume'
  | 'no_jobs_found'
  | 'no_jobs_match_filters'
  | 'embedding_failed'
  | 'cancelled'
  | 'configuration'
  | 'internal';

export interface ServiceErrorOptions {
  code?: ErrorCode;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ServiceError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, { code = 'internal', details, cause }: ServiceErrorOptions = {}) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
    this.details = details;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

type ErrorFactory = (message: string, details?: Record<string, unknown>, cause?: unknown) => ServiceError;

function errorFactory(code: ErrorCode): ErrorFactory {
  return (message: string, details?: Record<string, unknown>, cause?: unknown) =>
    new ServiceError(message, { code, details, cause });
}

export const invalidInputError = errorFactory('invalid_input');
export const providerExhaustedError = errorFactory('provider_exhausted');
export const dimensionMismatchError = errorFactory('dimension_mismatch');
export const lengthMismatchError = errorFactory('length_mismatch');
export const emptyReferenceError = errorFactory('empty_reference');
export const emptyResumeError = errorFactory('empty_resume');
export const noJobsFoundError = errorFactory('no_jobs_found');
export const noJobsMatchFiltersError = errorFactory('no_jobs_match_filters');
export const embeddingFailedError = errorFactory('embedding_failed');
export const cancelledError = errorFactory('cancelled');
export const configurationError = errorFactory('configuration');
export const internalError = errorFactory('internal');

export function isServiceError(error: unknown, code?: ErrorCode): error is ServiceError {
  if (!(error instanceof ServiceError)) {
    return false;
  }

  return code === undefined || error.code === code;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error.';
}
