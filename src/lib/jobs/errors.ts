import type { ErrorType, JobMetadata, ResolvedJob } from './model';

export type JobErrorOptions = {
  cause?: unknown;
};

export class JobError extends Error {
  readonly errorType: ErrorType;

  constructor(errorType: ErrorType, message: string, options: JobErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'JobError';
    this.errorType = errorType;
  }
}

/** The source object does not exist in the bucket. */
export class ArtifactNotFoundError extends JobError {
  constructor(message: string, options: JobErrorOptions = {}) {
    super('FileNotFoundError', message, options);
    this.name = 'ArtifactNotFoundError';
  }
}

/** Thrown by a transform that cannot accept its input (malformed or unsupported). */
export class InvalidInputError extends JobError {
  constructor(message: string, options: JobErrorOptions = {}) {
    super('ValueError', message, options);
    this.name = 'InvalidInputError';
  }
}

export class FetchError extends JobError {
  constructor(message: string, options: JobErrorOptions = {}) {
    super('FetchError', message, options);
    this.name = 'FetchError';
  }
}

export class PublishError extends JobError {
  constructor(message: string, options: JobErrorOptions = {}) {
    super('PublishError', message, options);
    this.name = 'PublishError';
  }
}

export type ClassifiedFailure = {
  errorType: ErrorType;
  message: string;
  metadata: JobMetadata;
};

function describe(err: unknown): { message: string; errorClass: string } {
  if (err instanceof Error) {
    return { message: err.message, errorClass: err.name };
  }

  return { message: String(err), errorClass: typeof err };
}

/**
 * Maps anything thrown after validation onto the closed taxonomy. Values
 * outside the JobError hierarchy land in RuntimeError; their class name is
 * kept in metadata for diagnosis only.
 */
export function classifyFailure(err: unknown, job: ResolvedJob, elapsedMs: number): ClassifiedFailure {
  if (err instanceof JobError) {
    switch (err.errorType) {
      case 'FileNotFoundError':
        return {
          errorType: 'FileNotFoundError',
          message: `File not found: ${err.message}`,
          metadata: { job_id: job.jobId, input_key: job.inputKey },
        };
      case 'ValueError':
        return {
          errorType: 'ValueError',
          message: `Invalid value: ${err.message}`,
          metadata: { job_id: job.jobId },
        };
      default:
        return {
          errorType: err.errorType,
          message: err.message,
          metadata: { job_id: job.jobId, input_key: job.inputKey, processing_time_ms: elapsedMs },
        };
    }
  }

  const { message, errorClass } = describe(err);
  return {
    errorType: 'RuntimeError',
    message,
    metadata: {
      job_id: job.jobId,
      input_key: job.inputKey,
      processing_time_ms: elapsedMs,
      error_class: errorClass,
    },
  };
}
