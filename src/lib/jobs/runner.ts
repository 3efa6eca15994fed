import { rm, stat } from 'node:fs/promises';
import { createJobLogger } from '../logger';
import type { Logger } from '../logger';
import type { EmitterIdentity, JobEventEmitter } from '../events/emitter';
import type { ObjectStorage } from '../storage/s3';
import { classifyFailure, JobError } from './errors';
import { jobInvocationSchema, resolveJob, scratchPaths } from './model';
import type {
  JobErrorResponse,
  JobMetadata,
  JobResponse,
  JobSuccessResponse,
  ResolvedJob,
  ScratchPaths,
} from './model';
import type { TransformFn } from './transform';

export type RunnerConfig = {
  serviceId: string;
  serviceVersion: string;
  scratchDir: string;
  /** Extension of the synthesized output key and of the local output file. */
  outputExtension: string;
};

export type RunnerDeps = {
  config: RunnerConfig;
  storage: ObjectStorage;
  transform: TransformFn;
  createEmitter: (identity: EmitterIdentity, logger: Logger) => JobEventEmitter;
  logger: Logger;
  now?: () => number;
};

/** Runs one job invocation. Always resolves with a response, never rejects. */
export type JobRunner = (invocation: unknown) => Promise<JobResponse>;

function rawJobId(invocation: unknown): string | undefined {
  if (typeof invocation !== 'object' || invocation === null || !('job_id' in invocation)) {
    return undefined;
  }
  return typeof invocation.job_id === 'string' ? invocation.job_id : undefined;
}

export function createJobRunner(deps: RunnerDeps): JobRunner {
  const { config, storage, transform, createEmitter, logger } = deps;
  const now = deps.now ?? Date.now;

  async function cleanup(scratch: ScratchPaths, log: Logger) {
    for (const path of [scratch.input, scratch.output]) {
      try {
        await rm(path, { force: true });
      } catch (err) {
        log.warn({ err, path }, 'Failed to clean up scratch file');
      }
    }
  }

  async function execute(
    job: ResolvedJob,
    scratch: ScratchPaths,
    emitter: JobEventEmitter,
    log: Logger,
    startedAt: number
  ): Promise<JobSuccessResponse> {
    await emitter.notifyProgress('Starting processing...');
    log.info(
      {
        input: `s3://${job.inputBucket}/${job.inputKey}`,
        output: `s3://${job.outputBucket}/${job.outputKey}`,
        customerTier: job.customerTier,
      },
      'Processing job'
    );

    await emitter.notifyProgress('Downloading input file...');
    await storage.fetch(job.inputBucket, job.inputKey, scratch.input);
    const inputBytes = (await stat(scratch.input)).size;
    log.info({ path: scratch.input, bytes: inputBytes }, 'Downloaded input');

    await emitter.notifyProgress('Processing file...');
    const result = await transform({
      inputPath: scratch.input,
      outputPath: scratch.output,
      config: job.stageConfig,
      emitter,
    });
    if (!result.success) {
      throw new JobError('RuntimeError', 'Transform reported an unsuccessful result');
    }

    await emitter.notifyProgress('Uploading output...');
    await storage.publish(scratch.output, job.outputBucket, job.outputKey);
    const outputBytes = (await stat(scratch.output)).size;
    log.info({ key: job.outputKey, bytes: outputBytes }, 'Uploaded output');

    const metadata: JobMetadata = {
      processing_time_ms: now() - startedAt,
      input_file_size_bytes: inputBytes,
      output_file_size_bytes: outputBytes,
      customer_tier: job.customerTier,
      service_version: config.serviceVersion,
      ...result.metadata,
    };
    if (job.referenceDate) {
      metadata.reference_date = job.referenceDate;
    }

    return {
      status: 'success',
      output_bucket: job.outputBucket,
      output_key: job.outputKey,
      metadata,
    };
  }

  async function runJob(invocation: unknown): Promise<JobResponse> {
    const startedAt = now();
    logger.debug({ invocation }, 'Received invocation');

    const parsed = jobInvocationSchema.safeParse(invocation);
    if (!parsed.success) {
      const error = parsed.error.issues[0]?.message ?? 'Invalid invocation';
      const jobId = rawJobId(invocation);
      logger.warn({ jobId, reason: error }, 'Rejected invocation');
      return {
        status: 'error',
        error,
        error_type: 'ValidationError',
        metadata: jobId ? { job_id: jobId } : {},
      };
    }

    const job = resolveJob(parsed.data, config.outputExtension);
    const scratch = scratchPaths(config.scratchDir, job, config.outputExtension);
    const log = createJobLogger(logger, job.jobId, job.stageId);

    let emitter: JobEventEmitter | undefined;
    let response: JobResponse;

    try {
      emitter = createEmitter({ jobId: job.jobId, serviceId: config.serviceId, stageId: job.stageId }, log);
      response = await execute(job, scratch, emitter, log, startedAt);
    } catch (err) {
      const failure = classifyFailure(err, job, now() - startedAt);
      log.error({ err, errorType: failure.errorType }, failure.message);
      response = {
        status: 'error',
        error: failure.message,
        error_type: failure.errorType,
        metadata: failure.metadata,
      } satisfies JobErrorResponse;
    }

    await cleanup(scratch, log);

    if (emitter) {
      if (response.status === 'success') {
        await emitter.notifySuccess('Processing completed successfully', response.output_key, response.metadata);
        log.info({ metadata: response.metadata }, 'Job succeeded');
      } else {
        await emitter.notifyFailure(response.error, response.error_type, response.metadata);
      }
    }

    return response;
  }

  return async function run(invocation) {
    try {
      return await runJob(invocation);
    } catch (err) {
      logger.error({ err }, 'Unhandled failure in job runner');
      const jobId = rawJobId(invocation);
      return {
        status: 'error',
        error: err instanceof Error ? err.message : String(err),
        error_type: 'RuntimeError',
        metadata: jobId ? { job_id: jobId } : {},
      };
    }
  };
}
