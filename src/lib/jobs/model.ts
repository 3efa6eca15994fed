import { createHash } from 'crypto';
import { basename, join } from 'node:path';
import { z } from 'zod';

export type StageConfigValue =
  | string
  | number
  | boolean
  | null
  | StageConfigValue[]
  | { [key: string]: StageConfigValue };

export type StageConfig = { [key: string]: StageConfigValue };

const stageConfigValue: z.ZodType<StageConfigValue> = z.lazy(() =>
  z.union(
    [z.string(), z.number(), z.boolean(), z.null(), z.array(stageConfigValue), z.record(stageConfigValue)],
    {
      errorMap: (issue) => ({
        message: `Invalid field: ${issue.path.join('.')} has an unsupported value`,
      }),
    }
  )
);

const requiredString = (field: string) =>
  z
    .string({
      required_error: `Missing required field: ${field}`,
      invalid_type_error: `Invalid field: ${field} must be a string`,
    })
    .min(1, `Missing required field: ${field}`);

const optionalString = (field: string) =>
  z.string({ invalid_type_error: `Invalid field: ${field} must be a string` }).nullish();

// Key order matters: the first failing field is the one reported.
export const jobInvocationSchema = z.object(
  {
    invocation_type: z.literal('direct', {
      errorMap: () => ({ message: 'Invalid invocation type. Expected "direct"' }),
    }),
    job_id: requiredString('job_id'),
    input_bucket: requiredString('input_bucket'),
    input_key: requiredString('input_key'),
    output_bucket: requiredString('output_bucket'),
    output_key: optionalString('output_key'),
    reference_date: optionalString('reference_date'),
    customer_tier: optionalString('customer_tier'),
    stage_config: z
      .record(stageConfigValue, {
        invalid_type_error: 'Invalid field: stage_config must be an object',
      })
      .superRefine((config, ctx) => {
        const stageId = config.stage_id;
        if (stageId !== undefined && stageId !== null && typeof stageId !== 'string') {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['stage_id'],
            message: 'Invalid field: stage_config.stage_id must be a string',
          });
        }
      })
      .nullish(),
  },
  {
    invalid_type_error: 'Invocation must be a JSON object',
    required_error: 'Invocation must be a JSON object',
  }
);

export type JobInvocation = z.infer<typeof jobInvocationSchema>;

/** Envelope after validation, with every default applied and the output key resolved once. */
export interface ResolvedJob {
  jobId: string;
  inputBucket: string;
  inputKey: string;
  outputBucket: string;
  outputKey: string;
  referenceDate?: string;
  customerTier: string;
  stageConfig: StageConfig;
  stageId?: string;
}

export const DEFAULT_CUSTOMER_TIER = 'standard';

export const paths = {
  output: (jobId: string, extension: string) => `jobs/${jobId}/output.${extension}`,
};

export function resolveJob(invocation: JobInvocation, outputExtension: string): ResolvedJob {
  const stageConfig: StageConfig = invocation.stage_config ?? {};
  const stageId = typeof stageConfig.stage_id === 'string' ? stageConfig.stage_id : undefined;

  return {
    jobId: invocation.job_id,
    inputBucket: invocation.input_bucket,
    inputKey: invocation.input_key,
    outputBucket: invocation.output_bucket,
    outputKey: invocation.output_key || paths.output(invocation.job_id, outputExtension),
    referenceDate: invocation.reference_date ?? undefined,
    customerTier: invocation.customer_tier ?? DEFAULT_CUSTOMER_TIER,
    stageConfig,
    stageId,
  };
}

export type ScratchPaths = {
  input: string;
  output: string;
};

/**
 * Scratch-file token for a job id: the id with unsafe characters replaced,
 * followed by a digest of the raw id so that ids which clean to the same
 * text still get distinct files.
 */
export function scratchToken(jobId: string): string {
  const readable = jobId.replace(/[^A-Za-z0-9._-]/g, '_');
  const digest = createHash('sha256').update(jobId).digest('hex').slice(0, 12);
  return `${readable}_${digest}`;
}

export function scratchPaths(scratchDir: string, job: ResolvedJob, outputExtension: string): ScratchPaths {
  const token = scratchToken(job.jobId);
  const inputName = basename(job.inputKey) || 'input';

  return {
    input: join(scratchDir, `input_${token}_${inputName}`),
    output: join(scratchDir, `output_${token}.${outputExtension}`),
  };
}

export type JobMetadata = Record<string, unknown>;

export type JobSuccessResponse = {
  status: 'success';
  output_bucket: string;
  output_key: string;
  metadata: JobMetadata;
};

export type JobErrorResponse = {
  status: 'error';
  error: string;
  error_type: ErrorType;
  metadata: JobMetadata;
};

export type JobResponse = JobSuccessResponse | JobErrorResponse;

export const ERROR_TYPES = [
  'ValidationError',
  'FileNotFoundError',
  'ValueError',
  'FetchError',
  'PublishError',
  'RuntimeError',
] as const;

export type ErrorType = (typeof ERROR_TYPES)[number];

export type LifecycleStatus = 'in_progress' | 'success' | 'error';

type LifecycleEventBase = {
  job_id: string;
  service_id: string;
  stage_id?: string;
  message: string;
  timestamp: string;
  metadata?: JobMetadata;
};

export type LifecycleEvent =
  | (LifecycleEventBase & { status: 'in_progress' })
  | (LifecycleEventBase & { status: 'success'; output_key?: string })
  | (LifecycleEventBase & { status: 'error'; error_type?: ErrorType });

export const detailTypes = {
  in_progress: 'service.progress',
  success: 'service.completed',
  error: 'service.failed',
} as const satisfies Record<LifecycleStatus, string>;

export type DetailType = (typeof detailTypes)[LifecycleStatus];
