import { tmpdir } from 'node:os';
import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  SERVICE_ID: z.string().min(1, 'SERVICE_ID cannot be empty').default('job-service-v1'),
  SERVICE_VERSION: z.string().min(1, 'SERVICE_VERSION cannot be empty').default('1.0.0'),
  EVENT_BUS_NAME: optionalString,
  EVENT_SOURCE: z.string().min(1, 'EVENT_SOURCE cannot be empty').default('workflow.service'),
  EVENT_TIMEOUT_MS: z.coerce
    .number({ invalid_type_error: 'EVENT_TIMEOUT_MS must be a number of milliseconds' })
    .int('EVENT_TIMEOUT_MS must be a whole number of milliseconds')
    .positive('EVENT_TIMEOUT_MS must be positive')
    .default(2000),
  AWS_REGION: optionalString,
  S3_ENDPOINT: z
    .union([z.string().url({ message: 'S3_ENDPOINT must be a valid URL' }), z.literal('')])
    .optional()
    .default(''),
  SCRATCH_DIR: optionalString,
  OUTPUT_EXTENSION: z
    .string()
    .default('xlsx')
    .transform((value) => value.trim().replace(/^\./, ''))
    .pipe(
      z.string().regex(/^[A-Za-z0-9]+$/, 'OUTPUT_EXTENSION must be alphanumeric, e.g. xlsx or json')
    ),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'], {
      errorMap: () => ({ message: 'LOG_LEVEL must be a pino level name' }),
    })
    .default('info'),
  NODE_ENV: z
    .enum(['development', 'production', 'test'], {
      errorMap: () => ({ message: 'NODE_ENV must be development, production or test' }),
    })
    .default('production'),
});

export type Env = ReturnType<typeof loadEnv>;

export function loadEnv(customEnv: NodeJS.ProcessEnv = process.env) {
  try {
    const parsed = envSchema.parse(customEnv);

    return {
      SERVICE_ID: parsed.SERVICE_ID,
      SERVICE_VERSION: parsed.SERVICE_VERSION,
      EVENT_BUS_NAME: parsed.EVENT_BUS_NAME,
      EVENT_SOURCE: parsed.EVENT_SOURCE,
      EVENT_TIMEOUT_MS: parsed.EVENT_TIMEOUT_MS,
      AWS_REGION: parsed.AWS_REGION,
      S3_ENDPOINT: parsed.S3_ENDPOINT.replace(/\/$/, ''),
      SCRATCH_DIR: parsed.SCRATCH_DIR ?? tmpdir(),
      OUTPUT_EXTENSION: parsed.OUTPUT_EXTENSION,
      LOG_LEVEL: parsed.LOG_LEVEL,
      NODE_ENV: parsed.NODE_ENV,
    } as const;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
      throw new Error(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`);
    }

    throw error;
  }
}

export const env = loadEnv();
