import { env } from './config/env';
import { createJobEventEmitter } from './lib/events/emitter';
import { createEventBridgeBus } from './lib/events/eventBridge';
import { createJobRunner } from './lib/jobs/runner';
import type { JobRunner } from './lib/jobs/runner';
import { processFile } from './lib/jobs/transform';
import { createLogger } from './lib/logger';
import { createS3Storage } from './lib/storage/s3';

let runner: JobRunner | null = null;

/** Runner wired to S3, EventBridge and the configured transform; built once per warm container. */
export function getJobRunner(): JobRunner {
  if (!runner) {
    const logger = createLogger({
      level: env.LOG_LEVEL,
      service: env.SERVICE_ID,
      version: env.SERVICE_VERSION,
    });
    const bus = createEventBridgeBus();

    runner = createJobRunner({
      config: {
        serviceId: env.SERVICE_ID,
        serviceVersion: env.SERVICE_VERSION,
        scratchDir: env.SCRATCH_DIR,
        outputExtension: env.OUTPUT_EXTENSION,
      },
      storage: createS3Storage(),
      transform: processFile,
      createEmitter: (identity, jobLogger) =>
        createJobEventEmitter({
          ...identity,
          bus,
          topic: env.EVENT_BUS_NAME,
          source: env.EVENT_SOURCE,
          logger: jobLogger,
          timeoutMs: env.EVENT_TIMEOUT_MS,
        }),
      logger,
    });
  }

  return runner;
}
