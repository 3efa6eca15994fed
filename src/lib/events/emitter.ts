import type { Logger } from '../logger';
import { detailTypes } from '../jobs/model';
import type { ErrorType, JobMetadata, LifecycleEvent } from '../jobs/model';
import type { EventBus } from './eventBridge';

/**
 * Best-effort lifecycle notifier for one job. Every method resolves, whatever
 * happens on the bus: a lost event is logged and the job carries on.
 */
export interface JobEventEmitter {
  notifyProgress(message: string, metadata?: JobMetadata): Promise<void>;
  notifySuccess(message: string, outputKey?: string, metadata?: JobMetadata): Promise<void>;
  notifyFailure(message: string, errorType?: ErrorType, metadata?: JobMetadata): Promise<void>;
}

export type EmitterIdentity = {
  jobId: string;
  serviceId: string;
  stageId?: string;
};

export type EmitterOptions = EmitterIdentity & {
  bus: EventBus;
  /** Bus name. Events are dropped with a warning when it is not set. */
  topic?: string;
  source: string;
  logger: Logger;
  now?: () => Date;
  /** How long to wait for the bus before giving up on an event. */
  timeoutMs?: number;
};

export const DEFAULT_EMIT_TIMEOUT_MS = 2000;

export const noopEventEmitter: JobEventEmitter = {
  async notifyProgress() {},
  async notifySuccess() {},
  async notifyFailure() {},
};

export function createJobEventEmitter(options: EmitterOptions): JobEventEmitter {
  const { jobId, serviceId, stageId, bus, topic, source, logger } = options;
  const now = options.now ?? (() => new Date());
  const timeoutMs = options.timeoutMs ?? DEFAULT_EMIT_TIMEOUT_MS;

  const base = (message: string, metadata?: JobMetadata) => ({
    job_id: jobId,
    service_id: serviceId,
    ...(stageId ? { stage_id: stageId } : {}),
    message,
    timestamp: now().toISOString(),
    ...(metadata ? { metadata } : {}),
  });

  async function emit(detail: LifecycleEvent): Promise<void> {
    const detailType = detailTypes[detail.status];

    if (!topic) {
      logger.warn({ detailType }, 'EVENT_BUS_NAME not set, skipping event emission');
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const sent = bus.publishMessage(topic, { source, detailType, detail }).then(() => 'sent' as const);
      if ((await Promise.race([sent, timedOut])) === 'timeout') {
        logger.warn({ detailType, timeoutMs }, 'Timed out emitting lifecycle event');
        return;
      }
      logger.debug({ detailType, eventMessage: detail.message }, 'Emitted lifecycle event');
    } catch (err) {
      logger.warn({ err, detailType }, 'Failed to emit lifecycle event');
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    notifyProgress(message, metadata) {
      return emit({ ...base(message, metadata), status: 'in_progress' });
    },

    notifySuccess(message, outputKey, metadata) {
      return emit({
        ...base(message, metadata),
        status: 'success',
        ...(outputKey ? { output_key: outputKey } : {}),
      });
    },

    notifyFailure(message, errorType, metadata) {
      return emit({
        ...base(message, metadata),
        status: 'error',
        ...(errorType ? { error_type: errorType } : {}),
      });
    },
  };
}
