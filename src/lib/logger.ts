import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export type LoggerSettings = {
  level: string;
  service: string;
  version?: string;
};

/**
 * JSON-lines logger. Function platforms ship stdout to their log store, so
 * no transport is configured.
 */
export function createLogger({ level, service, version }: LoggerSettings): Logger {
  return pino({
    level,
    base: version ? { service, version } : { service },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createJobLogger(parent: Logger, jobId: string, stageId?: string): Logger {
  return parent.child(stageId ? { jobId, stageId } : { jobId });
}

export const silentLogger: Logger = pino({ level: 'silent' });
