import type { JobResponse } from './lib/jobs/model';
import { getJobRunner } from './runtime';

/**
 * Direct-invocation entry point. The orchestrator passes the job envelope as
 * the event and reads the structured response; failures are reported through
 * `status` and `error_type`, never as a thrown error.
 */
export async function handler(event: unknown): Promise<JobResponse> {
  return getJobRunner()(event);
}
