import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';

export const baseEnv = {
  SERVICE_ID: 'test-service-v1',
  SERVICE_VERSION: '2.0.0',
  EVENT_BUS_NAME: 'test-bus',
  EVENT_SOURCE: 'test.source',
  AWS_REGION: 'us-east-1',
  S3_ENDPOINT: '',
  SCRATCH_DIR: '/tmp',
  OUTPUT_EXTENSION: 'xlsx',
  LOG_LEVEL: 'silent',
  NODE_ENV: 'test',
} as const;

type EnvOverrides = Partial<Record<keyof typeof baseEnv | 'EVENT_TIMEOUT_MS', string | undefined>>;

export async function loadModule<T>(path: string, overrides: EnvOverrides = {}): Promise<T> {
  vi.resetModules();
  const nextEnv: NodeJS.ProcessEnv = { ...baseEnv };

  for (const key of Object.keys(overrides) as Array<keyof EnvOverrides>) {
    const value = overrides[key];
    if (typeof value === 'undefined') {
      delete nextEnv[key];
    } else {
      nextEnv[key] = value;
    }
  }

  process.env = nextEnv;
  const module = (await import(path)) as T;
  return module;
}

export async function createScratchDir(): Promise<{ dir: string; remove: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'job-function-test-'));
  return {
    dir,
    remove: () => rm(dir, { recursive: true, force: true }),
  };
}

export function fixedClock(...ticks: number[]): () => number {
  const remaining = [...ticks];
  const last = ticks[ticks.length - 1] ?? 0;
  return () => remaining.shift() ?? last;
}
