import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { buildSummaryWorkbook } from '../excel/exporter';
import type { JobEventEmitter } from '../events/emitter';
import { InvalidInputError } from './errors';
import type { JobMetadata, StageConfig } from './model';

export type TransformInput = {
  inputPath: string;
  outputPath: string;
  config: StageConfig;
  /** For granular progress reporting from inside the transform. */
  emitter: JobEventEmitter;
};

export type TransformResult = {
  success: boolean;
  metadata?: JobMetadata;
};

/**
 * The pluggable processing step. It must write its artifact to `outputPath`
 * before resolving. Throw InvalidInputError for input it cannot accept; any
 * other error is reported as a runtime failure.
 */
export type TransformFn = (input: TransformInput) => Promise<TransformResult>;

/**
 * Placeholder transform: replace with the service's real processing. It
 * writes a summary workbook describing the input so the pipeline can be
 * exercised end to end.
 */
export const processFile: TransformFn = async ({ inputPath, outputPath, config, emitter }) => {
  await emitter.notifyProgress('Analyzing input file...');

  const input = await readFile(inputPath);
  if (input.byteLength === 0) {
    throw new InvalidInputError('Input file is empty');
  }

  const workbook = await buildSummaryWorkbook(
    [
      ['Source file', basename(inputPath)],
      ['Input size (bytes)', input.byteLength],
      ['Stage config keys', Object.keys(config).sort().join(', ')],
    ],
    { creator: 'job-function-template' }
  );
  await writeFile(outputPath, workbook);

  await emitter.notifyProgress('Processing complete');

  return {
    success: true,
    metadata: {
      records_processed: 0,
    },
  };
};
