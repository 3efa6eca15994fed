import { createReadStream, createWriteStream } from 'node:fs';
import type { ReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { S3ClientConfig } from '@aws-sdk/client-s3';
import { env } from '../../config/env';
import { ArtifactNotFoundError, FetchError, PublishError } from '../jobs/errors';

/** Byte transfer between object storage and local scratch files. */
export interface ObjectStorage {
  fetch(bucket: string, key: string, destinationPath: string): Promise<void>;
  publish(sourcePath: string, bucket: string, key: string): Promise<void>;
}

let client: S3Client | null = null;

export function shouldForcePathStyle(endpoint: string): boolean {
  try {
    const url = new URL(endpoint);
    const host = url.hostname.toLowerCase();

    // R2 rejects path-style requests; MinIO and most other S3-compatible
    // services expect them.
    if (host.endsWith('.r2.cloudflarestorage.com')) {
      return false;
    }

    return true;
  } catch {
    return true;
  }
}

export function getS3Client(): S3Client {
  if (!client) {
    const config: S3ClientConfig = { region: env.AWS_REGION };

    if (env.S3_ENDPOINT) {
      config.endpoint = env.S3_ENDPOINT;
      config.forcePathStyle = shouldForcePathStyle(env.S3_ENDPOINT);
    }

    client = new S3Client(config);
  }

  return client;
}

function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'NoSuchKey' || err.name === 'NotFound') return true;

  const metadata = '$metadata' in err ? err.$metadata : undefined;
  return (
    typeof metadata === 'object' &&
    metadata !== null &&
    'httpStatusCode' in metadata &&
    metadata.httpStatusCode === 404
  );
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createS3Storage(s3: S3Client = getS3Client()): ObjectStorage {
  return {
    async fetch(bucket, key, destinationPath) {
      const location = `s3://${bucket}/${key}`;
      try {
        const res = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        if (!(res.Body instanceof Readable)) {
          throw new FetchError(`Empty response body for ${location}`);
        }
        await pipeline(res.Body, createWriteStream(destinationPath));
      } catch (err) {
        if (err instanceof FetchError) throw err;
        if (isNotFound(err)) {
          throw new ArtifactNotFoundError(location, { cause: err });
        }
        throw new FetchError(`Failed to download ${location}: ${reason(err)}`, { cause: err });
      }
    },

    async publish(sourcePath, bucket, key) {
      const location = `s3://${bucket}/${key}`;
      let body: ReadStream | undefined;
      try {
        const { size } = await stat(sourcePath);
        body = createReadStream(sourcePath);
        await s3.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ContentLength: size,
          })
        );
      } catch (err) {
        body?.destroy();
        throw new PublishError(`Failed to upload ${location}: ${reason(err)}`, { cause: err });
      }
    },
  };
}
