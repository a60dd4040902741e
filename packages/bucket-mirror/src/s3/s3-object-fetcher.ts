/**
 * S3 object fetcher.
 *
 * Small objects are fetched with a single GetObject. Larger ones are split
 * into ranged parts fetched a few at a time, each written at its own offset
 * of the destination. Every part is pinned to the ETag seen by HeadObject
 * so a concurrent overwrite fails the attempt instead of mixing versions.
 */

import { S3Client, GetObjectCommand, HeadObjectCommand } from '@aws-sdk/client-s3';
import pLimit from 'p-limit';
import type { Logger } from 'pino';
import type { DestinationSink, ObjectFetch } from '../mirror/types.js';

export interface S3ObjectFetcherOptions {
  /** Objects above this size are fetched as ranged parts */
  partSizeBytes: number;

  /** Parts in flight per object */
  partConcurrency: number;
}

/** Inclusive byte range */
export interface ByteRange {
  start: number;
  end: number;
}

/** Split an object of `size` bytes into consecutive ranges of `partSize`. */
export function planParts(size: number, partSize: number): ByteRange[] {
  const parts: ByteRange[] = [];
  for (let start = 0; start < size; start += partSize) {
    parts.push({ start, end: Math.min(start + partSize, size) - 1 });
  }
  return parts;
}

export class S3ObjectFetcher implements ObjectFetch {
  private readonly client: S3Client;
  private readonly options: S3ObjectFetcherOptions;
  private readonly logger: Logger;

  constructor(client: S3Client, options: S3ObjectFetcherOptions, logger: Logger) {
    this.client = client;
    this.options = options;
    this.logger = logger.child({ component: 's3-object-fetcher' });
  }

  async fetch(
    bucket: string,
    key: string,
    sink: DestinationSink,
    signal: AbortSignal
  ): Promise<number> {
    const head = await this.client.send(
      new HeadObjectCommand({ Bucket: bucket, Key: key }),
      { abortSignal: signal }
    );
    const size = head.ContentLength ?? 0;
    const etag = head.ETag;

    if (size <= this.options.partSizeBytes) {
      const body = await this.getBytes(bucket, key, etag, undefined, signal);
      if (body.byteLength !== size) {
        throw new Error(`Expected ${size} bytes for ${key}, received ${body.byteLength}`);
      }
      await sink.write(body, 0);
      return body.byteLength;
    }

    const parts = planParts(size, this.options.partSizeBytes);
    this.logger.debug({ key, size, parts: parts.length }, 'Fetching object in parts');

    // Aborted by the first failed part, or by the run. Queued parts then
    // fail without a request and in-flight requests are cancelled.
    const partsController = new AbortController();
    const onRunAbort = (): void => partsController.abort(signal.reason);
    signal.addEventListener('abort', onRunAbort, { once: true });
    const failures: unknown[] = [];

    const limit = pLimit(this.options.partConcurrency);
    try {
      const settled = await Promise.allSettled(
        parts.map((part) =>
          limit(async () => {
            try {
              partsController.signal.throwIfAborted();
              const body = await this.getBytes(bucket, key, etag, part, partsController.signal);
              const expected = part.end - part.start + 1;
              if (body.byteLength !== expected) {
                throw new Error(
                  `Expected ${expected} bytes for ${key} at offset ${part.start}, received ${body.byteLength}`
                );
              }
              await sink.write(body, part.start);
              return body.byteLength;
            } catch (err) {
              failures.push(err);
              partsController.abort(err);
              throw err;
            }
          })
        )
      );

      // Every part has settled here, so nothing writes into the sink after
      // a failed attempt hands it back for truncation.
      if (failures.length > 0) {
        this.logger.debug(
          { key, parts: parts.length, failedParts: failures.length },
          'Ranged fetch stopped on a failed part'
        );
        throw failures[0];
      }

      let written = 0;
      for (const result of settled) {
        if (result.status === 'fulfilled') {
          written += result.value;
        }
      }
      return written;
    } finally {
      signal.removeEventListener('abort', onRunAbort);
    }
  }

  private async getBytes(
    bucket: string,
    key: string,
    etag: string | undefined,
    range: ByteRange | undefined,
    signal: AbortSignal
  ): Promise<Uint8Array> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: bucket,
        Key: key,
        IfMatch: etag,
        Range: range ? `bytes=${range.start}-${range.end}` : undefined,
      }),
      { abortSignal: signal }
    );

    if (!response.Body) {
      throw new Error('S3 response body is empty');
    }
    return response.Body.transformToByteArray();
  }
}
