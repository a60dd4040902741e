/**
 * S3 key listing.
 *
 * Streams the keys under a prefix page by page via ListObjectsV2, so the
 * first keys reach the workers before the last page has been requested.
 */

import { S3Client, ListObjectsV2Command } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import type { KeyListing } from '../mirror/types.js';

const DEFAULT_PAGE_SIZE = 1000;

export class S3KeyLister implements KeyListing {
  private readonly client: S3Client;
  private readonly logger: Logger;
  private readonly pageSize: number;

  constructor(client: S3Client, logger: Logger, pageSize = DEFAULT_PAGE_SIZE) {
    this.client = client;
    this.logger = logger.child({ component: 's3-key-lister' });
    this.pageSize = pageSize;
  }

  /**
   * Yield every object key under the prefix. Directory markers (keys
   * ending in "/") are skipped. A failed page request throws; earlier
   * keys have already been yielded.
   */
  async *list(bucket: string, prefix: string, signal: AbortSignal): AsyncGenerator<string> {
    let continuationToken: string | undefined;
    let pageCount = 0;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
          MaxKeys: this.pageSize,
        }),
        { abortSignal: signal }
      );
      pageCount++;

      const contents = response.Contents ?? [];
      this.logger.debug({ page: pageCount, keys: contents.length }, 'Listed page');

      for (const obj of contents) {
        if (!obj.Key || obj.Key.endsWith('/')) {
          continue;
        }
        yield obj.Key;
      }

      continuationToken = response.NextContinuationToken;
    } while (continuationToken);
  }
}
