/**
 * Wires the S3 capabilities and the local filesystem into a MirrorRunner.
 */

import type { Logger } from 'pino';
import { MirrorRunner, LocalFilesystem } from './mirror/index.js';
import type { MirrorConfig, MirrorResult, TypedMirrorRunnerEmitter } from './mirror/index.js';
import { S3KeyLister, S3ObjectFetcher, createBucketClient } from './s3/index.js';

export interface MirrorBucketOptions {
  /** Called with the runner before it starts, e.g. to attach event listeners */
  onRunner?: (runner: TypedMirrorRunnerEmitter) => void;
}

export async function mirrorBucket(
  config: MirrorConfig,
  logger: Logger,
  options: MirrorBucketOptions = {}
): Promise<MirrorResult> {
  const client = await createBucketClient(config.bucket, logger, config.region);

  try {
    const runner = new MirrorRunner(
      config,
      {
        listing: new S3KeyLister(client, logger),
        fetcher: new S3ObjectFetcher(
          client,
          {
            partSizeBytes: config.partSizeBytes,
            partConcurrency: config.partConcurrency,
          },
          logger
        ),
        filesystem: new LocalFilesystem(),
      },
      logger
    );
    options.onRunner?.(runner);
    return await runner.run();
  } finally {
    client.destroy();
  }
}
