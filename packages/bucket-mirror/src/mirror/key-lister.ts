/**
 * Producer side of the pipeline.
 *
 * Streams keys from the listing into the bounded queue, counting each one
 * before it is queued, and closes the queue when the stream ends for any
 * reason.
 */

import type { Logger } from 'pino';
import type { BoundedQueue } from './bounded-queue.js';
import type { ProgressTracker } from './progress-tracker.js';
import type { KeyListing, ListingOutcome } from './types.js';
import { ListingError } from './errors.js';

export interface KeyListerOptions {
  listing: KeyListing;
  bucket: string;
  prefix: string;
  queue: BoundedQueue<string>;
  tracker: ProgressTracker;
  signal: AbortSignal;
  logger: Logger;
  onKeyDiscovered?: (key: string, discovered: number) => void;
}

/**
 * Run the listing to completion. Never rejects: a failed page ends the
 * stream and is reported on the outcome, and keys that were not yet listed
 * are never produced.
 */
export async function runLister(options: KeyListerOptions): Promise<ListingOutcome> {
  const { listing, bucket, prefix, queue, tracker, signal } = options;
  const logger = options.logger.child({ component: 'key-lister' });
  let keysListed = 0;

  try {
    for await (const key of listing.list(bucket, prefix, signal)) {
      const discovered = tracker.recordDiscovered();
      keysListed++;
      options.onKeyDiscovered?.(key, discovered);
      await queue.push(key, signal);
    }

    logger.info({ bucket, prefix, keysListed }, 'Listing complete');
    return { complete: true, keysListed };
  } catch (err) {
    if (signal.aborted) {
      logger.debug({ keysListed }, 'Listing stopped by abort');
      return { complete: false, keysListed };
    }

    const error = new ListingError(bucket, prefix, keysListed, err);
    logger.error({ bucket, prefix, keysListed, error: error.message }, 'Error listing objects');
    return { complete: false, keysListed, error };
  } finally {
    queue.close();
  }
}
