/**
 * Per-key download with a fixed retry budget.
 *
 * Prepares the destination file once, then runs up to MAX_ATTEMPTS fetches
 * into it. Between attempts the file is truncated so bytes from a failed
 * attempt can never end up next to bytes from a later one.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import type {
  DestinationFile,
  FetchOutcome,
  MirrorFilesystem,
  ObjectFetch,
  ProgressSnapshot,
} from './types.js';
import { MAX_ATTEMPTS } from './types.js';
import type { ProgressTracker } from './progress-tracker.js';
import {
  FatalDownloadError,
  FilesystemError,
  TransientDownloadError,
} from './errors.js';

export interface RetryingFetcherOptions {
  bucket: string;
  destination: string;
  fetcher: ObjectFetch;
  filesystem: MirrorFilesystem;
  tracker: ProgressTracker;
  logger: Logger;
  onAttemptFailed?: (error: TransientDownloadError) => void;
  onCompleted?: (event: { worker: number; key: string } & ProgressSnapshot) => void;
}

/**
 * Map a key to its path under the destination directory.
 * Returns null when the key would land outside of it.
 */
export function resolveDestinationPath(destination: string, key: string): string | null {
  const root = path.resolve(destination);
  const target = path.join(root, key);
  const relative = path.relative(root, target);

  if (
    !relative ||
    relative === '..' ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    return null;
  }
  return target;
}

export class RetryingFetcher {
  private readonly options: RetryingFetcherOptions;
  private readonly logger: Logger;

  constructor(options: RetryingFetcherOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'retrying-fetcher' });
  }

  /**
   * Download one key. Resolves with the key's outcome; fatal problems are
   * returned as a `failed` outcome for the caller to act on.
   */
  async fetchKey(key: string, worker: number, signal: AbortSignal): Promise<FetchOutcome> {
    const prepared = await this.prepare(key);
    if (prepared instanceof FilesystemError) {
      this.logger.error({ worker, key, error: prepared.message }, 'Failed to prepare destination');
      return { status: 'failed', key, error: prepared };
    }

    const file = prepared;
    let lastError: unknown;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      let bytesWritten: number | undefined;

      try {
        bytesWritten = await this.options.fetcher.fetch(this.options.bucket, key, file, signal);
      } catch (err) {
        if (signal.aborted) {
          await this.closeQuietly(file);
          this.logger.debug({ worker, key, attempt }, 'Download abandoned');
          return { status: 'abandoned', key };
        }

        lastError = err;
        const transient = new TransientDownloadError(key, attempt, err);
        this.logger.warn({ worker, key, attempt, error: transient.message }, 'Download attempt failed');
        this.options.onAttemptFailed?.(transient);
      }

      if (bytesWritten !== undefined) {
        return this.complete(file, key, worker, attempt, bytesWritten);
      }

      if (attempt < MAX_ATTEMPTS) {
        try {
          await file.reset();
        } catch (err) {
          const error = new FilesystemError(key, file.path, 'reset', err);
          await this.discard(file);
          this.logger.error({ worker, key, error: error.message }, 'Failed to reset destination');
          return { status: 'failed', key, error };
        }
      }
    }

    await this.discard(file);
    const error = new FatalDownloadError(key, MAX_ATTEMPTS, lastError);
    this.logger.error({ worker, key, error: error.message }, 'Download failed');
    return { status: 'failed', key, error };
  }

  private async complete(
    file: DestinationFile,
    key: string,
    worker: number,
    attempt: number,
    bytesWritten: number
  ): Promise<FetchOutcome> {
    try {
      await file.close();
    } catch (err) {
      const error = new FilesystemError(key, file.path, 'close', err);
      await this.discard(file);
      this.logger.error({ worker, key, error: error.message }, 'Failed to close destination');
      return { status: 'failed', key, error };
    }

    const progress = this.options.tracker.recordCompleted();
    this.logger.info(
      { worker, key, bytesWritten, attempt, ...progress },
      `Worker ${worker} (${progress.completed}/${progress.discovered}), downloaded ${key}`
    );
    this.options.onCompleted?.({ worker, key, ...progress });
    return { status: 'completed', key, bytesWritten, attempts: attempt };
  }

  /** Create parent directories and open (or truncate) the destination file. */
  private async prepare(key: string): Promise<DestinationFile | FilesystemError> {
    const { destination, filesystem } = this.options;
    const localPath = resolveDestinationPath(destination, key);

    if (!localPath) {
      return new FilesystemError(
        key,
        path.join(destination, key),
        'resolve',
        new Error('key resolves outside the destination directory')
      );
    }

    try {
      await filesystem.createDirectories(path.dirname(localPath));
    } catch (err) {
      return new FilesystemError(key, path.dirname(localPath), 'mkdir', err);
    }

    try {
      return await filesystem.openDestination(localPath);
    } catch (err) {
      return new FilesystemError(key, localPath, 'open', err);
    }
  }

  /** Close and delete a destination that will not be completed. */
  private async discard(file: DestinationFile): Promise<void> {
    await this.closeQuietly(file);
    try {
      await this.options.filesystem.remove(file.path);
    } catch (err) {
      this.logger.warn(
        { path: file.path, error: err instanceof Error ? err.message : String(err) },
        'Failed to remove partial file'
      );
    }
  }

  private async closeQuietly(file: DestinationFile): Promise<void> {
    try {
      await file.close();
    } catch (err) {
      this.logger.warn(
        { path: file.path, error: err instanceof Error ? err.message : String(err) },
        'Failed to close destination file'
      );
    }
  }
}
