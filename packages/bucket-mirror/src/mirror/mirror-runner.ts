/**
 * MirrorRunner - orchestrates one mirror run.
 *
 * Integrates:
 * - runLister: streams keys into the bounded queue
 * - WorkerPool: drains the queue through the RetryingFetcher
 * - ProgressTracker: discovered/completed counters for the run
 *
 * The first fatal outcome from any worker aborts the whole run: the
 * listing stops, idle workers exit, and in-flight fetches are cancelled.
 * run() waits for every task to settle before it rejects.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import type {
  MirrorCapabilities,
  MirrorConfig,
  MirrorResult,
  MirrorRunnerEvents,
  ProgressSnapshot,
} from './types.js';
import type { FatalKeyError } from './errors.js';
import { ConfigError, MirrorAbortedError } from './errors.js';
import { BoundedQueue } from './bounded-queue.js';
import { ProgressTracker } from './progress-tracker.js';
import { runLister } from './key-lister.js';
import { RetryingFetcher } from './retrying-fetcher.js';
import { WorkerPool } from './worker-pool.js';
import { validateMirrorConfig } from './config.js';

/**
 * Typed event emitter interface for the mirror runner.
 */
export interface TypedMirrorRunnerEmitter {
  on<K extends keyof MirrorRunnerEvents>(event: K, listener: MirrorRunnerEvents[K]): this;
  off<K extends keyof MirrorRunnerEvents>(event: K, listener: MirrorRunnerEvents[K]): this;
  emit<K extends keyof MirrorRunnerEvents>(
    event: K,
    ...args: Parameters<MirrorRunnerEvents[K]>
  ): boolean;
}

export class MirrorRunner extends EventEmitter implements TypedMirrorRunnerEmitter {
  private readonly config: MirrorConfig;
  private readonly capabilities: MirrorCapabilities;
  private readonly logger: Logger;
  private readonly tracker = new ProgressTracker();
  private _isRunning = false;
  private hasRun = false;

  constructor(config: MirrorConfig, capabilities: MirrorCapabilities, logger: Logger) {
    super();

    const errors = validateMirrorConfig(config);
    if (errors.length > 0) {
      throw new ConfigError(errors);
    }

    this.config = config;
    this.capabilities = capabilities;
    this.logger = logger.child({ component: 'mirror-runner' });
  }

  get isRunning(): boolean {
    return this._isRunning;
  }

  /** Counters of the current (or last) run */
  get progress(): ProgressSnapshot {
    return this.tracker.snapshot();
  }

  /**
   * Mirror every key under the prefix into the destination directory.
   *
   * Resolves when the listing has ended and every queued key is done.
   * Rejects with MirrorAbortedError on the first fatal failure.
   */
  async run(): Promise<MirrorResult> {
    if (this._isRunning) {
      throw new Error('Mirror run already in progress');
    }
    if (this.hasRun) {
      throw new Error('MirrorRunner instances run once');
    }
    this._isRunning = true;
    this.hasRun = true;

    const startTime = Date.now();
    const { bucket, prefix, destination, concurrency, queueCapacity } = this.config;
    const controller = new AbortController();
    const queue = new BoundedQueue<string>(queueCapacity);
    const abort: { reason: FatalKeyError | null } = { reason: null };

    this.logger.info({ bucket, prefix, destination, concurrency, queueCapacity }, 'Starting mirror');

    const fetcher = new RetryingFetcher({
      bucket,
      destination,
      fetcher: this.capabilities.fetcher,
      filesystem: this.capabilities.filesystem,
      tracker: this.tracker,
      logger: this.logger,
      onAttemptFailed: (error) => this.emit('attemptFailed', error),
      onCompleted: (event) => this.emit('fileCompleted', event),
    });

    const stop = (error: unknown): void => {
      if (!controller.signal.aborted) {
        controller.abort(error);
      }
    };

    const pool = new WorkerPool({
      concurrency,
      queue,
      fetcher,
      signal: controller.signal,
      logger: this.logger,
      onFatal: ({ error }) => {
        if (abort.reason) return;
        abort.reason = error;
        this.logger.fatal({ key: error.key, error: error.message }, 'Aborting mirror');
        this.emit('aborted', error);
        stop(error);
      },
      onWorkerError: stop,
    });

    try {
      const listerTask = runLister({
        listing: this.capabilities.listing,
        bucket,
        prefix,
        queue,
        tracker: this.tracker,
        signal: controller.signal,
        logger: this.logger,
        onKeyDiscovered: (key, discovered) => this.emit('keyDiscovered', key, discovered),
      }).then((outcome) => {
        // Workers may still be draining the queue here
        if (outcome.error) {
          this.emit('listingFailed', outcome.error);
        }
        return outcome;
      });

      const [listed, drained] = await Promise.allSettled([
        listerTask.catch((err: unknown) => {
          stop(err);
          throw err;
        }),
        pool.run(),
      ]);

      if (drained.status === 'rejected') {
        throw drained.reason;
      }
      if (listed.status === 'rejected') {
        throw listed.reason;
      }
      if (abort.reason) {
        throw new MirrorAbortedError(abort.reason, this.tracker.snapshot());
      }

      const listing = listed.value;
      const result: MirrorResult = {
        bucket,
        prefix,
        destination,
        ...this.tracker.snapshot(),
        listingComplete: listing.complete,
        listingError: listing.error,
        durationMs: Date.now() - startTime,
      };

      this.logger.info(
        {
          discovered: result.discovered,
          completed: result.completed,
          listingComplete: result.listingComplete,
          durationMs: result.durationMs,
        },
        `All done! Downloaded ${result.completed} files from S3 bucket '${bucket}'`
      );

      return result;
    } finally {
      this._isRunning = false;
    }
  }
}
