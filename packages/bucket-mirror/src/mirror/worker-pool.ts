/**
 * Consumer side of the pipeline: a fixed number of worker loops draining
 * the shared queue, joined by run().
 */

import type { Logger } from 'pino';
import type { BoundedQueue } from './bounded-queue.js';
import type { RetryingFetcher } from './retrying-fetcher.js';
import type { FetchOutcome } from './types.js';

export interface WorkerPoolOptions {
  concurrency: number;
  queue: BoundedQueue<string>;
  fetcher: Pick<RetryingFetcher, 'fetchKey'>;
  signal: AbortSignal;
  logger: Logger;

  /** Called with each failed outcome; the owner decides whether to abort */
  onFatal: (outcome: Extract<FetchOutcome, { status: 'failed' }>) => void;

  /** Called when a worker stops on an unexpected error, before the others settle */
  onWorkerError: (error: unknown, worker: number) => void;
}

/** Per-worker tally, returned from run() */
export interface WorkerReport {
  worker: number;
  completed: number;
  failed: number;
  abandoned: number;
}

export class WorkerPool {
  private readonly options: WorkerPoolOptions;
  private readonly logger: Logger;

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`Worker count must be a positive integer, got ${options.concurrency}`);
    }
    this.options = options;
    this.logger = options.logger.child({ component: 'worker-pool' });
  }

  /**
   * Start every worker and wait for all of them to exit. Workers exit once
   * the queue is closed and drained, or when the run is aborted.
   *
   * Rejects with the first unexpected worker error, but only after every
   * worker has exited.
   */
  async run(): Promise<WorkerReport[]> {
    const workers: Promise<WorkerReport>[] = [];

    for (let id = 0; id < this.options.concurrency; id++) {
      workers.push(
        this.work(id).catch((err: unknown) => {
          this.logger.error(
            { worker: id, error: err instanceof Error ? err.message : String(err) },
            'Worker stopped on an unexpected error'
          );
          this.options.onWorkerError(err, id);
          throw err;
        })
      );
    }

    const settled = await Promise.allSettled(workers);
    const reports: WorkerReport[] = [];
    for (const result of settled) {
      if (result.status === 'rejected') {
        throw result.reason;
      }
      reports.push(result.value);
    }

    this.logger.debug({ workers: reports.length }, 'All workers exited');
    return reports;
  }

  private async work(id: number): Promise<WorkerReport> {
    const { queue, fetcher, signal, onFatal } = this.options;
    const report: WorkerReport = { worker: id, completed: 0, failed: 0, abandoned: 0 };

    while (!signal.aborted) {
      let next: IteratorResult<string, undefined>;
      try {
        next = await queue.shift(signal);
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }

      if (next.done) break;

      const outcome = await fetcher.fetchKey(next.value, id, signal);
      switch (outcome.status) {
        case 'completed':
          report.completed++;
          break;
        case 'failed':
          report.failed++;
          onFatal(outcome);
          break;
        case 'abandoned':
          report.abandoned++;
          break;
      }
    }

    this.logger.debug(report, 'Worker exited');
    return report;
  }
}
