import { describe, it, expect, vi } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { WorkerPool } from '../mirror/worker-pool.js';
import { BoundedQueue } from '../mirror/bounded-queue.js';
import { FatalDownloadError } from '../mirror/errors.js';
import type { FetchOutcome } from '../mirror/types.js';
import { createMockLogger } from './fakes.js';

async function fill(queue: BoundedQueue<string>, keys: string[]): Promise<void> {
  for (const key of keys) {
    await queue.push(key);
  }
  queue.close();
}

describe('WorkerPool', () => {
  it('should reject an invalid worker count', () => {
    const base = {
      queue: new BoundedQueue<string>(1),
      fetcher: { fetchKey: vi.fn() },
      signal: new AbortController().signal,
      logger: createMockLogger(),
      onFatal: vi.fn(),
      onWorkerError: vi.fn(),
    };

    expect(() => new WorkerPool({ ...base, concurrency: 0 })).toThrow(RangeError);
    expect(() => new WorkerPool({ ...base, concurrency: 2.5 })).toThrow(
      'Worker count must be a positive integer, got 2.5'
    );
  });

  it('should hand every queued key to exactly one worker', async () => {
    const keys = Array.from({ length: 20 }, (_, i) => `key-${i}`);
    const queue = new BoundedQueue<string>(4);
    const seen: string[] = [];
    const fetchKey = vi.fn(async (key: string): Promise<FetchOutcome> => {
      seen.push(key);
      await sleep(1);
      return { status: 'completed', key, bytesWritten: 1, attempts: 1 };
    });
    const pool = new WorkerPool({
      concurrency: 3,
      queue,
      fetcher: { fetchKey },
      signal: new AbortController().signal,
      logger: createMockLogger(),
      onFatal: vi.fn(),
      onWorkerError: vi.fn(),
    });

    const [reports] = await Promise.all([pool.run(), fill(queue, keys)]);

    expect([...seen].sort()).toEqual([...keys].sort());
    expect(new Set(seen).size).toBe(20);
    expect(reports.map((r) => r.worker)).toEqual([0, 1, 2]);
    expect(reports.reduce((sum, r) => sum + r.completed, 0)).toBe(20);
  });

  it('should never run more fetches at once than the worker count', async () => {
    const queue = new BoundedQueue<string>(10);
    let inFlight = 0;
    let maxInFlight = 0;
    const fetchKey = async (key: string): Promise<FetchOutcome> => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(5);
      inFlight--;
      return { status: 'completed', key, bytesWritten: 0, attempts: 1 };
    };
    const pool = new WorkerPool({
      concurrency: 3,
      queue,
      fetcher: { fetchKey },
      signal: new AbortController().signal,
      logger: createMockLogger(),
      onFatal: vi.fn(),
      onWorkerError: vi.fn(),
    });

    await Promise.all([
      pool.run(),
      fill(queue, Array.from({ length: 12 }, (_, i) => `k${i}`)),
    ]);

    expect(maxInFlight).toBe(3);
  });

  it('should exit when the queue closes with nothing in it', async () => {
    const queue = new BoundedQueue<string>(1);
    const fetchKey = vi.fn();
    const pool = new WorkerPool({
      concurrency: 4,
      queue,
      fetcher: { fetchKey },
      signal: new AbortController().signal,
      logger: createMockLogger(),
      onFatal: vi.fn(),
      onWorkerError: vi.fn(),
    });

    queue.close();
    const reports = await pool.run();

    expect(reports).toHaveLength(4);
    expect(fetchKey).not.toHaveBeenCalled();
  });

  it('should report failed outcomes and stop idle workers once aborted', async () => {
    const queue = new BoundedQueue<string>(10);
    const controller = new AbortController();
    const error = new FatalDownloadError('bad', 3, new Error('boom'));
    const fetchKey = vi.fn(async (key: string): Promise<FetchOutcome> => {
      if (key === 'bad') {
        return { status: 'failed', key, error };
      }
      return { status: 'completed', key, bytesWritten: 1, attempts: 1 };
    });
    const onFatal = vi.fn((_outcome: Extract<FetchOutcome, { status: 'failed' }>) => {
      controller.abort(error);
    });
    const pool = new WorkerPool({
      concurrency: 1,
      queue,
      fetcher: { fetchKey },
      signal: controller.signal,
      logger: createMockLogger(),
      onFatal,
      onWorkerError: vi.fn(),
    });

    await queue.push('bad');
    await queue.push('never-1');
    await queue.push('never-2');
    const reports = await pool.run();

    expect(onFatal).toHaveBeenCalledTimes(1);
    expect(onFatal).toHaveBeenCalledWith({ status: 'failed', key: 'bad', error });
    expect(fetchKey).toHaveBeenCalledTimes(1);
    expect(reports).toEqual([{ worker: 0, completed: 0, failed: 1, abandoned: 0 }]);
  });

  it('should count abandoned keys', async () => {
    const queue = new BoundedQueue<string>(2);
    const fetchKey = async (key: string): Promise<FetchOutcome> => ({ status: 'abandoned', key });
    const pool = new WorkerPool({
      concurrency: 1,
      queue,
      fetcher: { fetchKey },
      signal: new AbortController().signal,
      logger: createMockLogger(),
      onFatal: vi.fn(),
      onWorkerError: vi.fn(),
    });

    await queue.push('a');
    await queue.push('b');
    queue.close();

    expect(await pool.run()).toEqual([{ worker: 0, completed: 0, failed: 0, abandoned: 2 }]);
  });

  it('should let the other workers settle before rejecting on an unexpected error', async () => {
    const queue = new BoundedQueue<string>(10);
    const controller = new AbortController();
    let slowSettled = false;
    const fetchKey = async (key: string, _worker: number, signal: AbortSignal): Promise<FetchOutcome> => {
      if (key === 'explodes') {
        throw new Error('listener exploded');
      }
      try {
        await sleep(10_000, undefined, { signal });
        return { status: 'completed', key, bytesWritten: 1, attempts: 1 };
      } catch {
        return { status: 'abandoned', key };
      } finally {
        slowSettled = true;
      }
    };
    const onWorkerError = vi.fn((error: unknown, _worker: number) => controller.abort(error));
    const pool = new WorkerPool({
      concurrency: 2,
      queue,
      fetcher: { fetchKey },
      signal: controller.signal,
      logger: createMockLogger(),
      onFatal: vi.fn(),
      onWorkerError,
    });

    await queue.push('slow');
    await queue.push('explodes');
    await queue.push('never');

    await expect(pool.run()).rejects.toThrow('listener exploded');
    expect(onWorkerError).toHaveBeenCalledTimes(1);
    expect(onWorkerError.mock.calls[0]?.[1]).toBe(1);
    expect(slowSettled).toBe(true);
    expect(queue.size).toBe(1);
  });
});
