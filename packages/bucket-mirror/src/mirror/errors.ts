/**
 * Error taxonomy for a mirror run.
 *
 * Only TransientDownloadError is recovered locally (by retrying the key).
 * FatalDownloadError and FilesystemError end the whole run; ListingError
 * truncates the key stream but lets queued keys finish.
 */

import type { ProgressSnapshot } from './types.js';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

// ─── Listing ────────────────────────────────────────────────────────

export class ListingError extends Error {
  public readonly bucket: string;
  public readonly prefix: string;
  /** Keys that had been discovered when the page fetch failed */
  public readonly keysListed: number;

  constructor(bucket: string, prefix: string, keysListed: number, cause: unknown) {
    super(`Listing s3://${bucket}/${prefix} failed after ${keysListed} key(s): ${describeCause(cause)}`, {
      cause,
    });
    this.name = 'ListingError';
    this.bucket = bucket;
    this.prefix = prefix;
    this.keysListed = keysListed;
  }
}

// ─── Downloads ──────────────────────────────────────────────────────

export class TransientDownloadError extends Error {
  public readonly key: string;
  public readonly attempt: number;

  constructor(key: string, attempt: number, cause: unknown) {
    super(`Attempt ${attempt} to download ${key} failed: ${describeCause(cause)}`, { cause });
    this.name = 'TransientDownloadError';
    this.key = key;
    this.attempt = attempt;
  }
}

export class FatalDownloadError extends Error {
  public readonly key: string;
  public readonly attempts: number;

  constructor(key: string, attempts: number, cause: unknown) {
    super(`Failed to download ${key} after ${attempts} attempt(s): ${describeCause(cause)}`, {
      cause,
    });
    this.name = 'FatalDownloadError';
    this.key = key;
    this.attempts = attempts;
  }
}

// ─── Filesystem ─────────────────────────────────────────────────────

export type FilesystemOperation = 'resolve' | 'mkdir' | 'open' | 'reset' | 'close';

export class FilesystemError extends Error {
  public readonly key: string;
  public readonly path: string;
  public readonly operation: FilesystemOperation;

  constructor(key: string, path: string, operation: FilesystemOperation, cause: unknown) {
    super(`Filesystem ${operation} failed for ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'FilesystemError';
    this.key = key;
    this.path = path;
    this.operation = operation;
  }
}

/** Errors that end a run when any single key hits them */
export type FatalKeyError = FatalDownloadError | FilesystemError;

// ─── Run level ──────────────────────────────────────────────────────

export class MirrorAbortedError extends Error {
  public readonly key: string;
  public readonly reason: FatalKeyError;
  public readonly progress: ProgressSnapshot;

  constructor(reason: FatalKeyError, progress: ProgressSnapshot) {
    super(`Mirror aborted on ${reason.key}: ${reason.message}`, { cause: reason });
    this.name = 'MirrorAbortedError';
    this.key = reason.key;
    this.reason = reason;
    this.progress = progress;
  }
}

export class ConfigError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid mirror config: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}
