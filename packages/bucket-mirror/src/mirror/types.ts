/**
 * Types for the mirror pipeline.
 *
 * A run lists keys under a prefix, queues them, and lets a fixed pool of
 * workers download each key into the destination directory.
 */

import type {
  FatalKeyError,
  ListingError,
  TransientDownloadError,
} from './errors.js';

/** Configuration for a single mirror run */
export interface MirrorConfig {
  /** S3 bucket name */
  bucket: string;

  /** Key prefix to mirror (keys keep the prefix when mapped to local paths) */
  prefix: string;

  /** Absolute or relative path of the local destination directory */
  destination: string;

  /** Number of concurrent workers */
  concurrency: number;

  /** Maximum number of listed keys waiting for a worker */
  queueCapacity: number;

  /** AWS region; discovered from the bucket location when undefined */
  region: string | undefined;

  /** Objects larger than this are fetched as ranged parts */
  partSizeBytes: number;

  /** Ranged part requests in flight per object */
  partConcurrency: number;

  /** pino log level */
  logLevel: string;
}

/** Retry budget per key. */
export const MAX_ATTEMPTS = 3;

/** Default configuration values */
export const DEFAULT_MIRROR_CONFIG: Omit<
  MirrorConfig,
  'bucket' | 'prefix' | 'destination' | 'region'
> = {
  concurrency: 50,
  queueCapacity: 1000,
  partSizeBytes: 5 * 1024 * 1024,
  partConcurrency: 3,
  logLevel: 'info',
};

// ─── Capabilities ───────────────────────────────────────────────────

/** Streams the keys under a prefix, page by page. May throw mid-stream. */
export interface KeyListing {
  list(bucket: string, prefix: string, signal: AbortSignal): AsyncIterable<string>;
}

/** Destination that accepts writes at arbitrary offsets */
export interface DestinationSink {
  write(chunk: Uint8Array, position: number): Promise<void>;
}

/** Fetches one object into a sink and returns the number of bytes written */
export interface ObjectFetch {
  fetch(
    bucket: string,
    key: string,
    sink: DestinationSink,
    signal: AbortSignal
  ): Promise<number>;
}

/** An open local destination file */
export interface DestinationFile extends DestinationSink {
  readonly path: string;

  /** Truncate to zero length so the next attempt starts from offset 0 */
  reset(): Promise<void>;

  close(): Promise<void>;
}

export interface MirrorFilesystem {
  /** Recursive and idempotent */
  createDirectories(dir: string): Promise<void>;

  /** Create the file, truncating it if it already exists */
  openDestination(filePath: string): Promise<DestinationFile>;

  /** Remove a file; a missing file is not an error */
  remove(filePath: string): Promise<void>;
}

export interface MirrorCapabilities {
  listing: KeyListing;
  fetcher: ObjectFetch;
  filesystem: MirrorFilesystem;
}

// ─── Progress & outcomes ────────────────────────────────────────────

export interface ProgressSnapshot {
  discovered: number;
  completed: number;
}

/** Result of handing one key to the retrying fetcher */
export type FetchOutcome =
  | { status: 'completed'; key: string; bytesWritten: number; attempts: number }
  | { status: 'failed'; key: string; error: FatalKeyError }
  | { status: 'abandoned'; key: string };

/** Result of running the lister to the end of its key stream */
export interface ListingOutcome {
  /** False when a page fetch failed or the run was aborted */
  complete: boolean;

  keysListed: number;

  error?: ListingError;
}

/** Result of a mirror run that finished without a fatal error */
export interface MirrorResult {
  bucket: string;
  prefix: string;
  destination: string;
  discovered: number;
  completed: number;

  /** False when the listing stopped early; unlisted keys were never fetched */
  listingComplete: boolean;

  listingError?: ListingError;

  durationMs: number;
}

/** Events emitted by the MirrorRunner */
export interface MirrorRunnerEvents {
  /** A key was listed and counted */
  keyDiscovered: (key: string, discovered: number) => void;

  /** A key finished downloading */
  fileCompleted: (event: { worker: number; key: string } & ProgressSnapshot) => void;

  /** A single download attempt failed */
  attemptFailed: (error: TransientDownloadError) => void;

  /** The listing stopped on a page failure */
  listingFailed: (error: ListingError) => void;

  /** A fatal error aborted the run */
  aborted: (error: FatalKeyError) => void;
}
