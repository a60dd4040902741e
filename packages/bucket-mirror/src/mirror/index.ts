export { MirrorRunner } from './mirror-runner.js';
export type { TypedMirrorRunnerEmitter } from './mirror-runner.js';
export { BoundedQueue } from './bounded-queue.js';
export { ProgressTracker } from './progress-tracker.js';
export { runLister } from './key-lister.js';
export type { KeyListerOptions } from './key-lister.js';
export { RetryingFetcher, resolveDestinationPath } from './retrying-fetcher.js';
export type { RetryingFetcherOptions } from './retrying-fetcher.js';
export { WorkerPool } from './worker-pool.js';
export type { WorkerPoolOptions, WorkerReport } from './worker-pool.js';
export { LocalFilesystem } from './local-filesystem.js';
export { buildMirrorConfig, validateMirrorConfig } from './config.js';
export {
  ListingError,
  TransientDownloadError,
  FatalDownloadError,
  FilesystemError,
  MirrorAbortedError,
  ConfigError,
} from './errors.js';
export type { FatalKeyError, FilesystemOperation } from './errors.js';
export type {
  MirrorConfig,
  KeyListing,
  DestinationSink,
  DestinationFile,
  ObjectFetch,
  MirrorFilesystem,
  MirrorCapabilities,
  ProgressSnapshot,
  FetchOutcome,
  ListingOutcome,
  MirrorResult,
  MirrorRunnerEvents,
} from './types.js';
export { MAX_ATTEMPTS, DEFAULT_MIRROR_CONFIG } from './types.js';
