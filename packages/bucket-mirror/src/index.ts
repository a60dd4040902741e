/**
 * bucket-mirror - mirror an S3 prefix into a local directory.
 *
 * A streaming lister feeds a bounded queue drained by a fixed worker pool;
 * each key is downloaded with a fixed retry budget.
 */

// Pipeline
export {
  MirrorRunner,
  BoundedQueue,
  ProgressTracker,
  runLister,
  RetryingFetcher,
  resolveDestinationPath,
  WorkerPool,
  LocalFilesystem,
  buildMirrorConfig,
  validateMirrorConfig,
  ListingError,
  TransientDownloadError,
  FatalDownloadError,
  FilesystemError,
  MirrorAbortedError,
  ConfigError,
  MAX_ATTEMPTS,
  DEFAULT_MIRROR_CONFIG,
} from './mirror/index.js';

export type {
  TypedMirrorRunnerEmitter,
  KeyListerOptions,
  RetryingFetcherOptions,
  WorkerPoolOptions,
  WorkerReport,
  FatalKeyError,
  FilesystemOperation,
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
} from './mirror/index.js';

// S3 capabilities
export {
  S3KeyLister,
  S3ObjectFetcher,
  planParts,
  resolveBucketRegion,
  createBucketClient,
} from './s3/index.js';

export type { S3ObjectFetcherOptions, ByteRange } from './s3/index.js';

export { mirrorBucket } from './mirror-bucket.js';
export type { MirrorBucketOptions } from './mirror-bucket.js';
export { createLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
