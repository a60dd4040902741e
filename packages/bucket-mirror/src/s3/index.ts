export { S3KeyLister } from './s3-key-lister.js';
export { S3ObjectFetcher, planParts } from './s3-object-fetcher.js';
export type { S3ObjectFetcherOptions, ByteRange } from './s3-object-fetcher.js';
export { resolveBucketRegion, createBucketClient } from './region.js';
