/**
 * Bucket region discovery and region-correct client construction.
 */

import { S3Client, GetBucketLocationCommand } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';

/** Region used to ask for a bucket's location when none is configured */
const DISCOVERY_REGION = 'us-east-1';

/**
 * Determine the region a bucket lives in.
 *
 * GetBucketLocation reports buckets in us-east-1 with an empty location
 * constraint, and some old eu-west-1 buckets with the legacy "EU" value.
 */
export async function resolveBucketRegion(client: S3Client, bucket: string): Promise<string> {
  const result = await client.send(new GetBucketLocationCommand({ Bucket: bucket }));
  const constraint: string = result.LocationConstraint ?? '';

  if (constraint === '') {
    return 'us-east-1';
  }
  if (constraint === 'EU') {
    return 'eu-west-1';
  }
  return constraint;
}

/**
 * Build an S3Client for the bucket's own region. When `region` is given it
 * is used as is; otherwise the region is looked up first.
 */
export async function createBucketClient(
  bucket: string,
  logger: Logger,
  region?: string
): Promise<S3Client> {
  if (region) {
    return new S3Client({ region });
  }

  const discoveryClient = new S3Client({
    region: process.env['AWS_REGION'] ?? DISCOVERY_REGION,
  });

  try {
    const bucketRegion = await resolveBucketRegion(discoveryClient, bucket);
    logger.info({ bucket, region: bucketRegion }, `Bucket '${bucket}' is in region '${bucketRegion}'`);
    return new S3Client({ region: bucketRegion });
  } finally {
    discoveryClient.destroy();
  }
}
