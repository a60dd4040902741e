/**
 * Mirror configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically (the CLI passes its flags
 * as overrides).
 */

import type { MirrorConfig } from './types.js';
import { DEFAULT_MIRROR_CONFIG } from './types.js';

const MIN_PART_SIZE_BYTES = 1024 * 1024;
const MAX_CONCURRENCY = 1000;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Build mirror config from environment variables and optional overrides.
 *
 * Environment variables:
 * - MIRROR_BUCKET: S3 bucket name
 * - MIRROR_PREFIX: key prefix to mirror
 * - MIRROR_DESTINATION: local destination directory
 * - MIRROR_CONCURRENCY: number of workers (default: 50)
 * - MIRROR_QUEUE_CAPACITY: listed keys buffered ahead of the workers (default: 1000)
 * - MIRROR_REGION: bucket region (default: discovered from the bucket)
 * - MIRROR_PART_SIZE_BYTES: ranged part size for large objects (default: 5 MiB)
 * - MIRROR_PART_CONCURRENCY: ranged parts in flight per object (default: 3)
 * - LOG_LEVEL: pino log level (default: info)
 */
export function buildMirrorConfig(overrides?: Partial<MirrorConfig>): MirrorConfig {
  const envRegion = process.env['MIRROR_REGION'];

  return {
    bucket: overrides?.bucket ?? getEnv('MIRROR_BUCKET', ''),
    prefix: overrides?.prefix ?? getEnv('MIRROR_PREFIX', ''),
    destination: overrides?.destination ?? getEnv('MIRROR_DESTINATION', ''),
    concurrency:
      overrides?.concurrency ??
      getEnvNumber('MIRROR_CONCURRENCY', DEFAULT_MIRROR_CONFIG.concurrency),
    queueCapacity:
      overrides?.queueCapacity ??
      getEnvNumber('MIRROR_QUEUE_CAPACITY', DEFAULT_MIRROR_CONFIG.queueCapacity),
    region: overrides?.region ?? (envRegion ? envRegion : undefined),
    partSizeBytes:
      overrides?.partSizeBytes ??
      getEnvNumber('MIRROR_PART_SIZE_BYTES', DEFAULT_MIRROR_CONFIG.partSizeBytes),
    partConcurrency:
      overrides?.partConcurrency ??
      getEnvNumber('MIRROR_PART_CONCURRENCY', DEFAULT_MIRROR_CONFIG.partConcurrency),
    logLevel: overrides?.logLevel ?? getEnv('LOG_LEVEL', DEFAULT_MIRROR_CONFIG.logLevel),
  };
}

/**
 * Validate a mirror configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateMirrorConfig(config: MirrorConfig): string[] {
  const errors: string[] = [];

  if (!config.bucket) {
    errors.push('bucket is required');
  }

  if (!config.prefix) {
    errors.push('prefix is required');
  }

  if (!config.destination) {
    errors.push('destination is required');
  }

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    errors.push('concurrency must be an integer of at least 1');
  } else if (config.concurrency > MAX_CONCURRENCY) {
    errors.push(`concurrency must not exceed ${MAX_CONCURRENCY}`);
  }

  if (!Number.isInteger(config.queueCapacity) || config.queueCapacity < 1) {
    errors.push('queueCapacity must be an integer of at least 1');
  }

  if (config.region !== undefined && !config.region) {
    errors.push('region must not be empty');
  }

  if (!Number.isInteger(config.partSizeBytes) || config.partSizeBytes < MIN_PART_SIZE_BYTES) {
    errors.push(`partSizeBytes must be an integer of at least ${MIN_PART_SIZE_BYTES}`);
  }

  if (!Number.isInteger(config.partConcurrency) || config.partConcurrency < 1) {
    errors.push('partConcurrency must be an integer of at least 1');
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  return errors;
}
