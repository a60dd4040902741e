/**
 * bucket-mirror CLI - mirror an S3 prefix into a local directory
 *
 *   bucket-mirror -b <bucket> -p <prefix> -d <dir> [-c <workers>]
 *
 * Exit codes: 0 done, 1 aborted on a fatal error, 2 invalid configuration,
 * 3 listing stopped early (keys that were never listed were not mirrored).
 */

import * as fs from 'node:fs/promises';
import { createRequire } from 'node:module';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import {
  buildMirrorConfig,
  validateMirrorConfig,
  ConfigError,
  MirrorAbortedError,
} from './mirror/index.js';
import type { MirrorConfig, MirrorResult, TypedMirrorRunnerEmitter } from './mirror/index.js';
import type { LoggerOptions } from './logger.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

export const EXIT_ABORTED = 1;
export const EXIT_INVALID_CONFIG = 2;
export const EXIT_LISTING_INCOMPLETE = 3;

export interface CliDependencies {
  mirrorBucket: (
    config: MirrorConfig,
    logger: Logger,
    options: { onRunner?: (runner: TypedMirrorRunnerEmitter) => void }
  ) => Promise<MirrorResult>;
  createLogger: (options: LoggerOptions) => Logger;
}

interface CliOptions {
  bucket?: string;
  prefix?: string;
  destination?: string;
  concurrency?: number;
  queueCapacity?: number;
  region?: string;
  partSize?: number;
  partConcurrency?: number;
  logLevel?: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/** Map parsed flags onto config overrides, leaving unset flags to env/defaults */
export function toConfigOverrides(options: CliOptions): Partial<MirrorConfig> {
  const overrides: Partial<MirrorConfig> = {};

  if (options.bucket !== undefined) overrides.bucket = options.bucket;
  if (options.prefix !== undefined) overrides.prefix = options.prefix;
  if (options.destination !== undefined) overrides.destination = options.destination;
  if (options.concurrency !== undefined) overrides.concurrency = options.concurrency;
  if (options.queueCapacity !== undefined) overrides.queueCapacity = options.queueCapacity;
  if (options.region !== undefined) overrides.region = options.region;
  if (options.partSize !== undefined) overrides.partSizeBytes = options.partSize;
  if (options.partConcurrency !== undefined) overrides.partConcurrency = options.partConcurrency;
  if (options.logLevel !== undefined) overrides.logLevel = options.logLevel;

  return overrides;
}

function printSummary(result: MirrorResult): void {
  console.log(
    chalk.green(
      `Downloaded ${result.completed} file${result.completed !== 1 ? 's' : ''} from s3://${result.bucket}/${result.prefix}`
    )
  );
  console.log(chalk.dim(`  ${result.discovered} listed, ${(result.durationMs / 1000).toFixed(1)}s`));
}

export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name('bucket-mirror')
    .description('Mirror the objects under an S3 prefix into a local directory')
    .version(pkg.version, '-v, --version')
    .option('-b, --bucket <bucket>', 'S3 bucket name')
    .option('-p, --prefix <prefix>', 'Prefix of the keys to mirror')
    .option('-d, --destination <dir>', 'Destination directory on the local machine')
    .option('-c, --concurrency <n>', 'Number of concurrent downloads (default: 50)', parseInteger)
    .option('--queue-capacity <n>', 'Listed keys buffered ahead of the workers (default: 1000)', parseInteger)
    .option('--region <region>', 'Bucket region (default: discovered)')
    .option('--part-size <bytes>', 'Ranged part size for large objects (default: 5 MiB)', parseInteger)
    .option('--part-concurrency <n>', 'Parts fetched in parallel per object (default: 3)', parseInteger)
    .option('--log-level <level>', 'Log level (default: info)')
    .action(async (options: CliOptions) => {
      const config = buildMirrorConfig(toConfigOverrides(options));
      const problems = validateMirrorConfig(config);
      if (problems.length > 0) {
        const error = new ConfigError(problems);
        console.error(chalk.red(error.message));
        process.exitCode = EXIT_INVALID_CONFIG;
        return;
      }

      const logger = deps.createLogger({
        level: config.logLevel,
        pretty: Boolean(process.stderr.isTTY),
      });

      try {
        await fs.mkdir(config.destination, { recursive: true });
      } catch (error) {
        console.error(
          chalk.red(`Failed to create destination directory ${config.destination}:`),
          error instanceof Error ? error.message : error
        );
        process.exitCode = EXIT_ABORTED;
        return;
      }

      try {
        const result = await deps.mirrorBucket(config, logger, {
          onRunner: (runner) => {
            runner.on('attemptFailed', (error) => {
              console.error(chalk.yellow(error.message));
            });
          },
        });

        printSummary(result);

        if (!result.listingComplete) {
          console.error(
            chalk.yellow(
              `Listing stopped early after ${result.discovered} key${result.discovered !== 1 ? 's' : ''}; ` +
                'keys that were not listed were not mirrored.'
            )
          );
          if (result.listingError) {
            console.error(chalk.dim(`  ${result.listingError.message}`));
          }
          process.exitCode = EXIT_LISTING_INCOMPLETE;
        }
      } catch (error) {
        if (error instanceof MirrorAbortedError) {
          console.error(chalk.red(`Mirror aborted on ${error.key}:`), error.reason.message);
          console.error(
            chalk.dim(`  ${error.progress.completed}/${error.progress.discovered} completed before the abort`)
          );
        } else {
          console.error(chalk.red('Mirror failed:'), error instanceof Error ? error.message : error);
        }
        process.exitCode = EXIT_ABORTED;
      }
    });

  return program;
}
