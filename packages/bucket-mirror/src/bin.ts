#!/usr/bin/env node

import { createProgram } from './cli.js';
import { createLogger } from './logger.js';
import { mirrorBucket } from './mirror-bucket.js';

const program = createProgram({ mirrorBucket, createLogger });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
