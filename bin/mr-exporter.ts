#!/usr/bin/env node
/**
 * GitLab MR exporter entry point
 *
 * Usage:
 *   node dist/bin/mr-exporter.js [--config exporter.yaml]
 *
 * After `npm link` or global install:
 *   mr-exporter [options]
 */

import { main } from '../src/index.js';
import { logger } from '../src/logging/index.js';

main().catch(error => {
  logger.error('Fatal error', error instanceof Error ? error : { error: String(error) });
  process.exit(1);
});
