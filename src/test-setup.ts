import { beforeEach } from 'vitest';
import { logger, LogLevel } from './logging/index.js';

// Keep test output quiet; suites that assert on warnings lower the level themselves
beforeEach(() => {
  logger.reset();
  logger.setLevel(LogLevel.ERROR);
});
