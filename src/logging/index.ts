/**
 * Logging for the exporter
 *
 * ```typescript
 * import { logger } from '../logging/index.js';
 *
 * logger.init();
 * const log = logger.child('Collector');
 * log.info('Project found', { project: 'group/app' });
 * log.error('GitLab request failed', error, { endpoint });
 * ```
 *
 * Environment variables:
 * - EXPORTER_LOG_LEVEL: DEBUG, INFO, WARN, ERROR (default: INFO)
 * - EXPORTER_LOG_FORMAT: json, pretty (default: pretty)
 * - EXPORTER_LOG_REDACT: extra comma-separated field names to mask
 */

export { logger, LogLevel } from './logger.js';
export type { Logger, LogEntry, LogFormat } from './types.js';

export { generateCorrelationId, withCorrelationAsync } from './correlation.js';
