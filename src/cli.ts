/**
 * Command-line handling for the exporter process
 */

import { ConfigLoader, ExporterConfig } from './config/config-loader.js';
import { assertEnv } from './config/env-validator.js';

/**
 * Parsed command-line arguments
 */
export interface CliOptions {
  configPath?: string;
  help: boolean;
  printConfig: boolean;
}

export const HELP_TEXT = `Usage: mr-exporter [options]

Serves GitLab merge request metrics for Prometheus on /metrics.

Options:
  --config <path>   JSON or YAML config file (default: $EXPORTER_CONFIG)
  --print-config    Print the effective configuration, secrets masked, and exit
  -h, --help        Show this help

Environment:
  GITLAB_URL, GITLAB_TOKEN, GITLAB_REPOSITORIES, YOUR_EMAIL,
  LABEL_REWORK, LABEL_IN_REVIEW, LABEL_REWORK_DONE,
  SMTP_HOST, SMTP_PORT, SMTP_USER, SMTP_PASSWORD, ALERT_RECIPIENT,
  EXPORTER_PORT, EXPORTER_HOST, EXPORTER_CACHE_TTL_MS,
  EXPORTER_REQUEST_TIMEOUT_MS, EXPORTER_MR_PER_PAGE,
  EXPORTER_LOG_LEVEL, EXPORTER_LOG_FORMAT, EXPORTER_LOG_REDACT`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parse command-line arguments. Unknown options are rejected.
 */
export function parseArgs(args: string[]): CliOptions {
  const result: CliOptions = { help: false, printConfig: false };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
      i++;
    } else if (arg === '--print-config') {
      result.printConfig = true;
      i++;
    } else if (arg === '--config') {
      const nextArg = args[i + 1];
      if (!nextArg || nextArg.startsWith('-')) {
        throw new CliUsageError('--config needs a file path');
      }
      result.configPath = nextArg;
      i += 2;
    } else if (arg.startsWith('--config=')) {
      result.configPath = arg.slice('--config='.length);
      i++;
    } else {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

/**
 * Resolve the effective configuration. Without a config file the
 * environment alone must carry the token.
 */
export function loadConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  const configPath = options.configPath ?? (env.EXPORTER_CONFIG || undefined);

  if (!configPath) {
    assertEnv(env);
  }

  return ConfigLoader.load(configPath, env);
}
