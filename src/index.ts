import 'dotenv/config';
import { CliOptions, CliUsageError, HELP_TEXT, loadConfig, parseArgs } from './cli.js';
import { ConfigLoader } from './config/config-loader.js';
import { createExporter } from './exporter.js';
import { logger } from './logging/index.js';

const log = logger.child('Main');

/**
 * Start the exporter and keep serving until SIGINT or SIGTERM
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  logger.init();

  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${HELP_TEXT}`);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  if (options.help) {
    console.log(HELP_TEXT);
    return;
  }

  const config = loadConfig(options);
  logger.setLevelFromString(config.logLevel);
  logger.setFormat(config.logFormat);

  if (options.printConfig) {
    console.log(ConfigLoader.toDisplayString(config));
    return;
  }

  log.info('GitLab MR exporter starting', {
    gitlabUrl: config.gitlabUrl,
    repositories: config.repositories,
    identity: config.identity || '(unset)',
    cacheTtlMs: config.cacheTtlMs,
  });
  log.debug('Effective configuration', { config: ConfigLoader.toDisplayString(config) });

  const { server } = createExporter(config);

  // Handle graceful shutdown
  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    log.info('Shutting down', { signal });
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error('Error while stopping', error instanceof Error ? error : { error: String(error) });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}
