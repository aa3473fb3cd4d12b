import { SmtpMailer, MailSender, SmtpConfig, createSmtpSender } from './alerts/mailer.js';
import { ReworkAlerter } from './alerts/rework-alerter.js';
import type { ExporterConfig } from './config/config-loader.js';
import { GitLabClient } from './gitlab/client.js';
import { MetricsCollector } from './metrics/collector.js';
import { MetricsPipeline } from './metrics/pipeline.js';
import { ExporterServer } from './server/exporter-server.js';

export interface ExporterOverrides {
  fetchFn?: typeof fetch;
  createMailSender?: (config: SmtpConfig) => MailSender;
  now?: () => number;
}

export interface Exporter {
  pipeline: MetricsPipeline;
  server: ExporterServer;
}

/**
 * Wire every component from a validated config. Nothing talks to GitLab or
 * SMTP until the first scrape.
 */
export function createExporter(config: ExporterConfig, overrides: ExporterOverrides = {}): Exporter {
  const client = new GitLabClient({
    baseUrl: config.gitlabUrl,
    token: config.gitlabToken,
    timeoutMs: config.requestTimeoutMs,
    mergeRequestsPerPage: config.mergeRequestsPerPage,
    fetchFn: overrides.fetchFn,
  });

  const collector = new MetricsCollector({
    source: client,
    labels: config.labels,
    identity: config.identity,
    now: overrides.now,
  });

  const mailer = new SmtpMailer(
    {
      host: config.smtpHost,
      port: config.smtpPort,
      user: config.smtpUser,
      password: config.smtpPassword,
      recipient: config.alertRecipient,
    },
    overrides.createMailSender ?? createSmtpSender
  );

  const pipeline = new MetricsPipeline({
    collector,
    alerter: new ReworkAlerter(mailer),
    repositories: config.repositories,
    freshnessMs: config.cacheTtlMs,
    now: overrides.now,
  });

  const server = new ExporterServer({
    port: config.port,
    host: config.host,
    pipeline,
  });

  return { pipeline, server };
}
