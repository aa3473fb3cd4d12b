/**
 * Configuration loader for the exporter
 * Reads environment variables and, optionally, a JSON or YAML config file
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { LogFormat } from '../logging/index.js';
import type { WatchedLabels } from '../metrics/timing.js';

export interface ExporterConfig {
  // GitLab
  gitlabUrl: string;
  gitlabToken: string;
  repositories: string[];
  labels: WatchedLabels;
  /** E-mail or username matched against MR assignees */
  identity: string;

  // Mail
  smtpHost: string;
  smtpPort: number;
  smtpUser: string;
  smtpPassword: string;
  /** Alert recipient; defaults to the identity when that is an e-mail address */
  alertRecipient: string;

  // Server
  port: number;
  host: string;

  // Collection
  cacheTtlMs: number;
  requestTimeoutMs: number;
  mergeRequestsPerPage: number;

  // Logging
  logLevel: string;
  logFormat: LogFormat;
}

const configFileSchema = z.object({
  gitlab: z.object({
    url: z.string().optional(),
    token: z.string().optional(),
    repositories: z.array(z.string()).optional(),
  }).optional(),
  labels: z.object({
    rework: z.string().optional(),
    inReview: z.string().optional(),
    reworkDone: z.string().optional(),
  }).optional(),
  identity: z.string().optional(),
  smtp: z.object({
    host: z.string().optional(),
    port: z.number().optional(),
    user: z.string().optional(),
    password: z.string().optional(),
    recipient: z.string().optional(),
  }).optional(),
  server: z.object({
    port: z.number().optional(),
    host: z.string().optional(),
  }).optional(),
  collection: z.object({
    cacheTtlMs: z.number().optional(),
    requestTimeoutMs: z.number().optional(),
    mergeRequestsPerPage: z.number().optional(),
  }).optional(),
  logging: z.object({
    level: z.string().optional(),
    format: z.enum(['pretty', 'json']).optional(),
  }).optional(),
});

/**
 * Config file format, JSON or YAML
 */
type ConfigFileFormat = z.infer<typeof configFileSchema>;

export type PartialConfig = Partial<Omit<ExporterConfig, 'labels'>> & { labels?: Partial<WatchedLabels> };

export class ConfigValidationError extends Error {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}`);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

const DEFAULT_LABELS: WatchedLabels = {
  rework: 'Rework',
  inReview: 'In Review',
  reworkDone: 'Rework Done',
};

const DEFAULTS: Omit<ExporterConfig, 'gitlabToken' | 'alertRecipient'> = {
  gitlabUrl: 'https://gitlab.com',
  repositories: [],
  labels: DEFAULT_LABELS,
  identity: '',
  smtpHost: 'smtp.gmail.com',
  smtpPort: 587,
  smtpUser: '',
  smtpPassword: '',
  port: 9200,
  host: '0.0.0.0',
  cacheTtlMs: 10_000,
  requestTimeoutMs: 10_000,
  mergeRequestsPerPage: 100,
  logLevel: 'info',
  logFormat: 'pretty',
};

/**
 * Unset or blank is undefined; anything that is not an integer becomes NaN
 * so that validate() reports it instead of silently applying the default
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : Number.NaN;
}

// Unknown names are ignored, as logger.init() does
function parseLogFormat(value: string | undefined): LogFormat | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'json' || normalized === 'pretty' ? normalized : undefined;
}

function parseList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

function maskSecret(value: string): string {
  if (!value) return '(unset)';
  if (value.length <= 4) return '***';
  return value.substring(0, 4) + '***';
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export const ConfigLoader = {
  fromEnv(env: NodeJS.ProcessEnv = process.env): PartialConfig {
    const config: PartialConfig = {};

    // GitLab
    if (env.GITLAB_URL) {
      config.gitlabUrl = env.GITLAB_URL;
    }
    if (env.GITLAB_TOKEN) {
      config.gitlabToken = env.GITLAB_TOKEN;
    }
    if (env.GITLAB_REPOSITORIES) {
      config.repositories = parseList(env.GITLAB_REPOSITORIES);
    }
    if (env.YOUR_EMAIL) {
      config.identity = env.YOUR_EMAIL;
    }

    // Labels
    const labels: Partial<WatchedLabels> = {};
    if (env.LABEL_REWORK) {
      labels.rework = env.LABEL_REWORK;
    }
    if (env.LABEL_IN_REVIEW) {
      labels.inReview = env.LABEL_IN_REVIEW;
    }
    if (env.LABEL_REWORK_DONE) {
      labels.reworkDone = env.LABEL_REWORK_DONE;
    }
    if (Object.keys(labels).length > 0) {
      config.labels = labels;
    }

    // Mail
    if (env.SMTP_HOST) {
      config.smtpHost = env.SMTP_HOST;
    }
    const smtpPort = parseIntOrUndefined(env.SMTP_PORT);
    if (smtpPort !== undefined) {
      config.smtpPort = smtpPort;
    }
    if (env.SMTP_USER) {
      config.smtpUser = env.SMTP_USER;
    }
    if (env.SMTP_PASSWORD) {
      config.smtpPassword = env.SMTP_PASSWORD;
    }
    if (env.ALERT_RECIPIENT) {
      config.alertRecipient = env.ALERT_RECIPIENT;
    }

    // Server
    const port = parseIntOrUndefined(env.EXPORTER_PORT);
    if (port !== undefined) {
      config.port = port;
    }
    if (env.EXPORTER_HOST) {
      config.host = env.EXPORTER_HOST;
    }

    // Collection
    const cacheTtlMs = parseIntOrUndefined(env.EXPORTER_CACHE_TTL_MS);
    if (cacheTtlMs !== undefined) {
      config.cacheTtlMs = cacheTtlMs;
    }
    const requestTimeoutMs = parseIntOrUndefined(env.EXPORTER_REQUEST_TIMEOUT_MS);
    if (requestTimeoutMs !== undefined) {
      config.requestTimeoutMs = requestTimeoutMs;
    }
    const perPage = parseIntOrUndefined(env.EXPORTER_MR_PER_PAGE);
    if (perPage !== undefined) {
      config.mergeRequestsPerPage = perPage;
    }

    // Logging
    if (env.EXPORTER_LOG_LEVEL) {
      config.logLevel = env.EXPORTER_LOG_LEVEL;
    }
    const logFormat = parseLogFormat(env.EXPORTER_LOG_FORMAT);
    if (logFormat) {
      config.logFormat = logFormat;
    }

    return config;
  },

  /**
   * `.yaml` and `.yml` are parsed as YAML, anything else as JSON
   */
  fromFile(configPath: string): PartialConfig {
    if (!fs.existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }

    const fileContent = fs.readFileSync(configPath, 'utf-8');
    const isYaml = ['.yaml', '.yml'].includes(path.extname(configPath).toLowerCase());

    let raw: unknown;
    try {
      raw = isYaml ? yaml.load(fileContent) : JSON.parse(fileContent);
    } catch {
      throw new Error(`Invalid ${isYaml ? 'YAML' : 'JSON'} in config file: ${configPath}`);
    }

    const result = configFileSchema.safeParse(raw ?? {});
    if (!result.success) {
      throw new ConfigValidationError(
        result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    const parsed: ConfigFileFormat = result.data;

    const config: PartialConfig = {};

    // GitLab
    if (parsed.gitlab?.url) {
      config.gitlabUrl = parsed.gitlab.url;
    }
    if (parsed.gitlab?.token) {
      config.gitlabToken = parsed.gitlab.token;
    }
    if (parsed.gitlab?.repositories) {
      config.repositories = parsed.gitlab.repositories;
    }
    if (parsed.identity) {
      config.identity = parsed.identity;
    }

    // Labels
    if (parsed.labels) {
      const labels: Partial<WatchedLabels> = {};
      if (parsed.labels.rework !== undefined) {
        labels.rework = parsed.labels.rework;
      }
      if (parsed.labels.inReview !== undefined) {
        labels.inReview = parsed.labels.inReview;
      }
      if (parsed.labels.reworkDone !== undefined) {
        labels.reworkDone = parsed.labels.reworkDone;
      }
      config.labels = labels;
    }

    // Mail
    if (parsed.smtp?.host) {
      config.smtpHost = parsed.smtp.host;
    }
    if (parsed.smtp?.port !== undefined) {
      config.smtpPort = parsed.smtp.port;
    }
    if (parsed.smtp?.user) {
      config.smtpUser = parsed.smtp.user;
    }
    if (parsed.smtp?.password) {
      config.smtpPassword = parsed.smtp.password;
    }
    if (parsed.smtp?.recipient) {
      config.alertRecipient = parsed.smtp.recipient;
    }

    // Server
    if (parsed.server?.port !== undefined) {
      config.port = parsed.server.port;
    }
    if (parsed.server?.host) {
      config.host = parsed.server.host;
    }

    // Collection
    if (parsed.collection?.cacheTtlMs !== undefined) {
      config.cacheTtlMs = parsed.collection.cacheTtlMs;
    }
    if (parsed.collection?.requestTimeoutMs !== undefined) {
      config.requestTimeoutMs = parsed.collection.requestTimeoutMs;
    }
    if (parsed.collection?.mergeRequestsPerPage !== undefined) {
      config.mergeRequestsPerPage = parsed.collection.mergeRequestsPerPage;
    }

    // Logging
    if (parsed.logging?.level) {
      config.logLevel = parsed.logging.level;
    }
    if (parsed.logging?.format) {
      config.logFormat = parsed.logging.format;
    }

    return config;
  },

  /**
   * Merge defaults < file < environment and validate
   */
  load(configPath?: string, env: NodeJS.ProcessEnv = process.env): ExporterConfig {
    const fileConfig: PartialConfig = configPath ? ConfigLoader.fromFile(configPath) : {};
    const envConfig = ConfigLoader.fromEnv(env);

    return ConfigLoader.validate({
      ...fileConfig,
      ...envConfig,
      labels: { ...fileConfig.labels, ...envConfig.labels },
    });
  },

  /**
   * Apply defaults, then check every field.
   * Throws ConfigValidationError listing all problems at once.
   */
  validate(config: PartialConfig): ExporterConfig {
    const errors: string[] = [];
    const labels: WatchedLabels = { ...DEFAULT_LABELS, ...config.labels };
    const identity = config.identity ?? DEFAULTS.identity;

    const merged: ExporterConfig = {
      ...DEFAULTS,
      ...config,
      labels,
      identity,
      gitlabToken: config.gitlabToken ?? '',
      alertRecipient: config.alertRecipient ?? (identity.includes('@') ? identity : ''),
    };

    if (!merged.gitlabToken) {
      errors.push('gitlabToken is required');
    }

    if (!isValidUrl(merged.gitlabUrl)) {
      errors.push('gitlabUrl must be a valid http(s) URL');
    }

    if (merged.repositories.some(name => name.trim() === '')) {
      errors.push('repositories must not contain empty names');
    }

    for (const [key, value] of Object.entries(labels)) {
      if (value.trim() === '') {
        errors.push(`labels.${key} must be a non-empty string`);
      }
    }

    if (!Number.isInteger(merged.port) || merged.port < 0 || merged.port > 65535) {
      errors.push('port must be between 0 and 65535');
    }

    if (!Number.isInteger(merged.smtpPort) || merged.smtpPort < 1 || merged.smtpPort > 65535) {
      errors.push('smtpPort must be between 1 and 65535');
    }

    if (!isPositiveInteger(merged.cacheTtlMs)) {
      errors.push('cacheTtlMs must be a positive integer');
    }

    if (!isPositiveInteger(merged.requestTimeoutMs)) {
      errors.push('requestTimeoutMs must be a positive integer');
    }

    if (!isPositiveInteger(merged.mergeRequestsPerPage) || merged.mergeRequestsPerPage > 100) {
      errors.push('mergeRequestsPerPage must be between 1 and 100');
    }

    if (errors.length > 0) {
      throw new ConfigValidationError(errors);
    }

    return merged;
  },

  getDefaults(): Omit<ExporterConfig, 'gitlabToken' | 'alertRecipient'> {
    return { ...DEFAULTS, labels: { ...DEFAULT_LABELS }, repositories: [] };
  },

  /**
   * Format configuration for display, secrets masked
   */
  toDisplayString(config: ExporterConfig): string {
    const displayConfig = {
      gitlab: {
        url: config.gitlabUrl,
        token: maskSecret(config.gitlabToken),
        repositories: config.repositories,
      },
      labels: config.labels,
      identity: config.identity,
      smtp: {
        host: config.smtpHost,
        port: config.smtpPort,
        user: config.smtpUser,
        password: maskSecret(config.smtpPassword),
        recipient: config.alertRecipient,
      },
      server: {
        host: config.host,
        port: config.port,
      },
      collection: {
        cacheTtlMs: config.cacheTtlMs,
        requestTimeoutMs: config.requestTimeoutMs,
        mergeRequestsPerPage: config.mergeRequestsPerPage,
      },
      logging: {
        level: config.logLevel,
        format: config.logFormat,
      },
    };

    return JSON.stringify(displayConfig, null, 2);
  },
};
