import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigLoader, ConfigValidationError } from './config-loader.js';

describe('ConfigLoader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'exporter-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  }

  describe('fromEnv', () => {
    it('should load config from environment variables', () => {
      const config = ConfigLoader.fromEnv({
        GITLAB_URL: 'https://gitlab.example.com',
        GITLAB_TOKEN: 'test-secret',
        GITLAB_REPOSITORIES: ' app , api,,',
        YOUR_EMAIL: 'dev@example.com',
        SMTP_HOST: 'smtp.example.com',
        SMTP_PORT: '465',
        SMTP_USER: 'alerts@example.com',
        SMTP_PASSWORD: 'test-password',
        EXPORTER_PORT: '9300',
        EXPORTER_HOST: '127.0.0.1',
        EXPORTER_CACHE_TTL_MS: '5000',
        EXPORTER_LOG_LEVEL: 'debug',
        EXPORTER_LOG_FORMAT: 'JSON',
      });

      expect(config).toEqual({
        gitlabUrl: 'https://gitlab.example.com',
        gitlabToken: 'test-secret',
        repositories: ['app', 'api'],
        identity: 'dev@example.com',
        smtpHost: 'smtp.example.com',
        smtpPort: 465,
        smtpUser: 'alerts@example.com',
        smtpPassword: 'test-password',
        port: 9300,
        host: '127.0.0.1',
        cacheTtlMs: 5000,
        logLevel: 'debug',
        logFormat: 'json',
      });
    });

    it('should return an empty config when nothing is set', () => {
      expect(ConfigLoader.fromEnv({})).toEqual({});
    });

    it('should only set the label overrides that are present', () => {
      const config = ConfigLoader.fromEnv({ LABEL_IN_REVIEW: 'Needs Review' });
      expect(config.labels).toEqual({ inReview: 'Needs Review' });
    });

    it('should ignore an unknown log format', () => {
      expect(ConfigLoader.fromEnv({ EXPORTER_LOG_FORMAT: 'xml' })).toEqual({});
    });

    it('should treat blank numbers as unset', () => {
      const config = ConfigLoader.fromEnv({ EXPORTER_PORT: '  ' });
      expect(config.port).toBeUndefined();
    });

    it('should keep invalid numbers as NaN so validation reports them', () => {
      const config = ConfigLoader.fromEnv({ EXPORTER_PORT: 'not-a-number', SMTP_PORT: '25.5' });
      expect(config.port).toBeNaN();
      expect(config.smtpPort).toBeNaN();
    });
  });

  describe('fromFile', () => {
    it('should load a JSON config file', () => {
      const file = writeConfig('exporter.json', JSON.stringify({
        gitlab: { url: 'https://gitlab.example.com', token: 'test-secret', repositories: ['app'] },
        labels: { rework: 'Changes Requested' },
        server: { port: 9300 },
        collection: { mergeRequestsPerPage: 50 },
      }));

      expect(ConfigLoader.fromFile(file)).toEqual({
        gitlabUrl: 'https://gitlab.example.com',
        gitlabToken: 'test-secret',
        repositories: ['app'],
        labels: { rework: 'Changes Requested' },
        port: 9300,
        mergeRequestsPerPage: 50,
      });
    });

    it('should load a YAML config file', () => {
      const file = writeConfig('exporter.yaml', [
        'gitlab:',
        '  repositories:',
        '    - app',
        '    - api',
        'identity: dev@example.com',
        'smtp:',
        '  recipient: team@example.com',
        'logging:',
        '  level: warn',
        '  format: json',
      ].join('\n'));

      expect(ConfigLoader.fromFile(file)).toEqual({
        repositories: ['app', 'api'],
        identity: 'dev@example.com',
        alertRecipient: 'team@example.com',
        logLevel: 'warn',
        logFormat: 'json',
      });
    });

    it('should treat an empty YAML file as an empty config', () => {
      const file = writeConfig('empty.yml', '');
      expect(ConfigLoader.fromFile(file)).toEqual({});
    });

    it('should throw if the file does not exist', () => {
      const file = path.join(tempDir, 'missing.json');
      expect(() => ConfigLoader.fromFile(file)).toThrow(`Config file not found: ${file}`);
    });

    it('should throw on invalid JSON', () => {
      const file = writeConfig('broken.json', '{ not json');
      expect(() => ConfigLoader.fromFile(file)).toThrow(`Invalid JSON in config file: ${file}`);
    });

    it('should throw on invalid YAML', () => {
      const file = writeConfig('broken.yaml', 'gitlab: [unclosed');
      expect(() => ConfigLoader.fromFile(file)).toThrow(`Invalid YAML in config file: ${file}`);
    });

    it('should reject values of the wrong type with their path', () => {
      const file = writeConfig('typed.json', JSON.stringify({ server: { port: '9300' } }));

      try {
        ConfigLoader.fromFile(file);
        expect.unreachable('fromFile should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toHaveLength(1);
          expect(error.errors[0]).toMatch(/^server\.port: /);
        }
      }
    });
  });

  describe('load', () => {
    it('should let the environment override the file', () => {
      const file = writeConfig('exporter.json', JSON.stringify({
        gitlab: { token: 'file-token', repositories: ['from-file'] },
        labels: { rework: 'File Rework', inReview: 'File Review' },
        server: { port: 9300 },
      }));

      const config = ConfigLoader.load(file, {
        GITLAB_TOKEN: 'test-secret',
        LABEL_IN_REVIEW: 'Env Review',
      });

      expect(config.gitlabToken).toBe('test-secret');
      expect(config.repositories).toEqual(['from-file']);
      expect(config.port).toBe(9300);
      expect(config.labels).toEqual({
        rework: 'File Rework',
        inReview: 'Env Review',
        reworkDone: 'Rework Done',
      });
    });

    it('should work from the environment alone', () => {
      const config = ConfigLoader.load(undefined, { GITLAB_TOKEN: 'test-secret' });
      expect(config.gitlabUrl).toBe('https://gitlab.com');
      expect(config.port).toBe(9200);
    });
  });

  describe('validate', () => {
    it('should apply defaults', () => {
      const config = ConfigLoader.validate({ gitlabToken: 'test-secret' });

      expect(config).toEqual({
        gitlabUrl: 'https://gitlab.com',
        gitlabToken: 'test-secret',
        repositories: [],
        labels: { rework: 'Rework', inReview: 'In Review', reworkDone: 'Rework Done' },
        identity: '',
        smtpHost: 'smtp.gmail.com',
        smtpPort: 587,
        smtpUser: '',
        smtpPassword: '',
        alertRecipient: '',
        port: 9200,
        host: '0.0.0.0',
        cacheTtlMs: 10000,
        requestTimeoutMs: 10000,
        mergeRequestsPerPage: 100,
        logLevel: 'info',
        logFormat: 'pretty',
      });
    });

    it('should default the alert recipient to an e-mail identity', () => {
      const config = ConfigLoader.validate({ gitlabToken: 'test-secret', identity: 'dev@example.com' });
      expect(config.alertRecipient).toBe('dev@example.com');
    });

    it('should not use a bare username as recipient', () => {
      const config = ConfigLoader.validate({ gitlabToken: 'test-secret', identity: 'dev' });
      expect(config.alertRecipient).toBe('');
    });

    it('should keep an explicit recipient', () => {
      const config = ConfigLoader.validate({
        gitlabToken: 'test-secret',
        identity: 'dev@example.com',
        alertRecipient: 'team@example.com',
      });
      expect(config.alertRecipient).toBe('team@example.com');
    });

    it('should require a token', () => {
      expect(() => ConfigLoader.validate({})).toThrow(ConfigValidationError);
      expect(() => ConfigLoader.validate({})).toThrow('gitlabToken is required');
    });

    it('should collect every error at once', () => {
      try {
        ConfigLoader.validate({
          gitlabToken: 'test-secret',
          gitlabUrl: 'ftp://gitlab.example.com',
          repositories: ['app', ' '],
          labels: { reworkDone: '' },
          port: 70000,
          smtpPort: 0,
          cacheTtlMs: 0,
          requestTimeoutMs: -1,
          mergeRequestsPerPage: 101,
        });
        expect.unreachable('validate should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toEqual([
            'gitlabUrl must be a valid http(s) URL',
            'repositories must not contain empty names',
            'labels.reworkDone must be a non-empty string',
            'port must be between 0 and 65535',
            'smtpPort must be between 1 and 65535',
            'cacheTtlMs must be a positive integer',
            'requestTimeoutMs must be a positive integer',
            'mergeRequestsPerPage must be between 1 and 100',
          ]);
        }
      }
    });

    it('should report a NaN port from the environment', () => {
      const partial = ConfigLoader.fromEnv({ GITLAB_TOKEN: 'test-secret', EXPORTER_PORT: 'abc' });
      expect(() => ConfigLoader.validate(partial)).toThrow('port must be between 0 and 65535');
    });

    it('should accept port 0', () => {
      expect(ConfigLoader.validate({ gitlabToken: 'test-secret', port: 0 }).port).toBe(0);
    });
  });

  describe('ConfigValidationError', () => {
    it('should list every error in the message', () => {
      const error = new ConfigValidationError(['first', 'second']);
      expect(error.name).toBe('ConfigValidationError');
      expect(error.message).toBe('Configuration validation failed:\n  - first\n  - second');
    });
  });

  describe('getDefaults', () => {
    it('should return a fresh copy each time', () => {
      const defaults = ConfigLoader.getDefaults();
      defaults.repositories.push('mutated');
      defaults.labels.rework = 'mutated';

      const again = ConfigLoader.getDefaults();
      expect(again.repositories).toEqual([]);
      expect(again.labels.rework).toBe('Rework');
    });
  });

  describe('toDisplayString', () => {
    it('should mask secrets', () => {
      const config = ConfigLoader.validate({
        gitlabToken: 'test-secret',
        smtpPassword: 'pw',
      });
      const display = JSON.parse(ConfigLoader.toDisplayString(config));

      expect(display.gitlab.token).toBe('test***');
      expect(display.smtp.password).toBe('***');
      expect(ConfigLoader.toDisplayString(config)).not.toContain('test-secret');
    });

    it('should show unset secrets as unset', () => {
      const config = ConfigLoader.validate({ gitlabToken: 'test-secret' });
      const display = JSON.parse(ConfigLoader.toDisplayString(config));
      expect(display.smtp.password).toBe('(unset)');
    });
  });
});
