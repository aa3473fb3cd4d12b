import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { validateEnv, assertEnv } from './env-validator.js';
import { logger, LogLevel } from '../logging/index.js';

const COMPLETE_ENV = {
  GITLAB_TOKEN: 'test-token',
  GITLAB_URL: 'https://gitlab.example.com',
  GITLAB_REPOSITORIES: 'app,api',
  YOUR_EMAIL: 'dev@example.com',
  SMTP_USER: 'alerts@example.com',
  SMTP_PASSWORD: 'test-password',
};

describe('validateEnv', () => {
  beforeEach(() => {
    logger.setLevel(LogLevel.INFO);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('passes when the token is present', () => {
    const result = validateEnv(COMPLETE_ENV);
    expect(result).toEqual({ valid: true, missing: [] });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('fails when the token is missing', () => {
    const { GITLAB_TOKEN: _token, ...env } = COMPLETE_ENV;
    const result = validateEnv(env);
    expect(result).toEqual({ valid: false, missing: ['GITLAB_TOKEN'] });
  });

  it('treats a blank token as missing', () => {
    const result = validateEnv({ ...COMPLETE_ENV, GITLAB_TOKEN: '   ' });
    expect(result.missing).toEqual(['GITLAB_TOKEN']);
  });

  it('passes but warns once per unset optional var', () => {
    const result = validateEnv({ GITLAB_TOKEN: 'test-token' });
    expect(result.valid).toBe(true);
    expect(console.warn).toHaveBeenCalledTimes(5);
  });
});

describe('assertEnv', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('does not throw when the token is present', () => {
    expect(() => assertEnv(COMPLETE_ENV)).not.toThrow();
  });

  it('throws naming the missing token', () => {
    expect(() => assertEnv({})).toThrow(/GITLAB_TOKEN/);
  });

  it('error message includes startup guidance', () => {
    expect(() => assertEnv({})).toThrow(/Missing required environment variables/);
  });

  it('reads process.env by default', () => {
    vi.stubEnv('GITLAB_TOKEN', '');
    expect(() => assertEnv()).toThrow(/GITLAB_TOKEN/);
    vi.unstubAllEnvs();
  });
});
