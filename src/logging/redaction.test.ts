import { describe, it, expect } from 'vitest';
import { redact } from './redaction.js';

describe('redact()', () => {
  it('should redact fields whose names contain a sensitive word', () => {
    const result = redact({
      username: 'dev',
      smtpPassword: 'test-password',
      gitlabToken: 'test-token',
      Authorization: 'anything',
    });

    expect(result).toEqual({
      username: 'dev',
      smtpPassword: '[REDACTED]',
      gitlabToken: '[REDACTED]',
      Authorization: '[REDACTED]',
    });
  });

  it('should walk nested objects', () => {
    const result = redact({
      smtp: { host: 'smtp.example.com', auth: { user: 'dev', password: 'test-password' } },
    });

    expect(result).toEqual({
      smtp: { host: 'smtp.example.com', auth: { user: 'dev', password: '[REDACTED]' } },
    });
  });

  it('should redact token-shaped values inside arrays', () => {
    const result = redact({
      values: ['glpat-placeholder', 'main', { note: 'Bearer placeholder' }],
    });

    expect(result.values).toEqual(['[REDACTED]', 'main', { note: '[REDACTED]' }]);
  });

  it('should detect GitLab tokens, bearer headers and JWTs under any field name', () => {
    const result = redact({
      a: 'glpat-abc123_def',
      b: 'glrt-abc123',
      c: 'Bearer abc123',
      d: 'eyJhbGciOi.eyJzdWIi',
    });

    expect(result).toEqual({ a: '[REDACTED]', b: '[REDACTED]', c: '[REDACTED]', d: '[REDACTED]' });
  });

  it('should keep ordinary values', () => {
    expect(redact({ branch: 'feature/login', label: 'Rework' })).toEqual({
      branch: 'feature/login',
      label: 'Rework',
    });
  });

  it('should leave non-string scalars alone', () => {
    expect(redact({ port: 587, secure: false, missing: null })).toEqual({
      port: 587,
      secure: false,
      missing: null,
    });
  });

  it('should honour custom field names', () => {
    const result = redact({ recipient: 'dev@example.com', project: 'group/app' }, ['Recipient']);

    expect(result).toEqual({ recipient: '[REDACTED]', project: 'group/app' });
  });
});
