import { logger } from '../logging/index.js';

const log = logger.child('EnvValidator');

/**
 * Required environment variables. The exporter refuses to start without them.
 */
const REQUIRED_VARS = ['GITLAB_TOKEN'] as const;

/**
 * Optional variables; without them a feature is switched off or a default applies.
 */
const OPTIONAL_VARS = [
  { name: 'GITLAB_URL', effect: 'using https://gitlab.com' },
  { name: 'GITLAB_REPOSITORIES', effect: 'no projects will be monitored' },
  { name: 'YOUR_EMAIL', effect: 'rework assigned to me is always 0 and no alerts are mailed' },
  { name: 'SMTP_USER', effect: 'rework alerts will not be mailed' },
  { name: 'SMTP_PASSWORD', effect: 'rework alerts will not be mailed' },
] as const;

export interface ValidationResult {
  valid: boolean;
  missing: string[];
}

/**
 * Check required variables and warn about optional ones that are unset.
 * A variable holding only whitespace counts as unset.
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const missing: string[] = [];

  for (const name of REQUIRED_VARS) {
    if (!env[name]?.trim()) {
      missing.push(name);
    }
  }

  for (const { name, effect } of OPTIONAL_VARS) {
    if (!env[name]?.trim()) {
      log.warn('Optional env var not set', { name, effect });
    }
  }

  return { valid: missing.length === 0, missing };
}

/**
 * Throw, listing every missing variable, unless the environment is complete.
 * Call before anything talks to GitLab.
 */
export function assertEnv(env: NodeJS.ProcessEnv = process.env): void {
  const result = validateEnv(env);
  if (!result.valid) {
    const message = [
      'Missing required environment variables:',
      ...result.missing.map(name => `  - ${name}`),
      '',
      'Set these variables in your .env file or environment before starting.',
    ].join('\n');
    log.error('Startup aborted: missing required environment variables', { missing: result.missing });
    throw new Error(message);
  }
  log.info('Environment validation passed', { checked: REQUIRED_VARS.length });
}
