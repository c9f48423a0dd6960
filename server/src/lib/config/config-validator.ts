/**
 * Configuration Validator
 * Fail fast on misconfiguration
 */

import type { ZodError } from 'zod';
import type { Logger } from '../logger/structured-logger.js';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Flatten zod issues to "path: message" strings
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export interface ConfigRequirements {
  required: string[];
  optional: string[];
}

export interface ValidationResult {
  valid: boolean;
  missing: string[];
  warnings: string[];
}

export class ConfigValidator {
  constructor(
    private readonly requirements: ConfigRequirements,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  validate(): ValidationResult {
    const missing = this.requirements.required.filter(key => !this.env[key]);
    const warnings = this.requirements.optional
      .filter(key => !this.env[key])
      .map(key => `Optional config ${key} not set`);

    return { valid: missing.length === 0, missing, warnings };
  }

  /**
   * Validate configuration or throw ConfigError.
   * Call at startup, before the server listens.
   */
  validateOrThrow(log: Logger): void {
    const result = this.validate();

    if (!result.valid) {
      log.error({ event: 'config_invalid', missing: result.missing }, '[Config] Configuration validation failed');
      throw new ConfigError(`Missing required configuration: ${result.missing.join(', ')}`, result.missing);
    }

    if (result.warnings.length > 0) {
      log.warn({ event: 'config_warnings', warnings: result.warnings }, '[Config] Configuration warnings');
    }

    log.info({ event: 'config_validated', nodeEnv: this.env.NODE_ENV || 'development' }, '[Config] Configuration validated');
  }
}
