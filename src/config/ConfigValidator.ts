/**
 * Configuration Validator
 *
 * Runs every rule against a configuration and reports all problems together.
 */

import { ZuoraConfig, LOG_LEVELS } from './ZuoraConfig';
import { ValidationError } from '../errors/ValidationError';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationErrorDetail[];
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
  value?: unknown;
}

type Rule = (config: Partial<ZuoraConfig>) => ValidationErrorDetail[];

const MIN_TIMEOUT = 1000;
const MAX_TIMEOUT = 300000;

function credential(field: 'username' | 'password'): Rule {
  return (config) => {
    const value = config[field];
    if (value === undefined) {
      return [{ field, message: `${field} is required` }];
    }
    if (value.trim() === '') {
      return [
        {
          field,
          message: `${field} cannot be empty`,
          value: field === 'password' ? '[REDACTED]' : value,
        },
      ];
    }
    return [];
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'https:' || protocol === 'http:';
  } catch {
    return false;
  }
}

const baseUrl: Rule = ({ baseUrl: value }) =>
  value && !isHttpUrl(value)
    ? [{ field: 'baseUrl', message: 'baseUrl must be a valid http(s) URL', value }]
    : [];

// e.g. 74.0
const apiVersion: Rule = ({ apiVersion: value }) =>
  value !== undefined && !/^\d+(\.\d+)?$/.test(value)
    ? [{ field: 'apiVersion', message: 'apiVersion must look like 74.0', value }]
    : [];

const auditLogPath: Rule = ({ auditLogPath: value }) =>
  value !== undefined && value.trim() === ''
    ? [{ field: 'auditLogPath', message: 'auditLogPath cannot be empty', value }]
    : [];

const timeout: Rule = ({ timeout: value }) => {
  if (value === undefined) {
    return [];
  }
  let message: string | undefined;
  if (!Number.isFinite(value) || value <= 0) {
    message = 'timeout must be a positive number (milliseconds)';
  } else if (value < MIN_TIMEOUT) {
    message = `timeout should be at least ${MIN_TIMEOUT}ms`;
  } else if (value > MAX_TIMEOUT) {
    message = `timeout should not exceed ${MAX_TIMEOUT}ms`;
  }
  return message ? [{ field: 'timeout', message, value }] : [];
};

const logLevel: Rule = ({ logLevel: value }) =>
  value !== undefined && !LOG_LEVELS.includes(value)
    ? [{ field: 'logLevel', message: `logLevel must be one of: ${LOG_LEVELS.join(', ')}`, value }]
    : [];

/** Report order follows this list */
const RULES: readonly Rule[] = [
  credential('username'),
  credential('password'),
  baseUrl,
  apiVersion,
  auditLogPath,
  timeout,
  logLevel,
];

export class ConfigValidator {
  public validate(config: Partial<ZuoraConfig>): ValidationResult {
    const errors = RULES.flatMap((rule) => rule(config));
    return { valid: errors.length === 0, errors };
  }

  /**
   * @throws ValidationError listing every problem, with `field` set to the first
   */
  public validateOrThrow(config: Partial<ZuoraConfig>): void {
    const { errors } = this.validate(config);
    if (errors.length > 0) {
      const summary = errors.map((e) => `${e.field}: ${e.message}`).join('; ');
      throw new ValidationError(`Configuration validation failed: ${summary}`, errors[0].field);
    }
  }
}
