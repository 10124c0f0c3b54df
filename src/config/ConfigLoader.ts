/**
 * Configuration Loader
 *
 * Sources, in increasing priority: JSON file, ZUORA_* environment variables,
 * programmatic settings. Defaults fill whatever is left.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  ZuoraConfig,
  ResolvedZuoraConfig,
  ZUORA_BASE_URLS,
  CONFIG_DEFAULTS,
  ENV_VAR_MAPPING,
  LOG_LEVELS,
  LogLevel,
  ConfigFileOptions,
} from './ZuoraConfig';
import { ConfigValidator } from './ConfigValidator';
import { ZuoraError } from '../errors/ZuoraError';
import { ValidationError } from '../errors/ValidationError';

const CONFIG_KEYS: readonly (keyof ZuoraConfig)[] = [
  'username',
  'password',
  'sandbox',
  'baseUrl',
  'apiVersion',
  'timeout',
  'verifySsl',
  'omitFalsyFields',
  'enableAuditLog',
  'auditLogPath',
  'logLevel',
];

const BOOLEAN_KEYS: readonly (keyof ZuoraConfig)[] = [
  'sandbox',
  'verifySsl',
  'omitFalsyFields',
  'enableAuditLog',
];

type Guard<T> = (value: unknown) => value is T;

const isString: Guard<string> = (value): value is string => typeof value === 'string';
const isBoolean: Guard<boolean> = (value): value is boolean => typeof value === 'boolean';
const isNumber: Guard<number> = (value): value is number => typeof value === 'number';
const isLogLevel: Guard<LogLevel> = (value): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field<T>(
  raw: Record<string, unknown>,
  key: keyof ZuoraConfig,
  guard: Guard<T>,
  expected: string
): T | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (!guard(value)) {
    throw new ValidationError(`${key} ${expected}`, key);
  }
  return value;
}

function copyDefined<K extends keyof ZuoraConfig>(
  target: Partial<ZuoraConfig>,
  source: Partial<ZuoraConfig>,
  key: K
): void {
  const value = source[key];
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Environment strings to config values; anything unparseable is left as a
 * string for the type check to reject
 */
function parseEnvValue(key: keyof ZuoraConfig, value: string): unknown {
  if (BOOLEAN_KEYS.includes(key)) {
    return value.toLowerCase() === 'true' || value === '1';
  }
  if (key === 'timeout') {
    const ms = parseInt(value, 10);
    return Number.isNaN(ms) ? value : ms;
  }
  return value;
}

function readJsonObject(file: string): Record<string, unknown> {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ZuoraError(`Configuration file not found: ${file}`, 'CONFIG_FILE_NOT_FOUND');
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ZuoraError(
      `Invalid JSON in configuration file: ${file}`,
      'CONFIG_PARSE_ERROR',
      undefined,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  if (!isRecord(parsed)) {
    throw new ZuoraError(
      `Configuration file must contain a JSON object: ${file}`,
      'CONFIG_PARSE_ERROR'
    );
  }
  return parsed;
}

export class ConfigLoader {
  private readonly validator = new ConfigValidator();

  /**
   * A relative `auditLogPath` is taken relative to the file
   */
  public fromFile(options: ConfigFileOptions | string): Partial<ZuoraConfig> {
    const file = path.resolve(typeof options === 'string' ? options : options.path);
    const config = this.fromRecord(readJsonObject(file));
    if (config.auditLogPath !== undefined) {
      config.auditLogPath = path.resolve(path.dirname(file), config.auditLogPath);
    }
    return config;
  }

  /**
   * Empty variables count as unset
   */
  public fromEnvironment(env: NodeJS.ProcessEnv = process.env): Partial<ZuoraConfig> {
    const raw: Record<string, unknown> = {};
    for (const [name, key] of Object.entries(ENV_VAR_MAPPING)) {
      const value = env[name];
      if (value) {
        raw[key] = parseEnvValue(key, value);
      }
    }
    return this.fromRecord(raw);
  }

  /**
   * Later sources win; undefined never overrides
   */
  public merge(...sources: Partial<ZuoraConfig>[]): Partial<ZuoraConfig> {
    const merged: Partial<ZuoraConfig> = {};
    for (const source of sources) {
      for (const key of CONFIG_KEYS) {
        copyDefined(merged, source, key);
      }
    }
    return merged;
  }

  /**
   * @throws ValidationError if the configuration is invalid
   */
  public resolve(config: Partial<ZuoraConfig>): ResolvedZuoraConfig {
    this.validator.validateOrThrow(config);

    const { username, password } = config;
    if (username === undefined || password === undefined) {
      throw new ValidationError('Configuration validation failed: credentials are required');
    }

    const sandbox = config.sandbox ?? CONFIG_DEFAULTS.sandbox;

    return {
      username,
      password,
      sandbox,
      baseUrl: config.baseUrl || ZUORA_BASE_URLS[sandbox ? 'sandbox' : 'production'],
      apiVersion: config.apiVersion ?? CONFIG_DEFAULTS.apiVersion,
      timeout: config.timeout ?? CONFIG_DEFAULTS.timeout,
      verifySsl: config.verifySsl ?? CONFIG_DEFAULTS.verifySsl,
      omitFalsyFields: config.omitFalsyFields ?? CONFIG_DEFAULTS.omitFalsyFields,
      enableAuditLog: config.enableAuditLog ?? CONFIG_DEFAULTS.enableAuditLog,
      auditLogPath: config.auditLogPath,
      logLevel: config.logLevel ?? CONFIG_DEFAULTS.logLevel,
    };
  }

  /**
   * Read the file (when given) and the environment (unless `env: false`),
   * lay `config` on top, then resolve
   */
  public load(options: {
    file?: string | ConfigFileOptions;
    env?: boolean;
    config?: Partial<ZuoraConfig>;
  }): ResolvedZuoraConfig {
    return this.resolve(
      this.merge(
        options.file ? this.fromFile(options.file) : {},
        options.env === false ? {} : this.fromEnvironment(),
        options.config ?? {}
      )
    );
  }

  private fromRecord(raw: Record<string, unknown>): Partial<ZuoraConfig> {
    return this.merge({
      username: field(raw, 'username', isString, 'must be a string'),
      password: field(raw, 'password', isString, 'must be a string'),
      sandbox: field(raw, 'sandbox', isBoolean, 'must be a boolean'),
      baseUrl: field(raw, 'baseUrl', isString, 'must be a string'),
      apiVersion: field(raw, 'apiVersion', isString, 'must be a string'),
      timeout: field(raw, 'timeout', isNumber, 'must be a number'),
      verifySsl: field(raw, 'verifySsl', isBoolean, 'must be a boolean'),
      omitFalsyFields: field(raw, 'omitFalsyFields', isBoolean, 'must be a boolean'),
      enableAuditLog: field(raw, 'enableAuditLog', isBoolean, 'must be a boolean'),
      auditLogPath: field(raw, 'auditLogPath', isString, 'must be a string'),
      logLevel: field(raw, 'logLevel', isLogLevel, `must be one of: ${LOG_LEVELS.join(', ')}`),
    });
  }
}
