/**
 * Zuora SOAP client configuration types
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type ZuoraEnvironment = 'sandbox' | 'production';

/**
 * Base URLs for Zuora environments
 */
export const ZUORA_BASE_URLS: Record<ZuoraEnvironment, string> = {
  sandbox: 'https://sandbox.zuora.example.com',
  production: 'https://api.zuora.example.com',
};

/**
 * Path of the SOAP endpoint for an API version
 */
export function soapApiPath(apiVersion: string): string {
  return `/apps/services/a/${apiVersion}`;
}

/**
 * Default configuration values
 */
export const CONFIG_DEFAULTS = {
  sandbox: true,
  apiVersion: '74.0',
  timeout: 30000,
  verifySsl: true,
  omitFalsyFields: false,
  enableAuditLog: true,
  logLevel: 'info' as LogLevel,
} as const;

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Main client configuration interface
 */
export interface ZuoraConfig {
  // Required - Credentials
  /** API user name */
  username: string;
  /** API user password */
  password: string;

  // Optional - Environment settings
  /** Target the sandbox tenant (default: true) */
  sandbox?: boolean;
  /** Override the base URL chosen by `sandbox` */
  baseUrl?: string;
  /** SOAP API version (default: '74.0') */
  apiVersion?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Verify the server's TLS certificate (default: true) */
  verifySsl?: boolean;

  // Optional - Serialization
  /**
   * Omit every falsy field value (0, false, '') instead of only
   * null, undefined and '' (default: false)
   */
  omitFalsyFields?: boolean;

  // Optional - Logging
  /** Write an audit entry per HTTP request (default: true) */
  enableAuditLog?: boolean;
  /** File path for audit logs */
  auditLogPath?: string;
  /** Minimum log level (default: 'info') */
  logLevel?: LogLevel;
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedZuoraConfig {
  username: string;
  password: string;
  sandbox: boolean;
  baseUrl: string;
  apiVersion: string;
  timeout: number;
  verifySsl: boolean;
  omitFalsyFields: boolean;
  enableAuditLog: boolean;
  auditLogPath?: string;
  logLevel: LogLevel;
}

/**
 * Configuration for file-based config loading
 */
export interface ConfigFileOptions {
  /** Path to JSON configuration file */
  path: string;
}

/**
 * Environment variable mapping for configuration
 */
export const ENV_VAR_MAPPING: Record<string, keyof ZuoraConfig> = {
  ZUORA_USERNAME: 'username',
  ZUORA_PASSWORD: 'password',
  ZUORA_SANDBOX: 'sandbox',
  ZUORA_BASE_URL: 'baseUrl',
  ZUORA_API_VERSION: 'apiVersion',
  ZUORA_TIMEOUT: 'timeout',
  ZUORA_VERIFY_SSL: 'verifySsl',
  ZUORA_OMIT_FALSY_FIELDS: 'omitFalsyFields',
  ZUORA_ENABLE_AUDIT_LOG: 'enableAuditLog',
  ZUORA_AUDIT_LOG_PATH: 'auditLogPath',
  ZUORA_LOG_LEVEL: 'logLevel',
} as const;
