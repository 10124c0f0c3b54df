/**
 * Base class of every error the client raises
 */

export enum ZuoraErrorCategory {
  CONNECTION = 'CONN',
  AUTH = 'AUTH',
  PRECONDITION = 'PRE',
  NETWORK = 'NET',
  VALIDATION = 'VAL',
  CONFIG = 'CONFIG',
  UNKNOWN = 'UNKNOWN',
}

/** Codes are grouped by prefix: CONN01, PRE02, NET03, CONFIG_PARSE_ERROR... */
const CATEGORY_PREFIXES: readonly ZuoraErrorCategory[] = [
  ZuoraErrorCategory.CONNECTION,
  ZuoraErrorCategory.AUTH,
  ZuoraErrorCategory.PRECONDITION,
  ZuoraErrorCategory.NETWORK,
  ZuoraErrorCategory.VALIDATION,
  ZuoraErrorCategory.CONFIG,
];

function categoryOf(code: string | undefined): ZuoraErrorCategory {
  const category = code && CATEGORY_PREFIXES.find((prefix) => code.startsWith(prefix));
  return category || ZuoraErrorCategory.UNKNOWN;
}

export interface ZuoraErrorOptions {
  cause?: Error;
  details?: Record<string, unknown>;
}

export class ZuoraError extends Error {
  public readonly code?: string;
  public readonly statusCode?: number;
  public readonly category: ZuoraErrorCategory;
  public readonly cause?: Error;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp = new Date();

  constructor(
    message: string,
    code?: string,
    statusCode?: number,
    options: ZuoraErrorOptions = {}
  ) {
    super(message);
    this.name = 'ZuoraError';
    this.code = code;
    this.statusCode = statusCode;
    this.category = categoryOf(code);
    this.cause = options.cause;
    this.details = options.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * `[AUTH01] Unable to connect with provided credentials (HTTP 401)`
   */
  public getDescription(): string {
    const code = this.code ? `[${this.code}] ` : '';
    const status = this.statusCode ? ` (HTTP ${this.statusCode})` : '';
    return `${code}${this.message}${status}`;
  }

  /**
   * Log-friendly form; the cause is reduced to its message
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
      details: this.details,
      cause: this.cause?.message,
    };
  }
}
