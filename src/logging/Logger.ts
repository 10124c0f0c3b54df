/**
 * Logger
 *
 * Builds the winston logger used by the client and its HTTP layer.
 * Writes text lines to the console and, when a path is given, JSON lines
 * to an audit file.
 */

import winston from 'winston';
import { LogLevel } from '../config/ZuoraConfig';

export interface LoggerOptions {
  /** Minimum level written (default: 'info') */
  level?: LogLevel;
  /** Also append JSON lines to this file */
  filePath?: string;
  /** Drop every entry; used by tests */
  silent?: boolean;
}

/**
 * Text format: INFO  2026-10-19T08:15:00.000Z [zuora-soap] Authenticated
 */
const textFormat = winston.format.printf((info) => {
  const level = info.level.toUpperCase().padStart(5);
  const component = typeof info['component'] === 'string' ? ` [${info['component']}]` : '';
  const timestamp = typeof info['timestamp'] === 'string' ? info['timestamp'] : new Date().toISOString();
  return `${level} ${timestamp}${component} ${String(info.message)}`;
});

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.timestamp(), textFormat),
      stderrLevels: ['error', 'warn'],
    }),
  ];

  if (options.filePath) {
    transports.push(
      new winston.transports.File({
        filename: options.filePath,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    defaultMeta: { component: 'zuora-soap' },
    transports,
  });
}
