/**
 * Logger Unit Tests
 */

import winston from 'winston';
import { createLogger } from '../../src/logging/Logger';

describe('createLogger', () => {
  it('should default to info on the console', () => {
    const logger = createLogger();

    expect(logger.level).toBe('info');
    expect(logger.silent).toBe(false);
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it('should honour level and silent', () => {
    const logger = createLogger({ level: 'debug', silent: true });

    expect(logger.level).toBe('debug');
    expect(logger.silent).toBe(true);
    expect(logger.isDebugEnabled()).toBe(true);
  });
});
