/**
 * Raised when the authentication round trip cannot be completed.
 * Check the username, password and network settings.
 */

import { ZuoraError } from './ZuoraError';

export class ConnectionError extends ZuoraError {
  constructor(cause: Error, message: string = `Unable to connect: ${cause.message}`) {
    super(message, 'CONN01', undefined, { cause });
    this.name = 'ConnectionError';
  }
}
