/**
 * Non-success response to a login request
 */

import { ZuoraError } from './ZuoraError';

export class ErrorResponse extends ZuoraError {
  constructor(
    statusCode: number,
    message: string = 'Unable to connect with provided credentials',
    details?: Record<string, unknown>
  ) {
    super(message, 'AUTH01', statusCode, { details });
    this.name = 'ErrorResponse';
  }
}
