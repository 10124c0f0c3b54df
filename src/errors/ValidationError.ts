/**
 * Validation error class
 */

import { ZuoraError } from './ZuoraError';

export class ValidationError extends ZuoraError {
  constructor(message: string, public field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}
