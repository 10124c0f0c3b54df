/**
 * Precondition error class
 */

import { ZuoraError } from './ZuoraError';

/**
 * Precondition error codes
 */
export enum PreconditionErrorCode {
  SESSION_NOT_SET = 'PRE01',
  UNSERIALIZABLE_VALUE = 'PRE02',
  UNKNOWN_OBJECT_TYPE = 'PRE03',
}

/**
 * Raised before any I/O when a request cannot be built
 */
export class PreconditionError extends ZuoraError {
  constructor(
    message: string,
    code: PreconditionErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message, code, undefined, { details });
    this.name = 'PreconditionError';
  }

  static sessionNotSet(): PreconditionError {
    return new PreconditionError(
      'Session token not set. Did you call authenticate?',
      PreconditionErrorCode.SESSION_NOT_SET
    );
  }

  static unserializableValue(field: string, value: unknown): PreconditionError {
    const kind = Array.isArray(value) ? 'array' : typeof value;
    return new PreconditionError(
      `Value for ${field} cannot be serialized to XML (${kind})`,
      PreconditionErrorCode.UNSERIALIZABLE_VALUE,
      { field, kind }
    );
  }

  static unknownObjectType(type: string): PreconditionError {
    return new PreconditionError(
      `Unknown object type: ${type}`,
      PreconditionErrorCode.UNKNOWN_OBJECT_TYPE,
      { type }
    );
  }
}
