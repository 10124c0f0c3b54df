export { ZuoraError, ZuoraErrorCategory, ZuoraErrorOptions } from './ZuoraError';
export { ConnectionError } from './ConnectionError';
export { ErrorResponse } from './ErrorResponse';
export { PreconditionError, PreconditionErrorCode } from './PreconditionError';
export { NetworkError, NetworkErrorCode } from './NetworkError';
export { ValidationError } from './ValidationError';
