/**
 * Network error class for HTTP communication failures
 */

import { ZuoraError } from './ZuoraError';

/**
 * Network error codes
 */
export enum NetworkErrorCode {
  TIMEOUT = 'NET01',
  CONNECTION_REFUSED = 'NET02',
  DNS_LOOKUP_FAILED = 'NET03',
  SSL_ERROR = 'NET04',
  NO_RESPONSE = 'NET06',
  REQUEST_ABORTED = 'NET07',
  UNKNOWN = 'NET10',
}

/**
 * Node/axios error codes mapped onto network error codes
 */
const SYSTEM_CODE_MAPPING: Record<string, NetworkErrorCode> = {
  ECONNABORTED: NetworkErrorCode.TIMEOUT,
  ETIMEDOUT: NetworkErrorCode.TIMEOUT,
  ECONNREFUSED: NetworkErrorCode.CONNECTION_REFUSED,
  ECONNRESET: NetworkErrorCode.NO_RESPONSE,
  ENOTFOUND: NetworkErrorCode.DNS_LOOKUP_FAILED,
  EAI_AGAIN: NetworkErrorCode.DNS_LOOKUP_FAILED,
  ERR_CANCELED: NetworkErrorCode.REQUEST_ABORTED,
  CERT_HAS_EXPIRED: NetworkErrorCode.SSL_ERROR,
  DEPTH_ZERO_SELF_SIGNED_CERT: NetworkErrorCode.SSL_ERROR,
  SELF_SIGNED_CERT_IN_CHAIN: NetworkErrorCode.SSL_ERROR,
  UNABLE_TO_VERIFY_LEAF_SIGNATURE: NetworkErrorCode.SSL_ERROR,
};

/**
 * Network error for HTTP transport layer failures
 */
export class NetworkError extends ZuoraError {
  /** Network error code */
  public readonly networkCode: NetworkErrorCode;

  constructor(
    message: string,
    statusCode?: number,
    networkCode: NetworkErrorCode = NetworkErrorCode.UNKNOWN,
    cause?: Error
  ) {
    super(message, networkCode, statusCode, { cause });
    this.name = 'NetworkError';
    this.networkCode = networkCode;
  }

  /**
   * Map a system error code (ECONNREFUSED, ENOTFOUND, ...) to a network code
   */
  static codeFor(systemCode?: string): NetworkErrorCode {
    if (!systemCode) {
      return NetworkErrorCode.UNKNOWN;
    }
    return SYSTEM_CODE_MAPPING[systemCode] ?? NetworkErrorCode.UNKNOWN;
  }
}
