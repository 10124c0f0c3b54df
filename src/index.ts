/**
 * Zuora SOAP client for Node.js/TypeScript
 *
 * Main entry point
 */

export { ZuoraClient, ZuoraClientOptions, Session } from './client/ZuoraClient';

// HTTP Client
export {
  HttpClient,
  HttpClientOptions,
  HttpRequestOptions,
  HttpResponse,
  HttpAuditEntry,
  RequestInterceptor,
  ResponseInterceptor,
} from './client/HttpClient';

// Configuration
export * from './config';

// Logging
export { createLogger, LoggerOptions } from './logging/Logger';

// SOAP envelopes and responses
export * from './soap';

// Models
export * from './models';

// Errors
export * from './errors';
