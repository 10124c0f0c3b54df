/**
 * HTTP transport layer for the SOAP API
 * Posts XML envelopes and hands every response back unchanged,
 * with request interceptors and audit logging
 */

import * as https from 'https';
import axios, {
  AxiosAdapter,
  AxiosInstance,
  AxiosRequestConfig,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';
import type { Logger } from 'winston';
import { ResolvedZuoraConfig, soapApiPath } from '../config/ZuoraConfig';
import { NetworkError } from '../errors/NetworkError';

/**
 * Request options for HTTP client
 */
export interface HttpRequestOptions {
  /** Request headers */
  headers?: Record<string, string>;
  /** Request timeout override (ms) */
  timeout?: number;
}

/**
 * HTTP response wrapper
 */
export interface HttpResponse<T = string> {
  /** Response body */
  data: T;
  /** HTTP status code */
  status: number;
  /** Response headers */
  headers: Record<string, string>;
  /** Request duration in milliseconds */
  duration: number;
  /** Request ID for traceability */
  requestId: string;
  /** Absolute URL the request was sent to */
  url: string;
}

/**
 * Audit log entry for HTTP requests
 */
export interface HttpAuditEntry {
  timestamp: string;
  requestId: string;
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
  response?: {
    statusCode: number;
    body?: string;
  };
  duration: number;
  success: boolean;
  error?: string;
}

/**
 * Request interceptor callback
 */
export type RequestInterceptor = (
  config: InternalAxiosRequestConfig
) => InternalAxiosRequestConfig | Promise<InternalAxiosRequestConfig>;

/**
 * Response interceptor callback
 */
export type ResponseInterceptor = (
  response: AxiosResponse
) => AxiosResponse | Promise<AxiosResponse>;

export interface HttpClientOptions {
  /** Logger receiving audit entries */
  logger: Logger;
  /** Replace the network adapter (in-process fakes in tests) */
  adapter?: AxiosAdapter;
}

/**
 * Headers whose values never reach the logs
 */
const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-api-key'];

/**
 * XML elements whose text never reaches the logs
 */
const SENSITIVE_ELEMENTS = /<((?:[\w-]+:)?(?:password|session))>[\s\S]*?<\/\1>/gi;

/**
 * HTTP Client for the SOAP endpoint
 *
 * Features:
 * - XML request bodies, text response bodies
 * - Every HTTP status is returned, none is thrown
 * - Configurable TLS certificate verification
 * - Request/response interceptors
 * - Request ID generation for traceability
 * - Audit logging with credential redaction
 */
export class HttpClient {
  private readonly client: AxiosInstance;
  private readonly config: ResolvedZuoraConfig;
  private readonly logger: Logger;

  private requestInterceptors: RequestInterceptor[] = [];
  private responseInterceptors: ResponseInterceptor[] = [];

  private auditLogCallback?: (entry: HttpAuditEntry) => void;

  /**
   * Create a new HTTP client instance
   *
   * @param config - Resolved client configuration
   * @param options - Logger and optional adapter
   */
  constructor(config: ResolvedZuoraConfig, options: HttpClientOptions) {
    this.config = config;
    this.logger = options.logger;

    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout,
      headers: {
        'Content-Type': 'text/xml',
        Accept: 'text/xml',
      },
      responseType: 'text',
      validateStatus: () => true,
      httpsAgent: new https.Agent({
        rejectUnauthorized: config.verifySsl,
      }),
      adapter: options.adapter,
    });

    this.setupDefaultInterceptors();
  }

  private setupDefaultInterceptors(): void {
    this.client.interceptors.request.use((config: InternalAxiosRequestConfig) =>
      this.applyRequestInterceptors(config)
    );

    this.client.interceptors.response.use((response: AxiosResponse) =>
      this.applyResponseInterceptors(response)
    );
  }

  private async applyRequestInterceptors(
    config: InternalAxiosRequestConfig
  ): Promise<InternalAxiosRequestConfig> {
    let processedConfig = config;
    for (const interceptor of this.requestInterceptors) {
      processedConfig = await interceptor(processedConfig);
    }
    return processedConfig;
  }

  private async applyResponseInterceptors(response: AxiosResponse): Promise<AxiosResponse> {
    let processedResponse = response;
    for (const interceptor of this.responseInterceptors) {
      processedResponse = await interceptor(processedResponse);
    }
    return processedResponse;
  }

  public addRequestInterceptor(interceptor: RequestInterceptor): void {
    this.requestInterceptors.push(interceptor);
  }

  public addResponseInterceptor(interceptor: ResponseInterceptor): void {
    this.responseInterceptors.push(interceptor);
  }

  /**
   * Receive every audit entry in addition to the logger
   */
  public setAuditLogCallback(callback: (entry: HttpAuditEntry) => void): void {
    this.auditLogCallback = callback;
  }

  private generateRequestId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 10);
    return `zuora-${timestamp}-${random}`;
  }

  /**
   * Convert a transport failure into a NetworkError
   */
  private normalizeError(error: unknown): NetworkError {
    if (error instanceof NetworkError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      const networkCode = NetworkError.codeFor(error.code);
      return new NetworkError(
        `Network error: ${error.message || 'No response received'}`,
        undefined,
        networkCode,
        error
      );
    }

    if (error instanceof Error) {
      return new NetworkError(`Request error: ${error.message}`, undefined, undefined, error);
    }

    return new NetworkError(`Request error: ${String(error)}`);
  }

  /**
   * Redact credentials from headers or XML bodies
   */
  public redactSensitiveData(headers: Record<string, string>): Record<string, string>;
  public redactSensitiveData(body: string): string;
  public redactSensitiveData(
    value: Record<string, string> | string
  ): Record<string, string> | string {
    if (typeof value === 'string') {
      return value.replace(SENSITIVE_ELEMENTS, '<$1>[REDACTED]</$1>');
    }

    const redacted: Record<string, string> = {};
    for (const [key, headerValue] of Object.entries(value)) {
      redacted[key] = SENSITIVE_HEADERS.includes(key.toLowerCase()) ? '[REDACTED]' : headerValue;
    }
    return redacted;
  }

  private logAudit(entry: HttpAuditEntry): void {
    if (!this.config.enableAuditLog) {
      return;
    }

    const outcome = entry.response ? String(entry.response.statusCode) : entry.error ?? 'failed';
    this.logger.debug(`${entry.method} ${entry.url} -> ${outcome} (${entry.duration}ms)`, {
      audit: entry,
    });
    this.auditLogCallback?.(entry);
  }

  private toHeaderRecord(headers: AxiosResponse['headers']): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      } else if (typeof value === 'number') {
        record[key.toLowerCase()] = String(value);
      } else if (Array.isArray(value)) {
        record[key.toLowerCase()] = value.join(', ');
      }
    }
    return record;
  }

  /**
   * POST an XML document
   *
   * @param body - Serialized XML envelope
   * @param url - Path relative to the base URL (default: the SOAP endpoint)
   */
  public async post(
    body: string,
    url: string = soapApiPath(this.config.apiVersion),
    options?: HttpRequestOptions
  ): Promise<HttpResponse> {
    const requestId = this.generateRequestId();
    const headers: Record<string, string> = {
      'Content-Type': 'text/xml',
      ...options?.headers,
      'X-Request-ID': requestId,
    };
    const fullUrl = this.resolveUrl(url);
    const startTime = Date.now();

    const requestConfig: AxiosRequestConfig<string> = {
      method: 'POST',
      url,
      data: body,
      headers,
      timeout: options?.timeout ?? this.config.timeout,
    };

    let response: AxiosResponse<string>;
    try {
      response = await this.client.request<string, AxiosResponse<string>, string>(requestConfig);
    } catch (error) {
      const networkError = this.normalizeError(error);
      this.logAudit({
        timestamp: new Date().toISOString(),
        requestId,
        method: 'POST',
        url: fullUrl,
        headers: this.redactSensitiveData(headers),
        body: this.redactSensitiveData(body),
        duration: Date.now() - startTime,
        success: false,
        error: networkError.message,
      });
      throw networkError;
    }

    const data = typeof response.data === 'string' ? response.data : String(response.data ?? '');
    const duration = Date.now() - startTime;

    this.logAudit({
      timestamp: new Date().toISOString(),
      requestId,
      method: 'POST',
      url: fullUrl,
      headers: this.redactSensitiveData(headers),
      body: this.redactSensitiveData(body),
      response: {
        statusCode: response.status,
        body: this.redactSensitiveData(data),
      },
      duration,
      success: true,
    });

    return {
      data,
      status: response.status,
      headers: this.toHeaderRecord(response.headers),
      duration,
      requestId,
      url: fullUrl,
    };
  }

  /**
   * Join base URL and path the way axios does
   */
  private resolveUrl(url: string): string {
    if (/^https?:\/\//i.test(url)) {
      return url;
    }
    return `${this.config.baseUrl.replace(/\/+$/, '')}/${url.replace(/^\/+/, '')}`;
  }

  public getBaseUrl(): string {
    return this.config.baseUrl;
  }
}
