/**
 * Zuora SOAP client
 *
 * Authenticates once, then sends authenticated create requests for the
 * registered zObject types. Create responses are returned as received;
 * interpreting their bodies is left to the caller.
 */

import type { AxiosAdapter } from 'axios';
import type { Logger } from 'winston';
import { ConfigLoader } from '../config/ConfigLoader';
import { ResolvedZuoraConfig, ZuoraConfig } from '../config/ZuoraConfig';
import { ConnectionError } from '../errors/ConnectionError';
import { ErrorResponse } from '../errors/ErrorResponse';
import { PreconditionError } from '../errors/PreconditionError';
import { createLogger } from '../logging/Logger';
import { BillRunRequest } from '../models/BillRun';
import { RefundRequest } from '../models/Refund';
import { ZObjectData, getZObjectFields } from '../models/ZObject';
import {
  XmlNode,
  buildEnvelope,
  createBody,
  loginBody,
  sessionHeader,
} from '../soap/EnvelopeBuilder';
import { serializeFields } from '../soap/FieldSerializer';
import { extractSessionToken } from '../soap/ResponseParser';
import { HttpClient, HttpResponse } from './HttpClient';

/**
 * Session obtained from a successful login
 */
export interface Session {
  readonly token: string;
  readonly authenticatedAt: Date;
}

export interface ZuoraClientOptions {
  /** Logger to use instead of one built from the configuration */
  logger?: Logger;
  /** Replace the axios network adapter */
  adapter?: AxiosAdapter;
}

/**
 * Client for the Zuora SOAP API
 *
 * State moves from unauthenticated to authenticated on a successful
 * `authenticate()` and never back, except through `clearSession()`. There is
 * no token refresh: when a call fails because the session expired,
 * authenticate again.
 *
 * Overlapping `authenticate()` calls share one login request.
 */
export class ZuoraClient {
  private readonly config: ResolvedZuoraConfig;
  private readonly http: HttpClient;
  private readonly logger: Logger;

  private session?: Session;
  private pendingLogin?: Promise<HttpResponse>;

  /**
   * @param config - Credentials and settings; validated and resolved with defaults
   * @param options - Logger and transport overrides
   * @throws ValidationError if the configuration is invalid
   */
  constructor(config: ZuoraConfig, options: ZuoraClientOptions = {}) {
    this.config = new ConfigLoader().resolve(config);
    this.logger =
      options.logger ??
      createLogger({ level: this.config.logLevel, filePath: this.config.auditLogPath });
    this.http = new HttpClient(this.config, { logger: this.logger, adapter: options.adapter });
  }

  /**
   * Client for a username and password, against the sandbox unless told otherwise
   */
  static create(
    username: string,
    password: string,
    sandbox: boolean = true,
    options?: ZuoraClientOptions
  ): ZuoraClient {
    return new ZuoraClient({ username, password, sandbox }, options);
  }

  /**
   * Client configured from ZUORA_* environment variables
   *
   * @param overrides - Settings that win over the environment
   */
  static fromEnvironment(
    overrides: Partial<ZuoraConfig> = {},
    options?: ZuoraClientOptions
  ): ZuoraClient {
    const loader = new ConfigLoader();
    const merged = loader.merge(loader.fromEnvironment(), overrides);
    const resolved = loader.resolve(merged);
    return new ZuoraClient(resolved, options);
  }

  get sessionToken(): string | undefined {
    return this.session?.token;
  }

  public getSession(): Session | undefined {
    return this.session;
  }

  public isAuthenticated(): boolean {
    return this.hasToken(this.session);
  }

  public clearSession(): void {
    this.session = undefined;
  }

  public getConfig(): Readonly<ResolvedZuoraConfig> {
    return this.config;
  }

  /**
   * Transport, for interceptors and audit callbacks
   */
  public getHttpClient(): HttpClient {
    return this.http;
  }

  /**
   * Log in and store the session token
   *
   * @returns The raw login response
   * @throws ConnectionError when the request cannot be completed
   * @throws ErrorResponse when the API answers with a status other than 200
   */
  public authenticate(): Promise<HttpResponse> {
    if (!this.pendingLogin) {
      this.pendingLogin = this.login().finally(() => {
        this.pendingLogin = undefined;
      });
    }
    return this.pendingLogin;
  }

  private async login(): Promise<HttpResponse> {
    let response: HttpResponse;
    try {
      response = await this.http.post(this.loginRequestXml());
    } catch (error) {
      const failure = new ConnectionError(error instanceof Error ? error : new Error(String(error)));
      this.logger.warn(`Login failed: ${failure.getDescription()}`, { error: failure.toJSON() });
      throw failure;
    }

    if (response.status !== 200) {
      const rejected = new ErrorResponse(response.status, undefined, {
        requestId: response.requestId,
      });
      this.logger.warn(`Login rejected: ${rejected.getDescription()}`, {
        requestId: response.requestId,
      });
      throw rejected;
    }

    const token = extractSessionToken(response.data);
    this.session = { token, authenticatedAt: new Date() };

    if (token === '') {
      this.logger.warn('Login response did not contain a session token', {
        requestId: response.requestId,
      });
    } else {
      this.logger.info(`Authenticated as ${this.config.username}`, {
        requestId: response.requestId,
      });
    }

    return response;
  }

  private loginRequestXml(): string {
    return buildEnvelope({ body: loginBody(this.config.username, this.config.password) });
  }

  /**
   * Create envelope for a registered zObject type. No network call.
   *
   * Only fields registered for `type` are written, in registration order;
   * other keys in `data` are ignored.
   *
   * @param session - Session to use instead of the stored one
   * @throws PreconditionError without a session token, for an unknown type,
   * or for a value with no XML form
   */
  public createObjectXml(type: string, data: ZObjectData = {}, session?: Session): string {
    const header = this.authenticatedHeader(session ?? this.session);

    const fields = getZObjectFields(type);
    if (!fields) {
      throw PreconditionError.unknownObjectType(type);
    }

    const serialized = serializeFields(fields, data, {
      omitFalsyFields: this.config.omitFalsyFields,
    });

    return buildEnvelope({ header, body: createBody(type, serialized) });
  }

  /**
   * Send a create request for a registered zObject type
   *
   * @returns The raw response, whatever its status
   */
  public async createObject(
    type: string,
    data: ZObjectData = {},
    session?: Session
  ): Promise<HttpResponse> {
    const xml = this.createObjectXml(type, data, session);
    const response = await this.http.post(xml);
    this.logger.debug(`create ${type} -> HTTP ${response.status}`, {
      requestId: response.requestId,
    });
    return response;
  }

  public createRefundXml(data: RefundRequest = {}, session?: Session): string {
    return this.createObjectXml('Refund', data, session);
  }

  public createRefund(data: RefundRequest = {}, session?: Session): Promise<HttpResponse> {
    return this.createObject('Refund', data, session);
  }

  public createBillRunXml(data: BillRunRequest = {}, session?: Session): string {
    return this.createObjectXml('BillRun', data, session);
  }

  public createBillRun(data: BillRunRequest = {}, session?: Session): Promise<HttpResponse> {
    return this.createObject('BillRun', data, session);
  }

  private hasToken(session: Session | undefined): session is Session {
    return session !== undefined && session.token.trim() !== '';
  }

  private authenticatedHeader(session: Session | undefined): XmlNode {
    if (!this.hasToken(session)) {
      throw PreconditionError.sessionNotSet();
    }
    return sessionHeader(session.token);
  }
}
