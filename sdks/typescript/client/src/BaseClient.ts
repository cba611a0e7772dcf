/**
 * Base REST client for the Egeria platform.
 * Handles the bearer-token lifecycle, request construction, and translation
 * of every failure into the SDK's exception hierarchy.
 */

import {
  ApiException,
  ClientException,
  ConnectionException,
  EgeriaJson,
  InvalidParameterException,
  NotFoundException,
  UnauthorizedException,
  UnknownException,
  createLogger,
  errorCodeForStatus,
  isEgeriaException,
  isRecord,
  type ExceptionOptions,
  type Logger,
} from '@egeria-sdk/core';
import {
  TokenSource,
  type ClientOptions,
  type EgeriaResponse,
  type HttpMethod,
  type IEgeriaClient,
  type RequestOptions,
  type RequestPayload,
} from './IEgeriaClient.js';
import { SessionState } from './SessionState.js';

/** Default request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Base REST client for the Egeria platform.
 */
export class BaseClient implements IEgeriaClient {
  readonly platformUrl: string;
  readonly viewServer: string;
  readonly pageSize: number;
  readonly timeoutMs: number;

  protected readonly session: SessionState;
  protected readonly log: Logger;

  private _userId: string | undefined;
  private userPassword: string | undefined;
  private readonly configuredTokenSource: TokenSource | undefined;

  constructor(options: ClientOptions) {
    if (!options.viewServer || options.viewServer.trim() === '') {
      throw new InvalidParameterException('viewServer must not be empty', {
        context: { className: new.target.name, callerMethod: 'constructor' },
      });
    }
    if (!isValidUrl(options.platformUrl)) {
      throw new InvalidParameterException(`platformUrl '${options.platformUrl}' is not a valid URL`, {
        context: { className: new.target.name, callerMethod: 'constructor' },
      });
    }

    this.platformUrl = options.platformUrl.replace(/\/$/, '');
    this.viewServer = options.viewServer;
    this.pageSize = options.pageSize ?? 0;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this._userId = options.userId;
    this.userPassword = options.userPassword;
    this.configuredTokenSource = options.tokenSource;
    this.session = new SessionState(options.apiKey ?? process.env.API_KEY);
    this.log = createLogger(new.target.name);

    if (options.token !== undefined) {
      this.session.setToken(options.token, options.tokenSource ?? TokenSource.External);
    }
  }

  /**
   * User the client acts for.
   */
  get userId(): string | undefined {
    return this._userId;
  }

  /**
   * Source of the current token.
   */
  get tokenSource(): TokenSource | undefined {
    return this.session.tokenSource;
  }

  /**
   * Request tracking for this client's session.
   */
  get sessionState(): SessionState {
    return this.session;
  }

  /**
   * Creates a bearer token using the platform's token endpoint.
   * The arguments default to the credentials given at construction.
   */
  async createEgeriaBearerToken(userId?: string, password?: string): Promise<string> {
    const user = userId ?? this._userId;
    const pwd = password ?? this.userPassword;
    if (!user || !pwd) {
      throw new InvalidParameterException('a user id and password are required to create a bearer token', {
        context: this.context('createEgeriaBearerToken'),
      });
    }

    const url = `${this.platformUrl}/api/token`;
    const response = await this.makeRequest(
      'POST-DATA',
      url,
      { userId: user, password: pwd },
      { isJson: false, caller: 'createEgeriaBearerToken' }
    );

    const token = response.text.trim();
    if (token === '') {
      throw new InvalidParameterException('the platform returned an empty bearer token', {
        context: this.context('createEgeriaBearerToken'),
        additionalInfo: { endpoint: url, userId: user },
      });
    }

    this._userId = user;
    this.userPassword = pwd;
    this.session.setToken(token, TokenSource.Egeria);
    this.log.debug('Created bearer token', { userId: user });
    return token;
  }

  /**
   * Refreshes a token that was created by createEgeriaBearerToken.
   */
  async refreshEgeriaBearerToken(): Promise<string> {
    if (this.session.tokenSource === TokenSource.Egeria && this._userId && this.userPassword) {
      return this.createEgeriaBearerToken();
    }
    throw new InvalidParameterException('Invalid token source', {
      context: this.context('refreshEgeriaBearerToken'),
      additionalInfo: { tokenSource: this.session.tokenSource ?? null },
    });
  }

  /**
   * Uses a token obtained elsewhere.
   */
  setBearerToken(token: string): void {
    this.session.setToken(token, this.configuredTokenSource ?? TokenSource.Egeria);
  }

  /**
   * Gets the Authorization header value in use.
   */
  getToken(): string | undefined {
    return this.session.getAuthorizationHeader();
  }

  /**
   * Ends the session.
   */
  close(): void {
    this.session.clearToken();
  }

  /**
   * Sends one request to the platform.
   *
   * GET sends the payload as query parameters. POST sends a string payload as
   * text and an object payload as JSON. POST-DATA and DELETE send their
   * payload as JSON.
   */
  async makeRequest(
    method: HttpMethod,
    endpoint: string,
    payload?: RequestPayload,
    options: RequestOptions = {}
  ): Promise<EgeriaResponse> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const isJson = options.isJson ?? true;
    const { url, init } = this.buildRequest(method, endpoint, payload);

    this.session.recordRequest(method, endpoint, new Date());
    this.log.debug('Sending request', { method, endpoint });

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
      text = await response.text();
    } catch (error) {
      throw this.fail(this.translateFetchError(error, endpoint, timeoutMs, options.caller));
    }

    if (!response.ok) {
      throw this.fail(this.translateStatusError(response.status, text, endpoint, options.caller));
    }

    if (!isJson) {
      return { status: response.status, body: text, text };
    }

    const body = EgeriaJson.deserialize(text);
    if (body === null) {
      throw this.fail(
        new InvalidParameterException(`response from ${endpoint} was not valid JSON`, {
          context: this.context(options.caller),
          additionalInfo: { endpoint, status: response.status },
        })
      );
    }

    if (isRecord(body) && typeof body['relatedHTTPCode'] === 'number' && body['relatedHTTPCode'] !== 200) {
      throw this.fail(
        ApiException.fromResponseBody(body, {
          context: this.context(options.caller),
          additionalInfo: { endpoint, userId: this._userId },
        })
      );
    }

    return { status: response.status, body, text };
  }

  /**
   * Exception context for a method of this client.
   */
  protected context(callerMethod?: string): ExceptionOptions['context'] {
    return { className: this.constructor.name, callerMethod };
  }

  private buildRequest(
    method: HttpMethod,
    endpoint: string,
    payload: RequestPayload | undefined
  ): { url: string; init: RequestInit } {
    switch (method) {
      case 'GET': {
        const url = new URL(endpoint);
        if (isRecord(payload)) {
          for (const [key, value] of Object.entries(payload)) {
            if (value !== undefined && value !== null) {
              url.searchParams.append(key, String(value));
            }
          }
        }
        return { url: url.toString(), init: { method: 'GET', headers: this.session.getJsonHeaders() } };
      }
      case 'POST':
        if (typeof payload === 'string') {
          return {
            url: endpoint,
            init: { method: 'POST', headers: this.session.getTextHeaders(), body: payload },
          };
        }
        return {
          url: endpoint,
          init: {
            method: 'POST',
            headers: this.session.getJsonHeaders(),
            body: payload === undefined ? undefined : EgeriaJson.serialize(payload),
          },
        };
      case 'POST-DATA':
        return {
          url: endpoint,
          init: {
            method: 'POST',
            headers: this.session.getJsonHeaders(),
            body: payload === undefined ? undefined : EgeriaJson.serialize(payload),
          },
        };
      case 'DELETE':
        return {
          url: endpoint,
          init: {
            method: 'DELETE',
            headers: this.session.getJsonHeaders(),
            body: payload === undefined ? undefined : EgeriaJson.serialize(payload),
          },
        };
    }
  }

  private translateFetchError(error: unknown, endpoint: string, timeoutMs: number, caller?: string): Error {
    if (isEgeriaException(error)) {
      return error;
    }
    const context = this.context(caller);
    if (error instanceof TypeError || isAbortError(error)) {
      return new ConnectionException(endpoint, { cause: error, context, additionalInfo: { timeoutMs } });
    }
    return new UnknownException(error instanceof Error ? error.message : String(error), {
      cause: error,
      context,
      additionalInfo: { endpoint },
    });
  }

  private translateStatusError(status: number, text: string, endpoint: string, caller?: string): Error {
    const context = this.context(caller);
    const body = EgeriaJson.deserialize(text);
    if (isRecord(body) && typeof body['relatedHTTPCode'] === 'number') {
      return ApiException.fromResponseBody(body, {
        context,
        additionalInfo: { endpoint, userId: this._userId, status },
      });
    }
    const code = errorCodeForStatus(status);
    if (code === 'AUTHORIZATION_ERROR' || code === 'AUTHENTICATION_ERROR') {
      return new UnauthorizedException(
        this._userId ?? 'unknown',
        { context, httpCode: status, additionalInfo: { endpoint, status } },
        code
      );
    }
    if (code === 'CONNECTION_ERROR') {
      return new NotFoundException(endpoint, { context, additionalInfo: { userId: this._userId } });
    }
    return new ClientException(endpoint, status, { context, additionalInfo: { userId: this._userId } });
  }

  private fail(error: Error): Error {
    this.log.warn(error.message, { exception: error.name });
    return error;
  }
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
