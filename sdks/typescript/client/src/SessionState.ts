import { TokenSource, type HttpMethod } from './IEgeriaClient.js';

/**
 * Manages the per-client session: the bearer token, where it came from, the
 * request headers derived from it, and the last request sent for debugging.
 */
export class SessionState {
  /** API key sent as X-Api-Key when set */
  readonly apiKey: string | undefined;

  private _token: string | undefined;
  private _tokenSource: TokenSource | undefined;

  private lastRequest: RequestInfo | undefined;
  private requestCount = 0;

  constructor(apiKey?: string) {
    this.apiKey = apiKey;
  }

  /**
   * Current bearer token, if any.
   */
  get token(): string | undefined {
    return this._token;
  }

  /**
   * Where the current token came from.
   */
  get tokenSource(): TokenSource | undefined {
    return this._tokenSource;
  }

  /**
   * Stores a token and its source.
   */
  setToken(token: string, source: TokenSource): void {
    this._token = token;
    this._tokenSource = source;
  }

  /**
   * Forgets the token (the source is kept so a refresh can tell who issued it).
   */
  clearToken(): void {
    this._token = undefined;
  }

  /**
   * Gets the Authorization header value for the current token.
   */
  getAuthorizationHeader(): string | undefined {
    return this._token === undefined ? undefined : `Bearer ${this._token}`;
  }

  /**
   * Headers for requests with a JSON body.
   */
  getJsonHeaders(): Record<string, string> {
    return this.withCredentials({ 'Content-Type': 'application/json' });
  }

  /**
   * Headers for requests with a plain text body.
   */
  getTextHeaders(): Record<string, string> {
    return this.withCredentials({ 'Content-Type': 'text/plain' });
  }

  /**
   * Tracks a request for debugging.
   */
  recordRequest(method: HttpMethod, endpoint: string, sentAt: Date): void {
    this.lastRequest = { method, endpoint, sentAt };
    this.requestCount += 1;
  }

  /**
   * Gets the most recent request, if any.
   */
  getLastRequest(): RequestInfo | undefined {
    return this.lastRequest;
  }

  /**
   * Gets count of requests sent in this session.
   */
  getRequestCount(): number {
    return this.requestCount;
  }

  private withCredentials(headers: Record<string, string>): Record<string, string> {
    if (this.apiKey !== undefined) {
      headers['X-Api-Key'] = this.apiKey;
    }
    const authorization = this.getAuthorizationHeader();
    if (authorization !== undefined) {
      headers['Authorization'] = authorization;
    }
    return headers;
  }
}

/**
 * Information about a request that was sent.
 */
export interface RequestInfo {
  method: HttpMethod;
  endpoint: string;
  sentAt: Date;
}
