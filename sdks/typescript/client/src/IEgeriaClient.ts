/**
 * Interface for the Egeria REST client.
 * Provides a mockable interface for testing.
 */

/**
 * Who issued the bearer token in use.
 */
export enum TokenSource {
  /** Created by the platform's token endpoint from a user id and password */
  Egeria = 'Egeria',
  /** Supplied by the caller; cannot be refreshed by the client */
  External = 'External',
}

/**
 * Request methods understood by makeRequest.
 * POST-DATA sends its payload as a JSON body regardless of type.
 */
export type HttpMethod = 'GET' | 'POST' | 'POST-DATA' | 'DELETE';

/**
 * Body or query parameters of a request.
 */
export type RequestPayload = string | Record<string, unknown>;

/**
 * Per-request options.
 */
export interface RequestOptions {
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Whether the response body must be JSON (default true) */
  isJson?: boolean;
  /** Public method that issued the request, reported in exceptions */
  caller?: string;
}

/**
 * A successful response from the platform.
 */
export interface EgeriaResponse {
  /** HTTP status (200 or 201) */
  status: number;
  /** Parsed JSON body, or the raw text when isJson was false */
  body: unknown;
  /** Raw response text */
  text: string;
}

/**
 * Connection settings shared by every client.
 */
export interface ClientOptions {
  /** View server to route requests through */
  viewServer: string;
  /** Base URL of the platform, e.g. https://localhost:9443 */
  platformUrl: string;
  userId?: string;
  userPassword?: string;
  /** Existing bearer token */
  token?: string;
  /** Source of `token`; External when omitted */
  tokenSource?: TokenSource;
  /** API key sent as X-Api-Key; defaults to the API_KEY environment variable */
  apiKey?: string;
  /** Default page size for queries; 0 lets the platform decide */
  pageSize?: number;
  /** Default request timeout in milliseconds */
  timeoutMs?: number;
  /** Prefix for generated qualified names; defaults to EGERIA_LOCAL_QUALIFIER */
  localQualifier?: string;
}

/**
 * Interface for the Egeria REST client.
 */
export interface IEgeriaClient {
  /**
   * Platform base URL, without a trailing slash.
   */
  readonly platformUrl: string;

  /**
   * View server requests are routed through.
   */
  readonly viewServer: string;

  /**
   * User the client acts for.
   */
  readonly userId: string | undefined;

  /**
   * Source of the current token.
   */
  readonly tokenSource: TokenSource | undefined;

  /**
   * Creates a bearer token from the platform's token endpoint and uses it for
   * every following request.
   */
  createEgeriaBearerToken(userId?: string, password?: string): Promise<string>;

  /**
   * Creates a fresh token when the current one was issued by the platform.
   */
  refreshEgeriaBearerToken(): Promise<string>;

  /**
   * Uses a token obtained elsewhere.
   */
  setBearerToken(token: string): void;

  /**
   * Gets the Authorization header value in use.
   */
  getToken(): string | undefined;

  /**
   * Sends one request and translates any failure into an EgeriaException.
   */
  makeRequest(
    method: HttpMethod,
    endpoint: string,
    payload?: RequestPayload,
    options?: RequestOptions
  ): Promise<EgeriaResponse>;

  /**
   * Ends the session.
   */
  close(): void;
}
