/**
 * Exception hierarchy raised by the SDK. Every failure of a platform call is
 * translated into exactly one of these classes by the base client.
 */

import { ErrorCodes, formatMessage, type ErrorCodeName } from './ErrorCodes.js';

/**
 * Where an exception was raised.
 */
export interface ExceptionContext {
  /** Class that raised the exception. */
  className: string;

  /** Public method the caller invoked, when known. */
  callerMethod?: string;
}

/**
 * Options shared by all exception constructors.
 */
export interface ExceptionOptions {
  context?: Partial<ExceptionContext>;
  additionalInfo?: Record<string, unknown>;
  cause?: unknown;
  /** Overrides the HTTP code of the error code entry (e.g. the actual status returned). */
  httpCode?: number;
}

/**
 * Error envelope returned by the platform when it detects a problem.
 */
export interface PlatformError {
  relatedHTTPCode?: number;
  exceptionClassName?: string;
  exceptionErrorMessage?: string;
  exceptionErrorMessageId?: string;
  exceptionSystemAction?: string;
  exceptionUserAction?: string;
}

/**
 * Base class of every SDK exception.
 */
export class EgeriaException extends Error {
  /** Catalog entry describing the failure. */
  readonly errorCode: ErrorCodeName;

  /** HTTP status equivalent. 0 for local validation failures. */
  readonly httpCode: number;

  /** Message ID from the error catalog. */
  readonly messageId: string;

  readonly systemAction: string;

  readonly userAction: string;

  readonly context: ExceptionContext;

  /** Request details captured when the error was raised (endpoint, user, status...). */
  readonly additionalInfo: Readonly<Record<string, unknown>>;

  constructor(errorCode: ErrorCodeName, params: readonly unknown[], options: ExceptionOptions = {}) {
    const entry = ErrorCodes[errorCode];
    super(formatMessage(entry.messageTemplate, params), { cause: options.cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.httpCode = options.httpCode ?? entry.httpCode;
    this.messageId = entry.messageId;
    this.systemAction = entry.systemAction;
    this.userAction = entry.userAction;
    this.context = {
      className: options.context?.className ?? new.target.name,
      callerMethod: options.context?.callerMethod,
    };
    this.additionalInfo = { ...options.additionalInfo };
  }
}

/**
 * The platform could not be reached, or the request timed out.
 */
export class ConnectionException extends EgeriaException {
  constructor(endpoint: string, options: ExceptionOptions = {}) {
    super('CONNECTION_ERROR', [endpoint], {
      ...options,
      additionalInfo: { endpoint, errorKind: 'connection', ...options.additionalInfo },
    });
  }
}

/**
 * Parameters failed validation, or a response could not be interpreted.
 */
export class InvalidParameterException extends EgeriaException {
  constructor(detail: string, options: ExceptionOptions = {}) {
    super('VALIDATION_ERROR', [detail], options);
  }
}

/**
 * The platform answered with a 4xx status.
 */
export class ClientException extends EgeriaException {
  /** HTTP status returned by the platform. */
  readonly status: number;

  constructor(endpoint: string, status: number, options: ExceptionOptions = {}) {
    super('CLIENT_ERROR', [endpoint, status], {
      ...options,
      httpCode: status,
      additionalInfo: { endpoint, status, ...options.additionalInfo },
    });
    this.status = status;
  }
}

/**
 * The platform refused the request for the current user (401), or could not
 * authenticate them (403).
 */
export class UnauthorizedException extends EgeriaException {
  constructor(
    userId: string,
    options: ExceptionOptions = {},
    errorCode: 'AUTHORIZATION_ERROR' | 'AUTHENTICATION_ERROR' = 'AUTHORIZATION_ERROR'
  ) {
    super(errorCode, [userId], {
      ...options,
      additionalInfo: { userId, ...options.additionalInfo },
    });
  }
}

/**
 * The requested URL does not exist on the platform.
 */
export class NotFoundException extends EgeriaException {
  constructor(endpoint: string, options: ExceptionOptions = {}) {
    super('CLIENT_ERROR', [endpoint, 404], {
      ...options,
      httpCode: 404,
      additionalInfo: { endpoint, status: 404, ...options.additionalInfo },
    });
  }
}

/**
 * The platform returned its error envelope.
 */
export class ApiException extends EgeriaException {
  /** The platform's error envelope. */
  readonly platformError: PlatformError;

  constructor(platformError: PlatformError, options: ExceptionOptions = {}) {
    super('EGERIA_ERROR', [platformError.exceptionErrorMessage ?? 'no message returned'], {
      ...options,
      httpCode: platformError.relatedHTTPCode ?? ErrorCodes.EGERIA_ERROR.httpCode,
    });
    this.platformError = platformError;
  }

  /**
   * Builds an ApiException from a parsed response body, reading only the
   * envelope fields that carry the expected types.
   */
  static fromResponseBody(body: unknown, options: ExceptionOptions = {}): ApiException {
    const record = isRecord(body) ? body : {};
    return new ApiException(
      {
        relatedHTTPCode: numberField(record, 'relatedHTTPCode'),
        exceptionClassName: stringField(record, 'exceptionClassName'),
        exceptionErrorMessage: stringField(record, 'exceptionErrorMessage'),
        exceptionErrorMessageId: stringField(record, 'exceptionErrorMessageId'),
        exceptionSystemAction: stringField(record, 'exceptionSystemAction'),
        exceptionUserAction: stringField(record, 'exceptionUserAction'),
      },
      options
    );
  }
}

/**
 * Any failure that does not fit another class.
 */
export class UnknownException extends EgeriaException {
  constructor(detail: string, options: ExceptionOptions = {}) {
    super('UNKNOWN_ERROR', [detail], options);
  }
}

/**
 * Type guard for SDK exceptions.
 */
export function isEgeriaException(value: unknown): value is EgeriaException {
  return value instanceof EgeriaException;
}

/**
 * Rows used to print an exception as a two-column table.
 */
export function describeException(error: EgeriaException): Array<[string, string]> {
  const platform = error instanceof ApiException ? error.platformError : undefined;
  const endpoint = error.additionalInfo['endpoint'];
  return [
    ['Exception', error.name],
    ['HTTP Code', String(error.httpCode)],
    ['Egeria Code', platform?.exceptionErrorMessageId ?? error.messageId],
    ['Caller Method', error.context.callerMethod ?? '---'],
    ['Request URL', typeof endpoint === 'string' ? endpoint : '---'],
    ['Egeria Message', platform?.exceptionErrorMessage ?? error.message],
    ['Egeria User Action', platform?.exceptionUserAction ?? error.userAction],
  ];
}

/**
 * Checks that a value is a plain JSON object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function numberField(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' ? value : undefined;
}
