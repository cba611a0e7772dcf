import { type EgeriaException, describeException, isEgeriaException } from './EgeriaException.js';

/**
 * Represents a failed call, reduced to what a caller needs to report it.
 */
export interface ErrorResponse {
  /**
   * The HTTP status code equivalent for this error.
   * 0 means the call failed local validation and nothing was sent.
   */
  responseCode: number;

  /**
   * Error name (the exception class, e.g. "ConnectionException").
   */
  errorName: string | null;

  /**
   * Detailed error message, if any.
   */
  message: string | null;

  /**
   * The URL of the request that failed, when one was sent.
   */
  endpoint: string | null;

  /**
   * Label and value rows for printing the error as a table.
   */
  details: Array<[string, string]>;
}

/**
 * Creates an ErrorResponse from any thrown value.
 */
export function createErrorResponse(error: unknown): ErrorResponse {
  if (isEgeriaException(error)) {
    return fromException(error);
  }
  const errorName = error instanceof Error ? error.name : 'UnknownError';
  const message = error instanceof Error ? error.message : String(error);
  return {
    responseCode: 500,
    errorName,
    message,
    endpoint: null,
    details: [
      ['Exception', errorName],
      ['Message', message],
    ],
  };
}

function fromException(error: EgeriaException): ErrorResponse {
  const endpoint = error.additionalInfo['endpoint'];
  return {
    responseCode: error.httpCode,
    errorName: error.name,
    message: error.message,
    endpoint: typeof endpoint === 'string' ? endpoint : null,
    details: describeException(error),
  };
}

/**
 * Represents the result of a command, containing either a success value or error details.
 * @typeParam T - The expected result type on success.
 */
export class ApiResponse<T> {
  /**
   * Whether the call was successful.
   */
  readonly isSuccess: boolean;

  /**
   * The successful result. Only valid when isSuccess is true.
   */
  readonly result?: T;

  /**
   * Error details when the call failed. Only valid when isSuccess is false.
   */
  readonly error?: ErrorResponse;

  private constructor(isSuccess: boolean, result?: T, error?: ErrorResponse) {
    this.isSuccess = isSuccess;
    this.result = result;
    this.error = error;
  }

  /**
   * Creates a successful response.
   */
  static success<T>(result: T): ApiResponse<T> {
    return new ApiResponse<T>(true, result, undefined);
  }

  /**
   * Creates a successful response with no result.
   */
  static successEmpty<T>(): ApiResponse<T> {
    return new ApiResponse<T>(true, undefined, undefined);
  }

  /**
   * Creates an error response.
   */
  static failure<T>(error: ErrorResponse): ApiResponse<T> {
    return new ApiResponse<T>(false, undefined, error);
  }

  /**
   * Runs an async operation and captures its outcome.
   */
  static async capture<T>(operation: () => Promise<T>): Promise<ApiResponse<T>> {
    try {
      return ApiResponse.success(await operation());
    } catch (error) {
      return ApiResponse.failure<T>(createErrorResponse(error));
    }
  }

  /**
   * Gets the result if successful, or throws an Error with error details.
   * For empty success responses, returns undefined.
   * @throws Error when the response is an error.
   */
  getResultOrThrow(): T | undefined {
    if (this.isSuccess) {
      return this.result;
    }

    const error = this.error;
    throw new Error(
      `${error?.errorName ?? 'Error'}: ${error?.message ?? 'Request failed'} ` +
        `(code: ${error?.responseCode ?? -1})`
    );
  }
}
