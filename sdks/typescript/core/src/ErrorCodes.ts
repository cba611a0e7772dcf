/**
 * Error codes reported by the SDK when a call to the Egeria platform fails.
 * Each entry pairs the HTTP status it corresponds to with the message template
 * and the remediation text shown to the user.
 *
 * Code families:
 * - 0: Local validation (no request was sent)
 * - 400-403: Client-side problems (bad request, authorization, authentication)
 * - 404: Platform unreachable
 * - 500: Errors detected by the platform itself
 */
export const ErrorCodes = {
  /** The platform rejected the request as malformed. */
  CLIENT_ERROR: {
    httpCode: 400,
    messageId: 'CLIENT_ERROR_400',
    messageTemplate: 'Client error occurred accessing `{0}` with status code `{1}`.',
    systemAction: 'The client request could not be completed.',
    userAction: 'Check the request URL and the parameters, then retry.',
  },

  /** Parameters failed local validation. */
  VALIDATION_ERROR: {
    httpCode: 0,
    messageId: 'VALIDATION_ERROR_1',
    messageTemplate: 'Invalid parameters were provided -> `{0}`.',
    systemAction: 'The request was not sent to the platform.',
    userAction: 'Correct the parameters named in the message and retry.',
  },

  /** The user is not authorized for the request. */
  AUTHORIZATION_ERROR: {
    httpCode: 401,
    messageId: 'AUTHORIZATION_ERROR_401',
    messageTemplate: 'User not authorized received for user - `{0}`.',
    systemAction: 'The platform refused the request for this user.',
    userAction: 'Check the user id and bearer token, then retry.',
  },

  /** The user could not be authenticated. */
  AUTHENTICATION_ERROR: {
    httpCode: 403,
    messageId: 'AUTHENTICATION_ERROR_403',
    messageTemplate: 'User `{0}` is not authenticated.',
    systemAction: 'The platform could not authenticate the user.',
    userAction: 'Check the user credentials and create a new bearer token.',
  },

  /** The platform could not be reached. */
  CONNECTION_ERROR: {
    httpCode: 404,
    messageId: 'CONNECTION_ERROR_1',
    messageTemplate: 'Client failed to connect to the Egeria platform using URL `{0}`.',
    systemAction: 'The client was unable to connect to the platform.',
    userAction: 'Check that the platform is running and that the URL and view server are correct.',
  },

  /** The platform detected an error while handling the request. */
  EGERIA_ERROR: {
    httpCode: 500,
    messageId: 'SERVER_ERROR_500',
    messageTemplate: 'Egeria detected error: `{0}`.',
    systemAction: 'The platform returned an error envelope.',
    userAction: 'Review the Egeria message and user action returned by the platform.',
  },

  /** Anything that could not be classified. */
  UNKNOWN_ERROR: {
    httpCode: 500,
    messageId: 'UNKNOWN_ERROR_1',
    messageTemplate: 'An unexpected error occurred: `{0}`.',
    systemAction: 'The request ended with an unclassified failure.',
    userAction: 'Review the additional information and the platform logs.',
  },
} as const;

export type ErrorCodeName = keyof typeof ErrorCodes;

export type ErrorCode = (typeof ErrorCodes)[ErrorCodeName];

/**
 * Fills `{0}`, `{1}`, ... placeholders in a message template.
 * Placeholders without a matching parameter are left as written.
 */
export function formatMessage(template: string, params: readonly unknown[]): string {
  return template.replace(/\{(\d+)\}/g, (placeholder, index: string) => {
    const value = params[Number(index)];
    return value === undefined ? placeholder : String(value);
  });
}

/**
 * Maps an HTTP status returned by the platform to an error code name.
 */
export function errorCodeForStatus(status: number): ErrorCodeName {
  switch (status) {
    case 400:
      return 'CLIENT_ERROR';
    case 401:
      return 'AUTHORIZATION_ERROR';
    case 403:
      return 'AUTHENTICATION_ERROR';
    case 404:
      return 'CONNECTION_ERROR';
    default:
      if (status >= 500) {
        return 'EGERIA_ERROR';
      }
      if (status >= 400) {
        return 'CLIENT_ERROR';
      }
      return 'UNKNOWN_ERROR';
  }
}
