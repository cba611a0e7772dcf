/**
 * @egeria-sdk/core
 *
 * Core types and utilities shared by the Egeria client, the markdown
 * command processor and the CLI.
 */

export { EgeriaJson, bodySlimmer, fromJson, toJson } from './EgeriaJson.js';

export { ApiResponse, type ErrorResponse, createErrorResponse } from './ApiResponse.js';

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeName,
  formatMessage,
  errorCodeForStatus,
} from './ErrorCodes.js';

export {
  EgeriaException,
  ConnectionException,
  InvalidParameterException,
  ClientException,
  UnauthorizedException,
  NotFoundException,
  ApiException,
  UnknownException,
  type ExceptionContext,
  type ExceptionOptions,
  type PlatformError,
  isEgeriaException,
  describeException,
  isRecord,
} from './EgeriaException.js';

export { type EgeriaConfig, loadConfig, loadEnvFile } from './Config.js';

export {
  Logger,
  type LoggerConfig,
  type LogLevel,
  type LogMetadata,
  logger,
  createLogger,
  getLogLevel,
} from './Logger.js';

/** SDK version reported by the CLI. */
export const SDK_VERSION = '0.1.0';
