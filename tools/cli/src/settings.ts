/**
 * Resolves the CLI's global options against the environment configuration.
 */

import { join } from 'node:path';
import { type EgeriaConfig, InvalidParameterException } from '@egeria-sdk/core';
import { type ClientOptions, type OutputFormat, OUTPUT_FORMATS, isOutputFormat } from '@egeria-sdk/client';

/**
 * Global options as commander parses them.
 */
export type GlobalOptions = {
  server?: string;
  url?: string;
  userid?: string;
  password?: string;
  width?: string;
  outputFormat?: string;
};

export interface CliSettings {
  client: ClientOptions;
  width: number;
  outputFormat: OutputFormat;
  inbox: string;
  outbox: string;
}

/**
 * Command-line options win over the environment.
 * @throws InvalidParameterException for an unknown output format or a bad width
 */
export function resolveSettings(options: GlobalOptions, config: EgeriaConfig): CliSettings {
  const format = (options.outputFormat ?? 'TABLE').toUpperCase();
  if (!isOutputFormat(format)) {
    throw new InvalidParameterException(`unknown output format '${options.outputFormat ?? ''}'`, {
      context: { className: 'Cli', callerMethod: 'resolveSettings' },
      additionalInfo: { formats: OUTPUT_FORMATS.join(', ') },
    });
  }

  const width = options.width === undefined ? config.width : Number(options.width);
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidParameterException(`width must be a positive integer, got '${options.width ?? ''}'`, {
      context: { className: 'Cli', callerMethod: 'resolveSettings' },
    });
  }

  return {
    client: {
      viewServer: options.server ?? config.viewServer,
      platformUrl: options.url ?? config.viewServerUrl,
      userId: options.userid ?? config.userId,
      userPassword: options.password ?? config.userPassword,
      apiKey: config.apiKey,
      pageSize: config.pageSize,
      localQualifier: config.localQualifier,
    },
    width,
    outputFormat: format,
    inbox: join(config.rootPath, config.inboxPath),
    outbox: join(config.rootPath, config.outboxPath),
  };
}
