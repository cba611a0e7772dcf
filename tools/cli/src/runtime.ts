/**
 * What the commands need from the outside world, and the wrapper every command
 * action runs through.
 */

import type { Command } from 'commander';
import { ApiResponse, type EgeriaConfig, createLogger, loadConfig } from '@egeria-sdk/core';
import { EgeriaTech } from '@egeria-sdk/client';
import { renderError } from './render.js';
import { type CliSettings, type GlobalOptions, resolveSettings } from './settings.js';

const log = createLogger('cli');

export interface CliRuntime {
  config(): EgeriaConfig;
  /** A client for the settings, signed in */
  connect(settings: CliSettings): Promise<EgeriaTech>;
  write(text: string): void;
  setExitCode(code: number): void;
}

export const defaultRuntime: CliRuntime = {
  config: () => loadConfig(),
  async connect(settings) {
    const client = new EgeriaTech(settings.client);
    await client.createEgeriaBearerToken();
    return client;
  },
  write: (text) => {
    process.stdout.write(`${text}\n`);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

/**
 * Resolves the settings, connects, runs the action and prints what it returns.
 * A failure is printed as an exception table and sets exit code 1.
 */
export async function runAction(
  runtime: CliRuntime,
  command: Command,
  action: (client: EgeriaTech, settings: CliSettings) => Promise<string>
): Promise<void> {
  const response = await ApiResponse.capture(async () => {
    const settings = resolveSettings(command.optsWithGlobals<GlobalOptions>(), runtime.config());
    const client = await runtime.connect(settings);
    try {
      return await action(client, settings);
    } finally {
      client.close();
    }
  });

  if (!response.isSuccess && response.error !== undefined) {
    log.debug('Command failed', { command: command.name(), error: response.error.message });
    runtime.write(renderError(response.error));
    runtime.setExitCode(1);
    return;
  }
  runtime.write(response.result ?? '');
}
