/**
 * The `egeria` command-line program.
 */

import { Command } from 'commander';
import { SDK_VERSION } from '@egeria-sdk/core';
import { registerDrEgeriaCommand } from './commands/drEgeria.js';
import { registerElementCommands } from './commands/element.js';
import { registerListCommands } from './commands/list.js';
import { type CliRuntime, defaultRuntime } from './runtime.js';

/**
 * Builds the program. Settings left off the command line come from the
 * EGERIA_* environment variables.
 */
export function buildProgram(runtime: CliRuntime = defaultRuntime): Command {
  const program = new Command();
  program
    .name('egeria')
    .description('Query an Egeria view server and run Egeria Markdown files')
    .version(SDK_VERSION)
    .option('--server <name>', 'view server to use (EGERIA_VIEW_SERVER)')
    .option('--url <url>', 'URL of the view server platform (EGERIA_VIEW_SERVER_URL)')
    .option('--userid <user>', 'user to sign in as (EGERIA_USER)')
    .option('--password <password>', 'password of the user (EGERIA_USER_PASSWORD)')
    .option('--width <columns>', 'width of table output (EGERIA_WIDTH)')
    .option('--output-format <format>', 'TABLE, JSON, DICT, LIST, MD, FORM or REPORT', 'TABLE');

  registerListCommands(program, runtime);
  registerElementCommands(program, runtime);
  registerDrEgeriaCommand(program, runtime);
  return program;
}
