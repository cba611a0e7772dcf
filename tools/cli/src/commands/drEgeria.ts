/**
 * `dr-egeria`: runs the commands of an Egeria Markdown file from the inbox.
 */

import { type Command, Option } from 'commander';
import { type Directive, DIRECTIVES, defaultElementDictionary, processMarkdownFile } from '@egeria-sdk/markdown';
import { type CliRuntime, runAction } from '../runtime.js';

export function registerDrEgeriaCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('dr-egeria <file>')
    .description('Display, validate or process the commands of a markdown file in the inbox')
    .addOption(
      new Option('-d, --directive <directive>', 'what to do with each command').choices(DIRECTIVES).default('process')
    )
    .action(async (file: string, options: { directive: Directive }, command: Command) => {
      await runAction(runtime, command, async (client, settings) => {
        const result = await processMarkdownFile(client, {
          inputFile: file,
          directive: options.directive,
          inbox: settings.inbox,
          outbox: settings.outbox,
          dictionary: defaultElementDictionary,
        });
        const summary =
          result.outputPath === undefined
            ? '\nNo updates detected. New File not created.'
            : `\n==> Output written to ${result.outputPath}`;
        return options.directive === 'process' ? summary : result.messages.join('\n');
      });
    });
}
