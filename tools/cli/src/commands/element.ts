/**
 * `get-element`: any metadata element by GUID.
 */

import type { Command } from 'commander';
import { NO_ELEMENTS_FOUND, extractElementProperties } from '@egeria-sdk/client';
import { renderResult } from '../render.js';
import { type CliRuntime, runAction } from '../runtime.js';

export function registerElementCommands(program: Command, runtime: CliRuntime): void {
  program
    .command('get-element <guid>')
    .description('Show a metadata element by its GUID')
    .action(async (guid: string, _options: unknown, command: Command) => {
      await runAction(runtime, command, async (client, settings) => {
        const element = await client.elements.getElementByGuid(guid);
        if (element === NO_ELEMENTS_FOUND) {
          return element;
        }
        // TABLE shows the summary properties; other formats the element itself.
        const result = settings.outputFormat === 'TABLE' ? [extractElementProperties(element)] : element;
        return renderResult(result, settings.outputFormat, settings.width);
      });
    });
}
