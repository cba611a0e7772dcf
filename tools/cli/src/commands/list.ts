/**
 * `list-*` commands.
 */

import type { Command } from 'commander';
import { InvalidParameterException } from '@egeria-sdk/core';
import {
  type EgeriaTech,
  type FindOptions,
  type QueryResult,
  elementGuid,
  toElementList,
} from '@egeria-sdk/client';
import { renderResult, requestFormat } from '../render.js';
import { type CliRuntime, runAction } from '../runtime.js';

type Query = (client: EgeriaTech, search: string, options: FindOptions) => Promise<QueryResult>;

interface ListCommand {
  name: string;
  description: string;
  query: Query;
}

const LIST_COMMANDS: readonly ListCommand[] = [
  {
    name: 'list-glossaries',
    description: 'List glossaries matching a search string',
    query: (client, search, options) => client.glossary.findGlossaries(search, options),
  },
  {
    name: 'list-categories',
    description: 'List glossary categories matching a search string',
    query: (client, search, options) => client.glossary.findGlossaryCategories(search, options),
  },
  {
    name: 'list-projects',
    description: 'List projects matching a search string',
    query: (client, search, options) => client.projects.findProjects(search, options),
  },
  {
    name: 'list-blueprints',
    description: 'List solution blueprints matching a search string',
    query: (client, search, options) => client.solutions.findSolutionBlueprints(search, options),
  },
  {
    name: 'list-locations',
    description: 'List locations matching a search string',
    query: (client, search, options) => client.locations.findLocations(search, options),
  },
  {
    name: 'list-collections',
    description: 'List collections matching a search string',
    query: (client, search, options) => client.collections.findCollections(search, options),
  },
];

/**
 * GUID of the only glossary with a name.
 * @throws InvalidParameterException when no glossary or more than one has it
 */
export async function glossaryGuidForName(client: EgeriaTech, name: string): Promise<string> {
  const glossaries = toElementList(await client.glossary.getGlossariesByName(name));
  const guid = glossaries.length === 1 ? elementGuid(glossaries[0]) : undefined;
  if (guid === undefined) {
    throw new InvalidParameterException(`expected one glossary named '${name}', found ${glossaries.length}`, {
      context: { className: 'Cli', callerMethod: 'list-terms' },
    });
  }
  return guid;
}

export function registerListCommands(program: Command, runtime: CliRuntime): void {
  for (const { name, description, query } of LIST_COMMANDS) {
    program
      .command(`${name} [search]`)
      .description(description)
      .action(async (search: string | undefined, _options: unknown, command: Command) => {
        await runAction(runtime, command, async (client, settings) => {
          const result = await query(client, search ?? '*', { outputFormat: requestFormat(settings.outputFormat) });
          return renderResult(result, settings.outputFormat, settings.width);
        });
      });
  }

  program
    .command('list-terms [search]')
    .description('List glossary terms matching a search string')
    .option('-g, --glossary <name>', 'only terms of this glossary')
    .action(async (search: string | undefined, options: { glossary?: string }, command: Command) => {
      await runAction(runtime, command, async (client, settings) => {
        const glossaryGuid =
          options.glossary === undefined ? undefined : await glossaryGuidForName(client, options.glossary);
        const result = await client.glossary.findGlossaryTerms(search ?? '*', {
          glossaryGuid,
          outputFormat: requestFormat(settings.outputFormat),
        });
        return renderResult(result, settings.outputFormat, settings.width);
      });
    });

  program
    .command('list-assets <search>')
    .description('List assets, and elements anchored to them, matching a search string')
    .action(async (search: string, _options: unknown, command: Command) => {
      await runAction(runtime, command, async (client, settings) => {
        const result = await client.assets.findAssetsInDomain(search, {
          outputFormat: requestFormat(settings.outputFormat),
        });
        return renderResult(result, settings.outputFormat, settings.width);
      });
    });
}
