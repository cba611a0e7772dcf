/**
 * `List ...` commands: run a query and put its output in the document.
 */

import { type OutputFormat, type QueryResult, isNotFound } from '@egeria-sdk/client';
import { ERROR, INFO, PRE_COMMAND, extractAttribute, extractCommand } from '../extraction.js';
import type { CommandResult, Directive, MarkdownContext } from '../MarkdownContext.js';
import { resolveGlossary } from './common.js';

/** Output formats a listing can be written in. */
export const LIST_OUTPUT_FORMATS: readonly OutputFormat[] = ['LIST', 'MD', 'FORM', 'REPORT', 'DICT', 'JSON'];

export const LIST_COMMANDS = [
  'List Glossaries',
  'List Terms',
  'List Glossary Terms',
  'List Categories',
  'List Projects',
  'List Blueprints',
] as const;

export type ListCommand = (typeof LIST_COMMANDS)[number];

function isListCommand(command: string): command is ListCommand {
  return LIST_COMMANDS.some((listCommand) => listCommand === command);
}

function listFormat(value: string): OutputFormat | undefined {
  return LIST_OUTPUT_FORMATS.find((format) => format === value);
}

/**
 * Text of a query result for the output document.
 */
export function listingText(command: string, result: QueryResult): string {
  if (isNotFound(result)) {
    return `# ${command}\n\n${INFO}${result}\n`;
  }
  if (typeof result === 'string') {
    return result;
  }
  return `# ${command}\n\n\`\`\`json\n${JSON.stringify(result, null, 2)}\n\`\`\`\n`;
}

export async function processListCommand(
  context: MarkdownContext,
  txt: string,
  directive: Directive
): Promise<CommandResult> {
  const command = extractCommand(txt);
  if (command === null || !isListCommand(command)) {
    return null;
  }
  const { client } = context;

  const searchString = extractAttribute(txt, ['Search String']) ?? '*';
  const formatText = (extractAttribute(txt, ['Output Format']) ?? 'LIST').toUpperCase();
  const glossaryName = extractAttribute(txt, ['Glossary Name']);
  context.report(`${PRE_COMMAND} \`${command}\` with search string: \`${searchString}\` with directive: \`${directive}\``);

  if (directive === 'display') {
    context.report(
      `\n* Command: ${command}\n\t* Search String: ${searchString}\n\t* Output Format: ${formatText}\n` +
        (glossaryName === null ? '' : `\t* Glossary Name: ${glossaryName}\n`)
    );
    return null;
  }

  const outputFormat = listFormat(formatText);
  if (outputFormat === undefined) {
    context.report(`* ${ERROR}Invalid output format \`${formatText}\`; use one of ${LIST_OUTPUT_FORMATS.join(', ')}\n`, 'ERROR');
    return directive === 'validate' ? false : null;
  }
  if (directive === 'validate') {
    return true;
  }

  let result: QueryResult;
  switch (command) {
    case 'List Glossaries':
      result = await client.glossary.findGlossaries(searchString, { outputFormat });
      break;
    case 'List Terms':
    case 'List Glossary Terms': {
      let glossaryGuid: string | undefined;
      if (glossaryName !== null) {
        const messages: string[] = [];
        const guid = await resolveGlossary(context, glossaryName, messages);
        if (guid === null) {
          context.report(messages.join(''), 'ERROR');
          return null;
        }
        glossaryGuid = guid;
      }
      result = await client.glossary.findGlossaryTerms(searchString, { glossaryGuid, outputFormat });
      break;
    }
    case 'List Categories':
      result = await client.glossary.findGlossaryCategories(searchString, { outputFormat });
      break;
    case 'List Projects':
      result = await client.projects.findProjects(searchString, { outputFormat });
      break;
    case 'List Blueprints':
      result = await client.solutions.findSolutionBlueprints(searchString, { outputFormat });
      break;
    default:
      return null;
  }
  return listingText(command, result);
}
