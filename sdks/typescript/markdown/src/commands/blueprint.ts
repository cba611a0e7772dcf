/**
 * `Create Solution Blueprint` and `Update Solution Blueprint` (also written
 * `Create Blueprint` and `Update Blueprint`).
 */

import { NO_GUID_RETURNED } from '@egeria-sdk/client';
import { ERROR, INFO, PRE_COMMAND, extractAttribute, extractCommandPlus, updateACommand } from '../extraction.js';
import { processElementIdentifiers } from '../identifiers.js';
import type { CommandResult, Directive, MarkdownContext } from '../MarkdownContext.js';
import { markdownOf, opt, show } from './common.js';

const NAME_LABELS = ['Blueprint Name', 'Display Name'] as const;

export async function processBlueprintUpsertCommand(
  context: MarkdownContext,
  txt: string,
  directive: Directive
): Promise<CommandResult> {
  const parsed = extractCommandPlus(txt);
  if (parsed === null) {
    return null;
  }
  const [action, objectType] = parsed;
  const command = `${action} ${objectType}`;
  const { client, dictionary } = context;

  const displayName = extractAttribute(txt, NAME_LABELS);
  const description = extractAttribute(txt, ['Description']);
  const version = extractAttribute(txt, ['Version Identifier', 'Version']);
  context.report(`${PRE_COMMAND} \`${command}\` for blueprint: \`'${show(displayName)}'\` with directive: \`${directive}\``);

  const preview =
    `\n* Command: ${command}\n\t* Display Name: ${show(displayName)}\n\t` +
    `* Description: ${show(description)}\n\t* Version Identifier: ${show(version)}\n`;

  if (directive === 'display') {
    context.report(preview);
    return null;
  }

  const ids = await processElementIdentifiers(context, 'SolutionBlueprint', NAME_LABELS, txt, action, version);
  const messages = [...ids.messages];
  if (description === null) {
    messages.push(`* ${INFO}No Description found\n`);
  }
  if (ids.valid && !(action === 'Create' && ids.exists)) {
    messages.push(`\n-->It is valid to ${action.toLowerCase()} Solution Blueprint '${show(displayName)}' with:\n${preview}`);
  }
  context.report(messages.join(''), ids.valid ? 'INFO' : 'ERROR');

  if (directive === 'validate') {
    return ids.valid;
  }
  if (action === 'Create' && ids.exists) {
    context.report(`\nSolution Blueprint ${show(displayName)} already exists and result document updated\n`);
    return updateACommand(txt, action, objectType, ids.qName, ids.guid);
  }
  if (!ids.valid || displayName === null) {
    return null;
  }

  const properties = {
    class: 'SolutionBlueprintProperties',
    qualifiedName: opt(ids.qName),
    displayName,
    description: opt(description),
    versionIdentifier: opt(version),
  };

  if (action === 'Update') {
    if (ids.guid === null) {
      return null;
    }
    await client.solutions.updateSolutionBlueprint(ids.guid, { mergeUpdate: true, properties });
    dictionary.update(ids.qName, { guid: ids.guid, displayName, typeName: 'SolutionBlueprint' });
    context.report(`\n-->Updated Solution Blueprint ${displayName} with GUID ${ids.guid}`);
    return markdownOf(await client.solutions.getSolutionBlueprintByGuid(ids.guid, { outputFormat: 'MD' }));
  }

  const guid = await client.solutions.createSolutionBlueprint({ properties });
  if (guid === NO_GUID_RETURNED) {
    context.report(`${ERROR}Solution Blueprint ${displayName} was not created`, 'ERROR');
    return null;
  }
  dictionary.update(ids.qName, { guid, displayName, typeName: 'SolutionBlueprint' });
  return markdownOf(await client.solutions.getSolutionBlueprintByGuid(guid, { outputFormat: 'MD' }));
}
