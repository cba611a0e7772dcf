/**
 * `Create Personal Project` and `Update Personal Project`.
 */

import { NO_GUID_RETURNED } from '@egeria-sdk/client';
import {
  ERROR,
  INFO,
  PRE_COMMAND,
  extractAttribute,
  extractCommandPlus,
  isValidIsoDate,
  updateACommand,
} from '../extraction.js';
import { processElementIdentifiers } from '../identifiers.js';
import type { CommandResult, Directive, MarkdownContext } from '../MarkdownContext.js';
import { markdownOf, opt, show } from './common.js';

const NAME_LABELS = ['Project Name'] as const;

export async function processPersonalProjectUpsertCommand(
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

  const projectName = extractAttribute(txt, NAME_LABELS);
  const description = extractAttribute(txt, ['Description']);
  const identifier = extractAttribute(txt, ['Project Identifier']);
  const projectStatus = extractAttribute(txt, ['Project Status']);
  const projectPhase = extractAttribute(txt, ['Project Phase']);
  const projectHealth = extractAttribute(txt, ['Project Health']);
  const startDate = extractAttribute(txt, ['Start Date']);
  const plannedEndDate = extractAttribute(txt, ['Planned End Date']);
  context.report(`${PRE_COMMAND} \`'${command}'\` for project: \`${show(projectName)}\` with directive: \`${directive}\``);

  const preview =
    `\n* Command: ${command}\n\t* Project: ${show(projectName)}\n\t` +
    `* Status: ${show(projectStatus)}\n\t* Description: ${show(description)}\n\t` +
    `* Phase: ${show(projectPhase)}\n\t* Health: ${show(projectHealth)}\n\t` +
    `* Start Date: ${show(startDate)}\n\t* Planned End Date: ${show(plannedEndDate)}\n`;

  if (directive === 'display') {
    context.report(preview);
    return null;
  }

  const ids = await processElementIdentifiers(
    context,
    'Project',
    NAME_LABELS,
    txt,
    action,
    undefined,
    'PersonalProject'
  );
  let valid = ids.valid;
  const messages = [...ids.messages];

  const optional: Array<[string, string | null]> = [
    ['Project Status', projectStatus],
    ['Description', description],
    ['Project Identifier', identifier],
    ['Project Phase', projectPhase],
    ['Project Health', projectHealth],
  ];
  for (const [label, value] of optional) {
    if (value === null) {
      messages.push(`* ${INFO}No ${label} found\n`);
    }
  }
  for (const [label, value] of [
    ['Start Date', startDate],
    ['Planned End Date', plannedEndDate],
  ] as const) {
    if (value === null) {
      messages.push(`* ${INFO}No ${label} found\n`);
    } else if (!isValidIsoDate(value)) {
      messages.push(`* ${ERROR}${label} is not a valid ISO date of form YYYY-MM-DD\n`);
      valid = false;
    }
  }

  if (action === 'Update') {
    messages.push(valid ? `${preview}* -->Project ${show(projectName)} exists and can be updated\n` : '* --> validation failed\n');
  } else if (valid && !ids.exists) {
    messages.push(`\n-->It is valid to create Project '${show(projectName)}' with:\n${preview}`);
  }
  context.report(messages.join(''), valid ? 'INFO' : 'ERROR');

  if (directive === 'validate') {
    return valid;
  }
  if (action === 'Create' && ids.exists) {
    context.report(`Project ${show(projectName)} already exists and update document created`);
    return updateACommand(txt, action, objectType, ids.qName, ids.guid);
  }
  if (!valid || projectName === null) {
    return null;
  }

  const properties = {
    identifier: opt(identifier),
    description: opt(description),
    projectStatus: opt(projectStatus),
    projectPhase: opt(projectPhase),
    projectHealth: opt(projectHealth),
    startDate: opt(startDate),
    plannedEndDate: opt(plannedEndDate),
  };

  if (action === 'Update') {
    if (ids.guid === null) {
      return null;
    }
    await client.projects.updateProject(ids.guid, {
      mergeUpdate: true,
      properties: { class: 'ProjectProperties', qualifiedName: opt(ids.qName), name: projectName, ...properties },
    });
    dictionary.update(ids.qName, { guid: ids.guid, displayName: projectName, typeName: 'Project' });
    context.report(`\n-->Updated Project ${projectName} with GUID ${ids.guid}`);
    return markdownOf(await client.projects.getProjectByGuid(ids.guid, { outputFormat: 'MD' }));
  }

  const guid = await client.projects.createPersonalProject({
    displayName: projectName,
    qualifiedName: opt(ids.qName),
    ...properties,
  });
  if (guid === NO_GUID_RETURNED) {
    context.report(`${ERROR}Project ${projectName} was not created`, 'ERROR');
    return null;
  }
  dictionary.update(ids.qName, { guid, displayName: projectName, typeName: 'Project' });
  return markdownOf(await client.projects.getProjectByGuid(guid, { outputFormat: 'MD' }));
}
