/**
 * `Create Glossary` and `Update Glossary`.
 */

import { NO_GUID_RETURNED } from '@egeria-sdk/client';
import { ERROR, INFO, PRE_COMMAND, extractAttribute, extractCommandPlus, updateACommand } from '../extraction.js';
import { processElementIdentifiers } from '../identifiers.js';
import type { CommandResult, Directive, MarkdownContext } from '../MarkdownContext.js';
import { markdownOf, opt, show } from './common.js';

const NAME_LABELS = ['Glossary Name'] as const;

export async function processGlossaryUpsertCommand(
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

  const glossaryName = extractAttribute(txt, NAME_LABELS);
  context.report(`${PRE_COMMAND} \`${command}\` for glossary: \`'${show(glossaryName)}'\` with directive: \`${directive}\``);
  const language = extractAttribute(txt, ['Language']);
  const description = extractAttribute(txt, ['Description']);
  const usage = extractAttribute(txt, ['Usage']);
  const qName = extractAttribute(txt, ['Qualified Name']);
  const guid = extractAttribute(txt, ['GUID', 'guid', 'Guid']);

  let preview =
    `\n* Command: ${command}\n\t* Glossary Name: ${show(glossaryName)}\n\t` +
    `* Language: ${show(language)}\n\t* Description:\n${show(description)}\n` +
    `* Usage: ${show(usage)}\n`;
  if (action === 'Update') {
    preview += `* Qualified Name: ${show(qName)}\n\t* GUID: ${show(guid)}\n\n`;
  }

  if (directive === 'display') {
    context.report(preview);
    return null;
  }

  const ids = await processElementIdentifiers(context, 'Glossary', NAME_LABELS, txt, action);
  let valid = ids.valid;
  let msg = ids.messages.join('');

  if (language === null) {
    msg += `* ${ERROR}Language is missing\n`;
    valid = false;
  }
  if (description === null) {
    msg += `* ${INFO}Description is missing\n`;
  }

  if (action === 'Update') {
    msg += valid
      ? `${preview}* -->Glossary \`${show(glossaryName)}\` exists and can be updated\n`
      : '* --> validation failed\n';
  } else if (valid && !ids.exists) {
    msg += `-->It is valid to create Glossary '${show(glossaryName)}' with:\n${preview}`;
  }
  context.report(msg, valid ? 'INFO' : 'ERROR');

  if (directive === 'validate') {
    return valid;
  }
  if (action === 'Create' && ids.exists) {
    context.report(`\nGlossary ${show(glossaryName)} already exists and result document updated\n`);
    return updateACommand(txt, action, objectType, ids.qName, ids.guid);
  }
  if (!valid || glossaryName === null) {
    return null;
  }

  if (action === 'Update') {
    if (ids.guid === null) {
      return null;
    }
    await client.glossary.updateGlossary(ids.guid, {
      class: 'ReferenceableRequestBody',
      elementProperties: {
        class: 'GlossaryProperties',
        qualifiedName: opt(ids.qName),
        displayName: glossaryName,
        description: opt(description),
        language: opt(language),
        usage: opt(usage),
      },
    });
    dictionary.update(ids.qName, { guid: ids.guid, displayName: glossaryName, typeName: 'Glossary' });
    context.report(`\n-->Updated Glossary ${glossaryName} with GUID ${ids.guid}`);
    return markdownOf(await client.glossary.getGlossaryByGuid(ids.guid, { outputFormat: 'MD' }));
  }

  const newGuid = await client.glossary.createGlossary(glossaryName, opt(description), language ?? undefined, opt(usage));
  if (newGuid === NO_GUID_RETURNED) {
    context.report(`${ERROR}Glossary ${glossaryName} was not created`, 'ERROR');
    return null;
  }
  dictionary.update(ids.qName, { guid: newGuid, displayName: glossaryName, typeName: 'Glossary' });
  const created = markdownOf(await client.glossary.getGlossaryByGuid(newGuid, { outputFormat: 'MD' }));
  if (created === null) {
    context.report(`${ERROR}Just created with GUID ${newGuid} but Glossary not found\n`, 'ERROR');
  }
  return created;
}
