/**
 * `Create Category` and `Update Category`.
 */

import { NO_GUID_RETURNED } from '@egeria-sdk/client';
import { ERROR, INFO, PRE_COMMAND, extractAttribute, extractCommandPlus, updateACommand } from '../extraction.js';
import { processElementIdentifiers } from '../identifiers.js';
import type { CommandResult, Directive, MarkdownContext } from '../MarkdownContext.js';
import { markdownOf, opt, resolveGlossary, show } from './common.js';

const NAME_LABELS = ['Category Name'] as const;

export async function processCategoryUpsertCommand(
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

  const categoryName = extractAttribute(txt, NAME_LABELS);
  context.report(`${PRE_COMMAND} \`${command}\` for category: \`'${show(categoryName)}'\` with directive: \`${directive}\``);
  const owningGlossary = extractAttribute(txt, ['Owning Glossary', 'In Glossary']);
  const description = extractAttribute(txt, ['Description']);
  const qName = extractAttribute(txt, ['Qualified Name']);
  const updateDescription = extractAttribute(txt, ['Update Description']);

  let preview =
    `\n* Command: ${command}\n\t* Category: ${show(categoryName)}\n\t* In Glossary: ${show(owningGlossary)}\n\t` +
    `* Description:\n${show(description)}\n\t* Qualified Name: ${show(qName)}\n\t`;
  if (action === 'Update') {
    preview += `* GUID: ${show(extractAttribute(txt, ['GUID', 'guid', 'Guid']))}\n\n` +
      `* Update Description: \n ${show(updateDescription)}\n\t`;
  }

  if (directive === 'display') {
    context.report(preview);
    return null;
  }

  const ids = await processElementIdentifiers(context, 'GlossaryCategory', NAME_LABELS, txt, action, undefined, 'Category');
  let valid = ids.valid;
  const messages = [...ids.messages];

  let glossaryGuid: string | null = null;
  if (owningGlossary === null) {
    messages.push(`* ${ERROR}Owning Glossary Qualified Name is missing\n`);
    valid = false;
  } else {
    glossaryGuid = await resolveGlossary(context, owningGlossary, messages);
    valid = valid && glossaryGuid !== null;
  }
  if (description === null) {
    messages.push(`* ${INFO}Description is missing\n`);
  }

  if (action === 'Update') {
    messages.push(
      valid ? `${preview}* -->category \`${show(categoryName)}\` exists and can be updated\n` : '* --> validation failed\n'
    );
  } else if (valid && !ids.exists) {
    messages.push(`-->It is valid to create category \`${show(categoryName)}\` with:\n${preview}`);
  }
  context.report(messages.join(''), valid ? 'INFO' : 'ERROR');

  if (directive === 'validate') {
    return valid;
  }
  if (action === 'Create' && ids.exists) {
    context.report(`\ncategory \`${show(categoryName)}\` already exists and result document updated\n`);
    return updateACommand(txt, action, objectType, ids.qName, ids.guid);
  }
  if (!valid || categoryName === null || glossaryGuid === null) {
    context.report(`${ERROR}Validation checks failed in processing category \`${show(categoryName)}\``, 'ERROR');
    return null;
  }

  if (action === 'Update') {
    if (ids.guid === null) {
      return null;
    }
    await client.glossary.updateCategory(
      ids.guid,
      categoryName,
      opt(description),
      opt(ids.qName),
      true,
      opt(updateDescription)
    );
    dictionary.update(ids.qName, { guid: ids.guid, displayName: categoryName, typeName: 'GlossaryCategory' });
    context.report(`\n-->Updated category \`${categoryName}\` with GUID ${ids.guid}`);
    return markdownOf(await client.glossary.getCategoryByGuid(ids.guid, { outputFormat: 'MD' }));
  }

  const newGuid = await client.glossary.createCategory(glossaryGuid, categoryName, opt(description), false);
  if (newGuid === NO_GUID_RETURNED) {
    context.report(`${ERROR}Category ${categoryName} was not created`, 'ERROR');
    return null;
  }
  dictionary.update(ids.qName, { guid: newGuid, displayName: categoryName, typeName: 'GlossaryCategory' });
  return markdownOf(await client.glossary.getCategoryByGuid(newGuid, { outputFormat: 'MD' }));
}
