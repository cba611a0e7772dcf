/**
 * `Create Term` and `Update Term`.
 */

import { NO_GUID_RETURNED, elementStatus, isTermStatus } from '@egeria-sdk/client';
import {
  ERROR,
  INFO,
  PRE_COMMAND,
  WARNING,
  extractAttribute,
  extractCommandPlus,
  splitList,
  updateACommand,
} from '../extraction.js';
import { processElementIdentifiers } from '../identifiers.js';
import type { CommandResult, Directive, MarkdownContext } from '../MarkdownContext.js';
import { markdownOf, opt, resolveCategory, resolveGlossary, show } from './common.js';

const NAME_LABELS = ['Term Name'] as const;

export async function processTermUpsertCommand(
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

  const termName = extractAttribute(txt, NAME_LABELS);
  const summary = extractAttribute(txt, ['Summary']);
  const description = extractAttribute(txt, ['Description']);
  const abbreviation = extractAttribute(txt, ['Abbreviation']);
  const examples = extractAttribute(txt, ['Examples']);
  const usage = extractAttribute(txt, ['Usage']);
  const givenStatus = extractAttribute(txt, ['Status']);
  const status = (givenStatus ?? 'DRAFT').toUpperCase();
  const version = extractAttribute(txt, ['Version', 'Version Identifier']);
  const categories = extractAttribute(txt, ['Categories']);
  const glossaryName = extractAttribute(txt, ['In Glossary', 'Owning Glossary']);
  const qName = extractAttribute(txt, ['Qualified Name']);
  const updateDescription = extractAttribute(txt, ['Update Description']);

  context.report(`${PRE_COMMAND} \`${command}\` for term: \`'${show(termName)}'\` with directive: \`${directive}\``);

  let preview =
    `\n* Command: ${command}\n\t* Glossary: ${show(glossaryName)}\n\t` +
    `* Term Name: ${show(termName)}\n\t* Categories: ${show(categories)}\n\t* Summary: ${show(summary)}\n\t` +
    `* Description: ${show(description)}\n\t` +
    `* Abbreviation: ${show(abbreviation)}\n\t* Examples: ${show(examples)}\n\t* Usage: ${show(usage)}\n\t` +
    `* Version: ${show(version)}\n\t* Status: ${status}\n`;
  if (action === 'Update') {
    preview +=
      `\t* GUID: ${show(extractAttribute(txt, ['GUID']))}\n\t* Qualified Name: ${show(qName)}` +
      `\n\t* Update Description: ${show(updateDescription)}\n`;
  }

  if (directive === 'display') {
    context.report(preview);
    return null;
  }

  const ids = await processElementIdentifiers(context, 'GlossaryTerm', NAME_LABELS, txt, action, undefined, 'Term');
  let valid = ids.valid;
  const messages = [...ids.messages];

  if (givenStatus === null) {
    messages.push(`* ${INFO}Term status is missing - will default to DRAFT\n`);
  } else if (!isTermStatus(status)) {
    messages.push(`* ${ERROR}Term status \`${givenStatus}\` is not a valid term status\n`);
    valid = false;
  }

  let glossaryGuid: string | null = null;
  if (glossaryName === null) {
    messages.push(`* ${ERROR}Glossary qualified name is missing\n`);
    valid = false;
  } else {
    glossaryGuid = await resolveGlossary(context, glossaryName, messages);
    valid = valid && glossaryGuid !== null;
  }

  const categoryGuids: string[] = [];
  if (categories === null) {
    messages.push(`* ${INFO}No categories found\n`);
  } else {
    for (const category of splitList(categories)) {
      const categoryGuid = await resolveCategory(context, category, messages);
      if (categoryGuid === null) {
        valid = false;
      } else {
        categoryGuids.push(categoryGuid);
      }
    }
  }

  const optional: Array<[string, string | null]> = [
    ['summary', summary],
    ['description', description],
    ['abbreviation', abbreviation],
    ['examples', examples],
    ['usage', usage],
    ['version', version],
  ];
  for (const [label, value] of optional) {
    if (value === null) {
      messages.push(`* ${INFO}Term ${label} is missing\n`);
    }
  }

  if (action === 'Update') {
    messages.push(valid ? `\n--> * Term ${show(termName)} exists and can be updated\n${preview}` : '* --> validation failed\n');
  } else if (ids.exists) {
    messages.push(`\n${WARNING}Term '${show(termName)}' already exists.\n`);
  } else if (!valid) {
    messages.push(`\n-->Validation checks failed in creating Term '${show(termName)}' with: ${preview}\n`);
  } else {
    messages.push(`\n-->It is valid to create Term '${show(termName)}' with: ${preview}\n`);
  }
  context.report(messages.join(''), valid ? 'INFO' : 'ERROR');

  if (directive === 'validate') {
    return valid;
  }
  if (action === 'Create' && ids.exists) {
    context.report(`\n${WARNING}Term ${show(termName)} exists and result document updated`, 'WARNING');
    return updateACommand(txt, action, objectType, ids.qName, ids.guid);
  }
  if (!valid || termName === null || glossaryGuid === null) {
    return null;
  }

  const elementProperties = {
    class: 'GlossaryTermProperties',
    displayName: termName,
    summary: opt(summary),
    description: opt(description),
    abbreviation: opt(abbreviation),
    examples: opt(examples),
    usage: opt(usage),
    publishVersionIdentifier: opt(version),
  };

  if (action === 'Update') {
    if (ids.guid === null) {
      return null;
    }
    await client.glossary.updateTerm(ids.guid, {
      class: 'ReferenceableUpdateRequestBody',
      elementProperties: { ...elementProperties, qualifiedName: opt(ids.qName) },
      updateDescription: opt(updateDescription),
    });
    for (const categoryGuid of categoryGuids) {
      await client.glossary.addTermToCategory(ids.guid, categoryGuid);
    }
    // A term known only from the dictionary gets the given status unconditionally.
    if (givenStatus !== null && (ids.element === null || elementStatus(ids.element) !== status)) {
      await client.glossary.updateTermStatus(ids.guid, status);
    }
    dictionary.update(ids.qName, { guid: ids.guid, displayName: termName, typeName: 'GlossaryTerm' });
    context.report(`\n-->Updated Term ${termName} with GUID ${ids.guid}`);
    return markdownOf(await client.glossary.getTermByGuid(ids.guid, { outputFormat: 'MD' }));
  }

  const newQName = ids.qName ?? client.glossary.createQualifiedName('Term', termName);
  const termGuid = await client.glossary.createControlledGlossaryTerm(glossaryGuid, {
    class: 'ReferenceableRequestBody',
    elementProperties: { ...elementProperties, qualifiedName: newQName },
    initialStatus: status,
  });
  if (termGuid === NO_GUID_RETURNED) {
    context.report(`${ERROR}Term ${termName} not created`, 'ERROR');
    return null;
  }
  for (const categoryGuid of categoryGuids) {
    await client.glossary.addTermToCategory(termGuid, categoryGuid);
  }
  dictionary.update(newQName, { guid: termGuid, displayName: termName, typeName: 'GlossaryTerm' });
  context.report(`\n-->Created Term ${termName} with GUID ${termGuid}`);
  return markdownOf(await client.glossary.getTermByGuid(termGuid, { outputFormat: 'MD' }));
}
