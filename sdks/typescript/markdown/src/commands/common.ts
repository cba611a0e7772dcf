/**
 * Helpers shared by the command processors.
 */

import {
  type EgeriaElement,
  type QueryResult,
  elementDisplayName,
  elementGuid,
  elementQualifiedName,
  isNotFound,
  toElementList,
} from '@egeria-sdk/client';
import { ERROR, INFO } from '../extraction.js';
import type { MarkdownContext } from '../MarkdownContext.js';

/**
 * The elements of a JSON query result; none for a "nothing found" sentinel.
 */
function elementsOf(result: QueryResult): EgeriaElement[] {
  return toElementList(result);
}

/**
 * The markdown of a query rendered as MD, or null when nothing was found.
 */
export function markdownOf(result: QueryResult): string | null {
  return typeof result === 'string' && !isNotFound(result) ? result : null;
}

/** `null` becomes undefined so that the value drops out of a request body. */
export function opt(value: string | null): string | undefined {
  return value ?? undefined;
}

/** Text of an optional attribute in a preview. */
export function show(value: string | null): string {
  return value ?? '';
}

/**
 * The single element a by-name query found, with what a processor needs to
 * know about it.
 */
interface KnownElement {
  element: EgeriaElement;
  guid: string | null;
  qName: string | null;
}

function knownElement(elements: EgeriaElement[]): KnownElement | null {
  if (elements.length !== 1) {
    return null;
  }
  const [element] = elements;
  return { element, guid: elementGuid(element) ?? null, qName: elementQualifiedName(element) ?? null };
}

/**
 * Resolves the glossary a category or term belongs to, by qualified or display
 * name, recording it in the dictionary.
 * @returns The glossary GUID, or null with an error message added
 */
export async function resolveGlossary(
  context: MarkdownContext,
  glossaryName: string,
  messages: string[]
): Promise<string | null> {
  const key = context.dictionary.findKeyWithValue(glossaryName, 'Glossary');
  const known = key === undefined ? undefined : context.dictionary.get(key)?.guid;
  if (known) {
    return known;
  }

  const glossaries = elementsOf(await context.client.glossary.getGlossariesByName(glossaryName));
  if (glossaries.length === 0) {
    messages.push(`* ${ERROR}Glossary \`${glossaryName}\` does not exist\n`);
    return null;
  }
  if (glossaries.length > 1) {
    messages.push(`* ${ERROR}More than one glossary named \`${glossaryName}\` found\n`);
    return null;
  }
  const [glossary] = glossaries;
  const guid = elementGuid(glossary) ?? null;
  context.dictionary.update(elementQualifiedName(glossary), {
    guid: guid ?? undefined,
    displayName: elementDisplayName(glossary),
    typeName: 'Glossary',
  });
  messages.push(`* ${INFO}Glossary \`${glossaryName}\` exists\n`);
  return guid;
}

/**
 * Resolves a category by qualified or display name, recording it in the
 * dictionary.
 * @returns The category GUID, or null with an error message added
 */
export async function resolveCategory(
  context: MarkdownContext,
  categoryName: string,
  messages: string[]
): Promise<string | null> {
  const key = context.dictionary.findKeyWithValue(categoryName, 'GlossaryCategory');
  const known = key === undefined ? undefined : context.dictionary.get(key)?.guid;
  if (known) {
    return known;
  }

  const category = knownElement(elementsOf(await context.client.glossary.getCategoriesByName(categoryName)));
  if (category === null || category.guid === null) {
    messages.push(`* ${ERROR}Category \`${categoryName}\` not found\n`);
    return null;
  }
  context.dictionary.update(category.qName, {
    guid: category.guid,
    displayName: elementDisplayName(category.element),
    typeName: 'GlossaryCategory',
  });
  return category.guid;
}
