/**
 * Resolving the elements a command names, through the element dictionary
 * first and the platform second.
 */

import {
  type EgeriaElement,
  NO_ELEMENTS_FOUND,
  elementDisplayName,
  elementGuid,
  elementQualifiedName,
} from '@egeria-sdk/client';
import { ERROR, INFO, WARNING, extractAttribute } from './extraction.js';
import type { MarkdownContext } from './MarkdownContext.js';

/** Properties compared when looking an element up by name. */
export const ELEMENT_NAME_PROPERTIES = ['qualifiedName', 'name', 'displayName', 'title'] as const;

/**
 * Outcome of looking an element up by name.
 */
export interface ElementLookup {
  qName: string | null;
  guid: string | null;
  /** The element as the platform returned it; null for a dictionary hit */
  element: EgeriaElement | null;
  /** False when more than one element matched */
  unique: boolean;
  exists: boolean;
}

/**
 * Outcome of resolving the element a command block is about.
 */
export interface ElementIdentifiers {
  qName: string | null;
  guid: string | null;
  element: EgeriaElement | null;
  valid: boolean;
  exists: boolean;
  messages: string[];
}

/**
 * Looks an element of a type up by each of its candidate names in turn.
 */
export async function getElementByName(
  context: MarkdownContext,
  typeName: string,
  names: readonly string[]
): Promise<ElementLookup> {
  const { client, dictionary } = context;

  for (const name of names) {
    const key = dictionary.findKeyWithValue(name, typeName);
    if (key !== undefined) {
      const known = dictionary.get(key)?.guid;
      if (known) {
        return { qName: key, guid: known, element: null, unique: true, exists: true };
      }
      const guid = await client.elements.getElementGuidByUniqueName(key);
      if (guid !== NO_ELEMENTS_FOUND) {
        dictionary.update(key, { guid, typeName });
        return { qName: key, guid, element: null, unique: true, exists: true };
      }
    }

    const elements = await client.elements.getElementsByPropertyValue(name, ELEMENT_NAME_PROPERTIES, typeName);
    if (elements === NO_ELEMENTS_FOUND) {
      continue;
    }
    if (elements.length > 1) {
      return { qName: null, guid: null, element: null, unique: false, exists: true };
    }
    const [element] = elements;
    const qName = elementQualifiedName(element) ?? null;
    const guid = elementGuid(element) ?? null;
    dictionary.update(qName, { guid: guid ?? undefined, displayName: elementDisplayName(element), typeName });
    return { qName, guid, element, unique: true, exists: true };
  }

  return { qName: null, guid: null, element: null, unique: true, exists: false };
}

/**
 * Resolves the element a command block is about and checks that the action
 * makes sense for it.
 *
 * A Create looks the element up by its Qualified Name when one is given,
 * otherwise by name; an existing element stays valid so that the command can
 * become an Update. Other actions try the Qualified Name, then the name, and
 * reject a Qualified Name that differs from the one of the element found.
 * A Create of a new element gets a qualified name built from
 * `qualifierType` (default the type name). The action `EXISTS_REQUIRED`
 * marks an element the command refers to but does not create.
 */
export async function processElementIdentifiers(
  context: MarkdownContext,
  typeName: string,
  labels: readonly string[],
  txt: string,
  action: string,
  version?: string | null,
  qualifierType: string = typeName
): Promise<ElementIdentifiers> {
  const messages: string[] = [];
  const givenQName = extractAttribute(txt, ['Qualified Name']);
  const elementName = extractAttribute(txt, labels);

  const name = elementName ?? givenQName;
  if (name === null) {
    messages.push(`* ${ERROR}No ${labels[0]} found\n`);
    return { qName: null, guid: null, element: null, valid: false, exists: false, messages };
  }

  const candidates =
    action === 'Create' && givenQName !== null
      ? [givenQName]
      : [givenQName, elementName].filter((candidate): candidate is string => candidate !== null);
  const lookup = await getElementByName(context, typeName, candidates);
  let valid = true;
  let qName = lookup.qName;

  if (!lookup.unique) {
    messages.push(`* ${ERROR}More than one ${typeName} named \`${name}\` found, please specify a Qualified Name\n`);
    valid = false;
  } else if (!lookup.exists) {
    if (action === 'Update') {
      messages.push(`* ${ERROR}${typeName} \`${name}\` does not exist\n`);
      valid = false;
    } else if (action === 'EXISTS_REQUIRED') {
      messages.push(`* ${ERROR}${typeName} \`${name}\` was not found\n`);
      valid = false;
    }
  } else if (action === 'Create') {
    messages.push(`* ${WARNING}${typeName} \`${name}\` already exists with GUID ${lookup.guid ?? 'unknown'}\n`);
  } else if (givenQName !== null && lookup.qName !== null && givenQName !== lookup.qName) {
    messages.push(
      `* ${ERROR}${typeName} \`${name}\` qualifiedName mismatch between ${givenQName} and ${lookup.qName}\n`
    );
    valid = false;
  } else {
    messages.push(`* ${INFO}${typeName} \`${name}\` exists with GUID ${lookup.guid ?? 'unknown'}\n`);
    if (action === 'Update' && givenQName === null) {
      messages.push(`* ${INFO}Qualified Name is missing => can use known qualified name of ${lookup.qName ?? ''}\n`);
    }
  }

  if (action === 'Create' && !lookup.exists) {
    qName =
      givenQName ??
      context.client.elements.createQualifiedName(qualifierType, name, undefined, version ?? undefined);
    context.dictionary.update(qName, { displayName: elementName ?? undefined, typeName });
  }

  return { qName, guid: lookup.guid, element: lookup.element, valid, exists: lookup.exists, messages };
}
