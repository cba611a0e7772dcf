/**
 * Accessors for metadata elements returned by the platform.
 *
 * Elements are opaque JSON objects; these helpers read the few fields the SDK
 * relies on without assuming the rest of the shape.
 */

import { isRecord } from '@egeria-sdk/core';

/**
 * A metadata element as returned by the platform.
 */
export type EgeriaElement = Record<string, unknown>;

/** Keys under which older view services return an element's properties. */
const PROPERTY_KEYS = [
  'properties',
  'glossaryProperties',
  'glossaryCategoryProperties',
  'glossaryTermProperties',
  'projectProperties',
] as const;

/**
 * Keeps the JSON objects of an unknown value that should be an element list.
 */
export function toElementList(value: unknown): EgeriaElement[] {
  if (Array.isArray(value)) {
    return value.filter(isRecord);
  }
  return isRecord(value) ? [value] : [];
}

/**
 * Reads a nested field, e.g. `field(el, 'elementHeader', 'type', 'typeName')`.
 */
export function field(element: unknown, ...path: string[]): unknown {
  let current: unknown = element;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Reads a nested string field; anything else becomes undefined.
 */
export function stringField(element: unknown, ...path: string[]): string | undefined {
  const value = field(element, ...path);
  return typeof value === 'string' ? value : undefined;
}

/**
 * The element's GUID.
 */
export function elementGuid(element: EgeriaElement): string | undefined {
  return stringField(element, 'elementHeader', 'guid');
}

/**
 * The element's type name, e.g. "Glossary".
 */
export function elementTypeName(element: EgeriaElement): string | undefined {
  return stringField(element, 'elementHeader', 'type', 'typeName');
}

/**
 * The element's lifecycle status, e.g. "ACTIVE".
 */
export function elementStatus(element: EgeriaElement): string | undefined {
  return stringField(element, 'elementHeader', 'status');
}

/**
 * The element's property record, or an empty record.
 */
export function elementProperties(element: EgeriaElement): Record<string, unknown> {
  for (const key of PROPERTY_KEYS) {
    const value = element[key];
    if (isRecord(value)) {
      return value;
    }
  }
  return {};
}

/**
 * The element's qualified name.
 */
export function elementQualifiedName(element: EgeriaElement): string | undefined {
  return stringField(elementProperties(element), 'qualifiedName');
}

/**
 * The element's display name (displayName, then name, then title).
 */
export function elementDisplayName(element: EgeriaElement): string | undefined {
  const props = elementProperties(element);
  return stringField(props, 'displayName') ?? stringField(props, 'name') ?? stringField(props, 'title');
}

/**
 * Renders a property value as text for markdown and tables.
 */
export function propertyText(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (Array.isArray(value)) {
    return value.map(propertyText).join(', ');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
