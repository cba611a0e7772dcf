/**
 * Unit tests for the element accessors and shared constants.
 */

import { describe, it, expect } from 'vitest';
import {
  NO_ELEMENTS_FOUND,
  NO_GUID_RETURNED,
  NO_TERMS_FOUND,
  isNotFound,
  isOutputFormat,
  isTermStatus,
  toOutputFormat,
} from '../constants.js';
import {
  elementDisplayName,
  elementQualifiedName,
  elementStatus,
  elementTypeName,
  field,
  propertyText,
  stringField,
  toElementList,
} from '../elements.js';
import { element } from './fetchStub.js';

describe('toElementList', () => {
  it('should keep only objects', () => {
    expect(toElementList([{ a: 1 }, 'x', null, [1]])).toEqual([{ a: 1 }]);
  });

  it('should wrap a single object', () => {
    expect(toElementList({ a: 1 })).toEqual([{ a: 1 }]);
  });

  it('should return an empty list for anything else', () => {
    expect(toElementList('No elements found')).toEqual([]);
    expect(toElementList(undefined)).toEqual([]);
  });
});

describe('field', () => {
  it('should read nested fields', () => {
    const el = element('g-1', 'Glossary', {});

    expect(field(el, 'elementHeader', 'type', 'typeName')).toBe('Glossary');
    expect(field(el, 'elementHeader', 'missing', 'deeper')).toBeUndefined();
    expect(stringField({ count: 3 }, 'count')).toBeUndefined();
  });
});

describe('element accessors', () => {
  it('should read the header and properties', () => {
    const el = element('g-1', 'Glossary', { qualifiedName: 'Glossary::Sales', title: 'Sales' }, 'DRAFT');

    expect(elementTypeName(el)).toBe('Glossary');
    expect(elementStatus(el)).toBe('DRAFT');
    expect(elementQualifiedName(el)).toBe('Glossary::Sales');
    expect(elementDisplayName(el)).toBe('Sales');
  });

  it('should prefer displayName over name', () => {
    expect(elementDisplayName(element('g-1', 'Glossary', { displayName: 'A', name: 'B' }))).toBe('A');
  });
});

describe('propertyText', () => {
  it('should render values as text', () => {
    expect(propertyText(undefined)).toBe('');
    expect(propertyText(['a', 1])).toBe('a, 1');
    expect(propertyText({ k: 'v' })).toBe('{"k":"v"}');
    expect(propertyText(false)).toBe('false');
  });
});

describe('constants', () => {
  it('should recognise term statuses', () => {
    expect(isTermStatus('DRAFT')).toBe(true);
    expect(isTermStatus('draft')).toBe(false);
  });

  it('should normalise output formats', () => {
    expect(isOutputFormat('LIST')).toBe(true);
    expect(toOutputFormat(' list ')).toBe('LIST');
    expect(toOutputFormat('html')).toBe('JSON');
    expect(toOutputFormat(undefined, 'TABLE')).toBe('TABLE');
  });

  it('should recognise the not-found sentinels', () => {
    expect(isNotFound(NO_ELEMENTS_FOUND)).toBe(true);
    expect(isNotFound(NO_TERMS_FOUND)).toBe(true);
    expect(isNotFound(NO_GUID_RETURNED)).toBe(false);
    expect(isNotFound([])).toBe(false);
  });
});
