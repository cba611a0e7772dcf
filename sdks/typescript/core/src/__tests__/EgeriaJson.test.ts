/**
 * Unit tests for EgeriaJson and bodySlimmer.
 */

import { describe, it, expect } from 'vitest';
import { EgeriaJson, bodySlimmer, fromJson, toJson } from '../EgeriaJson.js';
import { InvalidParameterException } from '../EgeriaException.js';

describe('EgeriaJson', () => {
  it('should omit null and undefined members when serializing', () => {
    expect(EgeriaJson.serialize({ class: 'FilterRequestBody', filter: null, startFrom: 0, pageSize: undefined })).toBe(
      '{"class":"FilterRequestBody","startFrom":0}'
    );
  });

  it('should return null for invalid JSON', () => {
    expect(EgeriaJson.deserialize('not json')).toBeNull();
    expect(fromJson('{"guid":"abc"}')).toEqual({ guid: 'abc' });
  });

  it('should throw InvalidParameterException when JSON is required', () => {
    expect(() => EgeriaJson.deserializeRequired('<html>', 'https://h/x')).toThrow(InvalidParameterException);
  });

  it('should serialize through toJson', () => {
    expect(toJson(['a', null])).toBe('["a",null]');
  });
});

describe('bodySlimmer', () => {
  it('should drop falsy members and empty containers', () => {
    const body = {
      class: 'SearchStringRequestBody',
      searchString: null,
      startsWith: true,
      endsWith: false,
      startFrom: 0,
      typeName: '',
      limitResultsByStatus: [],
      elementProperties: { class: 'GlossaryProperties', usage: undefined },
      empty: { nested: { deeper: null } },
    };

    expect(bodySlimmer(body)).toEqual({
      class: 'SearchStringRequestBody',
      startsWith: true,
      elementProperties: { class: 'GlossaryProperties' },
    });
  });

  it('should slim objects inside arrays and keep scalar items', () => {
    expect(
      bodySlimmer({ propertyNames: ['qualifiedName', 'displayName'], items: [{ a: 1, b: null }] })
    ).toEqual({ propertyNames: ['qualifiedName', 'displayName'], items: [{ a: 1 }] });
  });
});
