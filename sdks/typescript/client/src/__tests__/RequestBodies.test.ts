/**
 * Unit tests for request body validation.
 */

import { describe, it, expect } from 'vitest';
import { InvalidParameterException } from '@egeria-sdk/core';
import {
  NewElementRequestBodySchema,
  ReferenceableRequestBodySchema,
  UpdateStatusRequestBodySchema,
  requirePropertyClass,
  validateBody,
} from '../RequestBodies.js';

describe('validateBody', () => {
  it('should fill in the body class', () => {
    const body = validateBody(NewElementRequestBodySchema, {
      properties: { class: 'ProjectProperties', qualifiedName: 'Project::Alpha' },
    });

    expect(body.class).toBe('NewElementRequestBody');
    expect(body.properties).toEqual({ class: 'ProjectProperties', qualifiedName: 'Project::Alpha' });
  });

  it('should keep members the schema does not name', () => {
    const body = validateBody(UpdateStatusRequestBodySchema, { newStatus: 'ACTIVE', forLineage: true });

    expect(body).toEqual({ class: 'UpdateStatusRequestBody', newStatus: 'ACTIVE', forLineage: true });
  });

  it('should report each issue with its path', () => {
    expect(() => validateBody(NewElementRequestBodySchema, {})).toThrow(
      'Invalid parameters were provided -> `properties: Required`.'
    );
  });

  it('should reject a class of another body', () => {
    expect(() =>
      validateBody(ReferenceableRequestBodySchema, {
        class: 'NewElementRequestBody',
        elementProperties: { class: 'GlossaryProperties' },
      })
    ).toThrow(InvalidParameterException);
  });
});

describe('requirePropertyClass', () => {
  it('should accept a listed class', () => {
    expect(() => requirePropertyClass({ class: 'GlossaryProperties' }, ['GlossaryProperties'])).not.toThrow();
  });

  it('should reject an unlisted class', () => {
    expect(() => requirePropertyClass({ class: 'TermProperties' }, ['GlossaryProperties'])).toThrow(
      "Invalid parameters were provided -> `property class 'TermProperties' is not one of GlossaryProperties`."
    );
  });

  it('should accept anything when no classes are listed', () => {
    expect(() => requirePropertyClass({ class: 'AnyProperties' }, [])).not.toThrow();
    expect(() => requirePropertyClass(undefined, ['GlossaryProperties'])).not.toThrow();
  });
});
