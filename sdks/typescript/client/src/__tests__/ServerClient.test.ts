/**
 * Unit tests for ServerClient.
 */

import { describe, it, expect } from 'vitest';
import { InvalidParameterException } from '@egeria-sdk/core';
import { NO_ELEMENTS_FOUND } from '../constants.js';
import { ServerClient, queryString } from '../ServerClient.js';
import { OPTIONS, ROOT, element, stubFetch } from './fetchStub.js';

describe('queryString', () => {
  it('should skip undefined values and write booleans', () => {
    expect(queryString({ startFrom: 0, pageSize: undefined, forLineage: false })).toBe('?startFrom=0&forLineage=false');
  });

  it('should be empty when there is nothing to send', () => {
    expect(queryString({})).toBe('');
    expect(queryString({ a: undefined })).toBe('');
  });
});

describe('ServerClient', () => {
  const client = new ServerClient(OPTIONS);

  it('should build view-service roots', () => {
    expect(client.commandRoot('glossary-manager')).toBe(`${ROOT}/glossary-manager`);
  });

  describe('createQualifiedName', () => {
    it('should replace each whitespace character with a dash', () => {
      expect(client.createQualifiedName('Glossary', ' Sales  Terms ')).toBe('Glossary::Sales--Terms');
    });

    it('should add the local qualifier and version', () => {
      expect(client.createQualifiedName('Term', 'Net Sales', 'PDR', '1.0')).toBe('PDR::Term::Net-Sales::1.0');
    });

    it('should use the client qualifier by default', () => {
      const qualified = new ServerClient({ ...OPTIONS, localQualifier: 'PDR' });

      expect(qualified.createQualifiedName('Category', 'Finance')).toBe('PDR::Category::Finance');
    });

    it('should reject a blank display name', () => {
      expect(() => client.createQualifiedName('Glossary', '  ')).toThrow(InvalidParameterException);
      expect(() => client.createQualifiedName('Glossary', undefined)).toThrow(InvalidParameterException);
    });
  });

  describe('getGuid', () => {
    it('should return a given GUID without a request', async () => {
      const requests = stubFetch();

      expect(await client.getGuid({ guid: 'g-1', displayName: 'ignored' })).toBe('g-1');
      expect(requests).toHaveLength(0);
    });

    it('should look up a qualified name', async () => {
      const requests = stubFetch({ guid: 'g-2' });

      const guid = await client.getGuid({ qualifiedName: 'Glossary::Sales' });

      expect(guid).toBe('g-2');
      expect(requests[0].url).toBe(
        `${ROOT}/classification-manager/elements/guid-by-unique-name?forLineage=false&forDuplicateProcessing=false`
      );
      expect(requests[0].body).toEqual({
        class: 'NameRequestBody',
        name: 'Glossary::Sales',
        namePropertyName: 'qualifiedName',
      });
    });

    it('should prefix the technology type to a display name', async () => {
      const requests = stubFetch({ guid: 'g-3' });

      await client.getGuid({ displayName: 'Sales', techType: 'PostgreSQL Server' });

      expect(requests[0].body).toEqual({
        class: 'NameRequestBody',
        name: 'PostgreSQL Server::Sales',
        namePropertyName: 'qualifiedName',
      });
    });

    it('should reject an empty identity', async () => {
      await expect(client.getGuid({})).rejects.toBeInstanceOf(InvalidParameterException);
    });
  });

  it('should report a unique name that matches nothing', async () => {
    stubFetch({ relatedHTTPCode: 200 });

    expect(await client.getElementGuidByUniqueName('Glossary::Missing')).toBe(NO_ELEMENTS_FOUND);
  });

  describe('getElementsByPropertyValue', () => {
    it('should search the name properties of a type', async () => {
      const sales = element('g-1', 'Glossary', { displayName: 'Sales' });
      const requests = stubFetch({ elements: [sales] });

      const result = await client.getElementsByPropertyValue('Sales', ['qualifiedName', 'displayName'], 'Glossary');

      expect(result).toEqual([sales]);
      expect(requests[0].url).toBe(
        `${ROOT}/classification-explorer/elements/by-exact-property-value` +
          '?startFrom=0&pageSize=0&forLineage=false&forDuplicateProcessing=false'
      );
      expect(requests[0].body).toEqual({
        class: 'FindPropertyNamesProperties',
        propertyValue: 'Sales',
        propertyNames: ['qualifiedName', 'displayName'],
        metadataElementTypeName: 'Glossary',
      });
    });

    it('should report an empty list as nothing found', async () => {
      stubFetch({ elements: [] });

      expect(await client.getElementsByPropertyValue('Sales', ['name'])).toBe(NO_ELEMENTS_FOUND);
    });
  });

  describe('getGuidForName', () => {
    it('should return the GUID of the single match', async () => {
      stubFetch({ elements: [element('g-1', 'Glossary', { displayName: 'Sales' })] });

      expect(await client.getGuidForName('Sales')).toBe('g-1');
    });

    it('should reject an ambiguous name', async () => {
      stubFetch({
        elements: [element('g-1', 'Glossary', { displayName: 'Sales' }), element('g-2', 'Term', { displayName: 'Sales' })],
      });

      await expect(client.getGuidForName('Sales')).rejects.toBeInstanceOf(InvalidParameterException);
    });
  });

  describe('getElementByGuid', () => {
    it('should return the element', async () => {
      const term = element('t-1', 'GlossaryTerm', { displayName: 'Revenue' });
      const requests = stubFetch({ element: term });

      expect(await client.getElementByGuid('t-1')).toEqual(term);
      expect(requests[0].url).toBe(
        `${ROOT}/classification-manager/elements/t-1?forLineage=false&forDuplicateProcessing=false`
      );
      expect(requests[0].body).toEqual({ class: 'EffectiveTimeQueryRequestBody' });
    });

    it('should report a missing element', async () => {
      stubFetch({ relatedHTTPCode: 200 });

      expect(await client.getElementByGuid('t-1')).toBe(NO_ELEMENTS_FOUND);
    });
  });

  describe('updateElementStatus', () => {
    it('should send the new status', async () => {
      const requests = stubFetch();

      await client.updateElementStatus('g-1', 'ACTIVE');

      expect(requests[0].url).toBe(`${ROOT}/classification-manager/elements/g-1/update-status`);
      expect(requests[0].body).toEqual({ class: 'UpdateStatusRequestBody', newStatus: 'ACTIVE' });
    });

    it('should require a status or body', async () => {
      const requests = stubFetch();

      await expect(client.updateElementStatus('g-1')).rejects.toBeInstanceOf(InvalidParameterException);
      expect(requests).toHaveLength(0);
    });
  });
});
