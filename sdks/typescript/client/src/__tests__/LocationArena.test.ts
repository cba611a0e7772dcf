/**
 * Unit tests for LocationArena.
 */

import { describe, it, expect } from 'vitest';
import { LocationArena } from '../resources/LocationArena.js';
import { OPTIONS, ROOT, element, stubFetch } from './fetchStub.js';

const ARENA = `${ROOT}/location-arena`;

describe('LocationArena', () => {
  const client = new LocationArena(OPTIONS);

  it('should create a location', async () => {
    const requests = stubFetch({ guid: 'l-1' });

    expect(
      await client.createLocation({ properties: { class: 'LocationProperties', qualifiedName: 'Location::Lab' } })
    ).toBe('l-1');
    expect(requests[0].url).toBe(`${ARENA}/locations`);
  });

  it('should link locations', async () => {
    const requests = stubFetch({}, {}, {});

    await client.linkPeerLocations('l-1', 'l-2');
    await client.linkNestedLocation('l-1', 'l-3');
    await client.linkKnownLocation('a-1', 'l-1');

    expect(requests.map((request) => request.url)).toEqual([
      `${ARENA}/locations/l-1/adjacent-locations/l-2/attach`,
      `${ARENA}/locations/l-1/nested-locations/l-3/attach`,
      `${ARENA}/elements/a-1/known-locations/l-1/attach`,
    ]);
  });

  it('should render locations as DICT rows', async () => {
    const lab = element('l-1', 'Location', { qualifiedName: 'Location::Lab', displayName: 'Lab', coordinates: '1,2' });
    stubFetch({ elements: [lab] });

    const rows = await client.getLocationsByName('Lab', { outputFormat: 'DICT' });

    expect(rows).toEqual([
      {
        guid: 'l-1',
        display_name: 'Lab',
        qualified_name: 'Location::Lab',
        identifier: '',
        description: '',
        coordinates: '1,2',
        map_projection: '',
      },
    ]);
  });
});
