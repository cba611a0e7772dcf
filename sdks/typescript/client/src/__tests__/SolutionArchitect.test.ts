/**
 * Unit tests for SolutionArchitect.
 */

import { describe, it, expect } from 'vitest';
import { InvalidParameterException } from '@egeria-sdk/core';
import { SolutionArchitect } from '../resources/SolutionArchitect.js';
import { OPTIONS, ROOT, element, stubFetch } from './fetchStub.js';

const ARCHITECT = `${ROOT}/solution-architect`;

describe('SolutionArchitect', () => {
  const client = new SolutionArchitect(OPTIONS);

  it('should create a blueprint', async () => {
    const requests = stubFetch({ guid: 'b-1' });

    const guid = await client.createSolutionBlueprint({
      properties: { class: 'SolutionBlueprintProperties', qualifiedName: 'SolutionBlueprint::Trials', displayName: 'Trials' },
    });

    expect(guid).toBe('b-1');
    expect(requests[0].url).toBe(`${ARCHITECT}/solution-blueprints`);
    expect(requests[0].body).toEqual({
      class: 'NewElementRequestBody',
      properties: { class: 'SolutionBlueprintProperties', qualifiedName: 'SolutionBlueprint::Trials', displayName: 'Trials' },
    });
  });

  it('should reject component properties for a blueprint', async () => {
    await expect(
      client.createSolutionBlueprint({ properties: { class: 'SolutionComponentProperties' } })
    ).rejects.toBeInstanceOf(InvalidParameterException);
  });

  it('should find blueprints and render LIST output', async () => {
    const blueprint = element('b-1', 'SolutionBlueprint', {
      qualifiedName: 'SolutionBlueprint::Trials',
      displayName: 'Trials',
      versionIdentifier: 'V1',
    });
    const requests = stubFetch({ elements: [blueprint] });

    const result = await client.findSolutionBlueprints('Trials', { outputFormat: 'LIST' });

    expect(requests[0].url).toBe(`${ARCHITECT}/solution-blueprints/by-search-string`);
    expect(result).toBe(
      '# Solution Blueprints Table\n\n' +
        'Solution Blueprints found from the search string: `Trials`\n\n' +
        '| Blueprint Name | Qualified Name | Version | Description | \n' +
        '|-------------|-------------|-------------|-------------|\n' +
        '| Trials | SolutionBlueprint::Trials | V1 |  | \n'
    );
  });

  it('should link a component to a blueprint', async () => {
    const requests = stubFetch();

    await client.linkSolutionComponentToBlueprint('b-1', 'c-1');

    expect(requests[0].url).toBe(`${ARCHITECT}/solution-blueprints/b-1/solution-components/c-1/attach`);
    expect(requests[0].body).toBeUndefined();
  });

  it('should wire two components', async () => {
    const requests = stubFetch();

    await client.linkSolutionLinkingWire('c-1', 'c-2', {
      properties: { class: 'SolutionLinkingWireProperties', label: 'feeds' },
    });

    expect(requests[0].url).toBe(`${ARCHITECT}/solution-components/c-1/wired-to/c-2/attach`);
    expect(requests[0].body).toEqual({
      class: 'NewRelationshipRequestBody',
      properties: { class: 'SolutionLinkingWireProperties', label: 'feeds' },
    });
  });

  it('should ask for supply chain implementations by default', async () => {
    const requests = stubFetch({ element: element('s-1', 'InformationSupplyChain', { displayName: 'Trial Data' }) });

    await client.getInfoSupplyChainByGuid('s-1');

    expect(requests[0].url).toBe(`${ARCHITECT}/information-supply-chains/s-1/retrieve?addImplementation=true`);
  });

  it('should link a role to a component', async () => {
    const requests = stubFetch();

    await client.linkComponentToActor('r-1', 'c-1');

    expect(requests[0].url).toBe(`${ARCHITECT}/solution-roles/r-1/solution-component-actors/c-1/attach`);
  });

  it('should delete a component with cascade', async () => {
    const requests = stubFetch();

    await client.deleteSolutionComponent('c-1', true);

    expect(requests[0].url).toBe(`${ARCHITECT}/solution-components/c-1/delete`);
    expect(requests[0].body).toEqual({ class: 'DeleteRequestBody', cascadeDelete: true });
  });
});
