/**
 * Information supply chains, solution blueprints, solution components and
 * the roles that act on them.
 */

import type { ClientOptions } from '../IEgeriaClient.js';
import {
  COLUMNS,
  extractBlueprintProperties,
  extractElementProperties,
  extractSolutionComponentProperties,
  extractSolutionRoleProperties,
  extractSupplyChainProperties,
} from '../output/extractors.js';
import { outputGenerator } from '../output/OutputFormatter.js';
import type {
  DeleteRequestBody,
  NewElementRequestBody,
  NewRelationshipRequestBody,
  TemplateRequestBody,
  UpdateElementRequestBody,
} from '../RequestBodies.js';
import {
  ServerClient,
  queryString,
  type FilterOptions,
  type FindOptions,
  type GetOptions,
  type QueryOptions,
  type QueryResult,
} from '../ServerClient.js';

const supplyChainOutput = outputGenerator(extractSupplyChainProperties);
const blueprintOutput = outputGenerator(extractBlueprintProperties, COLUMNS['Solution Blueprint']);
const componentOutput = outputGenerator(extractSolutionComponentProperties, COLUMNS['Solution Component']);
const roleOutput = outputGenerator(extractSolutionRoleProperties);
const elementOutput = outputGenerator(extractElementProperties, COLUMNS.Element);

/** Options of getInfoSupplyChainByGuid. */
export interface SupplyChainGetOptions extends GetOptions {
  /** Include the elements implementing the chain (default true) */
  addImplementation?: boolean;
}

/**
 * Client of the solution architect view service.
 */
export class SolutionArchitect extends ServerClient {
  private readonly architectRoot: string;

  constructor(options: ClientOptions) {
    super(options);
    this.architectRoot = this.commandRoot('solution-architect');
  }

  // Information supply chains

  async createInfoSupplyChain(body: NewElementRequestBody): Promise<string> {
    return this.createElementBodyRequest(
      `${this.architectRoot}/information-supply-chains`,
      ['InformationSupplyChainProperties'],
      body
    );
  }

  async createInfoSupplyChainFromTemplate(body: TemplateRequestBody): Promise<string> {
    return this.createElementFromTemplate(`${this.architectRoot}/information-supply-chains/from-template`, body);
  }

  async updateInfoSupplyChain(guid: string, body: UpdateElementRequestBody): Promise<void> {
    await this.updateElementBodyRequest(
      `${this.architectRoot}/information-supply-chains/${guid}/update`,
      ['InformationSupplyChainProperties'],
      body
    );
  }

  /** Links two supply chains that pass data between each other. */
  async linkPeerInfoSupplyChains(peer1Guid: string, peer2Guid: string, body?: NewRelationshipRequestBody): Promise<void> {
    await this.newRelationshipRequest(
      `${this.architectRoot}/information-supply-chains/${peer1Guid}/peer-links/${peer2Guid}/attach`,
      ['InformationSupplyChainLinkProperties'],
      body
    );
  }

  async unlinkPeerInfoSupplyChains(peer1Guid: string, peer2Guid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.architectRoot}/information-supply-chains/${peer1Guid}/peer-links/${peer2Guid}/detach`,
      body
    );
  }

  /** Makes one supply chain a segment of another. */
  async composeInfoSupplyChains(
    chainGuid: string,
    nestedChainGuid: string,
    body?: NewRelationshipRequestBody
  ): Promise<void> {
    await this.newRelationshipRequest(
      `${this.architectRoot}/information-supply-chains/${chainGuid}/compositions/${nestedChainGuid}/attach`,
      ['InformationSupplyChainCompositionProperties'],
      body
    );
  }

  async decomposeInfoSupplyChains(chainGuid: string, nestedChainGuid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.architectRoot}/information-supply-chains/${chainGuid}/compositions/${nestedChainGuid}/detach`,
      body
    );
  }

  async deleteInfoSupplyChain(guid: string, cascade = false, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRequest(`${this.architectRoot}/information-supply-chains/${guid}/delete`, body, cascade);
  }

  async findInformationSupplyChains(searchString = '*', options: FindOptions = {}): Promise<QueryResult> {
    return this.findRequest(
      `${this.architectRoot}/information-supply-chains/by-search-string`,
      'Information Supply Chain',
      supplyChainOutput,
      searchString,
      options
    );
  }

  async getInfoSupplyChainsByName(name: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(
      `${this.architectRoot}/information-supply-chains/by-name`,
      'Information Supply Chain',
      supplyChainOutput,
      name,
      options
    );
  }

  async getInfoSupplyChainByGuid(guid: string, options: SupplyChainGetOptions = {}): Promise<QueryResult> {
    const query = queryString({ addImplementation: options.addImplementation ?? true });
    return this.getGuidRequest(
      `${this.architectRoot}/information-supply-chains/${guid}/retrieve${query}`,
      'Information Supply Chain',
      supplyChainOutput,
      options
    );
  }

  // Solution blueprints

  async createSolutionBlueprint(body: NewElementRequestBody): Promise<string> {
    return this.createElementBodyRequest(`${this.architectRoot}/solution-blueprints`, ['SolutionBlueprintProperties'], body);
  }

  async createSolutionBlueprintFromTemplate(body: TemplateRequestBody): Promise<string> {
    return this.createElementFromTemplate(`${this.architectRoot}/solution-blueprints/from-template`, body);
  }

  async updateSolutionBlueprint(guid: string, body: UpdateElementRequestBody): Promise<void> {
    await this.updateElementBodyRequest(
      `${this.architectRoot}/solution-blueprints/${guid}/update`,
      ['SolutionBlueprintProperties'],
      body
    );
  }

  async deleteSolutionBlueprint(guid: string, cascade = false, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRequest(`${this.architectRoot}/solution-blueprints/${guid}/delete`, body, cascade);
  }

  async linkSolutionComponentToBlueprint(
    blueprintGuid: string,
    componentGuid: string,
    body?: NewRelationshipRequestBody
  ): Promise<void> {
    await this.newRelationshipRequest(
      `${this.architectRoot}/solution-blueprints/${blueprintGuid}/solution-components/${componentGuid}/attach`,
      ['SolutionComponentCompositionProperties'],
      body
    );
  }

  async detachSolutionComponentFromBlueprint(
    blueprintGuid: string,
    componentGuid: string,
    body?: DeleteRequestBody
  ): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.architectRoot}/solution-blueprints/${blueprintGuid}/solution-components/${componentGuid}/detach`,
      body
    );
  }

  async findSolutionBlueprints(searchString = '*', options: FindOptions = {}): Promise<QueryResult> {
    return this.findRequest(
      `${this.architectRoot}/solution-blueprints/by-search-string`,
      'Solution Blueprint',
      blueprintOutput,
      searchString,
      options
    );
  }

  async getSolutionBlueprintsByName(name: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(
      `${this.architectRoot}/solution-blueprints/by-name`,
      'Solution Blueprint',
      blueprintOutput,
      name,
      options
    );
  }

  async getSolutionBlueprintByGuid(guid: string, options: GetOptions = {}): Promise<QueryResult> {
    return this.getGuidRequest(
      `${this.architectRoot}/solution-blueprints/${guid}/retrieve`,
      'Solution Blueprint',
      blueprintOutput,
      options
    );
  }

  // Solution components

  async createSolutionComponent(body: NewElementRequestBody): Promise<string> {
    return this.createElementBodyRequest(`${this.architectRoot}/solution-components`, ['SolutionComponentProperties'], body);
  }

  async createSolutionComponentFromTemplate(body: TemplateRequestBody): Promise<string> {
    return this.createElementFromTemplate(`${this.architectRoot}/solution-components/from-template`, body);
  }

  async updateSolutionComponent(guid: string, body: UpdateElementRequestBody): Promise<void> {
    await this.updateElementBodyRequest(
      `${this.architectRoot}/solution-components/${guid}/update`,
      ['SolutionComponentProperties'],
      body
    );
  }

  async linkSubcomponent(componentGuid: string, subComponentGuid: string, body?: NewRelationshipRequestBody): Promise<void> {
    await this.newRelationshipRequest(
      `${this.architectRoot}/solution-components/${componentGuid}/subcomponents/${subComponentGuid}/attach`,
      ['SolutionCompositionProperties'],
      body
    );
  }

  async detachSubcomponent(componentGuid: string, subComponentGuid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.architectRoot}/solution-components/${componentGuid}/subcomponents/${subComponentGuid}/detach`,
      body
    );
  }

  /** Records that two components exchange data. */
  async linkSolutionLinkingWire(
    component1Guid: string,
    component2Guid: string,
    body?: NewRelationshipRequestBody
  ): Promise<void> {
    await this.newRelationshipRequest(
      `${this.architectRoot}/solution-components/${component1Guid}/wired-to/${component2Guid}/attach`,
      ['SolutionLinkingWireProperties'],
      body
    );
  }

  async detachSolutionLinkingWire(component1Guid: string, component2Guid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.architectRoot}/solution-components/${component1Guid}/wired-to/${component2Guid}/detach`,
      body
    );
  }

  async deleteSolutionComponent(guid: string, cascade = false, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRequest(`${this.architectRoot}/solution-components/${guid}/delete`, body, cascade);
  }

  async findSolutionComponents(searchString = '*', options: FindOptions = {}): Promise<QueryResult> {
    return this.findRequest(
      `${this.architectRoot}/solution-components/by-search-string`,
      'Solution Component',
      componentOutput,
      searchString,
      options
    );
  }

  async getSolutionComponentsByName(name: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(
      `${this.architectRoot}/solution-components/by-name`,
      'Solution Component',
      componentOutput,
      name,
      options
    );
  }

  async getSolutionComponentByGuid(guid: string, options: GetOptions = {}): Promise<QueryResult> {
    return this.getGuidRequest(
      `${this.architectRoot}/solution-components/${guid}/retrieve`,
      'Solution Component',
      componentOutput,
      options
    );
  }

  /** Elements that implement a solution component. */
  async getSolutionComponentImplementations(guid: string, options: QueryOptions = {}): Promise<QueryResult> {
    return this.getResultsRequest(
      `${this.architectRoot}/solution-components/${guid}/implementations`,
      'Element',
      elementOutput,
      options
    );
  }

  // Solution roles

  async createSolutionRole(body: NewElementRequestBody): Promise<string> {
    return this.createElementBodyRequest(`${this.architectRoot}/solution-roles`, ['SolutionRoleProperties'], body);
  }

  async createSolutionRoleFromTemplate(body: TemplateRequestBody): Promise<string> {
    return this.createElementFromTemplate(`${this.architectRoot}/solution-roles/from-template`, body);
  }

  async updateSolutionRole(guid: string, body: UpdateElementRequestBody): Promise<void> {
    await this.updateElementBodyRequest(`${this.architectRoot}/solution-roles/${guid}/update`, ['SolutionRoleProperties'], body);
  }

  /** Records that a role acts on a solution component. */
  async linkComponentToActor(roleGuid: string, componentGuid: string, body?: NewRelationshipRequestBody): Promise<void> {
    await this.newRelationshipRequest(
      `${this.architectRoot}/solution-roles/${roleGuid}/solution-component-actors/${componentGuid}/attach`,
      ['SolutionComponentActorProperties'],
      body
    );
  }

  async detachComponentActor(roleGuid: string, componentGuid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.architectRoot}/solution-roles/${roleGuid}/solution-component-actors/${componentGuid}/detach`,
      body
    );
  }

  async deleteSolutionRole(guid: string, cascade = false, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRequest(`${this.architectRoot}/solution-roles/${guid}/delete`, body, cascade);
  }

  async findSolutionRoles(searchString = '*', options: FindOptions = {}): Promise<QueryResult> {
    return this.findRequest(
      `${this.architectRoot}/solution-roles/by-search-string`,
      'Solution Role',
      roleOutput,
      searchString,
      options
    );
  }

  async getSolutionRolesByName(name: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(`${this.architectRoot}/solution-roles/by-name`, 'Solution Role', roleOutput, name, options);
  }

  async getSolutionRoleByGuid(guid: string, options: GetOptions = {}): Promise<QueryResult> {
    return this.getGuidRequest(`${this.architectRoot}/solution-roles/${guid}/retrieve`, 'Solution Role', roleOutput, options);
  }
}
