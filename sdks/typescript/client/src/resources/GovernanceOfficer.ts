/**
 * Governance definitions: strategies, principles, regulations, controls and
 * the relationships between them.
 */

import type { ClientOptions } from '../IEgeriaClient.js';
import { COLUMNS, extractGovernanceDefinitionProperties } from '../output/extractors.js';
import { outputGenerator } from '../output/OutputFormatter.js';
import type {
  DeleteRequestBody,
  NewElementRequestBody,
  NewRelationshipRequestBody,
  TemplateRequestBody,
  UpdateElementRequestBody,
  UpdateStatusRequestBody,
} from '../RequestBodies.js';
import {
  ServerClient,
  type FilterOptions,
  type FindOptions,
  type GetOptions,
  type QueryResult,
} from '../ServerClient.js';

/** Property classes accepted for governance definitions. */
export const GOVERNANCE_DEFINITION_PROPERTY_CLASSES = [
  'GovernanceDefinitionProperties',
  'GovernanceStrategyProperties',
  'RegulationProperties',
  'GovernanceControlProperties',
  'SecurityGroupProperties',
  'NamingStandardRuleProperties',
  'CertificationTypeProperties',
  'LicenseTypeProperties',
  'GovernanceApproachProperties',
  'GovernanceProcessingPurposeProperties',
  'BusinessImperativeProperties',
  'RegulationArticleProperties',
  'ThreatProperties',
] as const;

const definitionOutput = outputGenerator(extractGovernanceDefinitionProperties, COLUMNS['Governance Definition']);

/**
 * Client of the governance officer view service.
 */
export class GovernanceOfficer extends ServerClient {
  private readonly definitionsRoot: string;

  constructor(options: ClientOptions) {
    super(options);
    this.definitionsRoot = `${this.commandRoot('governance-officer')}/governance-definitions`;
  }

  async createGovernanceDefinition(body: NewElementRequestBody): Promise<string> {
    return this.createElementBodyRequest(this.definitionsRoot, GOVERNANCE_DEFINITION_PROPERTY_CLASSES, body);
  }

  async createGovernanceDefinitionFromTemplate(body: TemplateRequestBody): Promise<string> {
    return this.createElementFromTemplate(`${this.definitionsRoot}/from-template`, body);
  }

  async updateGovernanceDefinition(guid: string, body: UpdateElementRequestBody): Promise<void> {
    await this.updateElementBodyRequest(
      `${this.definitionsRoot}/${guid}/update`,
      GOVERNANCE_DEFINITION_PROPERTY_CLASSES,
      body
    );
  }

  async updateGovernanceDefinitionStatus(guid: string, status?: string, body?: UpdateStatusRequestBody): Promise<void> {
    await this.updateStatusRequest(`${this.definitionsRoot}/${guid}/update-status`, status, body);
  }

  async deleteGovernanceDefinition(guid: string, cascade = false, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRequest(`${this.definitionsRoot}/${guid}/delete`, body, cascade);
  }

  /**
   * Links two definitions of equal standing with a relationship such as
   * GovernedBy or RegulationCertificationType.
   */
  async linkPeerDefinitions(
    guid1: string,
    relationshipType: string,
    guid2: string,
    body?: NewRelationshipRequestBody
  ): Promise<void> {
    await this.newRelationshipRequest(
      `${this.definitionsRoot}/${guid1}/peer-definitions/${relationshipType}/${guid2}/attach`,
      ['PeerDefinitionProperties'],
      body
    );
  }

  async detachPeerDefinitions(
    guid1: string,
    relationshipType: string,
    guid2: string,
    body?: DeleteRequestBody
  ): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.definitionsRoot}/${guid1}/peer-definitions/${relationshipType}/${guid2}/detach`,
      body
    );
  }

  /**
   * Links a definition to one that supports it, e.g. a control to the
   * principle it enforces.
   */
  async attachSupportingDefinitions(
    guid1: string,
    relationshipType: string,
    guid2: string,
    body?: NewRelationshipRequestBody
  ): Promise<void> {
    await this.newRelationshipRequest(
      `${this.definitionsRoot}/${guid1}/supporting-definitions/${relationshipType}/${guid2}/attach`,
      ['SupportingDefinitionProperties'],
      body
    );
  }

  async detachSupportingDefinitions(
    guid1: string,
    relationshipType: string,
    guid2: string,
    body?: DeleteRequestBody
  ): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.definitionsRoot}/${guid1}/supporting-definitions/${relationshipType}/${guid2}/detach`,
      body
    );
  }

  async findGovernanceDefinitions(searchString = '*', options: FindOptions = {}): Promise<QueryResult> {
    return this.findRequest(
      `${this.definitionsRoot}/by-search-string`,
      'Governance Definition',
      definitionOutput,
      searchString,
      options
    );
  }

  async getGovernanceDefinitionsByName(name: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(`${this.definitionsRoot}/by-name`, 'Governance Definition', definitionOutput, name, options);
  }

  async getGovernanceDefinitionByGuid(guid: string, options: GetOptions = {}): Promise<QueryResult> {
    return this.getGuidRequest(`${this.definitionsRoot}/${guid}/retrieve`, 'Governance Definition', definitionOutput, options);
  }
}
