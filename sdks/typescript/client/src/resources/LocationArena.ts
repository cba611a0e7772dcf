/**
 * Locations and the links between locations and other elements.
 */

import type { ClientOptions } from '../IEgeriaClient.js';
import { COLUMNS, extractLocationProperties } from '../output/extractors.js';
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
  type FilterOptions,
  type FindOptions,
  type GetOptions,
  type QueryResult,
} from '../ServerClient.js';

const locationOutput = outputGenerator(extractLocationProperties, COLUMNS.Location);

/**
 * Client of the location arena view service.
 */
export class LocationArena extends ServerClient {
  private readonly arenaRoot: string;

  constructor(options: ClientOptions) {
    super(options);
    this.arenaRoot = this.commandRoot('location-arena');
  }

  async createLocation(body: NewElementRequestBody): Promise<string> {
    return this.createElementBodyRequest(`${this.arenaRoot}/locations`, ['LocationProperties'], body);
  }

  async createLocationFromTemplate(body: TemplateRequestBody): Promise<string> {
    return this.createElementFromTemplate(`${this.arenaRoot}/locations/from-template`, body);
  }

  async updateLocation(guid: string, body: UpdateElementRequestBody): Promise<void> {
    await this.updateElementBodyRequest(`${this.arenaRoot}/locations/${guid}/update`, ['LocationProperties'], body);
  }

  /** Records that two locations are adjacent. */
  async linkPeerLocations(guid1: string, guid2: string, body?: NewRelationshipRequestBody): Promise<void> {
    await this.newRelationshipRequest(
      `${this.arenaRoot}/locations/${guid1}/adjacent-locations/${guid2}/attach`,
      ['AdjacentLocationProperties'],
      body
    );
  }

  async detachPeerLocations(guid1: string, guid2: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(`${this.arenaRoot}/locations/${guid1}/adjacent-locations/${guid2}/detach`, body);
  }

  /** Records that one location lies within another. */
  async linkNestedLocation(guid: string, nestedGuid: string, body?: NewRelationshipRequestBody): Promise<void> {
    await this.newRelationshipRequest(
      `${this.arenaRoot}/locations/${guid}/nested-locations/${nestedGuid}/attach`,
      ['NestedLocationProperties'],
      body
    );
  }

  async detachNestedLocation(guid: string, nestedGuid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(`${this.arenaRoot}/locations/${guid}/nested-locations/${nestedGuid}/detach`, body);
  }

  /** Records that an element is found at a location. */
  async linkKnownLocation(elementGuid: string, locationGuid: string, body?: NewRelationshipRequestBody): Promise<void> {
    await this.newRelationshipRequest(
      `${this.arenaRoot}/elements/${elementGuid}/known-locations/${locationGuid}/attach`,
      ['KnownLocationProperties'],
      body
    );
  }

  async detachKnownLocation(elementGuid: string, locationGuid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.arenaRoot}/elements/${elementGuid}/known-locations/${locationGuid}/detach`,
      body
    );
  }

  async deleteLocation(guid: string, cascade = false, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRequest(`${this.arenaRoot}/locations/${guid}/delete`, body, cascade);
  }

  async findLocations(searchString = '*', options: FindOptions = {}): Promise<QueryResult> {
    return this.findRequest(`${this.arenaRoot}/locations/by-search-string`, 'Location', locationOutput, searchString, options);
  }

  async getLocationsByName(name: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(`${this.arenaRoot}/locations/by-name`, 'Location', locationOutput, name, options);
  }

  async getLocationByGuid(guid: string, options: GetOptions = {}): Promise<QueryResult> {
    return this.getGuidRequest(`${this.arenaRoot}/locations/${guid}/retrieve`, 'Location', locationOutput, options);
  }
}
