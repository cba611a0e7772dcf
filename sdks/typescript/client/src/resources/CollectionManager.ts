/**
 * Collections: folders, data dictionaries, data specs, digital products and
 * agreements, plus their membership.
 */

import { NO_ELEMENTS_FOUND } from '../constants.js';
import { field, toElementList } from '../elements.js';
import type { ClientOptions } from '../IEgeriaClient.js';
import { COLUMNS, extractCollectionProperties, extractElementProperties } from '../output/extractors.js';
import { outputGenerator } from '../output/OutputFormatter.js';
import {
  type DeleteRequestBody,
  type NewElementRequestBody,
  type NewRelationshipRequestBody,
  type TemplateRequestBody,
  type UpdateElementRequestBody,
  type UpdateStatusRequestBody,
  ResultsRequestBodySchema,
  validateBody,
} from '../RequestBodies.js';
import {
  ServerClient,
  type FilterOptions,
  type FindOptions,
  type GetOptions,
  type QueryResult,
  type ResultsOptions,
  queryString,
} from '../ServerClient.js';

/** Property classes accepted for collections and their subtypes. */
export const COLLECTION_PROPERTY_CLASSES = [
  'CollectionProperties',
  'DataDictionaryProperties',
  'DataSpecProperties',
  'DigitalProductProperties',
  'AgreementProperties',
] as const;

const collectionOutput = outputGenerator(extractCollectionProperties, COLUMNS.Collection);
const memberOutput = outputGenerator(extractElementProperties, COLUMNS.Element);

/** Simple form of a new collection. */
export interface NewCollection {
  displayName: string;
  description?: string;
  /** Free-text grouping, searched by getCollectionsByType */
  collectionType?: string;
  /**
   * Classifications such as Folder or RootCollection; the first also
   * prefixes the generated qualified name.
   */
  classifications?: string[];
}

/**
 * Client of the collection manager view service.
 */
export class CollectionManager extends ServerClient {
  private readonly collectionsRoot: string;
  private readonly elementsRoot: string;

  constructor(options: ClientOptions) {
    super(options);
    this.collectionsRoot = `${this.commandRoot('collection-manager')}/collections`;
    this.elementsRoot = `${this.commandRoot('collection-manager')}/metadata-elements`;
  }

  /** Collections attached to a parent element. */
  async getAttachedCollections(parentGuid: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(
      `${this.elementsRoot}/${parentGuid}/collections`,
      'Collection',
      collectionOutput,
      '*',
      options
    );
  }

  async findCollections(searchString = '*', options: FindOptions = {}): Promise<QueryResult> {
    return this.findRequest(`${this.collectionsRoot}/by-search-string`, 'Collection', collectionOutput, searchString, options);
  }

  async getCollectionsByName(name: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(`${this.collectionsRoot}/by-name`, 'Collection', collectionOutput, name, options);
  }

  async getCollectionsByType(collectionType: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(
      `${this.collectionsRoot}/by-collection-type`,
      'Collection',
      collectionOutput,
      collectionType,
      options
    );
  }

  async getCollectionByGuid(guid: string, options: GetOptions = {}): Promise<QueryResult> {
    return this.getGuidRequest(`${this.collectionsRoot}/${guid}/retrieve`, 'Collection', collectionOutput, options);
  }

  async getCollectionMembers(guid: string, options: ResultsOptions = {}): Promise<QueryResult> {
    return this.getResultsRequest(`${this.collectionsRoot}/${guid}/members`, 'Element', memberOutput, options);
  }

  /** A collection with its nested collections. */
  async getCollectionHierarchy(guid: string, options: ResultsOptions = {}): Promise<QueryResult> {
    return this.getResultsRequest(`${this.collectionsRoot}/${guid}/hierarchy`, 'Collection', collectionOutput, options);
  }

  /**
   * The nested members of a collection and the elements linked to it, with a
   * mermaid graph. Sends no body unless one is given.
   */
  async getCollectionGraph(guid: string, options: ResultsOptions = {}): Promise<QueryResult> {
    const url = `${this.collectionsRoot}/${guid}/graph${queryString({
      startFrom: options.startFrom ?? 0,
      pageSize: options.pageSize ?? this.pageSize,
    })}`;
    const body =
      options.body === undefined
        ? undefined
        : validateBody(ResultsRequestBodySchema, options.body, this.context('getCollectionGraph'));
    const response = await this.post(url, body, 'getCollectionGraph');
    const [graph] = toElementList(field(response.body, 'graph'));
    if (graph === undefined) {
      this.log.info(NO_ELEMENTS_FOUND, { url });
      return NO_ELEMENTS_FOUND;
    }
    if ((options.outputFormat ?? 'JSON') === 'JSON') {
      return graph;
    }
    return collectionOutput([graph], guid, 'Collection', options.outputFormat ?? 'JSON');
  }

  /** Creates a collection from a full request body. */
  async createCollectionFromBody(body: NewElementRequestBody): Promise<string> {
    return this.createElementBodyRequest(this.collectionsRoot, COLLECTION_PROPERTY_CLASSES, body);
  }

  /**
   * Creates a collection anchored to itself; the qualified name is generated
   * from the display name.
   */
  async createCollection(collection: NewCollection): Promise<string> {
    const { displayName, description, collectionType, classifications = [] } = collection;
    const [prefix = 'Collection'] = classifications;
    const initialClassifications: Record<string, Record<string, unknown>> = {};
    for (const name of classifications) {
      initialClassifications[name] = { class: `${name}Properties` };
    }
    return this.createCollectionFromBody({
      isOwnAnchor: true,
      initialClassifications: classifications.length > 0 ? initialClassifications : undefined,
      properties: {
        class: 'CollectionProperties',
        qualifiedName: this.createQualifiedName(prefix, displayName),
        displayName,
        description,
        collectionType,
      },
    });
  }

  async createCollectionFromTemplate(body: TemplateRequestBody): Promise<string> {
    return this.createElementFromTemplate(`${this.collectionsRoot}/from-template`, body);
  }

  async updateCollection(guid: string, body: UpdateElementRequestBody): Promise<void> {
    await this.updateElementBodyRequest(`${this.collectionsRoot}/${guid}/update`, COLLECTION_PROPERTY_CLASSES, body);
  }

  async updateCollectionStatus(guid: string, status?: string, body?: UpdateStatusRequestBody): Promise<void> {
    await this.updateStatusRequest(`${this.elementsRoot}/${guid}/update-status`, status, body);
  }

  /** Attaches a collection to a parent element as a resource list. */
  async attachCollection(parentGuid: string, collectionGuid: string, body?: NewRelationshipRequestBody): Promise<void> {
    await this.newRelationshipRequest(
      `${this.elementsRoot}/${parentGuid}/collections/${collectionGuid}/attach`,
      ['ResourceListProperties'],
      body
    );
    this.log.info('Attached collection', { parentGuid, collectionGuid });
  }

  async detachCollection(parentGuid: string, collectionGuid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(`${this.elementsRoot}/${parentGuid}/collections/${collectionGuid}/detach`, body);
  }

  async addToCollection(collectionGuid: string, elementGuid: string, body?: NewRelationshipRequestBody): Promise<void> {
    await this.newRelationshipRequest(
      `${this.collectionsRoot}/${collectionGuid}/members/${elementGuid}/attach`,
      ['CollectionMembershipProperties'],
      body
    );
  }

  async removeFromCollection(collectionGuid: string, elementGuid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(`${this.collectionsRoot}/${collectionGuid}/members/${elementGuid}/detach`, body);
  }

  async deleteCollection(guid: string, cascade = false, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRequest(`${this.collectionsRoot}/${guid}/delete`, body, cascade);
  }
}
