/**
 * Element-level operations shared by every view-service client: GUID and
 * qualified-name resolution plus the generic find, get, create, update and
 * delete request helpers the resource clients are written in terms of.
 */

import { InvalidParameterException, bodySlimmer } from '@egeria-sdk/core';
import { BaseClient } from './BaseClient.js';
import { NO_ELEMENTS_FOUND, NO_GUID_RETURNED, type NotFound, type OutputFormat } from './constants.js';
import { type EgeriaElement, elementGuid, field, stringField, toElementList } from './elements.js';
import type { ClientOptions, EgeriaResponse } from './IEgeriaClient.js';
import type { FormattedOutput, OutputGenerator } from './output/OutputFormatter.js';
import {
  DeleteRequestBodySchema,
  FilterRequestBodySchema,
  GetRequestBodySchema,
  NewElementRequestBodySchema,
  NewRelationshipRequestBodySchema,
  ResultsRequestBodySchema,
  SearchStringRequestBodySchema,
  TemplateRequestBodySchema,
  UpdateElementRequestBodySchema,
  UpdateStatusRequestBodySchema,
  requirePropertyClass,
  validateBody,
  type DeleteRequestBody,
  type FilterRequestBody,
  type GetRequestBody,
  type NewElementRequestBody,
  type NewRelationshipRequestBody,
  type ResultsRequestBody,
  type SearchStringRequestBody,
  type TemplateRequestBody,
  type UpdateElementRequestBody,
  type UpdateStatusRequestBody,
} from './RequestBodies.js';

/**
 * What a query method returns: the raw element(s) for JSON, the formatted
 * output otherwise, or a "nothing found" sentinel.
 */
export type QueryResult = FormattedOutput | EgeriaElement | NotFound;

/** Paging and output options common to list queries. */
export interface QueryOptions {
  startFrom?: number;
  /** Defaults to the client's page size */
  pageSize?: number;
  outputFormat?: OutputFormat;
}

/** Options of a search-string query. */
export interface FindOptions extends QueryOptions {
  startsWith?: boolean;
  endsWith?: boolean;
  ignoreCase?: boolean;
  metadataElementTypeName?: string;
  metadataElementSubtypeNames?: string[];
  includeOnlyClassifiedElements?: string[];
  /** Complete request body; replaces every other option but outputFormat */
  body?: SearchStringRequestBody;
}

/** Options of a name (filter) query. */
export interface FilterOptions extends QueryOptions {
  classificationNames?: string[];
  body?: FilterRequestBody;
}

/** Options of a by-GUID query. */
export interface GetOptions {
  outputFormat?: OutputFormat;
  body?: GetRequestBody;
}

/** Options of a results query. */
export interface ResultsOptions extends QueryOptions {
  body?: ResultsRequestBody;
}

/** Ways to identify an element for getGuid. */
export interface ElementIdentity {
  guid?: string;
  displayName?: string;
  /** Property the display name is matched against (default qualifiedName) */
  propertyName?: string;
  qualifiedName?: string;
  /** Technology type prefixed to the display name to form a qualified name */
  techType?: string;
}

/** Properties searched when resolving a name to a GUID. */
export const NAME_PROPERTIES = ['qualifiedName', 'displayName', 'name', 'title'] as const;

const LINEAGE_QUERY = 'forLineage=false&forDuplicateProcessing=false';

/**
 * Builds a query string, skipping undefined values. Booleans are written
 * as `true`/`false`.
 */
export function queryString(params: Record<string, string | number | boolean | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }
  const text = search.toString();
  return text === '' ? '' : `?${text}`;
}

/**
 * Client for one view server with the element helpers shared by all
 * resource clients.
 */
export class ServerClient extends BaseClient {
  /** Prefix applied to generated qualified names; empty for none */
  readonly localQualifier: string;

  constructor(options: ClientOptions) {
    super(options);
    this.localQualifier = options.localQualifier ?? process.env.EGERIA_LOCAL_QUALIFIER ?? '';
  }

  /**
   * Root URL of a view service, e.g. `commandRoot('glossary-manager')`.
   */
  commandRoot(service: string): string {
    return `${this.platformUrl}/servers/${this.viewServer}/api/open-metadata/${service}`;
  }

  /**
   * Builds `[qualifier::]type::name[::version]`, with whitespace in the name
   * replaced by dashes.
   */
  createQualifiedName(type: string, displayName: string | undefined, localQualifier?: string, version?: string): string {
    if (displayName === undefined || displayName.trim() === '') {
      throw new InvalidParameterException('display name is missing', {
        context: this.context('createQualifiedName'),
        additionalInfo: { type },
      });
    }
    const qualifier = localQualifier ?? this.localQualifier;
    let qName = `${type}::${displayName.trim().replace(/\s/g, '-')}`;
    if (qualifier) {
      qName = `${qualifier}::${qName}`;
    }
    if (version) {
      qName = `${qName}::${version}`;
    }
    return qName;
  }

  /**
   * Resolves an element to its GUID. A given GUID is returned unchanged; a
   * qualified name is preferred over a display name.
   */
  async getGuid(identity: ElementIdentity): Promise<string> {
    if (identity.guid) {
      return identity.guid;
    }
    const propertyName = identity.propertyName ?? 'qualifiedName';
    if (identity.qualifiedName) {
      return this.getElementGuidByUniqueName(identity.qualifiedName, 'qualifiedName');
    }
    if (identity.displayName) {
      const name =
        identity.techType && propertyName === 'qualifiedName'
          ? `${identity.techType}::${identity.displayName}`
          : identity.displayName;
      return this.getElementGuidByUniqueName(name, propertyName);
    }
    throw new InvalidParameterException('neither a GUID nor a name was provided', {
      context: this.context('getGuid'),
      additionalInfo: { ...identity },
    });
  }

  /**
   * Gets the GUID of the element whose unique property matches a name.
   */
  async getElementGuidByUniqueName(name: string, propertyName = 'qualifiedName'): Promise<string> {
    const url = `${this.commandRoot('classification-manager')}/elements/guid-by-unique-name?${LINEAGE_QUERY}`;
    const response = await this.post(
      url,
      { class: 'NameRequestBody', name, namePropertyName: propertyName },
      'getElementGuidByUniqueName'
    );
    return stringField(response.body, 'guid') ?? NO_ELEMENTS_FOUND;
  }

  /**
   * Finds elements where one of the named properties exactly equals a value.
   */
  async getElementsByPropertyValue(
    propertyValue: string,
    propertyNames: readonly string[],
    typeName?: string
  ): Promise<EgeriaElement[] | typeof NO_ELEMENTS_FOUND> {
    const url =
      `${this.commandRoot('classification-explorer')}/elements/by-exact-property-value` +
      `?startFrom=0&pageSize=${this.pageSize}&${LINEAGE_QUERY}`;
    const response = await this.post(
      url,
      {
        class: 'FindPropertyNamesProperties',
        propertyValue,
        propertyNames: [...propertyNames],
        metadataElementTypeName: typeName,
      },
      'getElementsByPropertyValue'
    );
    const elements = field(response.body, 'elements');
    if (!Array.isArray(elements) || elements.length === 0) {
      return NO_ELEMENTS_FOUND;
    }
    return toElementList(elements);
  }

  /**
   * Gets the GUID of the only element with a matching name.
   * @throws InvalidParameterException when more than one element matches
   */
  async getGuidForName(name: string, typeName?: string): Promise<string> {
    const elements = await this.getElementsByPropertyValue(name, NAME_PROPERTIES, typeName);
    if (elements === NO_ELEMENTS_FOUND) {
      return NO_ELEMENTS_FOUND;
    }
    if (elements.length > 1) {
      throw new InvalidParameterException(`multiple elements found for name '${name}'`, {
        context: this.context('getGuidForName'),
        additionalInfo: { name, matches: elements.length },
      });
    }
    return elementGuid(elements[0]) ?? NO_ELEMENTS_FOUND;
  }

  /**
   * Gets any element by its GUID.
   */
  async getElementByGuid(guid: string): Promise<EgeriaElement | typeof NO_ELEMENTS_FOUND> {
    const url = `${this.commandRoot('classification-manager')}/elements/${guid}?${LINEAGE_QUERY}`;
    const response = await this.post(url, { class: 'EffectiveTimeQueryRequestBody' }, 'getElementByGuid');
    const [element] = toElementList(field(response.body, 'element'));
    return element ?? NO_ELEMENTS_FOUND;
  }

  /**
   * Sets the lifecycle status of any element.
   */
  async updateElementStatus(guid: string, status?: string, body?: UpdateStatusRequestBody): Promise<void> {
    const url = `${this.commandRoot('classification-manager')}/elements/${guid}/update-status`;
    await this.updateStatusRequest(url, status, body);
  }

  /**
   * Search-string query reading `elements`. A search string of `*` matches everything.
   */
  protected async findRequest(
    url: string,
    entityType: string,
    generator: OutputGenerator,
    searchString = '*',
    options: FindOptions = {}
  ): Promise<QueryResult> {
    const search = searchString === '*' ? undefined : searchString;
    const body = validateBody(
      SearchStringRequestBodySchema,
      options.body ?? {
        searchString: search,
        startsWith: options.startsWith ?? true,
        endsWith: options.endsWith ?? false,
        ignoreCase: options.ignoreCase ?? false,
        startFrom: options.startFrom ?? 0,
        pageSize: options.pageSize ?? this.pageSize,
        metadataElementTypeName: options.metadataElementTypeName,
        metadataElementSubtypeNames: options.metadataElementSubtypeNames,
        includeOnlyClassifiedElements: options.includeOnlyClassifiedElements,
      },
      this.context('findRequest')
    );
    const response = await this.post(url, body, 'findRequest');
    const elements = field(response.body, 'elements');
    if (elements === undefined || typeof elements === 'string') {
      this.log.info(NO_ELEMENTS_FOUND, { url });
      return NO_ELEMENTS_FOUND;
    }
    return this.render(toElementList(elements), search, entityType, generator, options.outputFormat);
  }

  /**
   * Name (filter) query reading `elements`; an empty list is "nothing found".
   */
  protected async getNameRequest(
    url: string,
    entityType: string,
    generator: OutputGenerator,
    filter: string,
    options: FilterOptions = {}
  ): Promise<QueryResult> {
    const filterString = filter === '*' ? undefined : filter;
    const body = validateBody(
      FilterRequestBodySchema,
      options.body ?? {
        filter: filterString,
        startFrom: options.startFrom ?? 0,
        pageSize: options.pageSize ?? this.pageSize,
        includeOnlyClassifiedElements: options.classificationNames,
      },
      this.context('getNameRequest')
    );
    const response = await this.post(url, body, 'getNameRequest');
    const elements = toElementList(field(response.body, 'elements'));
    if (elements.length === 0) {
      this.log.info(NO_ELEMENTS_FOUND, { url });
      return NO_ELEMENTS_FOUND;
    }
    return this.render(elements, filterString, entityType, generator, options.outputFormat);
  }

  /**
   * By-GUID query reading `element`.
   */
  protected async getGuidRequest(
    url: string,
    entityType: string,
    generator: OutputGenerator,
    options: GetOptions = {}
  ): Promise<QueryResult> {
    const body = validateBody(
      GetRequestBodySchema,
      options.body ?? { metadataElementTypeName: entityType.replace(/ /g, '') },
      this.context('getGuidRequest')
    );
    const response = await this.post(url, body, 'getGuidRequest');
    const element = field(response.body, 'element');
    const [first] = toElementList(element);
    if (first === undefined) {
      this.log.info(NO_ELEMENTS_FOUND, { url });
      return NO_ELEMENTS_FOUND;
    }
    if ((options.outputFormat ?? 'JSON') === 'JSON') {
      return first;
    }
    return generator([first], 'GUID', entityType, options.outputFormat ?? 'JSON');
  }

  /**
   * Results query reading `elements`, or `element` when there is no list.
   */
  protected async getResultsRequest(
    url: string,
    entityType: string,
    generator: OutputGenerator,
    options: ResultsOptions = {}
  ): Promise<QueryResult> {
    const body = validateBody(
      ResultsRequestBodySchema,
      options.body ?? { startFrom: options.startFrom ?? 0, pageSize: options.pageSize ?? this.pageSize },
      this.context('getResultsRequest')
    );
    const response = await this.post(url, body, 'getResultsRequest');
    const elements = field(response.body, 'elements') ?? field(response.body, 'element');
    if (elements === undefined || typeof elements === 'string') {
      this.log.info(NO_ELEMENTS_FOUND, { url });
      return NO_ELEMENTS_FOUND;
    }
    return this.render(toElementList(elements), 'Members', entityType, generator, options.outputFormat);
  }

  /**
   * Creates an element; `properties.class` must be one of `propertyClasses`.
   * @returns The new element's GUID, or NO_GUID_RETURNED
   */
  protected async createElementBodyRequest(
    url: string,
    propertyClasses: readonly string[],
    body: NewElementRequestBody
  ): Promise<string> {
    const context = this.context('createElementBodyRequest');
    const validated = validateBody(NewElementRequestBodySchema, body, context);
    requirePropertyClass(validated.properties, propertyClasses, context);
    const response = await this.post(url, validated, 'createElementBodyRequest');
    return stringField(response.body, 'guid') ?? NO_GUID_RETURNED;
  }

  /**
   * Creates an element from a template.
   * @returns The new element's GUID, or NO_GUID_RETURNED
   */
  protected async createElementFromTemplate(url: string, body: TemplateRequestBody): Promise<string> {
    const validated = validateBody(TemplateRequestBodySchema, body, this.context('createElementFromTemplate'));
    const response = await this.post(url, validated, 'createElementFromTemplate');
    return stringField(response.body, 'guid') ?? NO_GUID_RETURNED;
  }

  /**
   * Updates an element's properties.
   */
  protected async updateElementBodyRequest(
    url: string,
    propertyClasses: readonly string[],
    body: UpdateElementRequestBody
  ): Promise<void> {
    const context = this.context('updateElementBodyRequest');
    const validated = validateBody(UpdateElementRequestBodySchema, body, context);
    requirePropertyClass(validated.properties, propertyClasses, context);
    await this.post(url, validated, 'updateElementBodyRequest');
  }

  /**
   * Moves an element to a new status; a body replaces `status`.
   */
  protected async updateStatusRequest(url: string, status?: string, body?: UpdateStatusRequestBody): Promise<void> {
    const validated = validateBody(
      UpdateStatusRequestBodySchema,
      body ?? { newStatus: status },
      this.context('updateStatusRequest')
    );
    await this.post(url, validated, 'updateStatusRequest');
  }

  /**
   * Links two elements. Without a body the request carries none.
   */
  protected async newRelationshipRequest(
    url: string,
    propertyClasses: readonly string[],
    body?: NewRelationshipRequestBody
  ): Promise<void> {
    if (body === undefined) {
      await this.post(url, undefined, 'newRelationshipRequest');
      return;
    }
    const context = this.context('newRelationshipRequest');
    const validated = validateBody(NewRelationshipRequestBodySchema, body, context);
    requirePropertyClass(validated.properties, propertyClasses, context);
    await this.post(url, validated, 'newRelationshipRequest');
  }

  /**
   * Deletes an element.
   */
  protected async deleteRequest(url: string, body?: DeleteRequestBody, cascadeDelete = false): Promise<void> {
    const validated = validateBody(DeleteRequestBodySchema, body ?? { cascadeDelete }, this.context('deleteRequest'));
    await this.post(url, validated, 'deleteRequest');
  }

  /**
   * Removes a relationship. Without a body the request carries none.
   */
  protected async deleteRelationshipRequest(url: string, body?: DeleteRequestBody): Promise<void> {
    if (body === undefined) {
      await this.post(url, undefined, 'deleteRelationshipRequest');
      return;
    }
    const validated = validateBody(DeleteRequestBodySchema, body, this.context('deleteRelationshipRequest'));
    await this.post(url, validated, 'deleteRelationshipRequest');
  }

  /**
   * POSTs a slimmed JSON body.
   */
  protected post(url: string, body: Record<string, unknown> | undefined, caller: string): Promise<EgeriaResponse> {
    return this.makeRequest('POST', url, body === undefined ? undefined : bodySlimmer(body), { caller });
  }

  private render(
    elements: EgeriaElement[],
    searchString: string | undefined,
    entityType: string,
    generator: OutputGenerator,
    outputFormat: OutputFormat = 'JSON'
  ): QueryResult {
    if (outputFormat === 'JSON') {
      return elements;
    }
    return generator(elements, searchString, entityType, outputFormat);
  }
}
