/**
 * Read-only access to glossaries, categories and terms.
 */

import { InvalidParameterException, isRecord } from '@egeria-sdk/core';
import {
  NO_CATEGORIES_FOUND,
  NO_GLOSSARIES_FOUND,
  NO_TERMS_FOUND,
  type NotFound,
  type OutputFormat,
} from '../constants.js';
import { type EgeriaElement, field, toElementList } from '../elements.js';
import type { ClientOptions } from '../IEgeriaClient.js';
import {
  COLUMNS,
  extractCategoryProperties,
  extractGlossaryProperties,
  extractTermProperties,
} from '../output/extractors.js';
import { outputGenerator, type OutputGenerator } from '../output/OutputFormatter.js';
import { ServerClient, queryString, type QueryResult } from '../ServerClient.js';

const glossaryOutput = outputGenerator(extractGlossaryProperties, COLUMNS.Glossary);
const categoryOutput = outputGenerator(extractCategoryProperties, COLUMNS.Category);
const termOutput = outputGenerator(extractTermProperties, COLUMNS.Term);

/** Paging and output options of the browser's list queries. */
export interface BrowseOptions {
  startFrom?: number;
  pageSize?: number;
  effectiveTime?: string;
  outputFormat?: OutputFormat;
}

/** Options of the browser's search-string queries. */
export interface SearchOptions extends BrowseOptions {
  startsWith?: boolean;
  endsWith?: boolean;
  ignoreCase?: boolean;
  forLineage?: boolean;
  forDuplicateProcessing?: boolean;
}

/** Options of term queries. */
export interface TermQueryOptions extends SearchOptions {
  /** Restrict the query to one glossary */
  glossaryGuid?: string;
  /** Only return terms in these statuses */
  statusFilter?: string[];
}

/**
 * Client of the glossary browser view service.
 */
export class GlossaryBrowser extends ServerClient {
  protected readonly browserRoot: string;

  constructor(options: ClientOptions) {
    super(options);
    this.browserRoot = `${this.commandRoot('glossary-browser')}/glossaries`;
  }

  /** Statuses a glossary term may have. */
  async getGlossaryTermStatuses(): Promise<string[]> {
    return this.getNames(`${this.browserRoot}/terms/status-list`, 'statuses', 'getGlossaryTermStatuses');
  }

  /** Statuses a relationship between terms may have. */
  async getGlossaryTermRelStatuses(): Promise<string[]> {
    return this.getNames(
      `${this.browserRoot}/terms/relationships/status-list`,
      'statuses',
      'getGlossaryTermRelStatuses'
    );
  }

  /** Activity types of terms that describe activities. */
  async getGlossaryTermActivityTypes(): Promise<string[]> {
    return this.getNames(`${this.browserRoot}/terms/activity-types`, 'types', 'getGlossaryTermActivityTypes');
  }

  /** Relationship types that may link two terms. */
  async getTermRelationshipTypes(): Promise<string[]> {
    return this.getNames(
      `${this.commandRoot('glossary-manager')}/glossaries/terms/relationships/type-names`,
      'names',
      'getTermRelationshipTypes'
    );
  }

  /**
   * Finds glossaries whose properties match a search string; `*` matches all.
   * @throws InvalidParameterException when the search string is empty
   */
  async findGlossaries(searchString: string, options: SearchOptions = {}): Promise<QueryResult> {
    this.requireSearchString(searchString, 'findGlossaries');
    const search = searchString === '*' ? undefined : searchString;
    const url = `${this.browserRoot}/by-search-string${this.searchQuery(options)}`;
    const elements = await this.browseList(
      url,
      { class: 'SearchStringRequestBody', searchString: search, effectiveTime: options.effectiveTime },
      'findGlossaries'
    );
    return this.present(elements, NO_GLOSSARIES_FOUND, search, 'Glossary', glossaryOutput, options.outputFormat);
  }

  /** Gets a glossary by its GUID. */
  async getGlossaryByGuid(guid: string, options: BrowseOptions = {}): Promise<QueryResult> {
    const element = await this.browseElement(
      `${this.browserRoot}/${guid}/retrieve`,
      { class: 'EffectiveTimeQueryRequestBody', effectiveTime: options.effectiveTime },
      'getGlossaryByGuid'
    );
    return this.present(element, NO_GLOSSARIES_FOUND, 'GUID', 'Glossary', glossaryOutput, options.outputFormat);
  }

  /** Gets the glossaries with exactly this name. */
  async getGlossariesByName(name: string, options: BrowseOptions = {}): Promise<QueryResult> {
    const elements = await this.browseList(
      `${this.browserRoot}/by-name${this.pageQuery(options)}`,
      { class: 'NameRequestBody', name, effectiveTime: options.effectiveTime },
      'getGlossariesByName'
    );
    return this.present(elements, NO_GLOSSARIES_FOUND, name, 'Glossary', glossaryOutput, options.outputFormat);
  }

  /** Gets the glossary a category belongs to. */
  async getGlossaryForCategory(categoryGuid: string, options: BrowseOptions = {}): Promise<QueryResult> {
    const element = await this.browseElement(
      `${this.browserRoot}/for-category/${categoryGuid}/retrieve`,
      { class: 'EffectiveTimeQueryRequestBody', effectiveTime: options.effectiveTime },
      'getGlossaryForCategory'
    );
    return this.present(element, NO_GLOSSARIES_FOUND, 'GUID', 'Glossary', glossaryOutput, options.outputFormat);
  }

  /** Finds categories whose properties match a search string; `*` matches all. */
  async findGlossaryCategories(searchString: string, options: SearchOptions = {}): Promise<QueryResult> {
    this.requireSearchString(searchString, 'findGlossaryCategories');
    const search = searchString === '*' ? undefined : searchString;
    const elements = await this.browseList(
      `${this.browserRoot}/categories/by-search-string${this.searchQuery(options)}`,
      { class: 'SearchStringRequestBody', searchString: search, effectiveTime: options.effectiveTime },
      'findGlossaryCategories'
    );
    return this.present(elements, NO_CATEGORIES_FOUND, search, 'Category', categoryOutput, options.outputFormat);
  }

  /** Gets the categories of a glossary. */
  async getCategoriesForGlossary(glossaryGuid: string, options: BrowseOptions = {}): Promise<QueryResult> {
    const elements = await this.browseList(
      `${this.browserRoot}/${glossaryGuid}/categories/retrieve${this.pageQuery(options)}`,
      undefined,
      'getCategoriesForGlossary'
    );
    return this.present(elements, NO_CATEGORIES_FOUND, undefined, 'Category', categoryOutput, options.outputFormat);
  }

  /** Gets the categories a term is in. */
  async getCategoriesForTerm(termGuid: string, options: BrowseOptions = {}): Promise<QueryResult> {
    const elements = await this.browseList(
      `${this.browserRoot}/terms/${termGuid}/categories/retrieve${this.pageQuery(options)}`,
      undefined,
      'getCategoriesForTerm'
    );
    return this.present(elements, NO_CATEGORIES_FOUND, undefined, 'Category', categoryOutput, options.outputFormat);
  }

  /** Gets the categories with exactly this name, optionally within one glossary. */
  async getCategoriesByName(
    name: string,
    options: BrowseOptions & { glossaryGuid?: string; status?: string[] } = {}
  ): Promise<QueryResult> {
    const elements = await this.browseList(
      `${this.browserRoot}/categories/by-name${this.pageQuery(options)}`,
      {
        class: 'GlossaryNameRequestBody',
        name,
        glossaryGUID: options.glossaryGuid,
        limitResultsByStatus: options.status ?? ['ACTIVE'],
        effectiveTime: options.effectiveTime,
      },
      'getCategoriesByName'
    );
    return this.present(elements, NO_CATEGORIES_FOUND, name, 'Category', categoryOutput, options.outputFormat);
  }

  /** Gets a category by its GUID. */
  async getCategoryByGuid(guid: string, options: BrowseOptions = {}): Promise<QueryResult> {
    const element = await this.browseElement(
      `${this.browserRoot}/categories/${guid}/retrieve`,
      { class: 'EffectiveTimeQueryRequestBody', effectiveTime: options.effectiveTime },
      'getCategoryByGuid'
    );
    return this.present(element, NO_CATEGORIES_FOUND, 'GUID', 'Category', categoryOutput, options.outputFormat);
  }

  /** Gets the terms of a glossary. */
  async getTermsForGlossary(glossaryGuid: string, options: BrowseOptions = {}): Promise<QueryResult> {
    const elements = await this.browseList(
      `${this.browserRoot}/${glossaryGuid}/terms/retrieve${this.pageQuery(options)}`,
      this.effectiveTimeBody(options),
      'getTermsForGlossary'
    );
    return this.present(elements, NO_TERMS_FOUND, undefined, 'Term', termOutput, options.outputFormat);
  }

  /** Gets the terms in a category. */
  async getTermsForCategory(categoryGuid: string, options: BrowseOptions = {}): Promise<QueryResult> {
    const elements = await this.browseList(
      `${this.browserRoot}/categories/${categoryGuid}/terms/retrieve${this.pageQuery(options)}`,
      this.effectiveTimeBody(options),
      'getTermsForCategory'
    );
    return this.present(elements, NO_TERMS_FOUND, undefined, 'Term', termOutput, options.outputFormat);
  }

  /** Gets the terms linked to a term by any term-to-term relationship. */
  async getRelatedTerms(termGuid: string, options: BrowseOptions = {}): Promise<QueryResult> {
    const elements = await this.browseList(
      `${this.browserRoot}/terms/${termGuid}/related-terms${this.pageQuery(options)}`,
      this.effectiveTimeBody(options),
      'getRelatedTerms'
    );
    return this.present(elements, NO_TERMS_FOUND, termGuid, 'Term', termOutput, options.outputFormat);
  }

  /** Gets the glossary that owns a term. */
  async getGlossaryForTerm(termGuid: string, options: BrowseOptions = {}): Promise<QueryResult> {
    const element = await this.browseElement(
      `${this.browserRoot}/for-term/${termGuid}/retrieve`,
      { class: 'EffectiveTimeQueryRequestBody', effectiveTime: options.effectiveTime },
      'getGlossaryForTerm'
    );
    return this.present(element, NO_GLOSSARIES_FOUND, 'GUID', 'Glossary', glossaryOutput, options.outputFormat);
  }

  /** Gets the terms with exactly this name. */
  async getTermsByName(term: string, options: TermQueryOptions = {}): Promise<QueryResult> {
    const query = queryString({
      startFrom: options.startFrom ?? 0,
      pageSize: options.pageSize ?? this.pageSize,
      forLineage: options.forLineage ?? false,
      forDuplicateProcessing: options.forDuplicateProcessing ?? false,
    });
    const elements = await this.browseList(
      `${this.browserRoot}/terms/by-name${query}`,
      {
        class: 'GlossaryNameRequestBody',
        glossaryGUID: options.glossaryGuid,
        name: term,
        effectiveTime: options.effectiveTime,
        limitResultsByStatus: options.statusFilter,
      },
      'getTermsByName'
    );
    return this.present(elements, NO_TERMS_FOUND, term, 'Term', termOutput, options.outputFormat);
  }

  /** Gets a term by its GUID. */
  async getTermByGuid(guid: string, options: { outputFormat?: OutputFormat } = {}): Promise<QueryResult> {
    const element = await this.browseElement(
      `${this.browserRoot}/terms/${guid}/retrieve`,
      undefined,
      'getTermByGuid'
    );
    return this.present(element, NO_TERMS_FOUND, 'GUID', 'Term', termOutput, options.outputFormat);
  }

  /**
   * Finds terms whose properties match a search string; `*` matches all.
   * @throws InvalidParameterException when the search string is empty
   */
  async findGlossaryTerms(searchString: string, options: TermQueryOptions = {}): Promise<QueryResult> {
    this.requireSearchString(searchString, 'findGlossaryTerms');
    const search = searchString === '*' ? undefined : searchString;
    const elements = await this.browseList(
      `${this.browserRoot}/terms/by-search-string${this.searchQuery(options)}`,
      {
        class: 'GlossarySearchStringRequestBody',
        glossaryGUID: options.glossaryGuid,
        searchString: search,
        effectiveTime: options.effectiveTime,
        limitResultsByStatus: options.statusFilter,
      },
      'findGlossaryTerms'
    );
    return this.present(elements, NO_TERMS_FOUND, search, 'Term', termOutput, options.outputFormat);
  }

  /**
   * Renders the result of a browser query, or the sentinel when there is none.
   */
  protected present(
    result: EgeriaElement | EgeriaElement[] | undefined,
    notFound: NotFound,
    searchString: string | undefined,
    entityType: string,
    generator: OutputGenerator,
    outputFormat: OutputFormat = 'JSON'
  ): QueryResult {
    if (result === undefined) {
      return notFound;
    }
    if (outputFormat === 'JSON') {
      return result;
    }
    return generator(Array.isArray(result) ? result : [result], searchString, entityType, outputFormat);
  }

  /**
   * Posts a browser request and reads `elementList`; undefined when absent.
   */
  protected async browseList(
    url: string,
    body: Record<string, unknown> | undefined,
    caller: string
  ): Promise<EgeriaElement[] | undefined> {
    const response = await this.post(url, body, caller);
    const value = field(response.body, 'elementList');
    return Array.isArray(value) ? toElementList(value) : undefined;
  }

  /**
   * Posts a browser request and reads `element`; undefined when absent.
   */
  protected async browseElement(
    url: string,
    body: Record<string, unknown> | undefined,
    caller: string
  ): Promise<EgeriaElement | undefined> {
    const response = await this.post(url, body, caller);
    const value = field(response.body, 'element');
    return isRecord(value) ? value : undefined;
  }

  private async getNames(url: string, key: string, caller: string): Promise<string[]> {
    const response = await this.makeRequest('GET', url, undefined, { caller });
    const names = field(response.body, key);
    return Array.isArray(names) ? names.filter((name): name is string => typeof name === 'string') : [];
  }

  private requireSearchString(searchString: string, caller: string): void {
    if (searchString.trim() === '') {
      throw new InvalidParameterException('search string must not be empty', { context: this.context(caller) });
    }
  }

  private pageQuery(options: BrowseOptions): string {
    return queryString({ startFrom: options.startFrom ?? 0, pageSize: options.pageSize ?? this.pageSize });
  }

  private searchQuery(options: SearchOptions): string {
    return queryString({
      startFrom: options.startFrom ?? 0,
      pageSize: options.pageSize ?? this.pageSize,
      startsWith: options.startsWith ?? false,
      endsWith: options.endsWith ?? false,
      ignoreCase: options.ignoreCase ?? false,
      forLineage: options.forLineage ?? false,
      forDuplicateProcessing: options.forDuplicateProcessing ?? false,
    });
  }

  private effectiveTimeBody(options: BrowseOptions): Record<string, unknown> | undefined {
    return options.effectiveTime === undefined ? undefined : { effectiveTime: options.effectiveTime };
  }
}
