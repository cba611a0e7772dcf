/**
 * Searches over the asset domain.
 */

import { NO_ELEMENTS_FOUND } from '../constants.js';
import { field, toElementList } from '../elements.js';
import type { ClientOptions } from '../IEgeriaClient.js';
import { COLUMNS, extractAssetProperties } from '../output/extractors.js';
import { outputGenerator } from '../output/OutputFormatter.js';
import {
  ServerClient,
  type FindOptions,
  type QueryOptions,
  type QueryResult,
  type ResultsOptions,
} from '../ServerClient.js';

const assetOutput = outputGenerator(extractAssetProperties, COLUMNS.Asset);

/** Options of getAssetsByMetadataCollectionId. */
export interface MetadataCollectionOptions extends QueryOptions {
  /** Limit to one asset type */
  typeName?: string;
  effectiveTime?: string;
}

/**
 * Client of the asset catalog view service.
 */
export class AssetCatalog extends ServerClient {
  private readonly assetsRoot: string;

  constructor(options: ClientOptions) {
    super(options);
    this.assetsRoot = `${this.commandRoot('asset-catalog')}/assets`;
  }

  /** Assets, and elements anchored to assets, matching a search string. */
  async findAssetsInDomain(searchString: string, options: FindOptions = {}): Promise<QueryResult> {
    return this.findRequest(`${this.assetsRoot}/in-domain/by-search-string`, 'Asset', assetOutput, searchString, options);
  }

  /** An asset with the elements anchored to it and their relationships. */
  async getAssetGraph(assetGuid: string, options: ResultsOptions = {}): Promise<QueryResult> {
    return this.getResultsRequest(`${this.assetsRoot}/${assetGuid}/as-graph`, 'Asset', assetOutput, options);
  }

  /** Assets homed in one metadata collection. */
  async getAssetsByMetadataCollectionId(
    metadataCollectionId: string,
    options: MetadataCollectionOptions = {}
  ): Promise<QueryResult> {
    const body = {
      filter: options.typeName,
      effectiveTime: options.effectiveTime,
      startFrom: options.startFrom ?? 0,
      pageSize: options.pageSize ?? this.pageSize,
    };
    const response = await this.post(
      `${this.assetsRoot}/by-metadata-collection-id/${metadataCollectionId}`,
      body,
      'getAssetsByMetadataCollectionId'
    );
    const elements = field(response.body, 'elements');
    if (elements === undefined || typeof elements === 'string') {
      this.log.info(NO_ELEMENTS_FOUND, { metadataCollectionId });
      return NO_ELEMENTS_FOUND;
    }
    const list = toElementList(elements);
    const format = options.outputFormat ?? 'JSON';
    if (format === 'JSON') {
      return list;
    }
    return assetOutput(list, metadataCollectionId, 'Asset', format);
  }

  /** Asset types the catalog knows about. */
  async getAssetCatalogTypes(): Promise<unknown[] | typeof NO_ELEMENTS_FOUND> {
    const response = await this.makeRequest('GET', `${this.assetsRoot}/types`, undefined, {
      caller: 'getAssetCatalogTypes',
    });
    const types = field(response.body, 'types');
    return Array.isArray(types) ? types : NO_ELEMENTS_FOUND;
  }
}
