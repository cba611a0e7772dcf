/**
 * @egeria-sdk/client
 *
 * REST clients for the Egeria view services.
 *
 * @example
 * ```typescript
 * import { GlossaryManager } from '@egeria-sdk/client';
 *
 * const client = new GlossaryManager({
 *   platformUrl: 'https://localhost:9443',
 *   viewServer: 'view-server',
 *   userId: 'erinoverview',
 *   userPassword: 'secret',
 * });
 * await client.createEgeriaBearerToken();
 *
 * // Raw elements
 * const glossaries = await client.findGlossaries('Sustainability');
 *
 * // Markdown rendering
 * const md = await client.getTermsForGlossary(glossaryGuid, { outputFormat: 'MD' });
 *
 * client.close();
 * ```
 */

// Re-export core types for convenience
export {
  EgeriaException,
  ConnectionException,
  InvalidParameterException,
  ClientException,
  UnauthorizedException,
  NotFoundException,
  ApiException,
  UnknownException,
  isEgeriaException,
  describeException,
  type ExceptionContext,
} from '@egeria-sdk/core';

export { BaseClient, DEFAULT_TIMEOUT_MS } from './BaseClient.js';
export {
  TokenSource,
  type HttpMethod,
  type RequestPayload,
  type RequestOptions,
  type EgeriaResponse,
  type ClientOptions,
  type IEgeriaClient,
} from './IEgeriaClient.js';
export { SessionState, type RequestInfo } from './SessionState.js';
export {
  ServerClient,
  NAME_PROPERTIES,
  queryString,
  type QueryResult,
  type QueryOptions,
  type FindOptions,
  type FilterOptions,
  type GetOptions,
  type ResultsOptions,
  type ElementIdentity,
} from './ServerClient.js';
export { EgeriaTech } from './EgeriaTech.js';

export * from './constants.js';
export * from './elements.js';
export * from './RequestBodies.js';

// Output rendering
export * from './output/OutputFormatter.js';
export * from './output/extractors.js';

// View-service clients
export { GlossaryBrowser, type BrowseOptions, type SearchOptions, type TermQueryOptions } from './resources/GlossaryBrowser.js';
export { GlossaryManager } from './resources/GlossaryManager.js';
export { ProjectManager, PROJECT_PROPERTY_CLASSES, type PersonalProjectProperties } from './resources/ProjectManager.js';
export { SolutionArchitect, type SupplyChainGetOptions } from './resources/SolutionArchitect.js';
export { GovernanceOfficer, GOVERNANCE_DEFINITION_PROPERTY_CLASSES } from './resources/GovernanceOfficer.js';
export { LocationArena } from './resources/LocationArena.js';
export { CollectionManager, COLLECTION_PROPERTY_CLASSES, type NewCollection } from './resources/CollectionManager.js';
export { AssetCatalog, type MetadataCollectionOptions } from './resources/AssetCatalog.js';
