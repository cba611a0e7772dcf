/**
 * @egeria-sdk/markdown
 *
 * Egeria Markdown: documents whose `# Create Glossary`, `# Update Term`,
 * `# List Projects` ... blocks are run against a view server.
 *
 * @example
 * ```typescript
 * import { EgeriaTech } from '@egeria-sdk/client';
 * import { processMarkdownFile } from '@egeria-sdk/markdown';
 *
 * const client = new EgeriaTech({ platformUrl, viewServer, userId, userPassword });
 * await client.createEgeriaBearerToken();
 * const result = await processMarkdownFile(client, {
 *   inputFile: 'glossary.md',
 *   directive: 'process',
 *   inbox: 'dr_egeria_inbox',
 *   outbox: 'dr_egeria_outbox',
 * });
 * ```
 */

export {
  ERROR,
  INFO,
  WARNING,
  PRE_COMMAND,
  MESSAGE_PREFIX,
  type MessageLevel,
  escapeRegExp,
  extractCommand,
  extractCommandPlus,
  extractAttribute,
  processSimpleAttribute,
  logMessage,
  isValidIsoDate,
  splitList,
  updateACommand,
  processProvenanceCommand,
} from './extraction.js';

export { ElementDictionary, defaultElementDictionary, type ElementEntry } from './ElementDictionary.js';
export {
  MarkdownContext,
  DIRECTIVES,
  isDirective,
  type Directive,
  type CommandResult,
} from './MarkdownContext.js';
export {
  ELEMENT_NAME_PROPERTIES,
  getElementByName,
  processElementIdentifiers,
  type ElementLookup,
  type ElementIdentifiers,
} from './identifiers.js';

export * from './commands/index.js';

export {
  FAILED_BLOCK_MARKER,
  processMarkdownFile,
  processedFileName,
  type ProcessFileOptions,
  type ProcessFileResult,
} from './FileProcessor.js';
