/**
 * State shared by the command processors while one document is processed.
 */

import type { EgeriaTech } from '@egeria-sdk/client';
import { ElementDictionary } from './ElementDictionary.js';
import { logMessage, type MessageLevel } from './extraction.js';

/**
 * How a command is handled:
 * - display: log a preview of the parsed command
 * - validate: check the command against the platform
 * - process: validate, then create or update the element
 */
export type Directive = 'display' | 'validate' | 'process';

export const DIRECTIVES: readonly Directive[] = ['display', 'validate', 'process'];

export function isDirective(value: string): value is Directive {
  return DIRECTIVES.some((directive) => directive === value);
}

/**
 * Result of a command processor: a replacement block, a validation verdict,
 * or null when there is nothing to output.
 */
export type CommandResult = string | boolean | null;

/**
 * Client, element dictionary and collected messages of a processing session.
 */
export class MarkdownContext {
  readonly client: EgeriaTech;
  readonly dictionary: ElementDictionary;
  readonly messages: string[] = [];

  constructor(client: EgeriaTech, dictionary: ElementDictionary = new ElementDictionary()) {
    this.client = client;
    this.dictionary = dictionary;
  }

  /**
   * Logs a message and keeps it for the processing report.
   */
  report(message: string, level: MessageLevel = 'INFO'): void {
    this.messages.push(message);
    logMessage(message, level);
  }
}
