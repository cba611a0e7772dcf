/**
 * Command processors by command name.
 */

import type { CommandResult, Directive, MarkdownContext } from '../MarkdownContext.js';
import { processBlueprintUpsertCommand } from './blueprint.js';
import { processCategoryUpsertCommand } from './category.js';
import { processGlossaryUpsertCommand } from './glossary.js';
import { LIST_COMMANDS, processListCommand } from './list.js';
import { processPersonalProjectUpsertCommand } from './project.js';
import { processTermUpsertCommand } from './term.js';

/**
 * Handles one command block.
 */
export type CommandProcessor = (context: MarkdownContext, txt: string, directive: Directive) => Promise<CommandResult>;

/** Command handled by the file processor itself. */
export const PROVENANCE_COMMAND = 'Provenance';

const PROCESSORS = new Map<string, CommandProcessor>([
  ['Create Glossary', processGlossaryUpsertCommand],
  ['Update Glossary', processGlossaryUpsertCommand],
  ['Create Category', processCategoryUpsertCommand],
  ['Update Category', processCategoryUpsertCommand],
  ['Create Term', processTermUpsertCommand],
  ['Update Term', processTermUpsertCommand],
  ['Create Personal Project', processPersonalProjectUpsertCommand],
  ['Update Personal Project', processPersonalProjectUpsertCommand],
  ['Create Solution Blueprint', processBlueprintUpsertCommand],
  ['Update Solution Blueprint', processBlueprintUpsertCommand],
  ['Create Blueprint', processBlueprintUpsertCommand],
  ['Update Blueprint', processBlueprintUpsertCommand],
  ...LIST_COMMANDS.map((command): [string, CommandProcessor] => [command, processListCommand]),
]);

/** Every command the processor recognises. */
export const COMMAND_LIST: readonly string[] = [...PROCESSORS.keys(), PROVENANCE_COMMAND];

/**
 * The processor of a command, or undefined for Provenance and unknown commands.
 */
export function dispatchCommand(command: string): CommandProcessor | undefined {
  return PROCESSORS.get(command);
}

export { processBlueprintUpsertCommand } from './blueprint.js';
export { processCategoryUpsertCommand } from './category.js';
export { processGlossaryUpsertCommand } from './glossary.js';
export { LIST_COMMANDS, LIST_OUTPUT_FORMATS, listingText, processListCommand, type ListCommand } from './list.js';
export { processPersonalProjectUpsertCommand } from './project.js';
export { processTermUpsertCommand } from './term.js';
