/**
 * Processes an Egeria Markdown document block by block and writes the
 * processed document to the outbox.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { InvalidParameterException, createLogger } from '@egeria-sdk/core';
import { type EgeriaTech, formatTimestamp } from '@egeria-sdk/client';
import { COMMAND_LIST, PROVENANCE_COMMAND, dispatchCommand } from './commands/index.js';
import type { ElementDictionary } from './ElementDictionary.js';
import { extractCommand, processProvenanceCommand } from './extraction.js';
import { type Directive, MarkdownContext } from './MarkdownContext.js';

const log = createLogger('markdown:file');

/** Appended after a block whose command could not be processed. */
export const FAILED_BLOCK_MARKER = '\n____\n';

export interface ProcessFileOptions {
  /** File name within the inbox, or an absolute path */
  inputFile: string;
  directive: Directive;
  inbox?: string;
  outbox?: string;
  /** Dictionary to resolve names through; a fresh one by default */
  dictionary?: ElementDictionary;
  now?: Date;
}

export interface ProcessFileResult {
  /** Whether any command changed the document */
  updated: boolean;
  /** Where the processed document was written, when it was */
  outputPath?: string;
  output: string;
  messages: string[];
}

/**
 * Name of the processed copy of a document, e.g.
 * `processed-2025-03-04-09-15-glossary.md`.
 */
export function processedFileName(inputFile: string, now: Date = new Date()): string {
  const stamp = formatTimestamp(now).replace(/[ :]/g, '-');
  return `processed-${stamp}-${basename(inputFile)}`;
}

/**
 * Runs every command of a document. With the `process` directive, a document
 * that changed is written to the outbox with a provenance section appended.
 * @throws InvalidParameterException when the input file cannot be read
 */
export async function processMarkdownFile(client: EgeriaTech, options: ProcessFileOptions): Promise<ProcessFileResult> {
  const { inputFile, directive, now = new Date() } = options;
  const context = new MarkdownContext(client, options.dictionary);
  const inputPath = resolve(options.inbox ?? '', inputFile);

  let text: string;
  try {
    text = await readFile(inputPath, 'utf8');
  } catch (error) {
    throw new InvalidParameterException(`cannot read markdown file ${inputPath}`, {
      context: { className: 'FileProcessor', callerMethod: 'processMarkdownFile' },
      cause: error,
    });
  }
  log.info('Processing markdown file', { inputPath, directive });

  const output: string[] = [];
  let updated = false;
  let provenance = '';

  // Resolves to true when the block was replaced by its processed form.
  const processBlock = async (block: string): Promise<boolean> => {
    // A processed document heads its provenance `# Provenance:`.
    const command = extractCommand(block)?.replace(/:$/, '') ?? null;
    if (command === null || !COMMAND_LIST.includes(command)) {
      if (command !== null) {
        context.report(`\n===> Unknown command: ${command}`, 'WARNING');
      }
      output.push(block);
      return false;
    }
    if (command === PROVENANCE_COMMAND) {
      provenance = block;
      return false;
    }

    const processor = dispatchCommand(command);
    const result = processor === undefined ? null : await processor(context, block, directive);
    if (directive !== 'process') {
      output.push(block);
      return false;
    }
    if (typeof result === 'string') {
      output.push(result);
      return true;
    }
    context.report(
      `\n==>\tErrors found while processing command: '${command}'\n\tPlease correct and try again. \n`,
      'ERROR'
    );
    output.push(block, FAILED_BLOCK_MARKER);
    return false;
  };

  let block = '';
  let inBlock = false;
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('# ')) {
      if (inBlock && (await processBlock(block))) {
        updated = true;
      }
      block = line;
      inBlock = true;
    } else if (inBlock && (line.startsWith('---') || line.startsWith('___'))) {
      if (await processBlock(`${block}\n${line}`)) {
        updated = true;
      }
      block = '';
      inBlock = false;
    } else if (inBlock) {
      block += `\n${line}`;
    } else {
      output.push(line);
    }
  }
  if (inBlock && (await processBlock(block))) {
    updated = true;
  }

  const document = output.join('\n') + processProvenanceCommand(inputFile, provenance, now);
  if (!updated) {
    return { updated, output: document, messages: context.messages };
  }

  const outbox = resolve(options.outbox ?? '');
  await mkdir(outbox, { recursive: true });
  const outputPath = join(outbox, processedFileName(inputFile, now));
  await writeFile(outputPath, document, 'utf8');
  log.info('Wrote processed markdown file', { outputPath });
  return { updated, outputPath, output: document, messages: context.messages };
}
