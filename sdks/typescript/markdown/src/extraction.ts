/**
 * Text extraction for Egeria Markdown.
 *
 * A command block starts with a `# <Action> <Object Type>` heading and carries
 * its attributes as `## <Label>` sections. Blocks are scanned with regular
 * expressions; there is no markdown grammar.
 */

import { basename } from 'node:path';
import { createLogger } from '@egeria-sdk/core';
import { formatTimestamp } from '@egeria-sdk/client';

const log = createLogger('markdown');

export const ERROR = 'ERROR-> ';
export const INFO = 'INFO- ';
export const WARNING = 'WARNING-> ';

/** Heading logged before each command is processed. */
export const PRE_COMMAND = '\n---\n==> Processing command:';

/**
 * Severity of a processing message.
 */
export type MessageLevel = 'ERROR' | 'WARNING' | 'INFO';

export const MESSAGE_PREFIX: Record<MessageLevel, string> = {
  ERROR,
  WARNING,
  INFO,
};

/**
 * Escapes text for use inside a RegExp.
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function dropQuotedLines(text: string): string {
  return text
    .split('\n')
    .filter((line) => !line.trimStart().startsWith('>'))
    .join('\n');
}

/**
 * The command named by the first heading of a block, e.g. `Create Glossary`.
 * Quoted (`>`) lines are ignored.
 */
export function extractCommand(block: string): string | null {
  const match = /#(.*?)(?:##|\n|$)/.exec(dropQuotedLines(block));
  return match ? match[1].trim() : null;
}

/**
 * The command split into its action and object type:
 * `Create Solution Blueprint` gives `['Create', 'Solution Blueprint']`.
 */
export function extractCommandPlus(block: string): [action: string, objectType: string] | null {
  const command = extractCommand(block);
  if (!command) {
    return null;
  }
  const [action, ...rest] = command.split(/\s+/);
  return [action, rest.join(' ')];
}

/**
 * The text of the first `## <label>` section found, trying each label in turn.
 * The section ends at the next `#`, at `___`, or at the end of the block.
 */
export function extractAttribute(text: string, labels: readonly string[]): string | null {
  const cleaned = text.replace(/\n{3,}/g, '\n\n').trim();
  for (const label of labels) {
    const pattern = new RegExp(`##\\s*${escapeRegExp(label)}\\s*\\n(?:\\s*\\n)*?(.*?)(?:#|___|$)`, 's');
    const match = pattern.exec(cleaned);
    if (match) {
      const extracted = dropQuotedLines(match[1]).replace(/\n+/g, '\n').trim();
      if (extracted) {
        return extracted;
      }
    }
  }
  return null;
}

/**
 * Extracts an attribute and logs `No <label> found` at the given level when
 * it is missing.
 */
export function processSimpleAttribute(
  text: string,
  labels: readonly string[],
  ifMissing: MessageLevel = 'INFO'
): string | null {
  const value = extractAttribute(text, labels);
  if (value === null) {
    logMessage(`${MESSAGE_PREFIX[ifMissing]}No ${labels[0]} found`, ifMissing);
  }
  return value;
}

/**
 * Logs a processing message at the level its severity maps to.
 */
export function logMessage(message: string, level: MessageLevel = 'INFO'): void {
  if (level === 'ERROR') {
    log.error(message);
  } else if (level === 'WARNING') {
    log.warn(message);
  } else {
    log.info(message);
  }
}

/**
 * Whether text is a `YYYY-MM-DD` date that exists on the calendar.
 */
export function isValidIsoDate(text: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Splits a comma or newline separated list.
 */
export function splitList(text: string): string[] {
  return text
    .split(/[,\n]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function insertBefore(text: string, pattern: RegExp, section: string): string {
  const match = pattern.exec(text);
  if (!match) {
    return `${text}${text.endsWith('\n') ? '' : '\n'}${section}`;
  }
  return text.slice(0, match.index) + section + text.slice(match.index);
}

/**
 * Rewrites a command block so that it can be resubmitted: Create becomes
 * Update and anything else becomes Create. An Update also gains the element's
 * Qualified Name and GUID sections when they are missing.
 */
export function updateACommand(
  txt: string,
  action: string,
  objectType: string,
  qualifiedName?: string | null,
  guid?: string | null
): string {
  const newAction = action === 'Create' ? 'Update' : 'Create';
  const heading = new RegExp(`#\\s*${escapeRegExp(action)}\\s+${escapeRegExp(objectType)}`);
  let updated = txt.replace(heading, `# ${newAction} ${objectType}`);

  if (newAction === 'Update' && qualifiedName && guid) {
    if (!/##\s*Qualified Name/.test(updated)) {
      updated = insertBefore(updated, /^##/m, `## Qualified Name\n${qualifiedName}\n\n`);
    }
    if (!/##\s*GUID/.test(updated)) {
      updated = insertBefore(updated, /^##(?!\s*Qualified Name)/m, `## GUID\n${guid}\n\n`);
    }
  }
  return updated;
}

/**
 * The provenance section of a processed document: earlier provenance lines
 * followed by a line naming the file just processed.
 */
export function processProvenanceCommand(filePath: string, txt: string, now: Date = new Date()): string {
  const existing = extractAttribute(txt, ['Provenance']) ?? provenanceBody(txt);
  return (
    `\n\n\n# Provenance:\n \n${existing}\n` +
    `* Derived from processing file ${basename(filePath)} on ${formatTimestamp(now)}\n`
  );
}

function provenanceBody(txt: string): string {
  return txt
    .split('\n')
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('---') && !line.startsWith('___'))
    .join('\n');
}
