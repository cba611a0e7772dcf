/**
 * Renders element lists as markdown, markdown tables, flat records or
 * mermaid graphs.
 */

import type { OutputFormat } from '../constants.js';
import { type EgeriaElement, stringField } from '../elements.js';

/** Separator placed between elements in markdown output. */
export const MD_SEPARATOR = '\n---\n\n';

/**
 * Properties extracted from one element for display.
 * Keys are written in snake case and become attribute titles in markdown.
 */
export interface ExtractedProperties {
  guid: string;
  display_name: string;
  [key: string]: string;
}

/**
 * Extracts the display properties of one element.
 */
export type PropertyExtractor = (element: EgeriaElement) => ExtractedProperties;

/**
 * A column of a LIST table.
 */
export interface ColumnDefinition {
  /** Column heading */
  name: string;
  /** Key in the extracted properties */
  key: string;
  /** Escape the value for use inside a table cell */
  format?: boolean;
}

/**
 * Result of formatting: elements unchanged (JSON), flat records (DICT) or text.
 */
export type FormattedOutput = string | EgeriaElement[] | ExtractedProperties[];

/**
 * Renders the elements a query returned in a non-JSON output format.
 */
export type OutputGenerator = (
  elements: EgeriaElement[],
  searchString: string | undefined,
  entityType: string,
  outputFormat: OutputFormat
) => FormattedOutput;

/**
 * Formats `YYYY-MM-DD HH:MM` in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

/**
 * Builds the preamble of a markdown document and the heading used for each element.
 * The element heading is null for REPORT output.
 */
export function makePreamble(
  objectType: string,
  searchString: string | undefined,
  outputFormat: OutputFormat,
  now: Date = new Date()
): { preamble: string; elementsAction: string | null } {
  const search = searchString ? searchString : 'All Elements';
  const elementsAction = `Update ${objectType}`;
  if (outputFormat === 'FORM') {
    return {
      preamble:
        `\n# Update ${objectType} Form - created at ${formatTimestamp(now)}\n` +
        `\t ${objectType} found from the search string:  \`${search}\`\n\n`,
      elementsAction,
    };
  }
  if (outputFormat === 'REPORT') {
    return {
      preamble:
        `# ${objectType} Report - created at ${formatTimestamp(now)}\n` +
        `\t${objectType}  found from the search string:  \`${search}\`\n\n`,
      elementsAction: null,
    };
  }
  return { preamble: '', elementsAction };
}

/**
 * Title-cases each word of an attribute name, leaving acronyms alone.
 */
export function toTitle(name: string): string {
  return name
    .split(' ')
    .map((word) => (word.length === 0 ? word : word[0].toUpperCase() + word.slice(1)))
    .join(' ');
}

/**
 * One markdown attribute section. REPORT output omits empty values.
 */
export function makeMdAttribute(name: string, value: string | undefined, outputFormat: OutputFormat): string {
  const text = value ? value.trim() : '';
  const title = toTitle(name);
  if (outputFormat === 'REPORT' && text === '') {
    return '';
  }
  if (outputFormat === 'FORM' || outputFormat === 'MD' || outputFormat === 'REPORT') {
    return `## ${title}\n${text}\n\n`;
  }
  return '';
}

/**
 * Makes text safe for a markdown table cell.
 */
export function formatForMarkdownTable(text: string): string {
  if (!text) {
    return '';
  }
  return text.replace(/\n/g, ' ').replace(/\|/g, '\\|');
}

/**
 * Pluralises an entity type for headings.
 */
export function pluralise(entityType: string): string {
  return entityType.endsWith('y') ? `${entityType.slice(0, -1)}ies` : `${entityType}s`;
}

/**
 * Markdown sections for each element.
 */
export function generateEntityMd(
  elements: EgeriaElement[],
  elementsAction: string | null,
  outputFormat: OutputFormat,
  entityType: string,
  extract: PropertyExtractor
): string {
  const sections = elements.map((element) => {
    const props = extract(element);
    let md = '';
    if (outputFormat === 'FORM' || outputFormat === 'MD') {
      md += `# ${elementsAction ?? `Update ${entityType}`}\n\n`;
      md += `## ${entityType} Name \n\n${props.display_name}\n\n`;
    } else if (outputFormat === 'REPORT') {
      md += `# ${entityType} Name: ${props.display_name}\n\n`;
    } else {
      md += `## ${entityType} Name \n\n${props.display_name}\n\n`;
    }

    for (const [key, value] of Object.entries(props)) {
      if (key !== 'guid' && key !== 'display_name') {
        md += makeMdAttribute(key.replace(/_/g, ' '), value, outputFormat);
      }
    }
    md += makeMdAttribute('GUID', props.guid, outputFormat);
    return md;
  });
  return sections.join(MD_SEPARATOR);
}

/**
 * A markdown table with one row per element.
 */
export function generateEntityMdTable(
  elements: EgeriaElement[],
  searchString: string,
  entityType: string,
  extract: PropertyExtractor,
  columns: readonly ColumnDefinition[]
): string {
  const plural = pluralise(entityType);
  let md = `# ${plural} Table\n\n`;
  md += `${plural} found from the search string: \`${searchString}\`\n\n`;

  md += `| ${columns.map((column) => `${column.name} | `).join('')}\n`;
  md += `|${columns.map(() => '-------------|').join('')}\n`;

  for (const element of elements) {
    const props = extract(element);
    const cells = columns.map((column) => {
      const value = props[column.key] ?? '';
      return column.format ? formatForMarkdownTable(value) : value;
    });
    md += `| ${cells.map((cell) => `${cell} | `).join('')}\n`;
  }
  return md;
}

/**
 * Flat records of the extracted properties.
 */
export function generateEntityDict(
  elements: EgeriaElement[],
  extract: PropertyExtractor,
  includeKeys?: readonly string[],
  excludeKeys?: readonly string[]
): ExtractedProperties[] {
  return elements.map((element) => {
    const props = extract(element);
    const record: ExtractedProperties = { guid: props.guid, display_name: props.display_name };
    for (const [key, value] of Object.entries(props)) {
      if (key === 'guid' || key === 'display_name') {
        continue;
      }
      const included = includeKeys === undefined || includeKeys.includes(key);
      const excluded = excludeKeys !== undefined && excludeKeys.includes(key);
      if (included && !excluded) {
        record[key] = value;
      }
    }
    return record;
  });
}

/**
 * The mermaid graph of each element; `___` where there is none.
 */
export function extractMermaidOnly(elements: EgeriaElement[]): string {
  return elements.map((element) => stringField(element, 'mermaidGraph') ?? '___').join('\n');
}

/**
 * Formats elements in the requested output format.
 * JSON (and TABLE, which the CLI renders) return the elements unchanged.
 */
export function generateOutput(
  elements: EgeriaElement[],
  searchString: string | undefined,
  entityType: string,
  outputFormat: OutputFormat,
  extract: PropertyExtractor,
  columns?: readonly ColumnDefinition[],
  now: Date = new Date()
): FormattedOutput {
  const search = searchString ? searchString : 'All';
  switch (outputFormat) {
    case 'JSON':
    case 'TABLE':
      return elements;
    case 'MERMAID':
      return extractMermaidOnly(elements);
    case 'DICT':
      return generateEntityDict(elements, extract);
    case 'LIST':
      return generateEntityMdTable(elements, search, entityType, extract, columns ?? defaultColumns(entityType));
    case 'MD':
    case 'FORM':
    case 'REPORT': {
      const { preamble, elementsAction } = makePreamble(entityType, searchString, outputFormat, now);
      return preamble + generateEntityMd(elements, elementsAction, outputFormat, entityType, extract);
    }
  }
}

/**
 * Columns used for LIST output when a type has none of its own.
 */
export function defaultColumns(entityType: string): ColumnDefinition[] {
  return [
    { name: `${entityType} Name`, key: 'display_name' },
    { name: 'Qualified Name', key: 'qualified_name' },
    { name: 'Description', key: 'description', format: true },
  ];
}

/**
 * Output generator for one element type.
 */
export function outputGenerator(extract: PropertyExtractor, columns?: readonly ColumnDefinition[]): OutputGenerator {
  return (elements, searchString, entityType, outputFormat) =>
    generateOutput(elements, searchString, entityType, outputFormat, extract, columns);
}
