/**
 * Sentinel results returned when a query matches nothing.
 */
export const NO_ELEMENTS_FOUND = 'No elements found';
export const NO_GLOSSARIES_FOUND = 'No glossaries found';
export const NO_CATEGORIES_FOUND = 'No categories found';
export const NO_TERMS_FOUND = 'No terms found';
export const NO_PROJECTS_FOUND = 'No projects found';
export const NO_GUID_RETURNED = 'NO_GUID_RETURNED';

/**
 * Sentinel strings a query may return in place of a list.
 */
export type NotFound =
  | typeof NO_ELEMENTS_FOUND
  | typeof NO_GLOSSARIES_FOUND
  | typeof NO_CATEGORIES_FOUND
  | typeof NO_TERMS_FOUND
  | typeof NO_PROJECTS_FOUND;

/**
 * Lifecycle states a glossary term may be created or moved into.
 */
export const TERM_STATUS = [
  'DRAFT',
  'PREPARED',
  'PROPOSED',
  'APPROVED',
  'REJECTED',
  'ACTIVE',
  'DEPRECATED',
  'OTHER',
] as const;

export type TermStatus = (typeof TERM_STATUS)[number];

/**
 * Check if a value is a valid term status.
 */
export function isTermStatus(value: string): value is TermStatus {
  return TERM_STATUS.some((status) => status === value);
}

/**
 * Output formats understood by the query methods and the output formatter.
 *
 * - JSON: elements as returned by the platform
 * - DICT: one flat record of extracted properties per element
 * - LIST: markdown table
 * - MD / FORM / REPORT: markdown sections (FORM and REPORT add a preamble)
 * - MERMAID: the mermaid graph the platform attaches to each element
 * - TABLE: console table (rendered by the CLI from DICT rows)
 */
export const OUTPUT_FORMATS = ['JSON', 'DICT', 'LIST', 'MD', 'FORM', 'REPORT', 'MERMAID', 'TABLE'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Check if a value names an output format.
 */
export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Normalises a user-supplied output format, falling back when unknown.
 */
export function toOutputFormat(value: string | undefined, fallback: OutputFormat = 'JSON'): OutputFormat {
  const upper = value?.trim().toUpperCase() ?? '';
  return isOutputFormat(upper) ? upper : fallback;
}

const NOT_FOUND_RESULTS: readonly string[] = [
  NO_ELEMENTS_FOUND,
  NO_GLOSSARIES_FOUND,
  NO_CATEGORIES_FOUND,
  NO_TERMS_FOUND,
  NO_PROJECTS_FOUND,
];

/**
 * Check if a query result is one of the "nothing found" sentinels.
 */
export function isNotFound(value: unknown): value is NotFound {
  return typeof value === 'string' && NOT_FOUND_RESULTS.includes(value);
}
