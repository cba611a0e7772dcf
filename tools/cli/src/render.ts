/**
 * Terminal rendering of query results and errors.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { ErrorResponse } from '@egeria-sdk/core';
import { type OutputFormat, type QueryResult, propertyText, toTitle } from '@egeria-sdk/client';

/**
 * The format to request from the client: TABLE is drawn from DICT rows.
 */
export function requestFormat(format: OutputFormat): OutputFormat {
  return format === 'TABLE' ? 'DICT' : format;
}

/**
 * Draws records as a table, one column per key of the first record. Columns
 * share `width` once the natural table would be wider.
 */
export function renderTable(rows: ReadonlyArray<Record<string, unknown>>, width: number): string {
  if (rows.length === 0) {
    return '';
  }
  const keys = Object.keys(rows[0]);
  const cells = rows.map((row) => keys.map((key) => propertyText(row[key])));
  const natural = keys.map(
    (key, column) => Math.max(toTitle(key.replace(/_/g, ' ')).length, ...cells.map((row) => row[column].length)) + 2
  );
  const total = natural.reduce((sum, columnWidth) => sum + columnWidth, keys.length + 1);
  const share = Math.max(8, Math.floor((width - keys.length - 1) / keys.length));

  const table = new Table({
    head: keys.map((key) => chalk.bold.cyan(toTitle(key.replace(/_/g, ' ')))),
    colWidths: total > width ? natural.map((columnWidth) => Math.min(columnWidth, share)) : natural,
    wordWrap: true,
    style: { head: [] },
  });
  table.push(...cells);
  return table.toString();
}

/**
 * Text for a query result in the chosen format.
 */
export function renderResult(result: QueryResult, format: OutputFormat, width: number): string {
  if (typeof result === 'string') {
    return result;
  }
  if (format === 'TABLE') {
    return renderTable(Array.isArray(result) ? result : [result], width);
  }
  return JSON.stringify(result, null, 2);
}

/**
 * A failed command as a two-column table.
 */
export function renderError(error: ErrorResponse): string {
  const table = new Table({
    head: [chalk.red.bold('Exception Details'), chalk.red.bold(error.errorName ?? 'Error')],
    wordWrap: true,
    style: { head: [] },
  });
  table.push(...error.details.map(([label, value]) => [chalk.bold(label), value]));
  return table.toString();
}
