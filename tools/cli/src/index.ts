/**
 * @egeria-sdk/cli
 *
 * The `egeria` command: list metadata elements and run Egeria Markdown files.
 */

export { buildProgram } from './program.js';
export { type CliRuntime, defaultRuntime, runAction } from './runtime.js';
export { type CliSettings, type GlobalOptions, resolveSettings } from './settings.js';
export { renderError, renderResult, renderTable, requestFormat } from './render.js';
export { glossaryGuidForName, registerListCommands } from './commands/list.js';
export { registerElementCommands } from './commands/element.js';
export { registerDrEgeriaCommand } from './commands/drEgeria.js';
