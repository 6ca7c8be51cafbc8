/**
 * @respack/cli
 *
 * Programmatic access to the `respack` command-line front end. Each
 * command body is exported separately so it can run against any
 * registry.
 */

export { VERSION, buildProgram } from './commands/index.js';
export { runGet } from './commands/get.js';
export type { GetOptions } from './commands/get.js';
export { runInfo } from './commands/info.js';
export { runList } from './commands/list.js';
export type { ListOptions } from './commands/list.js';
export { runPacks } from './commands/packs.js';
export type { PacksOptions } from './commands/packs.js';
export { lookupResource } from './commands/lookup.js';
export type { ResourceLookup } from './commands/lookup.js';
export type { CliDeps, CommandContext, GlobalOptions, RegistryFactory } from './context.js';
export { defaultDeps, execute, registryOptionsFrom, reportFailure } from './context.js';
export { ExitCode, exitCodeFor } from './exit-codes.js';
export { capitalize, formatSize, formatValue, matchesGlob } from './format.js';
export type { CliIO } from './io.js';
export { processIO } from './io.js';
export type { Theme } from './theme.js';
export { createTheme } from './theme.js';
