/**
 * CLI module — thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, resolveRunSettings, parsePositiveInt, parsePositiveNumber } from './run.js';
export type { RunOptions, RunSettings } from './run.js';
