/**
 * CLI Types - Public API
 */

export type { ExitCode } from './exit-code.js';
export { toTerminationCode } from './exit-code.js';

export type { CliOutput, CliResult } from './cli-result.js';
export { success, failure, misuse } from './cli-result.js';
