/**
 * CLI Result Types
 *
 * Commands return these; the composition root prints them and decides the
 * exit code.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Structured output, kept apart from its styling.
 */
export interface CliOutput {
  readonly message: string;
  /** Printed as `key: value` lines under the message. */
  readonly fields?: readonly (readonly [string, string])[];
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { readonly kind: 'success'; readonly output?: CliOutput }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

/**
 * An operation failed; exit code 1 unless given.
 */
export function failure(
  message: string,
  options?: {
    readonly exitCode?: ExitCode;
    readonly details?: readonly string[];
    readonly suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Bad arguments or configuration; exit code 2.
 */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}
