import type { TerminationCode } from '../../runtime/ports/process-terminator.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Typed exit codes for CLI commands, following Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' } // 0
  | { kind: 'general_error' } // 1: an operation failed (I/O, unrecognised file, not found)
  | { kind: 'misuse' }; // 2: bad arguments or missing configuration

export function toTerminationCode(exitCode: ExitCode): TerminationCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
    default:
      return assertNever(exitCode);
  }
}
