/**
 * CLI Result Interpreter
 *
 * The only place where a CliResult becomes a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toTerminationCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { OutputSink } from './output-formatter.js';
import { printResult, consoleSink } from './output-formatter.js';

/**
 * Print a CLI result, then terminate on failure. Success lets the process end
 * naturally so open handles (the Postgres pool) are closed by the caller.
 */
export function interpretCliResult(
  result: CliResult,
  terminator: ProcessTerminator,
  sink: OutputSink = consoleSink
): void {
  printResult(result, sink);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      terminator.terminate(toTerminationCode(result.exitCode));
  }
}
