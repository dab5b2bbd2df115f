import type { TerminationCode, ProcessTerminator } from '../ports/process-terminator.js';

export class ProcessTerminationRequested extends Error {
  constructor(readonly code: TerminationCode) {
    super(`[ProcessTerminator] terminate(${code.kind})`);
    this.name = 'ProcessTerminationRequested';
  }
}

/**
 * Test adapter: never exits the process. Tests catch the error and assert
 * on its `code`.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: TerminationCode): never {
    throw new ProcessTerminationRequested(code);
  }
}
