import { describe, it, expect } from 'vitest';
import { interpretCliResult } from '../../../src/cli/interpret-result.js';
import type { OutputSink } from '../../../src/cli/output-formatter.js';
import { failure, misuse, success } from '../../../src/cli/types/cli-result.js';
import {
  ProcessTerminationRequested,
  ThrowingProcessTerminator,
} from '../../../src/runtime/adapters/throwing-process-terminator.js';
import { toNumericExitCode } from '../../../src/runtime/adapters/node-process-terminator.js';

function captureSink(): OutputSink & { readonly stdout: string[]; readonly stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return { stdout, stderr, out: (t) => void stdout.push(t), err: (t) => void stderr.push(t) };
}

function terminationOf(run: () => void): ProcessTerminationRequested | undefined {
  try {
    run();
    return undefined;
  } catch (e) {
    if (e instanceof ProcessTerminationRequested) return e;
    throw e;
  }
}

describe('interpretCliResult', () => {
  it('prints successes to stdout and lets the process end', () => {
    const sink = captureSink();

    const terminated = terminationOf(() =>
      interpretCliResult(success({ message: 'Found it', fields: [['path', '/store/a.cdf']] }), new ThrowingProcessTerminator(), sink)
    );

    expect(terminated).toBeUndefined();
    expect(sink.stdout).toHaveLength(1);
    expect(sink.stdout[0]).toContain('Found it');
    expect(sink.stdout[0]).toContain('/store/a.cdf');
    expect(sink.stderr).toEqual([]);
  });

  it('prints failures to stderr and exits 1', () => {
    const sink = captureSink();

    const terminated = terminationOf(() =>
      interpretCliResult(failure('File /in/a.cdf does not exist.'), new ThrowingProcessTerminator(), sink)
    );

    expect(terminated?.code).toEqual({ kind: 'failure' });
    expect(toNumericExitCode({ kind: 'failure' })).toBe(1);
    expect(sink.stderr[0]).toContain('File /in/a.cdf does not exist.');
  });

  it('exits 2 on misuse', () => {
    const terminated = terminationOf(() =>
      interpretCliResult(misuse('No datastore root configured'), new ThrowingProcessTerminator(), captureSink())
    );

    expect(terminated?.code).toEqual({ kind: 'misuse' });
    expect(toNumericExitCode({ kind: 'misuse' })).toBe(2);
  });
});
