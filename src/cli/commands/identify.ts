/**
 * Identify Command
 *
 * Names the convention a file follows and where the datastore would put it.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { UnrecognisedFileError } from '../../datastore/core/errors.js';
import { formatDatastoreError } from '../../datastore/core/errors.js';
import type { PathHandler } from '../../datastore/core/path-handlers/index.js';
import { describeHandler } from './describe-handler.js';

export interface IdentifyCommandDeps {
  readonly findByPath: (filePath: string) => Result<PathHandler, UnrecognisedFileError>;
}

export function executeIdentifyCommand(filePath: string, deps: IdentifyCommandDeps): CliResult {
  const described = deps.findByPath(filePath).andThen(describeHandler);

  if (described.isErr()) {
    return failure(formatDatastoreError(described.error), {
      suggestions: described.error._tag === 'UnrecognisedFile' ? ['Check the file name against the naming conventions'] : undefined,
    });
  }

  return success({ message: `Recognised ${filePath}`, fields: described.value });
}
