/**
 * Find and Latest Commands
 *
 * Resolve a file name to its stored path. `find` honours an explicit
 * discriminator in the name; `latest` always resolves the highest one.
 */

import type { Result, ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { UnrecognisedFileError } from '../../datastore/core/errors.js';
import { formatDatastoreError } from '../../datastore/core/errors.js';
import type { PathHandler } from '../../datastore/core/path-handlers/index.js';
import type { FinderError, MatchedFile } from '../../datastore/finder/datastore-file-finder.js';
import { describeHandler } from './describe-handler.js';

export interface FindCommandDeps {
  readonly findByPath: (filePath: string) => Result<PathHandler, UnrecognisedFileError>;
  readonly findMatchingFile: (handler: PathHandler) => ResultAsync<string, FinderError>;
}

export interface LatestCommandDeps {
  readonly findByPath: (filePath: string) => Result<PathHandler, UnrecognisedFileError>;
  readonly findLatestVersion: (handler: PathHandler) => ResultAsync<MatchedFile, FinderError>;
}

export async function executeFindCommand(name: string, deps: FindCommandDeps): Promise<CliResult> {
  const handler = deps.findByPath(name);
  if (handler.isErr()) return failure(formatDatastoreError(handler.error));

  const found = await deps.findMatchingFile(handler.value);
  if (found.isErr()) return failure(formatDatastoreError(found.error));

  return success({ message: `Found ${name}`, fields: [['path', found.value]] });
}

export async function executeLatestCommand(name: string, deps: LatestCommandDeps): Promise<CliResult> {
  const handler = deps.findByPath(name);
  if (handler.isErr()) return failure(formatDatastoreError(handler.error));

  const latest = await deps.findLatestVersion(handler.value);
  if (latest.isErr()) return failure(formatDatastoreError(latest.error));

  const described = describeHandler(latest.value.handler);
  return success({
    message: `Latest stored file for ${name}`,
    fields: [
      ['path', latest.value.path],
      ...(described.isOk() ? described.value.filter(([key]) => key === 'version' || key === 'part') : []),
    ],
  });
}
