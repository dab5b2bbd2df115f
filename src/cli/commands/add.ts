/**
 * Add Command
 *
 * Identifies a local file and places it in the datastore, optionally
 * recording it in the index.
 */

import type { Result, ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { DatastoreError, UnrecognisedFileError } from '../../datastore/core/errors.js';
import { formatDatastoreError } from '../../datastore/core/errors.js';
import type { PathHandler } from '../../datastore/core/path-handlers/index.js';
import type { AddFileResult, AddOutcome } from '../../datastore/manager/types.js';
import type { IndexedAddFileOptions } from '../../datastore/manager/indexed-datastore-file-manager.js';
import type { JsonObject } from '../../datastore/ports/index-store.port.js';
import { isJsonObject } from '../../datastore/ports/index-store.port.js';
import { assertNever } from '../../runtime/assert-never.js';
import { describeHandler } from './describe-handler.js';

export interface AddCommandDeps {
  readonly findByPath: (filePath: string) => Result<PathHandler, UnrecognisedFileError>;
  /** Plain or indexed manager, chosen by the composition root from `--indexed`. */
  readonly addFile: (
    filePath: string,
    handler: PathHandler,
    options: IndexedAddFileOptions
  ) => ResultAsync<AddFileResult, DatastoreError>;
}

export interface AddCommandOptions {
  readonly move?: boolean;
  readonly indexed?: boolean;
  /** JSON object text, stored with the index record. */
  readonly metadata?: string;
}

type MetadataParse = { readonly ok: true; readonly value: JsonObject | undefined } | { readonly ok: false; readonly reason: string };

function parseMetadata(raw: string | undefined): MetadataParse {
  if (raw === undefined) return { ok: true, value: undefined };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }
  return isJsonObject(parsed) ? { ok: true, value: parsed } : { ok: false, reason: 'metadata must be a JSON object' };
}

function outcomeMessage(outcome: AddOutcome, filePath: string): string {
  switch (outcome) {
    case 'added':
      return `Stored ${filePath}`;
    case 'duplicate':
      return `Identical file already stored; ${filePath} not copied`;
    case 'overwritten':
      return `Replaced the stored copy of ${filePath}`;
    default:
      return assertNever(outcome);
  }
}

export async function executeAddCommand(
  filePath: string,
  deps: AddCommandDeps,
  options: AddCommandOptions = {}
): Promise<CliResult> {
  if (options.metadata !== undefined && !options.indexed) {
    return misuse('--metadata is only stored in indexed mode', ['Add --indexed']);
  }

  const metadata = parseMetadata(options.metadata);
  if (!metadata.ok) {
    return misuse(`Invalid --metadata: ${metadata.reason}`);
  }

  const handler = deps.findByPath(filePath);
  if (handler.isErr()) {
    return failure(formatDatastoreError(handler.error));
  }

  const added = await deps.addFile(filePath, handler.value, {
    transfer: options.move ? 'move' : 'copy',
    metadata: metadata.value,
  });

  if (added.isErr()) {
    return failure(formatDatastoreError(added.error));
  }

  const { path, outcome, fingerprint } = added.value;
  const described = describeHandler(added.value.handler);

  return success({
    message: outcomeMessage(outcome, filePath),
    fields: [
      ['path', path],
      ['outcome', outcome],
      ['fingerprint', fingerprint],
      ...(described.isOk() ? described.value.filter(([key]) => key === 'version' || key === 'part') : []),
    ],
  });
}
